export type QbittorrentConnection = {
  baseUrl: string;
  username: string;
  password: string;
  timeoutMs: number;
};

export type QbittorrentSession = {
  baseUrl: string;
  /** `SID=...`, or empty when the client bypasses auth for this host. */
  cookie: string;
  timeoutMs: number;
};

// Subset of /api/v2/torrents/info we rely on.
export type QbittorrentTorrent = {
  hash: string;
  name: string;
  category: string;
  savePath: string | null;
};

// Subset of /api/v2/torrents/files.
export type QbittorrentTorrentFile = {
  name: string;
  size: number;
};
