import { BadGatewayException, Injectable, Logger } from '@nestjs/common';
import type { TorrentRecord } from '../orphans/orphans.types';
import { categoryIdFromClient } from '../orphans/orphans.types';
import type {
  QbittorrentConnection,
  QbittorrentSession,
  QbittorrentTorrent,
  QbittorrentTorrentFile,
} from './qbittorrent.types';

type RawResponse = {
  status: number;
  body: string;
  setCookie: string | null;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function asString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function toTorrent(value: unknown): QbittorrentTorrent | null {
  if (!isRecord(value)) return null;
  const hash = asString(value.hash).trim();
  if (!hash) return null;
  const savePath = asString(value.save_path).trim();
  return {
    hash,
    name: asString(value.name) || hash,
    category: asString(value.category),
    savePath: savePath || null,
  };
}

function toTorrentFile(value: unknown): QbittorrentTorrentFile | null {
  if (!isRecord(value)) return null;
  const name = asString(value.name);
  if (!name) return null;
  const size =
    typeof value.size === 'number' && Number.isFinite(value.size) ? value.size : 0;
  return { name, size };
}

/** Non-2xx answer from the Web API. */
export class QbittorrentHttpError extends BadGatewayException {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
  }
}

export function parseSidCookie(setCookie: string | null): string {
  const match = /(?:^|[;,]\s*)SID=([^;,\s]+)/.exec(setCookie ?? '');
  return match ? `SID=${match[1]}` : '';
}

@Injectable()
export class QbittorrentService {
  private readonly logger = new Logger(QbittorrentService.name);

  async login(connection: QbittorrentConnection): Promise<QbittorrentSession> {
    const { baseUrl, username, password, timeoutMs } = connection;
    const res = await this.send({
      action: 'login',
      url: this.buildApiUrl(baseUrl, 'api/v2/auth/login'),
      timeoutMs,
      init: {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          // qBittorrent rejects requests whose Referer/Origin does not match its host.
          Referer: baseUrl,
        },
        body: new URLSearchParams({ username, password }).toString(),
      },
    });

    const text = res.body.trim();
    if (text !== 'Ok.') {
      throw new BadGatewayException(
        `qBittorrent login failed: ${text || `HTTP ${res.status}`}`,
      );
    }

    const cookie = parseSidCookie(res.setCookie);
    if (!cookie) {
      this.logger.debug('qBittorrent login returned no SID cookie (auth bypass?)');
    }
    return { baseUrl, cookie, timeoutMs };
  }

  async getVersion(session: QbittorrentSession): Promise<string> {
    const res = await this.get(session, 'get version', 'api/v2/app/version');
    return res.body.trim();
  }

  async listTorrents(session: QbittorrentSession): Promise<QbittorrentTorrent[]> {
    const data = await this.getJson(session, 'list torrents', 'api/v2/torrents/info');
    if (!Array.isArray(data)) return [];
    const out: QbittorrentTorrent[] = [];
    for (const item of data) {
      const torrent = toTorrent(item);
      if (torrent) out.push(torrent);
    }
    return out;
  }

  async listTorrentFiles(
    session: QbittorrentSession,
    hash: string,
  ): Promise<QbittorrentTorrentFile[]> {
    const data = await this.getJson(
      session,
      'list torrent files',
      `api/v2/torrents/files?${new URLSearchParams({ hash }).toString()}`,
    );
    if (!Array.isArray(data)) return [];
    const out: QbittorrentTorrentFile[] = [];
    for (const item of data) {
      const file = toTorrentFile(item);
      if (file) out.push(file);
    }
    return out;
  }

  async testConnection(connection: QbittorrentConnection) {
    this.logger.log(`Testing qBittorrent connection: ${connection.baseUrl}`);
    const session = await this.login(connection);
    const version = await this.getVersion(session);
    return { ok: true as const, version };
  }

  /** Every managed torrent with its file list, in the shape the tracked index expects. */
  async fetchTorrentRecords(
    connection: QbittorrentConnection,
  ): Promise<TorrentRecord[]> {
    const session = await this.login(connection);
    const torrents = await this.listTorrents(session);
    this.logger.log(`qBittorrent reports ${torrents.length} torrent(s)`);

    const records: TorrentRecord[] = [];
    for (const torrent of torrents) {
      const files = await this.listTorrentFilesIfPresent(session, torrent);
      records.push({
        hash: torrent.hash,
        name: torrent.name,
        category: categoryIdFromClient(torrent.category),
        savePath: torrent.savePath,
        files,
      });
    }
    return records;
  }

  // The torrent can be removed between torrents/info and torrents/files; the API answers 404.
  private async listTorrentFilesIfPresent(
    session: QbittorrentSession,
    torrent: QbittorrentTorrent,
  ): Promise<QbittorrentTorrentFile[] | null> {
    try {
      return await this.listTorrentFiles(session, torrent.hash);
    } catch (err) {
      if (err instanceof QbittorrentHttpError && err.status === 404) {
        this.logger.warn(`Torrent ${torrent.name} (${torrent.hash}) disappeared while listing files`);
        return null;
      }
      throw err;
    }
  }

  private async getJson(
    session: QbittorrentSession,
    action: string,
    path: string,
  ): Promise<unknown> {
    const res = await this.get(session, action, path);
    try {
      const parsed: unknown = JSON.parse(res.body);
      return parsed;
    } catch (err) {
      throw new BadGatewayException(
        `qBittorrent ${action} failed: invalid JSON (${err instanceof Error ? err.message : String(err)})`,
      );
    }
  }

  private get(session: QbittorrentSession, action: string, path: string) {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      Referer: session.baseUrl,
    };
    if (session.cookie) headers.Cookie = session.cookie;
    return this.send({
      action,
      url: this.buildApiUrl(session.baseUrl, path),
      timeoutMs: session.timeoutMs,
      init: { method: 'GET', headers },
    });
  }

  private async send(params: {
    action: string;
    url: string;
    timeoutMs: number;
    init: RequestInit;
  }): Promise<RawResponse> {
    const { action, url, timeoutMs, init } = params;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const res = await fetch(url, { ...init, signal: controller.signal });
      if (!res.ok) {
        const body = await res.text().catch(() => '');
        throw new QbittorrentHttpError(
          res.status,
          `qBittorrent ${action} failed: HTTP ${res.status} ${body}`.trim(),
        );
      }
      const body = await res.text();
      return { status: res.status, body, setCookie: res.headers.get('set-cookie') };
    } catch (err) {
      if (err instanceof BadGatewayException) throw err;
      throw new BadGatewayException(
        `qBittorrent ${action} failed: ${err instanceof Error ? err.message : String(err)}`,
      );
    } finally {
      clearTimeout(timeout);
    }
  }

  private buildApiUrl(baseUrl: string, path: string) {
    const normalized = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
    return new URL(path, normalized).toString();
  }
}
