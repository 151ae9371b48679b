import { BadGatewayException } from '@nestjs/common';
import type { OrphanDiagnostic } from './orphans.types';

function messageOf(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * The download client could not be reached or refused the session.
 * Fatal: the run ends before any file is classified.
 */
export class ClientUnavailableError extends BadGatewayException {
  constructor(cause: unknown) {
    super(`qBittorrent unavailable: ${messageOf(cause)}`, { cause });
  }
}

export class ResolutionError extends Error {
  readonly torrentHash: string;
  readonly torrentName: string;

  constructor(params: { torrentHash: string; torrentName: string; reason: string }) {
    super(
      `Cannot resolve files of torrent ${params.torrentName} (${params.torrentHash}): ${params.reason}`,
    );
    this.name = 'ResolutionError';
    this.torrentHash = params.torrentHash;
    this.torrentName = params.torrentName;
  }

  toDiagnostic(): OrphanDiagnostic {
    return {
      kind: 'resolution',
      torrentHash: this.torrentHash,
      torrentName: this.torrentName,
      message: this.message,
    };
  }
}

export class ScanError extends Error {
  readonly category: string;
  readonly path: string;

  constructor(params: { category: string; path: string; cause: unknown }) {
    super(
      `Cannot scan ${params.path} for category '${params.category}': ${messageOf(params.cause)}`,
      { cause: params.cause },
    );
    this.name = 'ScanError';
    this.category = params.category;
    this.path = params.path;
  }

  toDiagnostic(): OrphanDiagnostic {
    return {
      kind: 'scan',
      category: this.category,
      path: this.path,
      message: this.message,
    };
  }
}
