import { inspect } from 'node:util';

export type ServerLogLevel = 'debug' | 'info' | 'warn' | 'error';

export type ServerLogEntry = {
  id: number;
  time: string; // ISO
  level: ServerLogLevel;
  message: string;
  context: string | null;
};

// Nest boot chatter; warnings and errors from these contexts are still kept.
const QUIET_CONTEXTS = new Set<string>([
  'NestFactory',
  'InstanceLoader',
  'RoutesResolver',
  'RouterExplorer',
]);

// A full scan of a large library logs a few lines per category; keep a generous window.
export const MAX_SERVER_LOG_ENTRIES = 2000;
const MAX_MESSAGE_LENGTH = 10_000;

let nextId = 1;
let entries: ServerLogEntry[] = [];

export function clearServerLogs() {
  entries = [];
  // nextId keeps counting so clients polling with afterId never see ids reused.
}

function stringify(input: unknown): string {
  if (input instanceof Error) return input.stack ?? input.message;
  if (typeof input === 'string') return input;
  if (input === null || input === undefined) return '';
  if (typeof input === 'number' || typeof input === 'boolean' || typeof input === 'bigint') {
    return String(input);
  }
  try {
    const json = JSON.stringify(input);
    return typeof json === 'string' ? json : inspect(input, { depth: 4 });
  } catch {
    // Circular structures.
    return inspect(input, { depth: 4 });
  }
}

export function addServerLog(params: {
  level: ServerLogLevel;
  message: unknown;
  stack?: unknown;
  context?: unknown;
}) {
  const msg = stringify(params.message).trim();
  const stack = stringify(params.stack).trim();
  const combined = stack ? (msg ? `${msg}\n${stack}` : stack) : msg;
  if (!combined) return;

  const context =
    typeof params.context === 'string' && params.context.trim()
      ? params.context.trim()
      : null;
  const quiet = params.level === 'info' || params.level === 'debug';
  if (quiet && context && QUIET_CONTEXTS.has(context)) return;

  entries.push({
    id: nextId++,
    time: new Date().toISOString(),
    level: params.level,
    message:
      combined.length > MAX_MESSAGE_LENGTH
        ? `${combined.slice(0, MAX_MESSAGE_LENGTH)}…`
        : combined,
    context,
  });
  if (entries.length > MAX_SERVER_LOG_ENTRIES) {
    entries = entries.slice(-MAX_SERVER_LOG_ENTRIES);
  }
}

export function listServerLogs(params?: { afterId?: number; limit?: number }): {
  logs: ServerLogEntry[];
  latestId: number;
} {
  const latestId = nextId - 1;
  const limit = Math.max(1, Math.min(MAX_SERVER_LOG_ENTRIES, params?.limit ?? 200));
  const afterId = params?.afterId;
  const filtered =
    afterId === undefined ? entries : entries.filter((l) => l.id > afterId);
  return { logs: filtered.slice(-limit), latestId };
}
