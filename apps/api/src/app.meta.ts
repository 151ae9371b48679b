export const APP_NAME = 'orphanarr';
export const DEFAULT_APP_VERSION = '0.1.0';

export type AppMeta = {
  name: string;
  version: string;
  buildSha: string | null;
};

export function readAppMeta(env: Record<string, string | undefined> = process.env): AppMeta {
  const version = (env.APP_VERSION ?? '').trim() || DEFAULT_APP_VERSION;
  const buildSha = (env.APP_BUILD_SHA ?? '').trim() || null;
  return { name: APP_NAME, version, buildSha };
}
