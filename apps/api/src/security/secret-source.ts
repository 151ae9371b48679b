import { readFileSync } from 'node:fs';

type EnvLike = Record<string, string | undefined>;

export type FileBackedEnvResult = {
  applied: string[];
  failed: Array<{ key: string; error: string }>;
};

function normalizeFileSecret(raw: string): string {
  // Strip one trailing newline; secrets mounted by Docker/Kubernetes usually end with one.
  return raw.replace(/\r\n/g, '\n').replace(/\n$/, '');
}

function resolveTargetKey(fileBackedKey: string): string | null {
  if (!fileBackedKey.endsWith('_FILE')) return null;
  return fileBackedKey.slice(0, -'_FILE'.length) || null;
}

function hasConfiguredValue(env: EnvLike, key: string): boolean {
  const existing = env[key];
  return typeof existing === 'string' && existing.trim() !== '';
}

/**
 * Docker-style indirection: `QBIT_PASS_FILE=/run/secrets/qbit` fills `QBIT_PASS`
 * from that file unless `QBIT_PASS` is already set.
 */
export function applyFileBackedEnv(env: EnvLike = process.env): FileBackedEnvResult {
  const result: FileBackedEnvResult = { applied: [], failed: [] };

  for (const [key, value] of Object.entries(env)) {
    const targetKey = resolveTargetKey(key);
    if (!targetKey || hasConfiguredValue(env, targetKey)) continue;
    const filePath = value?.trim() ?? '';
    if (!filePath) continue;

    try {
      env[targetKey] = normalizeFileSecret(readFileSync(filePath, 'utf8'));
      result.applied.push(targetKey);
    } catch (err) {
      result.failed.push({
        key,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  return result;
}
