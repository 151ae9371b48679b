import { Logger } from '@nestjs/common';
import { applyFileBackedEnv } from './security/secret-source';

/**
 * Resolve `*_FILE` secrets into the environment before settings are read.
 * Must run before the Nest application (and so SettingsService) is created.
 */
export function ensureBootstrapEnv(env: Record<string, string | undefined> = process.env) {
  const logger = new Logger('Bootstrap');
  const result = applyFileBackedEnv(env);
  for (const key of result.applied) {
    logger.log(`Loaded ${key} from file`);
  }
  for (const failure of result.failed) {
    logger.warn(`Could not read ${failure.key}: ${failure.error}`);
  }
  return result;
}
