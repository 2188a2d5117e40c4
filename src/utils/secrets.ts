import { readFileSync, existsSync } from 'fs';
import logger from './logger.js';

export type Env = Record<string, string | undefined>;

const SECRETS_DIR = '/run/secrets';

/**
 * Read a secret from Docker secrets or fall back to an environment variable.
 * Docker secrets are mounted at /run/secrets/<name> in containers.
 * Returns undefined when neither source has a value.
 */
export function getOptionalSecret(
  name: string,
  fallbackEnv: string,
  env: Env = process.env,
  secretsDir: string = SECRETS_DIR
): string | undefined {
  const secretPath = `${secretsDir}/${name}`;

  if (existsSync(secretPath)) {
    try {
      const value = readFileSync(secretPath, 'utf8').trim();
      if (value) return value;
    } catch (error) {
      logger.warn('Secret mount unreadable, using environment', {
        name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  const fromEnv = env[fallbackEnv]?.trim();
  return fromEnv ? fromEnv : undefined;
}
