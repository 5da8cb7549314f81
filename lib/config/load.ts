import fs from 'node:fs';
import stripJsonComments from 'strip-json-comments';
import { logger } from '../logger';

export type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readJSONConfig(filePath: string): unknown {
  const configFile = fs.readFileSync(filePath, { encoding: 'utf8' });
  return JSON.parse(stripJsonComments(configFile));
}

export async function readJSConfig(filePath: string): Promise<unknown> {
  const loaded: unknown = await import(filePath);
  return isRecord(loaded) && 'default' in loaded ? loaded.default : loaded;
}

/**
 * Read a config file and unwrap it to a single object. JSON files may carry
 * comments; anything else is loaded as a JS module. A multi-bot array yields
 * its first entry.
 */
export async function readConfigFile(filePath: string): Promise<RawConfig> {
  let config = filePath.endsWith('.json')
    ? readJSONConfig(filePath)
    : await readJSConfig(filePath);

  if (Array.isArray(config)) {
    if (config.length === 0) {
      throw new Error('Config array is empty');
    }
    logger.info(`Found ${config.length} bot config(s), using first one`);
    config = config[0];
  }

  if (!isRecord(config)) {
    throw new Error(`Expecting an object exported from the config file, got ${String(config)}`);
  }
  return config;
}

/**
 * Apply environment variable overrides for secrets and deployment paths
 *
 * Supported environment variables:
 * - IRC_PASSWORD: IRC server password
 * - IRC_SASL_USERNAME: SASL authentication username
 * - IRC_SASL_PASSWORD: SASL authentication password
 * - RATBOT_DATABASE: case database connection string
 */
export function applyEnvironmentOverrides(config: RawConfig, env: NodeJS.ProcessEnv = process.env): RawConfig {
  const overridden: RawConfig = { ...config };

  if (env.IRC_PASSWORD) {
    overridden.password = env.IRC_PASSWORD;
    logger.info('Using IRC password from IRC_PASSWORD environment variable');
  }

  if (env.IRC_SASL_USERNAME || env.IRC_SASL_PASSWORD) {
    const sasl: RawConfig = isRecord(overridden.sasl) ? { ...overridden.sasl } : {};
    if (env.IRC_SASL_USERNAME) {
      sasl.username = env.IRC_SASL_USERNAME;
      logger.info('Using SASL username from IRC_SASL_USERNAME environment variable');
    }
    if (env.IRC_SASL_PASSWORD) {
      sasl.password = env.IRC_SASL_PASSWORD;
      logger.info('Using SASL password from IRC_SASL_PASSWORD environment variable');
    }
    overridden.sasl = sasl;
  }

  if (env.RATBOT_DATABASE) {
    overridden.database = env.RATBOT_DATABASE;
    logger.info('Using case database from RATBOT_DATABASE environment variable');
  }

  return overridden;
}
