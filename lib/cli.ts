#!/usr/bin/env node

import fs from 'node:fs';
import { resolve, join } from 'node:path';
import { ZodError } from 'zod';
import { createBot } from './bot';
import { logger } from './logger';
import { validateConfig, type BotConfig } from './config/schema';
import { applyEnvironmentOverrides, readConfigFile } from './config/load';

// Load package.json for version info
const packageJson: { version: string } = JSON.parse(
  fs.readFileSync(join(__dirname, '../../package.json'), 'utf8')
);

const USAGE = 'Usage: ratbot [-c|--config <config-file>]';

// Let the process manager restart the bot
process.on('uncaughtException', (error: Error, origin: string) => {
  logger.error(`[FATAL] Uncaught Exception at: ${origin}`, error);
  process.exit(1);
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('[FATAL] Unhandled Promise Rejection:', reason);
  process.exit(1);
});

function printHelp(): void {
  console.log(USAGE);
  console.log('');
  console.log('Options:');
  console.log('  -c, --config <file>  Path to config file (default: config.json)');
  console.log('  -h, --help           Show this help message');
  console.log('');
  console.log('Examples:');
  console.log('  ratbot                      # Uses config.json from current directory');
  console.log('  ratbot -c fuelrats.json     # Uses specified config file');
  console.log('  ratbot --config bot.js      # Uses JavaScript config file');
}

export async function run(): Promise<void> {
  logger.info(`ratbot v${packageJson.version}`);

  const args = process.argv.slice(2);
  let configPath = 'config.json';

  if (args.length > 0) {
    if (args[0] === '-c' || args[0] === '--config') {
      if (!args[1]) {
        console.error(USAGE);
        console.error('Defaults to config.json in current directory');
        return process.exit(2);
      }
      configPath = args[1];
    } else if (args[0] === '-h' || args[0] === '--help') {
      printHelp();
      return process.exit(0);
    } else {
      configPath = args[0];
    }
  }

  const completePath = resolve(process.cwd(), configPath);
  if (!fs.existsSync(completePath)) {
    console.error(`Error: Config file not found: ${completePath}`);
    console.error('');
    console.error(USAGE);
    return process.exit(2);
  }

  let config: BotConfig;
  try {
    const raw = applyEnvironmentOverrides(await readConfigFile(completePath));
    config = validateConfig(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('\nConfiguration validation failed:\n');
      error.issues.forEach((issue) => {
        console.error(`  • ${issue.path.join('.')}: ${issue.message}`);
      });
      console.error('\nPlease fix your configuration and try again.\n');
    } else {
      console.error('Could not read configuration:', error);
    }
    return process.exit(2);
  }

  if (config.logLevel) {
    logger.level = config.logLevel;
  }
  logger.info(`Log level: ${logger.level} (set NODE_ENV=development for debug logs)`);
  logger.info('Configuration validated successfully');

  const bot = await createBot(config);

  const shutdown = async (signal: string) => {
    logger.info(`${signal} received - initiating graceful shutdown...`);
    try {
      await bot.disconnect();
      logger.info('Bot disconnected');
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => { void shutdown('SIGTERM'); });
  process.on('SIGINT', () => { void shutdown('SIGINT'); });
}

// Execute if run directly (when used as CLI entry point)
if (require.main === module) {
  void run();
}
