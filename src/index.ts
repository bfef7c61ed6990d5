#!/usr/bin/env node

/**
 * CLI entry point
 *
 * Usage: openapi-raw-requests [spec.json] [operation|all]
 */

import 'dotenv/config';
import { runCli } from './cli.js';
import { createLogger, loadConfig, type CliConfig } from './config.js';
import { toError } from './errors.js';
import { ConsoleLogger } from './logger.js';

async function main(): Promise<void> {
  let config: CliConfig;
  try {
    config = loadConfig(process.env, process.argv.slice(2));
  } catch (error) {
    new ConsoleLogger().error('Invalid configuration', toError(error));
    process.exit(1);
  }

  const logger = createLogger(config);

  try {
    process.exitCode = await runCli(config, {
      logger,
      stdout: text => {
        process.stdout.write(text);
      },
    });
  } catch (error) {
    logger.error('Fatal error', toError(error));
    process.exit(1);
  }
}

void main();
