#!/usr/bin/env node

/**
 * CLI entry point
 *
 * Reads env vars (and .env), runs one command, maps failures to exit code 1.
 */

import 'dotenv/config';
import { CommanderError } from 'commander';
import { createProgram } from './cli.js';
import { loadConfig, type CatalogConfig } from './config.js';
import { getErrorDetails, isCatalogError, toError } from './errors.js';
import { ConsoleLogger } from './logger.js';

async function main(): Promise<void> {
  let config: CatalogConfig;
  try {
    config = loadConfig();
  } catch (error) {
    new ConsoleLogger().error('Invalid configuration', toError(error), getErrorDetails(error));
    process.exitCode = 1;
    return;
  }

  const program = createProgram({ config });
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      // help and version also end up here, with exit code 0
      process.exitCode = error.exitCode;
      return;
    }

    const message = isCatalogError(error) ? `${error.code}: ${error.message}` : toError(error).message;
    console.error(message);
    process.exitCode = 1;
  }
}

void main();
