#!/usr/bin/env node

/**
 * @ipam-report/reporter - IPAM Usage Report
 *
 * Prints per-tenant used and unused IPv4 address counts as one line of JSON.
 *
 * Uso:
 *   ipam-usage-report [--config-file <path>]
 */

import 'reflect-metadata';
import { Logger, LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';

import { AppModule } from './app.module';
import { CliUsageError, parseCliArgs, USAGE } from './cli/cli-options';
import { AppConfigService } from './config/app.config';
import { ConfigFileNotFoundError, resolveConfigFile } from './config/config-file';
import { StderrLogger } from './logger/stderr.logger';
import { IpamUsageService } from './modules/ipam-usage/ipam-usage.service';

const BOOTSTRAP_LOG_LEVELS: LogLevel[] = ['warn', 'error', 'fatal'];

/**
 * Runs the report and returns the process exit code.
 * Database and configuration errors propagate to the caller.
 */
export async function bootstrap(args: readonly string[]): Promise<number> {
  let configFile: string;

  try {
    const options = parseCliArgs(args);
    if (options.help) {
      process.stdout.write(USAGE);
      return 0;
    }
    configFile = resolveConfigFile(options.configFile);
  } catch (error) {
    if (error instanceof CliUsageError) {
      process.stderr.write(`${error.message}\n${USAGE}`);
      return 1;
    }
    if (error instanceof ConfigFileNotFoundError) {
      process.stderr.write(`${error.message}\n`);
      return 1;
    }
    throw error;
  }

  const logger = new StderrLogger('IpamUsageReport', { logLevels: BOOTSTRAP_LOG_LEVELS });

  const app = await NestFactory.createApplicationContext(AppModule.forConfigFile(configFile), {
    logger,
    abortOnError: false,
  });

  try {
    const config = app.get(AppConfigService);
    logger.setLogLevels(config.logLevels);
    logger.debug(`Configuration loaded from ${configFile}: ${JSON.stringify(config.getAll())}`);

    const report = await app.get(IpamUsageService).generateReport();
    process.stdout.write(`${JSON.stringify(report)}\n`);

    return 0;
  } finally {
    await app.close();
  }
}

// Executar se chamado diretamente
if (require.main === module) {
  bootstrap(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      const logger = new Logger('IpamUsageReport');
      logger.error(error instanceof Error ? error.message : String(error));
      process.exit(1);
    });
}
