#!/usr/bin/env node

import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

import { Command } from 'commander';

import { ConfigManager, ConfigValidationError, GatewayConfigSchema, ConfigUtils, z } from '@switchyard/configuration';
import { LoggerFactory, LogLevel } from '@switchyard/logging';

import { registerSignalHandlers, startGateway } from './server.js';

const PackageJsonSchema = z.object({ version: z.string() });

// Nearest package.json above this module, from sources or from dist/
function readVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      return PackageJsonSchema.parse(JSON.parse(readFileSync(candidate, 'utf-8'))).version;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return '0.0.0';
    }
    dir = parent;
  }
}

async function loadConfig(path: string) {
  const bootstrap = LoggerFactory.createConsoleLogger('config', LogLevel.WARN);
  const manager = new ConfigManager(path, GatewayConfigSchema, { enableEnvSubstitution: true, logger: bootstrap });
  return manager.loadConfig();
}

const program = new Command();

program
  .name('switchyard')
  .description('Reverse-proxy gateway with retrying upstream calls')
  .version(readVersion());

program
  .command('start')
  .description('Start the gateway')
  .requiredOption('-c, --config <path>', 'Path to configuration file')
  .action(async (options: { config: string }) => {
    const config = await loadConfig(options.config);
    const logger = LoggerFactory.fromConfig('gateway', config.logging);
    const gateway = await startGateway({ config, logger });
    registerSignalHandlers(gateway, logger);
  });

program
  .command('check')
  .description('Validate a configuration file and print the route table')
  .requiredOption('-c, --config <path>', 'Path to configuration file')
  .action(async (options: { config: string }) => {
    const config = await loadConfig(options.config);

    console.log(`Configuration OK: ${options.config}`);
    console.log(`Listening on ${config.server.host}:${config.server.port}`);
    for (const route of config.routes) {
      const extras = [
        route.timeout !== undefined ? `timeout ${ConfigUtils.formatDuration(route.timeout)}` : undefined,
        route.cache.enabled ? `cache ${ConfigUtils.formatDuration(route.cache.ttl)}` : undefined,
      ].filter(Boolean);
      console.log(
        `  ${route.path} -> ${route.target} [${route.methods.join(', ')}]${extras.length ? ` (${extras.join(', ')})` : ''}`
      );
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof ConfigValidationError) {
    console.error(`Invalid configuration:\n  ${error.getFormattedErrors().join('\n  ')}`);
  } else {
    console.error('Error:', error instanceof Error ? error.message : error);
  }
  process.exit(1);
});
