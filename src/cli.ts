#!/usr/bin/env node
/**
 * Command-line interface for the config patch pipeline.
 */

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { createAppComponents, createStores } from '#patchbot/app.js';
import type { PatchResult } from '#patchbot/ai/patch/types.js';
import { formatPointer } from '#patchbot/ai/patch/json-pointer.js';
import { loadSettings, setConfig } from '#patchbot/config.js';
import { startServer } from '#patchbot/index.js';

export function formatResult(result: PatchResult): string[] {
  const lines: string[] = [];
  if (result.identity) {
    lines.push(`service: ${result.identity.name} (${result.identity.confidence})`);
  }
  if (result.change) {
    lines.push(`change:  ${formatPointer(result.change.path)} = ${JSON.stringify(result.change.value)}`);
  }
  if (result.error) {
    lines.push(`error:   ${result.error.kind} at ${result.error.stage}: ${result.error.message}`);
  } else if (result.dryRun) {
    lines.push('dry run: valid, nothing written');
  } else {
    lines.push('applied');
  }
  return lines;
}

const program = new Command();

program
  .name('patchbot')
  .description('Apply natural-language changes to JSON-schema-validated service configs')
  .version('0.1.0');

program
  .command('patch <input...>')
  .description('Resolve one change request and apply it')
  .option('-s, --service <name>', 'target service, skipping identification')
  .option('--dry-run', 'resolve and validate without writing')
  .option('--no-retry', 'do not retry a failed model call')
  .action(async (input: string[], options: { service?: string; dryRun?: boolean; retry: boolean }) => {
    try {
      if (!options.retry) setConfig('max-model-retries', '0');
      const { pipeline } = await createAppComponents(loadSettings());
      const result = await pipeline.handle(input.join(' '), {
        service: options.service,
        dryRun: options.dryRun,
      });

      const color = result.error ? chalk.red : chalk.green;
      for (const line of formatResult(result)) {
        console.log(color(line));
      }
      if (result.document !== undefined) {
        console.log(chalk.yellow('document:'));
        console.log(JSON.stringify(result.document, null, 2));
      }
      process.exitCode = result.error ? 1 : 0;
    } catch (error) {
      console.error(chalk.red(`Error: ${error instanceof Error ? error.message : 'Unknown error'}`));
      process.exitCode = 2;
    }
  });

program
  .command('services')
  .description('List the services that have a schema')
  .action(async () => {
    try {
      const { schemaStore } = createStores(loadSettings());
      const services = await schemaStore.listServices();
      if (services.length === 0) {
        console.log(chalk.yellow('No services found'));
        return;
      }
      for (const name of services) {
        console.log(name);
      }
    } catch (error) {
      console.error(chalk.red(`Error: ${error instanceof Error ? error.message : 'Unknown error'}`));
      process.exitCode = 2;
    }
  });

program
  .command('serve')
  .description('Start the HTTP API')
  .action(async () => {
    await startServer();
  });

if (require.main === module) {
  program.parseAsync(process.argv).catch((error) => {
    console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(2);
  });
}
