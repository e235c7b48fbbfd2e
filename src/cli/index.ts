#!/usr/bin/env node
/**
 * scene-mock CLI
 * Replays command scripts against an in-memory scene session
 */

import * as fs from 'node:fs';
import { Command } from 'commander';
import { z } from 'zod';
import { runCommand, type RunOptions } from './commands/run.js';
import { typesCommand, type TypesOptions } from './commands/types.js';
import { logger } from '../logging/logger.js';
import { getErrorMessage } from '../errors.js';

function readVersion(): string {
  try {
    const raw: unknown = JSON.parse(fs.readFileSync(new URL('../../package.json', import.meta.url), 'utf8'));
    const parsed = z.object({ version: z.string() }).safeParse(raw);
    return parsed.success ? parsed.data.version : '0.0.0-dev';
  } catch (error) {
    logger.debug(`Could not read package version: ${getErrorMessage(error)}`);
    return '0.0.0-dev';
  }
}

const program = new Command();

program
  .name('scene-mock')
  .description('Replay 3D application scripting commands against an in-memory scene')
  .version(readVersion(), '-v, --version', 'Output the current version');

program.configureOutput({
  writeErr: (str) => {
    const trimmed = str.replace(/^error:\s*/i, '').trimEnd();
    if (trimmed) {
      logger.error(trimmed);
    }
  },
  writeOut: (str) => process.stdout.write(str),
});

// Run command
program
  .command('run <script>')
  .description('Run a YAML or JSON command script against a fresh session')
  .option('-c, --config <path>', 'Config file (default: scene-mock.config.yaml in the current directory)')
  .option('--continue-on-error', 'Keep running after a command fails', false)
  .option('--seed-builtin-ports', 'Create built-in attributes from the node type schema', false)
  .option('--json', 'Print the whole report as JSON', false)
  .action((script: string, options: RunOptions) => {
    try {
      const report = runCommand(script, options);
      if (!report.ok) {
        process.exit(1);
      }
    } catch (error) {
      logger.error(`Command failed: ${getErrorMessage(error)}`);
      process.exit(1);
    }
  });

// Types command
program
  .command('types')
  .description('List node types and their built-in attributes')
  .option('-s, --schema <path>', 'Node type schema file (default: bundled schema)')
  .option('--json', 'Output as JSON', false)
  .action((options: TypesOptions) => {
    try {
      typesCommand(options);
    } catch (error) {
      logger.error(`Command failed: ${getErrorMessage(error)}`);
      process.exit(1);
    }
  });

program.on('--help', () => {
  logger.newline();
  logger.section('Examples');
  logger.log('  $ scene-mock run rig.yaml');
  logger.log('  $ scene-mock run rig.yaml --seed-builtin-ports --json');
  logger.log('  $ scene-mock run rig.json --config scene-mock.config.yaml --continue-on-error');
  logger.log('  $ scene-mock types');
  logger.newline();
});

program.parse(process.argv);

// Show help if no command specified
if (!process.argv.slice(2).length) {
  program.outputHelp();
}
