/**
 * Run command - replays a command script against a fresh session
 */

import { CmdsSession } from '../../cmds/cmds-session.js';
import { loadConfig } from '../../config/loader.js';
import type { TPartialSessionConfig } from '../../config/types.js';
import { getErrorMessage, SessionError } from '../../errors.js';
import { logger } from '../../logging/logger.js';
import { Session } from '../../session/session.js';
import { executeStep, loadScript, type TCommandResult, type TScript } from '../script.js';

export interface RunOptions {
  config?: string;
  /** Keep going after a failing command */
  continueOnError?: boolean;
  /** Print one JSON document instead of a line per command */
  json?: boolean;
  /** Create built-in ports from the node type schema */
  seedBuiltinPorts?: boolean;
}

export type TStepOutcome =
  | { index: number; command: string; ok: true; result: TCommandResult }
  | { index: number; command: string; ok: false; error: string; code?: string };

export interface RunReport {
  ok: boolean;
  steps: TStepOutcome[];
}

/**
 * Execute every step of a script. Stops at the first failure unless
 * `continueOnError` is set.
 */
export function runScript(
  script: TScript,
  cmds: CmdsSession,
  options: Pick<RunOptions, 'continueOnError'> = {},
): RunReport {
  const steps: TStepOutcome[] = [];
  for (const [index, step] of script.commands.entries()) {
    try {
      steps.push({ index, command: step.command, ok: true, result: executeStep(cmds, step) });
    } catch (error) {
      steps.push({
        index,
        command: step.command,
        ok: false,
        error: getErrorMessage(error),
        ...(SessionError.is(error) ? { code: error.code } : {}),
      });
      if (!options.continueOnError) break;
    }
  }
  return { ok: steps.every((step) => step.ok), steps };
}

export function runCommand(scriptPath: string, options: RunOptions = {}): RunReport {
  const overrides: TPartialSessionConfig = {};
  if (options.seedBuiltinPorts) {
    overrides.seedBuiltinPorts = true;
  }
  const config = loadConfig({ configPath: options.config, overrides });
  const script = loadScript(scriptPath);
  const cmds = new CmdsSession(Session.fromConfig(config));

  logger.debug(`Running ${script.commands.length} command(s) from ${scriptPath}`);
  const report = runScript(script, cmds, options);

  if (options.json) {
    logger.log(JSON.stringify(report, null, 2));
    return report;
  }

  for (const step of report.steps) {
    if (step.ok) {
      logger.log(`${step.command} → ${JSON.stringify(step.result)}`);
    } else {
      logger.error(`${step.command} (#${step.index + 1}): ${step.error}`);
    }
  }
  if (report.ok) {
    logger.success(`${report.steps.length} command(s) succeeded`);
  }
  return report;
}
