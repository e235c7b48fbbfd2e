/**
 * Command scripts: a YAML or JSON list of command-layer calls replayed
 * against one session.
 *
 * ```yaml
 * commands:
 *   - command: createNode
 *     args: [transform]
 *     flags: { name: group1 }
 *   - command: ls
 *     args: [group1]
 *     flags: { long: true }
 * ```
 */

import * as fs from 'node:fs';
import * as YAML from 'js-yaml';
import { z } from 'zod';
import type { CmdsSession } from '../cmds/cmds-session.js';
import { ConfigError, getErrorMessage } from '../errors.js';
import type { TPortValue } from '../session/types.js';

export const COMMAND_NAMES = [
  'createNode',
  'delete',
  'parent',
  'nodeType',
  'ls',
  'objExists',
  'addAttr',
  'deleteAttr',
  'getAttr',
  'setAttr',
  'listAttr',
  'connectAttr',
  'disconnectAttr',
  'connectionInfo',
  'select',
  'warning',
] as const;

export type TCommandName = (typeof COMMAND_NAMES)[number];

const portValueSchema = z.union([z.number(), z.boolean(), z.string(), z.array(z.number())]);

const scriptStepSchema = z
  .object({
    command: z.enum(COMMAND_NAMES),
    args: z.array(portValueSchema).default([]),
    flags: z.record(portValueSchema).default({}),
  })
  .strict();

const scriptSchema = z
  .object({
    commands: z.array(scriptStepSchema),
  })
  .strict();

export type TScriptStep = z.infer<typeof scriptStepSchema>;
export type TScript = z.infer<typeof scriptSchema>;

export type TCommandResult = TPortValue | string[] | null;

const names = z.array(z.string());
const oneName = z.tuple([z.string()]);
const twoNames = z.tuple([z.string(), z.string()]);

const createNodeFlags = z
  .object({
    name: z.string().optional(),
    n: z.string().optional(),
    parent: z.string().optional(),
    p: z.string().optional(),
    skipSelect: z.boolean().optional(),
    ss: z.boolean().optional(),
  })
  .strict();

const addAttrFlags = z
  .object({
    attributeType: z.string().optional(),
    at: z.string().optional(),
    dataType: z.string().optional(),
    dt: z.string().optional(),
    defaultValue: portValueSchema.optional(),
    dv: portValueSchema.optional(),
    longName: z.string().optional(),
    ln: z.string().optional(),
    niceName: z.string().optional(),
    nn: z.string().optional(),
    shortName: z.string().optional(),
    sn: z.string().optional(),
  })
  .strict();

const deleteAttrFlags = z
  .object({ attribute: z.string().optional(), at: z.string().optional() })
  .strict();

const listAttrFlags = z
  .object({ userDefined: z.boolean().optional(), ud: z.boolean().optional() })
  .strict();

const lsFlags = z
  .object({
    long: z.boolean().optional(),
    l: z.boolean().optional(),
    selection: z.boolean().optional(),
    sl: z.boolean().optional(),
    type: z.string().optional(),
    typ: z.string().optional(),
  })
  .strict();

const parentFlags = z
  .object({ world: z.boolean().optional(), w: z.boolean().optional() })
  .strict();

const connectionInfoFlags = z
  .object({
    sourceFromDestination: z.boolean().optional(),
    sdf: z.boolean().optional(),
    destinationFromSource: z.boolean().optional(),
    dfs: z.boolean().optional(),
  })
  .strict();

const noFlags = z.object({}).strict();

/**
 * Validate raw script data (already parsed from YAML or JSON).
 *
 * @throws {ConfigError} If the data is not a valid script
 */
export function parseScript(raw: unknown, source = 'script'): TScript {
  const result = scriptSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      source,
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return result.data;
}

export function loadScript(filePath: string): TScript {
  let raw: unknown;
  try {
    raw = YAML.load(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigError(filePath, [getErrorMessage(error)], { cause: error });
  }
  return parseScript(raw, filePath);
}

/**
 * Run one script step. Arguments and flags are checked against the
 * command's own shape before the call.
 */
export function executeStep(cmds: CmdsSession, step: TScriptStep): TCommandResult {
  const source = `command "${step.command}"`;
  switch (step.command) {
    case 'createNode': {
      const [type] = parseWith(oneName, step.args, source);
      return cmds.createNode(type, parseWith(createNodeFlags, step.flags, source));
    }
    case 'delete':
      parseWith(noFlags, step.flags, source);
      cmds.delete(parseWith(names, step.args, source));
      return null;
    case 'parent':
      cmds.parent(parseWith(names, step.args, source), parseWith(parentFlags, step.flags, source));
      return null;
    case 'nodeType': {
      parseWith(noFlags, step.flags, source);
      const [name] = parseWith(oneName, step.args, source);
      return cmds.nodeType(name);
    }
    case 'ls':
      return cmds.ls(parseWith(names, step.args, source), parseWith(lsFlags, step.flags, source));
    case 'objExists': {
      parseWith(noFlags, step.flags, source);
      const [pattern] = parseWith(oneName, step.args, source);
      return cmds.objExists(pattern);
    }
    case 'addAttr':
      cmds.addAttr(parseWith(names, step.args, source), parseWith(addAttrFlags, step.flags, source));
      return null;
    case 'deleteAttr':
      cmds.deleteAttr(parseWith(names, step.args, source), parseWith(deleteAttrFlags, step.flags, source));
      return null;
    case 'getAttr': {
      parseWith(noFlags, step.flags, source);
      const [dagpath] = parseWith(oneName, step.args, source);
      return cmds.getAttr(dagpath);
    }
    case 'setAttr': {
      parseWith(noFlags, step.flags, source);
      const [dagpath, value] = parseWith(z.tuple([z.string(), portValueSchema]), step.args, source);
      cmds.setAttr(dagpath, value);
      return null;
    }
    case 'listAttr':
      return cmds.listAttr(parseWith(names, step.args, source), parseWith(listAttrFlags, step.flags, source));
    case 'connectAttr': {
      parseWith(noFlags, step.flags, source);
      const [src, dst] = parseWith(twoNames, step.args, source);
      cmds.connectAttr(src, dst);
      return null;
    }
    case 'disconnectAttr': {
      parseWith(noFlags, step.flags, source);
      const [src, dst] = parseWith(twoNames, step.args, source);
      cmds.disconnectAttr(src, dst);
      return null;
    }
    case 'connectionInfo': {
      const [dagpath] = parseWith(oneName, step.args, source);
      return cmds.connectionInfo(dagpath, parseWith(connectionInfoFlags, step.flags, source));
    }
    case 'select':
      parseWith(noFlags, step.flags, source);
      cmds.select(parseWith(names, step.args, source));
      return null;
    case 'warning': {
      parseWith(noFlags, step.flags, source);
      const [message] = parseWith(oneName, step.args, source);
      cmds.warning(message);
      return null;
    }
  }
}

function parseWith<T extends z.ZodTypeAny>(schema: T, value: unknown, source: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(
      source,
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
      ),
    );
  }
  return result.data;
}
