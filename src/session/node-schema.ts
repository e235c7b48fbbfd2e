/**
 * Node type schema
 *
 * Describes the built-in ports each node type starts with. A type may
 * inherit another type's ports; inherited ports come first.
 */

import * as fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError, getErrorMessage } from '../errors.js';
import type { TPortValue } from './types.js';

const portValueSchema = z.union([z.number(), z.boolean(), z.string(), z.array(z.number())]);

const builtinPortSchema = z
  .object({
    name: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/),
    shortName: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/).optional(),
    niceName: z.string().optional(),
    type: z.string().min(1),
    value: portValueSchema.optional(),
  })
  .strict();

const nodeTypeSchema = z
  .object({
    inherits: z.string().optional(),
    ports: z.array(builtinPortSchema).default([]),
  })
  .strict();

const schemaFileSchema = z
  .object({
    nodeTypes: z.record(nodeTypeSchema),
  })
  .strict();

export type TBuiltinPort = {
  name: string;
  shortName?: string;
  niceName?: string;
  type: string;
  value?: TPortValue;
};

type TNodeTypeSpec = z.infer<typeof nodeTypeSchema>;

/** Location of the schema shipped with the package. */
export const BUNDLED_SCHEMA_URL = new URL('../../schemas/node-types.json', import.meta.url);

export class NodeTypeSchema {
  private constructor(private readonly nodeTypes: ReadonlyMap<string, TNodeTypeSpec>) {}

  /** A schema with no types: nodes start without ports. */
  static empty(): NodeTypeSchema {
    return new NodeTypeSchema(new Map());
  }

  /**
   * @throws {ConfigError} If the data does not describe a valid schema
   */
  static fromObject(raw: unknown, source = 'node type schema'): NodeTypeSchema {
    const result = schemaFileSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigError(
        source,
        result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      );
    }

    const nodeTypes = new Map(Object.entries(result.data.nodeTypes));
    for (const [type, spec] of nodeTypes) {
      if (spec.inherits !== undefined && !nodeTypes.has(spec.inherits)) {
        throw new ConfigError(source, [`nodeTypes.${type}.inherits: unknown node type "${spec.inherits}"`]);
      }
    }
    const schema = new NodeTypeSchema(nodeTypes);
    for (const type of nodeTypes.keys()) {
      const clash = findNameClash(schema.builtinPorts(type, source));
      if (clash !== undefined) {
        throw new ConfigError(source, [`nodeTypes.${type}: attribute name "${clash}" is used more than once`]);
      }
    }
    return schema;
  }

  /**
   * Read a schema file. Defaults to the bundled schema.
   */
  static load(filePath: string | URL = BUNDLED_SCHEMA_URL): NodeTypeSchema {
    const source = typeof filePath === 'string' ? filePath : fileURLToPath(filePath);
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
      throw new ConfigError(source, [getErrorMessage(error)], { cause: error });
    }
    return NodeTypeSchema.fromObject(raw, source);
  }

  /** Known node types, sorted. */
  types(): string[] {
    return [...this.nodeTypes.keys()].sort();
  }

  has(type: string): boolean {
    return this.nodeTypes.has(type);
  }

  /**
   * Built-in ports of a type, inherited ones first. Unknown types have none.
   */
  builtinPorts(type: string, source = 'node type schema'): TBuiltinPort[] {
    const chain: TNodeTypeSpec[] = [];
    const visited = new Set<string>();
    for (let current: string | undefined = type; current !== undefined; ) {
      if (visited.has(current)) {
        throw new ConfigError(source, [`nodeTypes.${type}: inheritance cycle through "${current}"`]);
      }
      visited.add(current);
      const spec = this.nodeTypes.get(current);
      if (!spec) break;
      chain.unshift(spec);
      current = spec.inherits;
    }

    const ports = new Map<string, TBuiltinPort>();
    for (const spec of chain) {
      for (const port of spec.ports) {
        // A derived type may redefine an inherited port
        ports.set(port.name, port);
      }
    }
    return [...ports.values()];
  }
}

/**
 * First name used twice among a type's resolved ports. Long and short
 * names share one namespace, as they do on a node.
 */
function findNameClash(ports: readonly TBuiltinPort[]): string | undefined {
  const taken = new Set<string>();
  for (const port of ports) {
    const names = port.shortName === undefined || port.shortName === port.name
      ? [port.name]
      : [port.name, port.shortName];
    for (const name of names) {
      if (taken.has(name)) return name;
      taken.add(name);
    }
  }
  return undefined;
}
