/**
 * Types command - lists the node types of a node type schema
 */

import { NodeTypeSchema } from '../../session/node-schema.js';
import { logger } from '../../logging/logger.js';

export interface TypesOptions {
  /** Schema file; defaults to the bundled schema */
  schema?: string;
  json?: boolean;
}

export function describeNodeTypes(schema: NodeTypeSchema): Record<string, string[]> {
  const described: Record<string, string[]> = {};
  for (const type of schema.types()) {
    described[type] = schema
      .builtinPorts(type)
      .map((port) => (port.shortName ? `${port.name} (${port.shortName})` : port.name));
  }
  return described;
}

export function typesCommand(options: TypesOptions = {}): void {
  const schema = options.schema ? NodeTypeSchema.load(options.schema) : NodeTypeSchema.load();
  const described = describeNodeTypes(schema);

  if (options.json) {
    logger.log(JSON.stringify(described, null, 2));
    return;
  }

  logger.section('Node types');
  for (const [type, ports] of Object.entries(described)) {
    logger.log(`${type}: ${ports.length > 0 ? ports.join(', ') : '(no built-in attributes)'}`);
  }
}
