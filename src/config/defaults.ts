/**
 * Default configuration values
 */

import { RESERVED_NODE_NAMES } from '../naming/constants.js';
import type { TSessionConfig } from './types.js';

export const DEFAULT_CONFIG: TSessionConfig = {
  defaultPortType: 'float',
  reservedNames: [...RESERVED_NODE_NAMES],
  seedBuiltinPorts: false,
  matcherCacheSize: 256,
  warnings: 'log',
  schemaPath: null,
};

/**
 * Fresh copy of the defaults, safe for callers to mutate.
 */
export function getDefaultConfig(): TSessionConfig {
  return { ...DEFAULT_CONFIG, reservedNames: [...DEFAULT_CONFIG.reservedNames] };
}
