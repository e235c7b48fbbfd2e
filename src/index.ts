/**
 * scene-session-mock
 *
 * In-memory scene graph session and command layer for testing 3D application
 * scripts without the host application.
 *
 * @example
 * ```typescript
 * import { CmdsSession } from 'scene-session-mock';
 *
 * const cmds = new CmdsSession();
 * cmds.createNode('transform', { name: 'group1' });
 * cmds.createNode('transform', { name: 'locator1', parent: 'group1' });
 * cmds.ls('locator1', { long: true }); // ['|group1|locator1']
 * ```
 */

// Session
export { Session, type SessionOptions } from './session/session.js';
export { NodeTypeSchema, BUNDLED_SCHEMA_URL, type TBuiltinPort } from './session/node-schema.js';
export {
  portValueKind,
  defaultValueForType,
  type NodeId,
  type PortId,
  type ConnectionId,
  type TSceneNode,
  type TPort,
  type TPortValue,
  type TPortValueKind,
  type TConnection,
  type TWarningSink,
  type TCreateNodeOptions,
  type TCreatePortOptions,
} from './session/types.js';

// Command layer
export {
  CmdsSession,
  type CreateNodeFlags,
  type AddAttrFlags,
  type DeleteAttrFlags,
  type ListAttrFlags,
  type LsFlags,
  type ParentFlags,
  type ConnectionInfoFlags,
} from './cmds/cmds-session.js';

// Naming and patterns
export { compilePattern, matchesPattern, patternToRegexSource, type TPathMatcher } from './naming/pattern.js';
export {
  isValidNodeName,
  assertValidNodeName,
  describeInvalidNodeName,
  conformNodeName,
  isValidPortName,
  joinPath,
  splitPath,
  leafName,
  splitPortAddress,
} from './naming/names.js';
export {
  HIERARCHY_SEPARATOR,
  ATTRIBUTE_SEPARATOR,
  NAMESPACE_SEPARATOR,
  WILDCARD,
  RESERVED_NODE_NAMES,
} from './naming/constants.js';

// Configuration
export { loadConfig, resolveConfig, type LoadConfigOptions } from './config/loader.js';
export { DEFAULT_CONFIG, getDefaultConfig } from './config/defaults.js';
export type { TSessionConfig, TPartialSessionConfig, TWarningMode } from './config/types.js';

// Errors
export {
  SessionError,
  InvalidNameError,
  NameCollisionError,
  NotFoundError,
  DuplicateConnectionError,
  MissingConnectionError,
  AmbiguousArgumentsError,
  InvalidParentError,
  ConfigError,
  getErrorMessage,
  type TSessionErrorCode,
} from './errors.js';

export { createLogger, logger, type Logger } from './logging/logger.js';
