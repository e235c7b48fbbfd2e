/**
 * Error types raised by the session and the command layer.
 *
 * Every error carries a stable `code` so callers can branch without
 * matching on message text:
 *
 * | Code                   | Raised when |
 * |------------------------|-------------|
 * | `INVALID_NAME`         | a node or port name fails the naming rules |
 * | `NAME_COLLISION`       | a sibling node or a port on the same node already has the name |
 * | `NOT_FOUND`            | an exact lookup or a required address resolves to nothing |
 * | `DUPLICATE_CONNECTION` | the ordered (src, dst) pair is already connected |
 * | `MISSING_CONNECTION`   | disconnecting a pair that is not connected |
 * | `AMBIGUOUS_ARGUMENTS`  | mutually exclusive flags are both set, or a required one is missing |
 * | `INVALID_PARENT`       | reparenting a node under itself or one of its descendants |
 * | `INVALID_CONFIG`       | a configuration source fails validation |
 */

export type TSessionErrorCode =
  | 'INVALID_NAME'
  | 'NAME_COLLISION'
  | 'NOT_FOUND'
  | 'DUPLICATE_CONNECTION'
  | 'MISSING_CONNECTION'
  | 'AMBIGUOUS_ARGUMENTS'
  | 'INVALID_PARENT'
  | 'INVALID_CONFIG';

export class SessionError extends Error {
  constructor(
    public readonly code: TSessionErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SessionError';
  }

  /**
   * Narrow an unknown value to a SessionError, optionally of one code.
   */
  static is(error: unknown, code?: TSessionErrorCode): error is SessionError {
    if (!(error instanceof SessionError)) return false;
    return code === undefined || error.code === code;
  }
}

export class InvalidNameError extends SessionError {
  constructor(
    public readonly invalidName: string,
    reason: string,
  ) {
    super('INVALID_NAME', `Invalid name "${invalidName}": ${reason}`);
    this.name = 'InvalidNameError';
  }
}

export class NameCollisionError extends SessionError {
  constructor(
    public readonly collidingName: string,
    scope: string,
  ) {
    super('NAME_COLLISION', `Name "${collidingName}" is already used in ${scope}`);
    this.name = 'NameCollisionError';
  }
}

export class NotFoundError extends SessionError {
  constructor(public readonly query: string, what = 'object') {
    super('NOT_FOUND', `No ${what} matches name: ${query}`);
    this.name = 'NotFoundError';
  }
}

export class DuplicateConnectionError extends SessionError {
  constructor(src: string, dst: string) {
    super('DUPLICATE_CONNECTION', `"${src}" is already connected to "${dst}"`);
    this.name = 'DuplicateConnectionError';
  }
}

export class MissingConnectionError extends SessionError {
  constructor(src: string, dst: string) {
    super('MISSING_CONNECTION', `There is no connection from "${src}" to "${dst}" to disconnect`);
    this.name = 'MissingConnectionError';
  }
}

export class AmbiguousArgumentsError extends SessionError {
  constructor(message: string) {
    super('AMBIGUOUS_ARGUMENTS', message);
    this.name = 'AmbiguousArgumentsError';
  }
}

export class InvalidParentError extends SessionError {
  constructor(child: string, parent: string) {
    super('INVALID_PARENT', `Cannot parent "${child}" under "${parent}": it is the node itself or one of its descendants`);
    this.name = 'InvalidParentError';
  }
}

export class ConfigError extends SessionError {
  constructor(source: string, issues: string[], options?: { cause?: unknown }) {
    super('INVALID_CONFIG', `Invalid configuration in ${source}: ${issues.join('; ')}`, options);
    this.name = 'ConfigError';
  }
}

/**
 * Extracts a string message from any thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
