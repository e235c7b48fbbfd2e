import { SessionError, type TSessionErrorCode } from '../src/errors.js';
import { Session, type SessionOptions } from '../src/session/session.js';

/** Run `fn` and return what it threw. Fails the test when nothing is thrown. */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the call to throw');
}

export function captureSessionError(fn: () => unknown, code: TSessionErrorCode): SessionError {
  const error = captureError(fn);
  if (!SessionError.is(error, code)) {
    throw new Error(`Expected a ${code} error, got: ${String(error)}`);
  }
  return error;
}

/** A session whose warnings are collected instead of printed. */
export function createTestSession(options: Omit<SessionOptions, 'warningSink'> = {}): {
  session: Session;
  warnings: string[];
} {
  const warnings: string[] = [];
  const session = new Session({ ...options, warningSink: (message) => warnings.push(message) });
  return { session, warnings };
}
