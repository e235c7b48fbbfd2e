/**
 * Long/short flag handling for the command layer.
 *
 * Commands accept every flag under its long and its short spelling, the way
 * the host application's scripting layer does (`name` / `n`). Giving both
 * spellings of one flag is rejected rather than silently picking one.
 */

import { AmbiguousArgumentsError } from '../errors.js';

/**
 * Return whichever spelling of a flag was given.
 *
 * @example
 * pickFlag('name', 'n', flags.name, flags.n)
 *
 * @throws {AmbiguousArgumentsError} If both spellings were given
 */
export function pickFlag<T>(
  long: string,
  short: string,
  longValue: T | undefined,
  shortValue: T | undefined,
): T | undefined {
  if (longValue !== undefined && shortValue !== undefined) {
    throw new AmbiguousArgumentsError(
      `Flag "${long}" was given twice (as "${long}" and "${short}")`,
    );
  }
  return longValue ?? shortValue;
}

/** Accept one value or a list, the way object arguments are passed to commands. */
export function toList(objects: string | readonly string[] | undefined): string[] {
  if (objects === undefined) return [];
  return typeof objects === 'string' ? [objects] : [...objects];
}
