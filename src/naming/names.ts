/**
 * Name validation and dag path helpers.
 */

import { InvalidNameError } from '../errors.js';
import {
  ATTRIBUTE_SEPARATOR,
  HIERARCHY_SEPARATOR,
  NAMESPACE_SEPARATOR,
  RESERVED_NODE_NAMES,
} from './constants.js';

const NODE_NAME_CHARS = new RegExp(`^[A-Za-z0-9_${NAMESPACE_SEPARATOR}]+$`);
const INVALID_NODE_NAME_CHARS = new RegExp(`[^A-Za-z0-9_${NAMESPACE_SEPARATOR}]`, 'g');
const LEADING_DIGITS = /^[0-9]+/;
const PORT_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Explain why `name` cannot be used as a node name, or return null when it can.
 */
export function describeInvalidNodeName(
  name: string,
  reservedNames: readonly string[] = RESERVED_NODE_NAMES,
): string | null {
  if (name.length === 0) {
    return 'a name cannot be empty';
  }
  if (/^[0-9]/.test(name)) {
    return 'a name cannot start with a number';
  }
  if (!NODE_NAME_CHARS.test(name)) {
    return `only letters, digits, "_" and "${NAMESPACE_SEPARATOR}" are allowed`;
  }
  if (reservedNames.includes(name)) {
    return 'the name is reserved';
  }
  return null;
}

export function isValidNodeName(
  name: string,
  reservedNames: readonly string[] = RESERVED_NODE_NAMES,
): boolean {
  return describeInvalidNodeName(name, reservedNames) === null;
}

/**
 * @throws {InvalidNameError} If the name fails the node naming rules
 */
export function assertValidNodeName(
  name: string,
  reservedNames: readonly string[] = RESERVED_NODE_NAMES,
): void {
  const reason = describeInvalidNodeName(name, reservedNames);
  if (reason !== null) {
    throw new InvalidNameError(name, reason);
  }
}

/**
 * Conform a name by removing invalid characters and leading digits.
 * The result can still be empty or reserved.
 */
export function conformNodeName(name: string): string {
  return name.replace(INVALID_NODE_NAME_CHARS, '').replace(LEADING_DIGITS, '');
}

export function isValidPortName(name: string): boolean {
  return PORT_NAME.test(name);
}

/**
 * Join two dag paths. The result is absolute when `left` is.
 *
 * @example
 * joinPath('|group1', 'locator1') // '|group1|locator1'
 * joinPath('group1|', '|locator1') // 'group1|locator1'
 */
export function joinPath(left: string, right: string): string {
  const joined = `${trimSeparators(left)}${HIERARCHY_SEPARATOR}${trimSeparators(right)}`;
  return left.startsWith(HIERARCHY_SEPARATOR) ? HIERARCHY_SEPARATOR + joined : joined;
}

/** Split a path into its non-empty segments. */
export function splitPath(path: string): string[] {
  return path.split(HIERARCHY_SEPARATOR).filter((segment) => segment.length > 0);
}

/** Last segment of a path, or the path itself when it has no separator. */
export function leafName(path: string): string {
  const segments = splitPath(path);
  return segments.length > 0 ? segments[segments.length - 1] : '';
}

/**
 * Split `node.port` on the final attribute separator.
 * Returns null when there is no separator or either side is empty.
 */
export function splitPortAddress(address: string): { node: string; port: string } | null {
  const index = address.lastIndexOf(ATTRIBUTE_SEPARATOR);
  if (index <= 0 || index === address.length - 1) {
    return null;
  }
  return {
    node: address.slice(0, index),
    port: address.slice(index + 1),
  };
}

function trimSeparators(path: string): string {
  let start = 0;
  let end = path.length;
  while (start < end && path[start] === HIERARCHY_SEPARATOR) start++;
  while (end > start && path[end - 1] === HIERARCHY_SEPARATOR) end--;
  return path.slice(start, end);
}
