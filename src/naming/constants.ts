/**
 * Address syntax shared by node paths and port addresses.
 */

/** Separates the segments of a node path: `|group1|locator1` */
export const HIERARCHY_SEPARATOR = '|';

/** Separates a node address from a port name: `locator1.visibility` */
export const ATTRIBUTE_SEPARATOR = '.';

/** Namespace separator. Treated as an ordinary name character. */
export const NAMESPACE_SEPARATOR = ':';

/** Expands to one or more word characters inside a single path segment. */
export const WILDCARD = '*';

/**
 * Names of the nodes a fresh application scene starts with.
 * A caller can never create a node with one of these names.
 */
export const RESERVED_NODE_NAMES = [
  'world',
  'time1',
  'persp',
  'top',
  'front',
  'side',
] as const;
