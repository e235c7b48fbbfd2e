/**
 * Node Graph Store
 *
 * Arena of scene nodes. Parent/child links are ids into the arena, and a
 * node's path is always derived from its current ancestor chain, so nothing
 * goes stale after a rename or reparent.
 *
 * Top-level nodes are siblings of each other: their names must be unique
 * among the top-level scope, exactly like children of a common parent.
 */

import { InvalidParentError, NameCollisionError, NotFoundError } from '../errors.js';
import { HIERARCHY_SEPARATOR } from '../naming/constants.js';
import type { MatcherCache } from '../naming/matcher-cache.js';
import { assertValidNodeName, conformNodeName, isValidNodeName, splitPath } from '../naming/names.js';
import { compilePattern, type TPathMatcher } from '../naming/pattern.js';
import { IdAllocator, isNodeId } from './ids.js';
import type { NodeId, TSceneNode } from './types.js';

type TNodeRecord = {
  id: NodeId;
  name: string;
  type: string;
  parent: NodeId | null;
  children: NodeId[];
};

/** A node renamed because its old name collided in its new scope. */
export type TNodeRename = {
  node: TSceneNode;
  from: string;
  to: string;
};

export type TNodeRemoval = {
  /** Children that became top-level nodes */
  orphans: TSceneNode[];
  renamed: TNodeRename[];
};

const TRAILING_DIGITS = /[0-9]+$/;
const FALLBACK_BASE_NAME = 'node';

/** Plain code-unit ordering, independent of locale. */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export class NodeStore {
  private records = new Map<NodeId, TNodeRecord>();
  private roots: NodeId[] = [];
  private ids = new IdAllocator<NodeId>('node', isNodeId);

  constructor(
    private readonly reservedNames: readonly string[],
    private readonly matcherCache?: MatcherCache<TPathMatcher>,
  ) {}

  /** All nodes in creation order. */
  all(): TSceneNode[] {
    return [...this.records.values()];
  }

  has(node: TSceneNode): boolean {
    return this.records.get(node.id) === node;
  }

  get(id: NodeId): TSceneNode | undefined {
    return this.records.get(id);
  }

  create(type: string, name?: string, parent?: TSceneNode | null): TSceneNode {
    const parentRecord = parent ? this.require(parent) : null;
    const siblings = this.siblingNames(parentRecord?.id ?? null);

    let resolvedName: string;
    if (name === undefined) {
      resolvedName = this.nextFreeName(defaultBaseName(type), siblings);
    } else if (name.endsWith('#')) {
      const base = name.slice(0, -1);
      assertValidNodeName(`${base}1`, this.reservedNames);
      resolvedName = this.nextFreeName(base, siblings);
    } else {
      assertValidNodeName(name, this.reservedNames);
      if (siblings.has(name)) {
        throw new NameCollisionError(name, this.describeScope(parentRecord));
      }
      resolvedName = name;
    }

    const record: TNodeRecord = {
      id: this.ids.allocate(),
      name: resolvedName,
      type,
      parent: parentRecord?.id ?? null,
      children: [],
    };
    this.records.set(record.id, record);
    this.childList(record.parent).push(record.id);
    return record;
  }

  /**
   * Forget a node. Its children are detached and become top-level nodes;
   * any whose name is already taken at the top level is renamed.
   */
  remove(node: TSceneNode): TNodeRemoval {
    const record = this.require(node);
    removeFrom(this.childList(record.parent), record.id);
    this.records.delete(record.id);

    const orphans: TSceneNode[] = [];
    const renamed: TNodeRename[] = [];
    for (const childId of record.children) {
      const child = this.records.get(childId);
      if (!child) continue;

      const rootNames = this.siblingNames(null);
      child.parent = null;
      if (rootNames.has(child.name)) {
        const from = child.name;
        child.name = this.nextFreeName(stripTrailingDigits(child.name), rootNames);
        renamed.push({ node: child, from, to: child.name });
      }
      this.roots.push(child.id);
      orphans.push(child);
    }
    return { orphans, renamed };
  }

  /**
   * Move a node under `parent`, or to the top level when `parent` is null.
   *
   * @throws {InvalidParentError} If `parent` is the node or one of its descendants
   * @throws {NameCollisionError} If a sibling in the destination has the same name
   */
  setParent(node: TSceneNode, parent: TSceneNode | null): void {
    const record = this.require(node);
    const parentRecord = parent ? this.require(parent) : null;
    const destination = parentRecord?.id ?? null;
    if (record.parent === destination) return;

    for (let cursor = parentRecord; cursor; cursor = this.parentRecord(cursor)) {
      if (cursor.id === record.id) {
        throw new InvalidParentError(this.path(record), parentRecord ? this.path(parentRecord) : '');
      }
    }

    if (this.siblingNames(destination).has(record.name)) {
      throw new NameCollisionError(record.name, this.describeScope(parentRecord));
    }

    removeFrom(this.childList(record.parent), record.id);
    record.parent = destination;
    this.childList(destination).push(record.id);
  }

  rename(node: TSceneNode, name: string): void {
    const record = this.require(node);
    if (record.name === name) return;
    assertValidNodeName(name, this.reservedNames);
    if (this.siblingNames(record.parent).has(name)) {
      throw new NameCollisionError(name, this.describeScope(this.parentRecord(record)));
    }
    record.name = name;
  }

  parentOf(node: TSceneNode): TSceneNode | null {
    return this.parentRecord(this.require(node));
  }

  childrenOf(node: TSceneNode): TSceneNode[] {
    return this.resolveIds(this.require(node).children);
  }

  /** Full path: `|` followed by ancestor names from the top level down. */
  path(node: TSceneNode): string {
    const names: string[] = [];
    for (let cursor: TNodeRecord | null = this.require(node); cursor; cursor = this.parentRecord(cursor)) {
      names.push(cursor.name);
    }
    return HIERARCHY_SEPARATOR + names.reverse().join(HIERARCHY_SEPARATOR);
  }

  /**
   * Shortest trailing part of the path that identifies the node.
   * Falls back to the full path when every relative suffix is ambiguous.
   */
  shortName(node: TSceneNode): string {
    const fullPath = this.path(node);
    const segments = splitPath(fullPath);
    const others = this.all()
      .filter((other) => other !== node)
      .map((other) => this.path(other));

    for (let depth = 1; depth <= segments.length; depth++) {
      const suffix = segments.slice(-depth).join(HIERARCHY_SEPARATOR);
      const needle = HIERARCHY_SEPARATOR + suffix;
      if (!others.some((path) => path.endsWith(needle))) {
        return suffix;
      }
    }
    return fullPath;
  }

  /**
   * Exact lookup. A query containing the hierarchy separator is compared
   * against full paths, anything else against node names.
   *
   * @throws {NotFoundError} If no node has that name or path
   */
  getByName(name: string): TSceneNode {
    const found = name.includes(HIERARCHY_SEPARATOR)
      ? this.findByPath(name)
      : this.all().find((node) => node.name === name);
    if (!found) {
      throw new NotFoundError(name);
    }
    return found;
  }

  /** Lazily yield every node whose path matches, in creation order. */
  iterMatches(pattern: string | null | undefined): Iterable<TSceneNode> {
    const matcher = compilePattern(pattern, this.matcherCache);
    const store = this;
    return {
      *[Symbol.iterator]() {
        for (const record of store.records.values()) {
          if (matcher.test(store.path(record))) {
            yield record;
          }
        }
      },
    };
  }

  /**
   * Type, then name, then path. Gives listings a reproducible order.
   */
  compare(a: TSceneNode, b: TSceneNode): number {
    return (
      compareStrings(a.type, b.type) ||
      compareStrings(a.name, b.name) ||
      compareStrings(this.path(a), this.path(b))
    );
  }

  private findByPath(query: string): TSceneNode | undefined {
    const absolute = query.startsWith(HIERARCHY_SEPARATOR) ? query : HIERARCHY_SEPARATOR + query;
    return this.all().find((node) => this.path(node) === absolute);
  }

  private require(node: TSceneNode): TNodeRecord {
    const record = this.records.get(node.id);
    if (!record || record !== node) {
      throw new NotFoundError(node.name, 'node in this session');
    }
    return record;
  }

  private parentRecord(record: TNodeRecord): TNodeRecord | null {
    return record.parent === null ? null : this.records.get(record.parent) ?? null;
  }

  private childList(parent: NodeId | null): NodeId[] {
    if (parent === null) return this.roots;
    const record = this.records.get(parent);
    if (!record) {
      throw new NotFoundError(`#${parent}`, 'node');
    }
    return record.children;
  }

  private siblingNames(parent: NodeId | null): Set<string> {
    return new Set(this.resolveIds(this.childList(parent)).map((node) => node.name));
  }

  private resolveIds(ids: readonly NodeId[]): TSceneNode[] {
    const nodes: TSceneNode[] = [];
    for (const id of ids) {
      const record = this.records.get(id);
      if (record) nodes.push(record);
    }
    return nodes;
  }

  private nextFreeName(base: string, taken: ReadonlySet<string>): string {
    for (let index = 1; ; index++) {
      const candidate = `${base}${index}`;
      if (!taken.has(candidate) && isValidNodeName(candidate, this.reservedNames)) {
        return candidate;
      }
    }
  }

  private describeScope(parent: TNodeRecord | null): string {
    return parent ? `the children of "${this.path(parent)}"` : 'the top level';
  }
}

function defaultBaseName(type: string): string {
  return conformNodeName(type) || FALLBACK_BASE_NAME;
}

function stripTrailingDigits(name: string): string {
  return name.replace(TRAILING_DIGITS, '') || name;
}

function removeFrom<T>(list: T[], item: T): void {
  const index = list.indexOf(item);
  if (index !== -1) {
    list.splice(index, 1);
  }
}
