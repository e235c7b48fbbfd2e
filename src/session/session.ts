/**
 * @module session
 *
 * # Session
 *
 * Façade over the node, port and connection stores. Every mutation of the
 * scene goes through here so the cascades stay consistent:
 *
 * - removing a node removes its ports, which removes their connections
 * - removing a port removes every connection touching it
 * - removing a node drops it from the selection
 *
 * Pattern lookups (`getNodeByMatch`, `getPortByMatch`, `iterNodeByMatch`)
 * return `undefined` or an empty result instead of throwing. Operations where
 * the caller asserts something exists, or is free, throw a `SessionError`.
 *
 * Selection and the compiled pattern cache belong to the instance, so any
 * number of sessions can coexist in one process.
 */

import { resolveConfig } from '../config/loader.js';
import type { TPartialSessionConfig, TSessionConfig } from '../config/types.js';
import {
  DuplicateConnectionError,
  MissingConnectionError,
  NotFoundError,
} from '../errors.js';
import { createLogger } from '../logging/logger.js';
import { ATTRIBUTE_SEPARATOR } from '../naming/constants.js';
import { MatcherCache } from '../naming/matcher-cache.js';
import { splitPortAddress } from '../naming/names.js';
import type { TPathMatcher } from '../naming/pattern.js';
import { ConnectionStore } from './connection-store.js';
import { NodeTypeSchema } from './node-schema.js';
import { compareStrings, NodeStore } from './node-store.js';
import { PortStore } from './port-store.js';
import type {
  NodeId,
  TConnection,
  TCreateNodeOptions,
  TCreatePortOptions,
  TPort,
  TPortValue,
  TSceneNode,
  TWarningSink,
} from './types.js';

const sessionLogger = createLogger('session');

export interface SessionOptions {
  /** Values applied on top of the defaults */
  config?: TPartialSessionConfig;
  /** Node type schema used when `seedBuiltinPorts` is on. Defaults to the bundled one. */
  schema?: NodeTypeSchema;
  /** Receives warnings. Defaults to the console logger, or nothing when `warnings` is "silent". */
  warningSink?: TWarningSink;
}

export class Session {
  readonly config: TSessionConfig;
  readonly schema: NodeTypeSchema;

  private readonly nodeStore: NodeStore;
  private readonly portStore: PortStore;
  private readonly connectionStore = new ConnectionStore();
  private readonly matcherCache: MatcherCache<TPathMatcher>;
  private readonly warningSink: TWarningSink;
  private selected: NodeId[] = [];

  constructor(options: SessionOptions = {}) {
    this.config = resolveConfig(options.config);
    this.matcherCache = new MatcherCache<TPathMatcher>(this.config.matcherCacheSize);
    this.nodeStore = new NodeStore(this.config.reservedNames, this.matcherCache);
    this.portStore = new PortStore(this.config.defaultPortType);
    this.schema = options.schema ?? loadSchema(this.config);
    this.warningSink = options.warningSink ?? defaultWarningSink(this.config);
  }

  /**
   * Build a session from an already loaded configuration (see `loadConfig`).
   */
  static fromConfig(config: TSessionConfig, options: Omit<SessionOptions, 'config'> = {}): Session {
    return new Session({ ...options, config });
  }

  // ── Nodes ──────────────────────────────────────────────────────────────

  /** Every node, in creation order. */
  get nodes(): TSceneNode[] {
    return this.nodeStore.all();
  }

  /**
   * Create a node, optionally under a parent.
   * With `seedBuiltinPorts` on, the type's built-in ports are created too.
   *
   * @throws {InvalidNameError} If the name fails the naming rules
   * @throws {NameCollisionError} If a sibling already has the name
   */
  createNode(type: string, options: TCreateNodeOptions = {}): TSceneNode {
    const node = this.nodeStore.create(type, options.name, options.parent);
    if (!this.config.seedBuiltinPorts) {
      return node;
    }
    try {
      for (const port of this.schema.builtinPorts(type)) {
        this.portStore.create(node.id, port.name, {
          type: port.type,
          shortName: port.shortName,
          niceName: port.niceName,
          value: port.value,
          userDefined: false,
        });
      }
    } catch (error) {
      // Leave no half-seeded node behind
      for (const port of this.portStore.byOwner(node.id)) {
        this.portStore.remove(port);
      }
      this.nodeStore.remove(node);
      throw error;
    }
    return node;
  }

  /**
   * Remove a node with its ports and their connections. Children are kept
   * and become top-level nodes; one whose name is taken at the top level is
   * renamed and a warning is emitted.
   */
  removeNode(node: TSceneNode): void {
    for (const port of this.portsByNode(node)) {
      this.removePort(port);
    }
    const { renamed } = this.nodeStore.remove(node);
    this.selected = this.selected.filter((id) => id !== node.id);
    for (const { from, to } of renamed) {
      this.warning(`Renamed "${from}" to "${to}" while moving it to the top level`);
    }
  }

  /**
   * Reparent a node; `null` moves it to the top level.
   *
   * @throws {NameCollisionError} If the destination already has a child with the node's name
   * @throws {InvalidParentError} If `parent` is the node or one of its descendants
   */
  setParent(node: TSceneNode, parent: TSceneNode | null): void {
    this.nodeStore.setParent(node, parent);
  }

  renameNode(node: TSceneNode, name: string): void {
    this.nodeStore.rename(node, name);
  }

  parentOf(node: TSceneNode): TSceneNode | null {
    return this.nodeStore.parentOf(node);
  }

  childrenOf(node: TSceneNode): TSceneNode[] {
    return this.nodeStore.childrenOf(node);
  }

  /** Full path, e.g. `|group1|locator1`. */
  path(node: TSceneNode): string {
    return this.nodeStore.path(node);
  }

  /** Shortest path suffix that still identifies the node, e.g. `locator1`. */
  shortName(node: TSceneNode): string {
    return this.nodeStore.shortName(node);
  }

  /**
   * Exact lookup by name, or by full path when the query contains `|`.
   *
   * @throws {NotFoundError} If nothing has that name
   */
  getNodeByName(name: string): TSceneNode {
    return this.nodeStore.getByName(name);
  }

  /**
   * Resolve a pattern to one node. When several match, the one with the
   * lexicographically smallest path wins.
   */
  getNodeByMatch(pattern: string | null | undefined): TSceneNode | undefined {
    let best: { node: TSceneNode; path: string } | undefined;
    for (const node of this.nodeStore.iterMatches(pattern)) {
      const path = this.nodeStore.path(node);
      if (!best || compareStrings(path, best.path) < 0) {
        best = { node, path };
      }
    }
    return best?.node;
  }

  /** Every node matching the pattern, in creation order. */
  getNodesByMatch(pattern: string | null | undefined): TSceneNode[] {
    return [...this.nodeStore.iterMatches(pattern)];
  }

  /**
   * Lazy version of getNodesByMatch. Each iteration re-reads the scene.
   */
  iterNodeByMatch(pattern: string | null | undefined): Iterable<TSceneNode> {
    return this.nodeStore.iterMatches(pattern);
  }

  nodeExist(pattern: string | null | undefined): boolean {
    for (const _node of this.nodeStore.iterMatches(pattern)) {
      return true;
    }
    return false;
  }

  /** Display order: type, then name, then path. */
  compareNodes(a: TSceneNode, b: TSceneNode): number {
    return this.nodeStore.compare(a, b);
  }

  sortNodes(nodes: Iterable<TSceneNode>): TSceneNode[] {
    return [...nodes].sort((a, b) => this.nodeStore.compare(a, b));
  }

  // ── Ports ──────────────────────────────────────────────────────────────

  /**
   * Add a user-defined port to a node.
   *
   * @throws {InvalidNameError} If a name is not an identifier
   * @throws {NameCollisionError} If the name or short name is already used on the node
   */
  createPort(node: TSceneNode, name: string, options: TCreatePortOptions = {}): TPort {
    this.requireNode(node);
    return this.portStore.create(node.id, name, { ...options, userDefined: true });
  }

  /** Remove a port and every connection touching it. */
  removePort(port: TPort): void {
    this.portOwner(port);
    for (const connection of this.connectionStore.touching(port.id)) {
      this.connectionStore.tryRemove(connection);
    }
    this.portStore.remove(port);
  }

  /**
   * Resolve `<node pattern>.<port name>`. The node side goes through
   * getNodeByMatch; the port name must equal a port's name or short name.
   */
  getPortByMatch(dagpath: string): TPort | undefined {
    const address = splitPortAddress(dagpath);
    if (!address) return undefined;
    const node = this.getNodeByMatch(address.node);
    if (!node) return undefined;
    return this.portStore.find(node.id, address.port);
  }

  /** Ports owned by a node, in creation order. */
  portsByNode(node: TSceneNode): TPort[] {
    this.requireNode(node);
    return this.portStore.byOwner(node.id);
  }

  portOwner(port: TPort): TSceneNode {
    const node = this.portStore.has(port) ? this.nodeStore.get(port.node) : undefined;
    if (!node) {
      throw new NotFoundError(port.name, 'attribute in this session');
    }
    return node;
  }

  getPortValue(port: TPort): TPortValue {
    this.portOwner(port);
    return port.value;
  }

  setPortValue(port: TPort, value: TPortValue): void {
    this.portStore.setValue(port, value);
  }

  /** `<full node path>.<port name>` */
  portAddress(port: TPort): string {
    return `${this.path(this.portOwner(port))}${ATTRIBUTE_SEPARATOR}${port.name}`;
  }

  /** `<node short name>.<port name>` */
  portShortAddress(port: TPort): string {
    return `${this.shortName(this.portOwner(port))}${ATTRIBUTE_SEPARATOR}${port.name}`;
  }

  // ── Connections ────────────────────────────────────────────────────────

  get connections(): TConnection[] {
    return this.connectionStore.all();
  }

  /**
   * @throws {DuplicateConnectionError} If src is already connected to dst
   */
  createConnection(src: TPort, dst: TPort): TConnection {
    this.portOwner(src);
    this.portOwner(dst);
    const connection = this.connectionStore.tryCreate(src.id, dst.id);
    if (!connection) {
      throw new DuplicateConnectionError(this.portShortAddress(src), this.portShortAddress(dst));
    }
    return connection;
  }

  /**
   * @throws {MissingConnectionError} If the connection is not in the graph
   */
  removeConnection(connection: TConnection): void {
    if (!this.connectionStore.tryRemove(connection)) {
      throw new MissingConnectionError(this.describePort(connection.src), this.describePort(connection.dst));
    }
  }

  /**
   * Remove the connection from src to dst.
   *
   * @throws {MissingConnectionError} If the ports are not connected
   */
  disconnect(src: TPort, dst: TPort): void {
    this.portOwner(src);
    this.portOwner(dst);
    const connection = this.getConnectionByPorts(src, dst);
    if (!connection) {
      throw new MissingConnectionError(this.portShortAddress(src), this.portShortAddress(dst));
    }
    this.connectionStore.tryRemove(connection);
  }

  getConnectionByPorts(src: TPort, dst: TPort): TConnection | undefined {
    this.portOwner(src);
    this.portOwner(dst);
    return this.connectionStore.byPorts(src.id, dst.id);
  }

  /** Connections feeding into the port (the port is the destination). */
  getPortInputConnections(port: TPort): TConnection[] {
    this.portOwner(port);
    return this.connectionStore.inputsOf(port.id);
  }

  /** Connections leaving the port (the port is the source). */
  getPortOutputConnections(port: TPort): TConnection[] {
    this.portOwner(port);
    return this.connectionStore.outputsOf(port.id);
  }

  connectionSource(connection: TConnection): TPort {
    return this.requirePort(connection.src);
  }

  connectionDestination(connection: TConnection): TPort {
    return this.requirePort(connection.dst);
  }

  // ── Selection & warnings ───────────────────────────────────────────────

  /** Selected nodes in the order they were passed to select(). */
  get selection(): TSceneNode[] {
    const nodes: TSceneNode[] = [];
    for (const id of this.selected) {
      const node = this.nodeStore.get(id);
      if (node) nodes.push(node);
    }
    return nodes;
  }

  /** Replace the selection. Duplicates are kept. */
  select(nodes: Iterable<TSceneNode>): void {
    const ids: NodeId[] = [];
    for (const node of nodes) {
      this.requireNode(node);
      ids.push(node.id);
    }
    this.selected = ids;
  }

  isSelected(node: TSceneNode): boolean {
    return this.selected.includes(node.id);
  }

  warning(message: string): void {
    this.warningSink(message);
  }

  private requireNode(node: TSceneNode): void {
    if (!this.nodeStore.has(node)) {
      throw new NotFoundError(node.name, 'node in this session');
    }
  }

  private requirePort(id: TPort['id']): TPort {
    const port = this.portStore.get(id);
    if (!port) {
      throw new NotFoundError(`#${id}`, 'attribute');
    }
    return port;
  }

  private describePort(id: TPort['id']): string {
    const port = this.portStore.get(id);
    return port ? this.portShortAddress(port) : `#${id}`;
  }
}

function loadSchema(config: TSessionConfig): NodeTypeSchema {
  if (!config.seedBuiltinPorts) {
    return NodeTypeSchema.empty();
  }
  return config.schemaPath === null ? NodeTypeSchema.load() : NodeTypeSchema.load(config.schemaPath);
}

function defaultWarningSink(config: TSessionConfig): TWarningSink {
  if (config.warnings === 'silent') {
    return () => undefined;
  }
  return (message) => sessionLogger.warn(message);
}
