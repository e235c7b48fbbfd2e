/**
 * @module cmds
 *
 * # Command layer
 *
 * Application-shaped scripting commands over a Session. Arguments are
 * addresses (names, paths, patterns, `node.attr`) and return values are
 * strings, the way scripts see them; the session underneath works with
 * records.
 *
 * | Category    | Commands |
 * |-------------|----------|
 * | Nodes       | `createNode`, `delete`, `parent`, `nodeType`, `ls`, `objExists` |
 * | Attributes  | `addAttr`, `deleteAttr`, `getAttr`, `setAttr`, `listAttr` |
 * | Connections | `connectAttr`, `disconnectAttr`, `connectionInfo` |
 * | Selection   | `select` |
 * | Output      | `warning` |
 */

import {
  AmbiguousArgumentsError,
  DuplicateConnectionError,
  MissingConnectionError,
  NotFoundError,
} from '../errors.js';
import { ATTRIBUTE_SEPARATOR } from '../naming/constants.js';
import { Session } from '../session/session.js';
import type { TPort, TPortValue, TSceneNode } from '../session/types.js';
import { pickFlag, toList } from './flags.js';

export interface CreateNodeFlags {
  name?: string;
  n?: string;
  parent?: string;
  p?: string;
  /** Keep the current selection instead of selecting the new node */
  skipSelect?: boolean;
  ss?: boolean;
}

export interface AddAttrFlags {
  attributeType?: string;
  at?: string;
  dataType?: string;
  dt?: string;
  defaultValue?: TPortValue;
  dv?: TPortValue;
  longName?: string;
  ln?: string;
  niceName?: string;
  nn?: string;
  shortName?: string;
  sn?: string;
}

export interface DeleteAttrFlags {
  attribute?: string;
  at?: string;
}

export interface ListAttrFlags {
  userDefined?: boolean;
  ud?: boolean;
}

export interface LsFlags {
  /** Return full paths instead of short names */
  long?: boolean;
  l?: boolean;
  /** Only selected nodes */
  selection?: boolean;
  sl?: boolean;
  type?: string;
  typ?: string;
}

export interface ParentFlags {
  /** Move the objects to the top level */
  world?: boolean;
  w?: boolean;
}

export interface ConnectionInfoFlags {
  sourceFromDestination?: boolean;
  sdf?: boolean;
  destinationFromSource?: boolean;
  dfs?: boolean;
}

const DEFAULT_ATTRIBUTE_VALUE = 0;

export class CmdsSession {
  readonly session: Session;

  constructor(session?: Session) {
    this.session = session ?? new Session();
  }

  /**
   * Create a node and, unless `skipSelect`, select it.
   *
   * @returns The new node's short name
   */
  createNode(type: string, flags: CreateNodeFlags = {}): string {
    const name = pickFlag('name', 'n', flags.name, flags.n);
    const parentQuery = pickFlag('parent', 'p', flags.parent, flags.p);
    const skipSelect = pickFlag('skipSelect', 'ss', flags.skipSelect, flags.ss) ?? false;

    const parent = parentQuery ? this.requireNode(parentQuery) : null;
    const node = this.session.createNode(type, { name, parent });
    if (!skipSelect) {
      this.session.select([node]);
    }
    return this.session.shortName(node);
  }

  /**
   * Delete nodes by exact name or path. Every name is resolved before
   * anything is removed; a node named twice is removed once.
   */
  delete(names: string | readonly string[]): void {
    const nodes = new Set(toList(names).map((name) => this.session.getNodeByName(name)));
    for (const node of nodes) {
      this.session.removeNode(node);
    }
  }

  /**
   * Parent objects under the last one, or move them all to the top level
   * with `world`.
   */
  parent(objects: readonly string[], flags: ParentFlags = {}): void {
    const world = pickFlag('world', 'w', flags.world, flags.w) ?? false;
    if (!world && objects.length < 2) {
      throw new AmbiguousArgumentsError('parent needs at least one object and a parent, or the world flag');
    }

    const childNames = world ? objects : objects.slice(0, -1);
    const parent = world ? null : this.session.getNodeByName(objects[objects.length - 1]);
    const children = childNames.map((name) => this.session.getNodeByName(name));
    for (const child of children) {
      this.session.setParent(child, parent);
    }
  }

  nodeType(name: string): string {
    return this.session.getNodeByName(name).type;
  }

  /**
   * List nodes matching the first pattern (every node when none is given),
   * sorted by type then name.
   */
  ls(objects?: string | readonly string[], flags: LsFlags = {}): string[] {
    const long = pickFlag('long', 'l', flags.long, flags.l) ?? false;
    const selection = pickFlag('selection', 'sl', flags.selection, flags.sl) ?? false;
    const type = pickFlag('type', 'typ', flags.type, flags.typ);
    const pattern = toList(objects)[0];

    const nodes: TSceneNode[] = [];
    for (const node of this.session.iterNodeByMatch(pattern)) {
      if (selection && !this.session.isSelected(node)) continue;
      if (type !== undefined && node.type !== type) continue;
      nodes.push(node);
    }
    return this.session
      .sortNodes(nodes)
      .map((node) => (long ? this.session.path(node) : this.session.shortName(node)));
  }

  /** True when a node or an attribute matches. */
  objExists(pattern: string): boolean {
    return this.session.nodeExist(pattern) || this.session.getPortByMatch(pattern) !== undefined;
  }

  /**
   * Add an attribute to each object. Needs a long or a short name.
   */
  addAttr(objects: string | readonly string[], flags: AddAttrFlags = {}): void {
    const longName = pickFlag('longName', 'ln', flags.longName, flags.ln);
    const shortName = pickFlag('shortName', 'sn', flags.shortName, flags.sn);
    const name = longName || shortName;
    if (!name) {
      throw new AmbiguousArgumentsError('New attribute needs either a long (-ln) or short (-sn) attribute name.');
    }
    const attributeType = pickFlag('attributeType', 'at', flags.attributeType, flags.at);
    const dataType = pickFlag('dataType', 'dt', flags.dataType, flags.dt);
    const value = pickFlag('defaultValue', 'dv', flags.defaultValue, flags.dv) ?? DEFAULT_ATTRIBUTE_VALUE;
    const niceName = pickFlag('niceName', 'nn', flags.niceName, flags.nn);

    const nodes = toList(objects).map((object) => this.requireNode(object));
    for (const node of nodes) {
      this.session.createPort(node, name, {
        type: attributeType ?? dataType ?? this.session.config.defaultPortType,
        shortName: shortName || undefined,
        value,
        niceName,
      });
    }
  }

  /**
   * Delete attributes given as `node.attr`, or as node names plus the
   * `attribute` flag.
   */
  deleteAttr(queries: string | readonly string[], flags: DeleteAttrFlags = {}): void {
    const attribute = pickFlag('attribute', 'at', flags.attribute, flags.at);
    const ports = toList(queries).map((query) => {
      const direct = this.session.getPortByMatch(query);
      if (direct) return direct;
      if (attribute === undefined) {
        throw new NotFoundError(query, 'attribute');
      }
      return this.requirePort(`${query}${ATTRIBUTE_SEPARATOR}${attribute}`);
    });
    for (const port of ports) {
      this.session.removePort(port);
    }
  }

  getAttr(dagpath: string): TPortValue {
    return this.session.getPortValue(this.requirePort(dagpath));
  }

  setAttr(dagpath: string, value: TPortValue): void {
    this.session.setPortValue(this.requirePort(dagpath), value);
  }

  /**
   * Attribute names of every node matching the given patterns.
   */
  listAttr(objects: string | readonly string[], flags: ListAttrFlags = {}): string[] {
    const userDefined = pickFlag('userDefined', 'ud', flags.userDefined, flags.ud) ?? false;

    const nodes = new Set<TSceneNode>();
    for (const object of toList(objects)) {
      for (const node of this.session.getNodesByMatch(object)) {
        nodes.add(node);
      }
    }

    const names: string[] = [];
    for (const node of nodes) {
      for (const port of this.session.portsByNode(node)) {
        if (userDefined && !port.userDefined) continue;
        names.push(port.name);
      }
    }
    return names;
  }

  /**
   * Connect two attributes. A duplicate connection is reported through
   * `warning` before the error is raised.
   */
  connectAttr(src: string, dst: string): void {
    const [source, destination] = this.resolveConnectionPorts(src, dst);
    if (this.session.getConnectionByPorts(source, destination)) {
      const error = new DuplicateConnectionError(
        this.session.portShortAddress(source),
        this.session.portShortAddress(destination),
      );
      this.warning(error.message);
      throw error;
    }
    this.session.createConnection(source, destination);
  }

  disconnectAttr(src: string, dst: string): void {
    const [source, destination] = this.resolveConnectionPorts(src, dst);
    const connection = this.session.getConnectionByPorts(source, destination);
    if (!connection) {
      throw new MissingConnectionError(
        this.session.portShortAddress(source),
        this.session.portShortAddress(destination),
      );
    }
    this.session.removeConnection(connection);
  }

  /**
   * With `sourceFromDestination`, the attribute feeding `dagpath` ("" when
   * none). With `destinationFromSource`, every attribute it feeds.
   * Exactly one of the two flags must be set.
   */
  connectionInfo(dagpath: string, flags: ConnectionInfoFlags): string | string[] {
    const sourceFromDestination =
      pickFlag('sourceFromDestination', 'sdf', flags.sourceFromDestination, flags.sdf) ?? false;
    const destinationFromSource =
      pickFlag('destinationFromSource', 'dfs', flags.destinationFromSource, flags.dfs) ?? false;

    if (sourceFromDestination && destinationFromSource) {
      throw new AmbiguousArgumentsError('You cannot specify more than one flag.');
    }
    if (!sourceFromDestination && !destinationFromSource) {
      throw new AmbiguousArgumentsError('You must specify exactly one flag.');
    }

    const port = this.requirePort(dagpath);
    if (sourceFromDestination) {
      const [first] = this.session.getPortInputConnections(port);
      return first ? this.session.portShortAddress(this.session.connectionSource(first)) : '';
    }
    return this.session
      .getPortOutputConnections(port)
      .map((connection) => this.session.portShortAddress(this.session.connectionDestination(connection)));
  }

  /**
   * Replace the selection with every node matching the given patterns, in
   * the order given.
   */
  select(names: string | readonly string[]): void {
    const nodes = toList(names).flatMap((name) => {
      const matches = this.session.getNodesByMatch(name);
      if (matches.length === 0) {
        throw new NotFoundError(name);
      }
      return matches;
    });
    this.session.select(nodes);
  }

  warning(message: string): void {
    this.session.warning(message);
  }

  private requireNode(pattern: string): TSceneNode {
    const node = this.session.getNodeByMatch(pattern);
    if (!node) {
      throw new NotFoundError(pattern);
    }
    return node;
  }

  private requirePort(dagpath: string): TPort {
    const port = this.session.getPortByMatch(dagpath);
    if (!port) {
      throw new NotFoundError(dagpath);
    }
    return port;
  }

  private resolveConnectionPorts(src: string, dst: string): [TPort, TPort] {
    const source = this.session.getPortByMatch(src);
    if (!source) {
      throw new NotFoundError(src, 'source attribute');
    }
    const destination = this.session.getPortByMatch(dst);
    if (!destination) {
      throw new NotFoundError(dst, 'destination attribute');
    }
    return [source, destination];
  }
}
