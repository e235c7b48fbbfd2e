/**
 * Port Store
 *
 * Ports (attributes) owned by nodes. A port's long name and short name share
 * one namespace per node, so `tx` can never be both the short name of
 * `translateX` and the name of another port on the same node.
 */

import { InvalidNameError, NameCollisionError, NotFoundError } from '../errors.js';
import { isValidPortName } from '../naming/names.js';
import { IdAllocator, isPortId } from './ids.js';
import {
  defaultValueForType,
  type NodeId,
  type PortId,
  type TCreatePortOptions,
  type TPort,
  type TPortValue,
} from './types.js';

type TPortRecord = {
  id: PortId;
  node: NodeId;
  name: string;
  shortName?: string;
  niceName?: string;
  type: string;
  value: TPortValue;
  userDefined: boolean;
};

export class PortStore {
  private records = new Map<PortId, TPortRecord>();
  private byNode = new Map<NodeId, PortId[]>();
  private ids = new IdAllocator<PortId>('port', isPortId);

  constructor(private readonly defaultPortType: string) {}

  get(id: PortId): TPort | undefined {
    return this.records.get(id);
  }

  has(port: TPort): boolean {
    return this.records.get(port.id) === port;
  }

  /**
   * @throws {InvalidNameError} If a name is not an identifier
   * @throws {NameCollisionError} If the name or short name is already used on the node
   */
  create(
    node: NodeId,
    name: string,
    options: TCreatePortOptions & { userDefined: boolean },
  ): TPort {
    const { shortName, niceName, userDefined } = options;
    const type = options.type ?? this.defaultPortType;

    for (const candidate of shortName === undefined ? [name] : [name, shortName]) {
      if (!isValidPortName(candidate)) {
        throw new InvalidNameError(candidate, 'attribute names must start with a letter or "_" and contain only letters, digits and "_"');
      }
    }
    const taken = this.takenNames(node);
    for (const candidate of [name, shortName]) {
      if (candidate !== undefined && taken.has(candidate)) {
        throw new NameCollisionError(candidate, 'the attributes of this node');
      }
    }

    const record: TPortRecord = {
      id: this.ids.allocate(),
      node,
      name,
      type,
      value: options.value ?? defaultValueForType(type),
      userDefined,
    };
    // A short name equal to the long name adds no alias
    if (shortName !== undefined && shortName !== name) record.shortName = shortName;
    if (niceName !== undefined) record.niceName = niceName;

    this.records.set(record.id, record);
    const owned = this.byNode.get(node);
    if (owned) {
      owned.push(record.id);
    } else {
      this.byNode.set(node, [record.id]);
    }
    return record;
  }

  remove(port: TPort): void {
    const record = this.require(port);
    this.records.delete(record.id);
    const owned = this.byNode.get(record.node);
    if (!owned) return;
    const index = owned.indexOf(record.id);
    if (index !== -1) owned.splice(index, 1);
    if (owned.length === 0) this.byNode.delete(record.node);
  }

  /** Ports owned by a node, in creation order. */
  byOwner(node: NodeId): TPort[] {
    const ports: TPort[] = [];
    for (const id of this.byNode.get(node) ?? []) {
      const record = this.records.get(id);
      if (record) ports.push(record);
    }
    return ports;
  }

  /** Exact lookup by long or short name on one node. */
  find(node: NodeId, name: string): TPort | undefined {
    return this.byOwner(node).find((port) => port.name === name || port.shortName === name);
  }

  setValue(port: TPort, value: TPortValue): void {
    this.require(port).value = value;
  }

  private takenNames(node: NodeId): Set<string> {
    const names = new Set<string>();
    for (const port of this.byOwner(node)) {
      names.add(port.name);
      if (port.shortName !== undefined) names.add(port.shortName);
    }
    return names;
  }

  private require(port: TPort): TPortRecord {
    const record = this.records.get(port.id);
    if (!record || record !== port) {
      throw new NotFoundError(port.name, 'attribute in this session');
    }
    return record;
  }
}
