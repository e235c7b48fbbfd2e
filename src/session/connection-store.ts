/**
 * Connection Graph
 *
 * Directed edges between ports. Fan-in and fan-out are both allowed and no
 * cycle check is made; the only structural rule is one edge per ordered
 * (src, dst) pair.
 */

import { IdAllocator, isConnectionId } from './ids.js';
import type { ConnectionId, PortId, TConnection } from './types.js';

export class ConnectionStore {
  private records = new Map<ConnectionId, TConnection>();
  private byPair = new Map<string, ConnectionId>();
  private inputs = new Map<PortId, ConnectionId[]>();
  private outputs = new Map<PortId, ConnectionId[]>();
  private ids = new IdAllocator<ConnectionId>('connection', isConnectionId);

  all(): TConnection[] {
    return [...this.records.values()];
  }

  has(connection: TConnection): boolean {
    return this.records.get(connection.id) === connection;
  }

  /** Returns undefined when the pair is already connected. */
  tryCreate(src: PortId, dst: PortId): TConnection | undefined {
    const key = pairKey(src, dst);
    if (this.byPair.has(key)) return undefined;

    const connection: TConnection = { id: this.ids.allocate(), src, dst };
    this.records.set(connection.id, connection);
    this.byPair.set(key, connection.id);
    appendTo(this.outputs, src, connection.id);
    appendTo(this.inputs, dst, connection.id);
    return connection;
  }

  /** Returns false when the connection is not in the graph. */
  tryRemove(connection: TConnection): boolean {
    if (!this.has(connection)) return false;
    this.records.delete(connection.id);
    this.byPair.delete(pairKey(connection.src, connection.dst));
    removeFrom(this.outputs, connection.src, connection.id);
    removeFrom(this.inputs, connection.dst, connection.id);
    return true;
  }

  byPorts(src: PortId, dst: PortId): TConnection | undefined {
    const id = this.byPair.get(pairKey(src, dst));
    return id === undefined ? undefined : this.records.get(id);
  }

  /** Connections whose destination is `port`. */
  inputsOf(port: PortId): TConnection[] {
    return this.resolve(this.inputs.get(port));
  }

  /** Connections whose source is `port`. */
  outputsOf(port: PortId): TConnection[] {
    return this.resolve(this.outputs.get(port));
  }

  /** Every connection with `port` at either end, without duplicates. */
  touching(port: PortId): TConnection[] {
    return [...new Set([...this.inputsOf(port), ...this.outputsOf(port)])];
  }

  private resolve(ids: readonly ConnectionId[] | undefined): TConnection[] {
    const connections: TConnection[] = [];
    for (const id of ids ?? []) {
      const connection = this.records.get(id);
      if (connection) connections.push(connection);
    }
    return connections;
  }
}

function pairKey(src: PortId, dst: PortId): string {
  return `${src}->${dst}`;
}

function appendTo(index: Map<PortId, ConnectionId[]>, port: PortId, id: ConnectionId): void {
  const list = index.get(port);
  if (list) {
    list.push(id);
  } else {
    index.set(port, [id]);
  }
}

function removeFrom(index: Map<PortId, ConnectionId[]>, port: PortId, id: ConnectionId): void {
  const list = index.get(port);
  if (!list) return;
  const position = list.indexOf(id);
  if (position !== -1) list.splice(position, 1);
  if (list.length === 0) index.delete(port);
}
