import type { ConnectionId, NodeId, PortId } from './types.js';

function isArenaIndex(value: number): boolean {
  return Number.isSafeInteger(value) && value > 0;
}

export function isNodeId(value: number): value is NodeId {
  return isArenaIndex(value);
}

export function isPortId(value: number): value is PortId {
  return isArenaIndex(value);
}

export function isConnectionId(value: number): value is ConnectionId {
  return isArenaIndex(value);
}

/**
 * Hands out increasing ids for one arena. Ids are never reused, so a stale
 * handle to a removed record can never alias a newer one.
 */
export class IdAllocator<T extends number> {
  private next = 1;

  constructor(
    private readonly kind: string,
    private readonly guard: (value: number) => value is T,
  ) {}

  allocate(): T {
    const value = this.next++;
    if (!this.guard(value)) {
      throw new RangeError(`Exhausted ${this.kind} ids`);
    }
    return value;
  }
}
