/**
 * Scene graph records.
 *
 * Nodes, ports and connections live in arenas owned by their stores and
 * refer to each other by id only. Records handed out by the session are the
 * store's own objects, typed read-only: they always reflect the current state
 * (a renamed node shows its new name) but can only be changed through the
 * session.
 */

declare const NodeIdBrand: unique symbol;
declare const PortIdBrand: unique symbol;
declare const ConnectionIdBrand: unique symbol;

export type NodeId = number & { readonly [NodeIdBrand]: never };
export type PortId = number & { readonly [PortIdBrand]: never };
export type ConnectionId = number & { readonly [ConnectionIdBrand]: never };

export type TSceneNode = {
  readonly id: NodeId;
  readonly name: string;
  /** Node type tag, e.g. "transform", "locator", "multiplyDivide" */
  readonly type: string;
  readonly parent: NodeId | null;
  readonly children: readonly NodeId[];
};

/**
 * Attribute values. Numeric tuples model compound attributes (double3 etc).
 */
export type TPortValue = number | boolean | string | readonly number[];

export type TPortValueKind = 'number' | 'boolean' | 'string' | 'tuple';

export type TPort = {
  readonly id: PortId;
  /** Owning node */
  readonly node: NodeId;
  readonly name: string;
  readonly shortName?: string;
  /** Display alias, never used for addressing */
  readonly niceName?: string;
  readonly type: string;
  readonly value: TPortValue;
  /** False for ports seeded from the node type schema */
  readonly userDefined: boolean;
};

export type TConnection = {
  readonly id: ConnectionId;
  readonly src: PortId;
  readonly dst: PortId;
};

/** Receives warnings raised by the session. Fire-and-forget. */
export type TWarningSink = (message: string) => void;

export type TCreateNodeOptions = {
  /** Node name. Defaults to the type plus the first free number; a trailing `#` is replaced the same way. */
  name?: string;
  parent?: TSceneNode | null;
};

export type TCreatePortOptions = {
  type?: string;
  shortName?: string;
  value?: TPortValue;
  niceName?: string;
};

export function portValueKind(value: TPortValue): TPortValueKind {
  if (typeof value === 'number') return 'number';
  if (typeof value === 'boolean') return 'boolean';
  if (typeof value === 'string') return 'string';
  return 'tuple';
}

/**
 * Default value for a freshly created port of the given type.
 */
export function defaultValueForType(type: string): TPortValue {
  switch (type) {
    case 'bool':
      return false;
    case 'string':
    case 'message':
      return '';
    case 'double2':
    case 'float2':
    case 'long2':
    case 'short2':
      return [0, 0];
    case 'double3':
    case 'float3':
    case 'long3':
    case 'short3':
      return [0, 0, 0];
    default:
      return 0;
  }
}
