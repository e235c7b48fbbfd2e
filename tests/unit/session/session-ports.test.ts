import { describe, it, expect } from 'vitest';
import { Session } from '../../../src/session/session.js';
import { defaultValueForType, portValueKind } from '../../../src/session/types.js';
import { captureSessionError, createTestSession } from '../../helpers.js';

describe('Session ports', () => {
  describe('createPort', () => {
    it('should create a user-defined port with the configured default type', () => {
      const { session } = createTestSession();
      const node = session.createNode('locator', { name: 'loc' });
      const port = session.createPort(node, 'visibility', { value: true });

      expect(port.name).toBe('visibility');
      expect(port.type).toBe('float');
      expect(port.value).toBe(true);
      expect(port.userDefined).toBe(true);
      expect(session.portOwner(port)).toBe(node);
    });

    it('should take the default type from the configuration', () => {
      const { session } = createTestSession({ config: { defaultPortType: 'double' } });
      const node = session.createNode('locator');
      expect(session.createPort(node, 'weight').type).toBe('double');
    });

    it('should derive the initial value from the type', () => {
      const { session } = createTestSession();
      const node = session.createNode('locator');

      expect(session.createPort(node, 'label', { type: 'string' }).value).toBe('');
      expect(session.createPort(node, 'offset', { type: 'double3' }).value).toEqual([0, 0, 0]);
      expect(session.createPort(node, 'enabled', { type: 'bool' }).value).toBe(false);
      expect(session.createPort(node, 'weight').value).toBe(0);
    });

    it('should keep short and nice names', () => {
      const { session } = createTestSession();
      const node = session.createNode('transform');
      const port = session.createPort(node, 'translateX', { shortName: 'tx', niceName: 'Translate X' });

      expect(port.shortName).toBe('tx');
      expect(port.niceName).toBe('Translate X');
    });

    it('should drop a short name equal to the long name', () => {
      const { session } = createTestSession();
      const node = session.createNode('transform');
      expect(session.createPort(node, 'weight', { shortName: 'weight' }).shortName).toBeUndefined();
    });

    it('should share one namespace between long and short names', () => {
      const { session } = createTestSession();
      const node = session.createNode('transform');
      session.createPort(node, 'translateX', { shortName: 'tx' });

      const byName = captureSessionError(() => session.createPort(node, 'tx'), 'NAME_COLLISION');
      expect(byName.message).toBe('Name "tx" is already used in the attributes of this node');
      captureSessionError(() => session.createPort(node, 'other', { shortName: 'translateX' }), 'NAME_COLLISION');
      expect(session.portsByNode(node)).toHaveLength(1);
    });

    it('should allow the same port name on different nodes', () => {
      const { session } = createTestSession();
      const a = session.createNode('transform');
      const b = session.createNode('transform');
      session.createPort(a, 'weight');

      expect(session.createPort(b, 'weight').name).toBe('weight');
    });

    it('should reject names that are not identifiers', () => {
      const { session } = createTestSession();
      const node = session.createNode('transform');

      captureSessionError(() => session.createPort(node, '1x'), 'INVALID_NAME');
      captureSessionError(() => session.createPort(node, 'a.b'), 'INVALID_NAME');
      captureSessionError(() => session.createPort(node, 'ok', { shortName: 'not ok' }), 'INVALID_NAME');
    });

    it('should reject a node from another session', () => {
      const { session } = createTestSession();
      const foreign = new Session({ config: { warnings: 'silent' } }).createNode('transform');

      captureSessionError(() => session.createPort(foreign, 'weight'), 'NOT_FOUND');
    });
  });

  describe('getPortByMatch', () => {
    it('should resolve by long name, short name and path', () => {
      const { session } = createTestSession();
      const group = session.createNode('transform', { name: 'g' });
      const loc = session.createNode('locator', { name: 'loc', parent: group });
      const port = session.createPort(loc, 'translateX', { shortName: 'tx' });

      expect(session.getPortByMatch('loc.translateX')).toBe(port);
      expect(session.getPortByMatch('loc.tx')).toBe(port);
      expect(session.getPortByMatch('|g|loc.tx')).toBe(port);
      expect(session.getPortByMatch('l*.tx')).toBe(port);
    });

    it('should return undefined for unknown addresses', () => {
      const { session } = createTestSession();
      const loc = session.createNode('locator', { name: 'loc' });
      session.createPort(loc, 'weight');

      expect(session.getPortByMatch('loc.missing')).toBeUndefined();
      expect(session.getPortByMatch('other.weight')).toBeUndefined();
      expect(session.getPortByMatch('loc')).toBeUndefined();
      expect(session.getPortByMatch('.weight')).toBeUndefined();
    });
  });

  describe('values and addresses', () => {
    it('should read and write values', () => {
      const { session } = createTestSession();
      const node = session.createNode('locator', { name: 'loc' });
      const port = session.createPort(node, 'offset', { type: 'double3' });

      session.setPortValue(port, [1, 2, 3]);
      expect(session.getPortValue(port)).toEqual([1, 2, 3]);
      expect(port.value).toEqual([1, 2, 3]);
    });

    it('should format full and short addresses', () => {
      const { session } = createTestSession();
      const group = session.createNode('transform', { name: 'g' });
      const loc = session.createNode('locator', { name: 'loc', parent: group });
      const port = session.createPort(loc, 'visibility');

      expect(session.portAddress(port)).toBe('|g|loc.visibility');
      expect(session.portShortAddress(port)).toBe('loc.visibility');
    });

    it('should list a node\'s ports in creation order', () => {
      const { session } = createTestSession();
      const node = session.createNode('transform');
      const b = session.createPort(node, 'b');
      const a = session.createPort(node, 'a');

      expect(session.portsByNode(node)).toEqual([b, a]);
    });
  });

  describe('removePort', () => {
    it('should remove the port and every connection touching it', () => {
      const { session } = createTestSession();
      const a = session.createNode('transform', { name: 'a' });
      const b = session.createNode('transform', { name: 'b' });
      const out = session.createPort(a, 'out');
      const other = session.createPort(a, 'other');
      const input = session.createPort(b, 'in');
      session.createConnection(out, input);
      const kept = session.createConnection(other, input);

      session.removePort(out);

      expect(session.portsByNode(a)).toEqual([other]);
      expect(session.connections).toEqual([kept]);
      expect(session.getPortByMatch('a.out')).toBeUndefined();
      captureSessionError(() => session.removePort(out), 'NOT_FOUND');
    });

    it('should remove ports with their node', () => {
      const { session } = createTestSession();
      const a = session.createNode('transform', { name: 'a' });
      const b = session.createNode('transform', { name: 'b' });
      const out = session.createPort(a, 'out');
      session.createConnection(out, session.createPort(b, 'in'));

      session.removeNode(a);

      expect(session.connections).toEqual([]);
      captureSessionError(() => session.portOwner(out), 'NOT_FOUND');
    });
  });
});

describe('port value helpers', () => {
  it('should classify values', () => {
    expect(portValueKind(1)).toBe('number');
    expect(portValueKind(true)).toBe('boolean');
    expect(portValueKind('x')).toBe('string');
    expect(portValueKind([1, 2])).toBe('tuple');
  });

  it('should pick a default per type', () => {
    expect(defaultValueForType('bool')).toBe(false);
    expect(defaultValueForType('message')).toBe('');
    expect(defaultValueForType('float2')).toEqual([0, 0]);
    expect(defaultValueForType('long3')).toEqual([0, 0, 0]);
    expect(defaultValueForType('doubleLinear')).toBe(0);
  });
});
