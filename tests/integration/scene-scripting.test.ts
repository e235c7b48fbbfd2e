import { describe, it, expect } from 'vitest';
import { CmdsSession } from '../../src/cmds/cmds-session.js';
import { runScript } from '../../src/cli/commands/run.js';
import { parseScript } from '../../src/cli/script.js';
import { captureSessionError, createTestSession } from '../helpers.js';

describe('scene scripting', () => {
  it('should address a child through its parent', () => {
    const { session } = createTestSession();
    const cmds = new CmdsSession(session);
    cmds.createNode('transform', { name: 'group1' });
    cmds.createNode('transform', { name: 'locator1', parent: 'group1' });

    const locator = session.getNodeByMatch('group1|locator1');
    expect(locator?.name).toBe('locator1');
    expect(cmds.ls('locator1', { long: true })).toEqual(['|group1|locator1']);
  });

  it('should read back an attribute after it is set', () => {
    const { session } = createTestSession();
    const cmds = new CmdsSession(session);
    const locator = session.createNode('locator', { name: 'locator1' });
    const port = session.createPort(locator, 'visibility', { value: true });

    expect(session.getPortByMatch('locator1.visibility')).toBe(port);
    cmds.setAttr('locator1.visibility', false);
    expect(port.value).toBe(false);
    expect(cmds.getAttr('locator1.visibility')).toBe(false);
  });

  it('should reject a repeated connection and a missing disconnection', () => {
    const { session } = createTestSession();
    const cmds = new CmdsSession(session);
    cmds.createNode('transform', { name: 'driver' });
    cmds.createNode('transform', { name: 'driven' });
    cmds.addAttr(['driver', 'driven'], { ln: 'weight' });

    cmds.connectAttr('driver.weight', 'driven.weight');
    captureSessionError(() => cmds.connectAttr('driver.weight', 'driven.weight'), 'DUPLICATE_CONNECTION');
    captureSessionError(() => cmds.disconnectAttr('driven.weight', 'driver.weight'), 'MISSING_CONNECTION');
  });

  it('should cascade node removal to ports and connections', () => {
    const { session } = createTestSession();
    const cmds = new CmdsSession(session);
    cmds.createNode('multiplyDivide', { name: 'md' });
    cmds.createNode('transform', { name: 'ctrl' });
    cmds.createNode('transform', { name: 'target' });
    cmds.addAttr('md', { ln: 'outputX' });
    cmds.addAttr(['ctrl', 'target'], { ln: 'value' });
    cmds.connectAttr('ctrl.value', 'md.outputX');
    cmds.connectAttr('md.outputX', 'target.value');

    const ctrlValue = session.getPortByMatch('ctrl.value');
    const targetValue = session.getPortByMatch('target.value');
    cmds.delete('md');

    expect(session.connections).toEqual([]);
    expect(ctrlValue && session.getPortOutputConnections(ctrlValue)).toEqual([]);
    expect(targetValue && session.getPortInputConnections(targetValue)).toEqual([]);
    expect(cmds.objExists('md.outputX')).toBe(false);
  });

  it('should keep a rig consistent through a reparent', () => {
    const { session } = createTestSession({ config: { seedBuiltinPorts: true } });
    const cmds = new CmdsSession(session);
    cmds.createNode('joint', { name: 'root' });
    cmds.createNode('joint', { name: 'elbow', parent: 'root' });
    cmds.createNode('transform', { name: 'rig' });
    cmds.connectAttr('root.rx', 'elbow.rx');

    cmds.parent(['root', 'rig']);

    expect(cmds.ls('elbow', { long: true })).toEqual(['|rig|root|elbow']);
    expect(cmds.connectionInfo('|rig|root|elbow.rotateX', { sdf: true })).toBe('root.rotateX');
    expect(cmds.ls([], { type: 'joint' })).toEqual(['elbow', 'root']);
  });

  it('should replay a whole script', () => {
    const cmds = new CmdsSession(createTestSession().session);
    const report = runScript(
      parseScript({
        commands: [
          { command: 'createNode', args: ['transform'], flags: { n: 'group1' } },
          { command: 'createNode', args: ['locator'], flags: { n: 'ctrl#', p: 'group1' } },
          { command: 'addAttr', args: ['ctrl1'], flags: { ln: 'weight', at: 'double', dv: 0.25 } },
          { command: 'select', args: ['group1'] },
          { command: 'ls', flags: { sl: true, l: true } },
          { command: 'getAttr', args: ['|group1|ctrl1.weight'] },
          { command: 'listAttr', args: ['ctrl1'], flags: { ud: true } },
        ],
      }),
      cmds,
    );

    expect(report.ok).toBe(true);
    expect(report.steps.map((step) => (step.ok ? step.result : step.error))).toEqual([
      'group1',
      'ctrl1',
      null,
      null,
      ['|group1'],
      0.25,
      ['weight'],
    ]);
  });
});
