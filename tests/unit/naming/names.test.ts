import { describe, it, expect } from 'vitest';
import {
  assertValidNodeName,
  conformNodeName,
  describeInvalidNodeName,
  isValidNodeName,
  isValidPortName,
  joinPath,
  leafName,
  splitPath,
  splitPortAddress,
} from '../../../src/naming/names.js';
import { NAMESPACE_SEPARATOR } from '../../../src/naming/constants.js';
import { InvalidNameError } from '../../../src/errors.js';
import { captureSessionError } from '../../helpers.js';

describe('node names', () => {
  it('should accept plain and namespaced names', () => {
    expect(isValidNodeName('locator1')).toBe(true);
    expect(isValidNodeName('_hidden')).toBe(true);
    expect(isValidNodeName('rig:ctrl_L')).toBe(true);
  });

  it('should explain each rejection', () => {
    expect(describeInvalidNodeName('')).toBe('a name cannot be empty');
    expect(describeInvalidNodeName('1abc')).toBe('a name cannot start with a number');
    expect(describeInvalidNodeName('a|b')).toBe('only letters, digits, "_" and ":" are allowed');
    expect(describeInvalidNodeName('a.b')).toBe('only letters, digits, "_" and ":" are allowed');
    expect(describeInvalidNodeName('persp')).toBe('the name is reserved');
    expect(describeInvalidNodeName(`a${NAMESPACE_SEPARATOR}b`)).toBeNull();
  });

  it('should use a custom reserved list when given', () => {
    expect(isValidNodeName('persp', ['foo'])).toBe(true);
    expect(isValidNodeName('foo', ['foo'])).toBe(false);
  });

  it('should throw InvalidNameError from assertValidNodeName', () => {
    expect(() => assertValidNodeName('9x')).toThrow(InvalidNameError);
    const error = captureSessionError(() => assertValidNodeName('9x'), 'INVALID_NAME');
    expect(error.message).toBe('Invalid name "9x": a name cannot start with a number');
  });

  it('should conform names by dropping invalid characters and leading digits', () => {
    expect(conformNodeName('12ab|c d')).toBe('abcd');
    expect(conformNodeName('rig:ctrl')).toBe('rig:ctrl');
    expect(conformNodeName('123')).toBe('');
  });
});

describe('port names', () => {
  it('should accept identifiers only', () => {
    expect(isValidPortName('translateX')).toBe(true);
    expect(isValidPortName('_x1')).toBe(true);
    expect(isValidPortName('1x')).toBe(false);
    expect(isValidPortName('a.b')).toBe(false);
    expect(isValidPortName('')).toBe(false);
  });
});

describe('path helpers', () => {
  it('should join paths and keep them absolute when the left side is', () => {
    expect(joinPath('|group1', 'locator1')).toBe('|group1|locator1');
    expect(joinPath('group1|', '|locator1')).toBe('group1|locator1');
  });

  it('should split paths into segments', () => {
    expect(splitPath('|a|b')).toEqual(['a', 'b']);
    expect(splitPath('a')).toEqual(['a']);
    expect(splitPath('')).toEqual([]);
  });

  it('should return the leaf segment', () => {
    expect(leafName('|a|b')).toBe('b');
    expect(leafName('a')).toBe('a');
    expect(leafName('')).toBe('');
  });

  it('should split port addresses on the last dot', () => {
    expect(splitPortAddress('|a|b.tx')).toEqual({ node: '|a|b', port: 'tx' });
    expect(splitPortAddress('a.b.c')).toEqual({ node: 'a.b', port: 'c' });
  });

  it('should reject port addresses without both sides', () => {
    expect(splitPortAddress('nodot')).toBeNull();
    expect(splitPortAddress('.x')).toBeNull();
    expect(splitPortAddress('x.')).toBeNull();
  });
});
