/**
 * Attribute Cache Tests
 *
 * Positional records decide whether an attribute writer touches the host.
 */

import { describe, it, expect, vi } from 'vitest';
import { AttributeList } from '../src/core/attributes.js';
import { ContractViolationError } from '../src/core/errors.js';
import type { Listener } from '../src/core/events.js';

function fakeListener(): Listener & { remove: ReturnType<typeof vi.fn> } {
  return { remove: vi.fn() };
}

describe('AttributeList', () => {
  it('always applies the first write at a position', () => {
    const attrs = new AttributeList();
    expect(attrs.checkStr(0, 'a')).toBe(true);
    expect(attrs.checkBool(1, false)).toBe(true);
    expect(attrs.length).toBe(2);
  });

  it('skips unchanged values and applies changed ones', () => {
    const attrs = new AttributeList();
    attrs.checkStr(0, 'a');
    attrs.checkBool(1, true);
    attrs.checkI32(2, -5);
    attrs.checkU32(3, 7);

    expect(attrs.checkStr(0, 'a')).toBe(false);
    expect(attrs.checkBool(1, true)).toBe(false);
    expect(attrs.checkI32(2, -5)).toBe(false);
    expect(attrs.checkU32(3, 7)).toBe(false);

    expect(attrs.checkStr(0, 'b')).toBe(true);
    expect(attrs.checkStr(0, 'b')).toBe(false);
    expect(attrs.checkBool(1, false)).toBe(true);
    expect(attrs.at(1)).toEqual({ kind: 'bool', value: false });
  });

  it('treats floats within machine epsilon as unchanged', () => {
    const attrs = new AttributeList();
    expect(attrs.checkF64(0, 0.1 + 0.2)).toBe(true);
    expect(attrs.checkF64(0, 0.3)).toBe(false);
    expect(attrs.checkF64(0, 0.31)).toBe(true);
  });

  it('throws when a position changes kind', () => {
    const attrs = new AttributeList();
    attrs.checkStr(0, 'x');
    expect(() => attrs.checkBool(0, true)).toThrow(ContractViolationError);
    expect(() => attrs.checkI32(0, 1)).toThrow(
      'Spindle: attribute position 0 held a str value and now receives a i32 value'
    );
  });

  it('throws when a position is skipped', () => {
    const attrs = new AttributeList();
    expect(() => attrs.checkStr(1, 'x')).toThrow(ContractViolationError);
  });

  it('rejects integers outside their width', () => {
    const attrs = new AttributeList();
    expect(() => attrs.checkI32(0, 2 ** 31)).toThrow(ContractViolationError);
    expect(() => attrs.checkI32(0, 1.5)).toThrow(ContractViolationError);
    expect(() => attrs.checkU32(0, -1)).toThrow(ContractViolationError);
    expect(attrs.checkU32(0, 2 ** 32 - 1)).toBe(true);
  });

  it('removes the listener it replaces', () => {
    const attrs = new AttributeList();
    const first = fakeListener();
    const second = fakeListener();

    attrs.storeListener(0, first);
    attrs.storeListener(0, second);

    expect(first.remove).toHaveBeenCalledTimes(1);
    expect(second.remove).not.toHaveBeenCalled();
    expect(attrs.length).toBe(1);
  });

  it('rejects a listener at a value position', () => {
    const attrs = new AttributeList();
    attrs.checkStr(0, 'x');
    expect(() => attrs.storeListener(0, fakeListener())).toThrow(ContractViolationError);
    expect(() => attrs.expectListener(0)).toThrow(ContractViolationError);
  });

  it('clones values but leaves listener slots empty', () => {
    const attrs = new AttributeList();
    const listener = fakeListener();
    attrs.storeListener(0, listener);
    attrs.checkStr(1, 'v');

    const clone = attrs.cloneWithoutListeners();

    expect(clone.at(0)).toEqual({ kind: 'listener', listener: null });
    expect(clone.checkStr(1, 'v')).toBe(false);
    expect(attrs.at(0)).toEqual({ kind: 'listener', listener });

    // Writing to the clone leaves the source untouched.
    clone.checkStr(1, 'w');
    expect(attrs.at(1)).toEqual({ kind: 'str', value: 'v' });
  });

  it('removes every listener on teardown', () => {
    const attrs = new AttributeList();
    const a = fakeListener();
    const b = fakeListener();
    attrs.storeListener(0, a);
    attrs.checkStr(1, 'x');
    attrs.storeListener(2, b);

    attrs.removeListeners();
    attrs.removeListeners();

    expect(a.remove).toHaveBeenCalledTimes(1);
    expect(b.remove).toHaveBeenCalledTimes(1);
  });
});
