/**
 * Attribute Cache
 *
 * Every element remembers, by position, the last value each attribute writer
 * applied. A render pass walks the writers in the same order every time, so
 * "the third attribute call" always refers to the same record. A writer only
 * touches the host element when its check returns true.
 *
 * Rules:
 * - the first write at a position is always applied
 * - later writes are applied only when the value changed
 *   (floats within Number.EPSILON are considered unchanged)
 * - a different kind at an existing position is a ContractViolationError
 */

import { contractViolation } from './errors.js';
import type { Listener } from './events.js';

export type AttributeRecord =
  | { readonly kind: 'listener'; listener: Listener | null }
  | { readonly kind: 'str'; value: string }
  | { readonly kind: 'bool'; value: boolean }
  | { readonly kind: 'i32'; value: number }
  | { readonly kind: 'u32'; value: number }
  | { readonly kind: 'f64'; value: number };

export type AttributeKind = AttributeRecord['kind'];

const I32_MIN = -0x80000000;
const I32_MAX = 0x7fffffff;
const U32_MAX = 0xffffffff;

function describe(record: AttributeRecord): string {
  return record.kind === 'listener' ? 'event listener' : `${record.kind} value`;
}

function mismatch(index: number, record: AttributeRecord, kind: AttributeKind): never {
  return contractViolation(
    `attribute position ${index} held a ${describe(record)} and now receives a ${kind} value; ` +
    'render functions must emit attributes in the same order on every pass'
  );
}

export class AttributeList {
  private readonly records: AttributeRecord[] = [];

  get length(): number {
    return this.records.length;
  }

  /** Read-only view of a record, for diagnostics and tests */
  at(index: number): Readonly<AttributeRecord> | undefined {
    return this.records[index];
  }

  /**
   * Return the record at `index`, or append `fresh` and return null when
   * the position is new.
   */
  private slot(index: number, fresh: AttributeRecord): AttributeRecord | null {
    if (index > this.records.length) {
      contractViolation(`attribute position ${index} skipped; only ${this.records.length} recorded`);
    }
    const record = this.records[index];
    if (record === undefined) {
      this.records.push(fresh);
      return null;
    }
    return record;
  }

  checkStr(index: number, value: string): boolean {
    const record = this.slot(index, { kind: 'str', value });
    if (record === null) return true;
    if (record.kind !== 'str') return mismatch(index, record, 'str');
    if (record.value === value) return false;
    record.value = value;
    return true;
  }

  checkBool(index: number, value: boolean): boolean {
    const record = this.slot(index, { kind: 'bool', value });
    if (record === null) return true;
    if (record.kind !== 'bool') return mismatch(index, record, 'bool');
    if (record.value === value) return false;
    record.value = value;
    return true;
  }

  checkI32(index: number, value: number): boolean {
    if (!Number.isInteger(value) || value < I32_MIN || value > I32_MAX) {
      contractViolation(`${value} is not a 32-bit signed integer`);
    }
    const record = this.slot(index, { kind: 'i32', value });
    if (record === null) return true;
    if (record.kind !== 'i32') return mismatch(index, record, 'i32');
    if (record.value === value) return false;
    record.value = value;
    return true;
  }

  checkU32(index: number, value: number): boolean {
    if (!Number.isInteger(value) || value < 0 || value > U32_MAX) {
      contractViolation(`${value} is not a 32-bit unsigned integer`);
    }
    const record = this.slot(index, { kind: 'u32', value });
    if (record === null) return true;
    if (record.kind !== 'u32') return mismatch(index, record, 'u32');
    if (record.value === value) return false;
    record.value = value;
    return true;
  }

  checkF64(index: number, value: number): boolean {
    const record = this.slot(index, { kind: 'f64', value });
    if (record === null) return true;
    if (record.kind !== 'f64') return mismatch(index, record, 'f64');
    if (Math.abs(record.value - value) < Number.EPSILON) return false;
    record.value = value;
    return true;
  }

  /**
   * Store a listener at `index`, removing the one it replaces.
   */
  storeListener(index: number, listener: Listener): void {
    if (index > this.records.length) {
      contractViolation(`attribute position ${index} skipped; only ${this.records.length} recorded`);
    }
    const record = this.records[index];
    if (record === undefined) {
      this.records.push({ kind: 'listener', listener });
      return;
    }
    if (record.kind !== 'listener') {
      return mismatch(index, record, 'listener');
    }
    record.listener?.remove();
    record.listener = listener;
  }

  /**
   * Confirm that `index` holds a listener without replacing it.
   */
  expectListener(index: number): void {
    const record = this.records[index];
    if (record === undefined || record.kind !== 'listener') {
      contractViolation(
        `attribute position ${index} was expected to hold an event listener but holds ` +
        (record === undefined ? 'nothing' : `a ${describe(record)}`)
      );
    }
  }

  /** Detach every listener held by this list */
  removeListeners(): void {
    for (const record of this.records) {
      if (record.kind === 'listener' && record.listener) {
        record.listener.remove();
        record.listener = null;
      }
    }
  }

  /**
   * Copy for a cloned element. Listener slots are kept as empty placeholders
   * so positions stay aligned; the clone binds its own listeners into them.
   */
  cloneWithoutListeners(): AttributeList {
    const clone = new AttributeList();
    for (const record of this.records) {
      clone.records.push(record.kind === 'listener' ? { kind: 'listener', listener: null } : { ...record });
    }
    return clone;
  }
}
