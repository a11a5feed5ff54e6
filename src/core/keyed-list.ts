/**
 * Keyed List State
 *
 * Holds the rendered sequence of a keyed list between passes. Two arrays are
 * kept so a pass can read the previous sequence while writing the next one:
 * preUpdate() sizes the spare array for the incoming items and swaps it in.
 */

import type { HostNode } from '../renderers/types.js';
import { contractViolation } from './errors.js';
import type { Element } from './nodes.js';
import type { ReconcileStats } from './reconcile.js';

/**
 * Item key. Numbers must be safe integers; bigint covers 64-bit ids;
 * UUIDs are passed as strings (see uuidKey). Keys of different types never
 * compare equal: `1`, `1n` and `'1'` are three distinct keys.
 */
export type KeyValue = string | number | bigint;

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Canonical key for a UUID: validated and lower-cased, so the same id
 * written in different cases maps to one list item.
 */
export function uuidKey(uuid: string): string {
  if (!UUID_PATTERN.test(uuid)) {
    throw new TypeError(`Spindle: "${uuid}" is not a UUID`);
  }
  return uuid.toLowerCase();
}

export function assertKey(key: KeyValue): void {
  if (typeof key === 'number' && !Number.isSafeInteger(key)) {
    contractViolation(`list key ${key} is not an integer; use a string or bigint key`);
  }
}

export interface KeyedElement {
  readonly key: KeyValue;
  readonly element: Element;
}

export interface OldElement {
  /** Position in the previous pass */
  readonly index: number;
  readonly element: Element;
}

export interface ListTemplate {
  rendered: boolean;
  readonly element: Element;
}

export class KeyedList {
  /** Sequence being rendered (after preUpdate) */
  active: Array<KeyedElement | null> = [];
  /** Previous sequence (after preUpdate) */
  buffer: Array<KeyedElement | null> = [];
  /** Off-tree element new items are cloned from, in clone mode */
  template: ListTemplate | null = null;
  /** Previous elements not yet claimed by the current pass */
  readonly oldElements = new Map<KeyValue, OldElement>();
  /** Outcome of the most recent reconciliation */
  lastStats: ReconcileStats | null = null;

  get length(): number {
    return this.active.length;
  }

  /**
   * Prepare for a pass of `count` items: the spare array is reset to exactly
   * `count` empty slots and becomes the active sequence.
   */
  preUpdate(count: number): void {
    this.buffer.length = 0;
    for (let i = 0; i < count; i++) {
      this.buffer.push(null);
    }
    const previous = this.active;
    this.active = this.buffer;
    this.buffer = previous;
  }

  /**
   * Move every previous element into oldElements, keyed by item key.
   * Returns host-node -> key for the moved elements.
   */
  collectOldElements(): Map<HostNode, KeyValue> {
    this.oldElements.clear();
    const hostKeys = new Map<HostNode, KeyValue>();
    this.buffer.forEach((entry, index) => {
      if (entry) {
        this.oldElements.set(entry.key, { index, element: entry.element });
        hostKeys.set(entry.element.host, entry.key);
      }
    });
    this.buffer.length = 0;
    return hostKeys;
  }

  /**
   * The template, created on first use. Callers render it once and set
   * `rendered`.
   */
  ensureTemplate(create: () => Element): ListTemplate {
    if (!this.template) {
      this.template = { rendered: false, element: create() };
    }
    return this.template;
  }

  first(): Element | null {
    return this.active[0]?.element ?? null;
  }

  last(): Element | null {
    return this.active[this.active.length - 1]?.element ?? null;
  }

  dispose(): void {
    for (const entry of this.active) {
      entry?.element.dispose();
    }
    this.template?.element.dispose();
  }
}
