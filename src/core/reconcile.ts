/**
 * Spindle Core - Keyed List Reconciliation
 *
 * Brings a keyed list's children in line with a new item sequence in a single
 * forward pass. Elements are matched by key, reused in place, and moved only
 * when they are not already at the expected position.
 *
 * ## Algorithm Overview
 *
 * A cursor walks the parent's children in step with the new items:
 *
 *   Old: [k1, k2, k3]           cursor -> k1
 *   New: [k3, k1, k4]
 *
 *   i=0  k3 reused, cursor is k1      -> insert k3 before k1   [k3, k1, k2]
 *   i=1  k1 reused, cursor is k1      -> in place, advance     cursor -> end (k2 is stale)
 *   i=2  k4 created, cursor is end    -> append k4             [k3, k1, k2, k4]
 *   end  k2 unclaimed                 -> removed               [k3, k1, k4]
 *
 * The cursor skips nodes whose keys are absent from the new sequence, so an
 * element about to be removed never forces its neighbours to move.
 *
 * ## Complexity
 * - Time: O(n) map operations plus at most one host move per item
 * - No longest-increasing-subsequence pass: a rotation may cost more moves
 *   than strictly necessary
 */

import type { HostNode, IRendererAdapter } from '../renderers/types.js';
import { contractViolation } from './errors.js';
import { assertKey, type KeyedList, type KeyValue } from './keyed-list.js';
import type { Element } from './nodes.js';

export interface KeyedListConfig<I> {
  /** Key of an item; must be unique within the sequence */
  getKey: (item: I, index: number) => KeyValue;
  /** Build and render the element for a new item (not yet inserted) */
  createElement: (item: I, index: number) => Element;
  /** Re-render a reused element with its item */
  updateElement: (element: Element, item: I, index: number) => void;
}

export interface ReconcileStats {
  created: number;
  reused: number;
  moved: number;
  removed: number;
}

/**
 * Reconcile `list`, whose elements are the only children of `parent`,
 * against `items`.
 */
export function reconcileKeyedList<I>({
  list,
  items,
  parent,
  renderer,
  config
}: {
  list: KeyedList;
  items: readonly I[];
  parent: HostNode;
  renderer: IRendererAdapter;
  config: KeyedListConfig<I>;
}): ReconcileStats {
  const stats: ReconcileStats = { created: 0, reused: 0, moved: 0, removed: 0 };

  const keys = items.map((item, index) => config.getKey(item, index));
  const incoming = new Set<KeyValue>();
  for (const key of keys) {
    assertKey(key);
    if (incoming.has(key)) {
      contractViolation(`duplicate list key ${String(key)}; keys must be unique within a list`);
    }
    incoming.add(key);
  }

  list.preUpdate(items.length);
  const hostKeys = list.collectOldElements();

  // Advance past nodes that are going away.
  const skipStale = (node: HostNode | null): HostNode | null => {
    let current = node;
    while (current !== null) {
      const key = hostKeys.get(current);
      if (key === undefined || incoming.has(key)) break;
      current = renderer.nextSibling(current);
    }
    return current;
  };

  let cursor = skipStale(renderer.firstChild(parent));

  items.forEach((item, index) => {
    const key = keys[index];
    const old = list.oldElements.get(key);
    let element: Element;

    if (old) {
      list.oldElements.delete(key);
      element = old.element;
      config.updateElement(element, item, index);
      stats.reused++;
    } else {
      element = config.createElement(item, index);
      stats.created++;
    }

    if (element.host === cursor) {
      cursor = skipStale(renderer.nextSibling(element.host));
    } else {
      renderer.insertBefore(parent, element.host, cursor);
      if (old) stats.moved++;
    }

    list.active[index] = { key, element };
  });

  for (const { element } of list.oldElements.values()) {
    renderer.removeChild(parent, element.host);
    element.dispose();
    stats.removed++;
  }
  list.oldElements.clear();

  return stats;
}
