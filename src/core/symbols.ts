/**
 * Spindle Core - Shared Constants
 *
 * Status values threaded through every render pass and the component lifecycle.
 * Defined as const lookup objects so call sites read like enums while the
 * emitted values stay plain numbers.
 */

// === ELEMENT STATUS ===
// Tells a render pass how much of an element it is allowed to skip.

export const ElementStatus = {
  /** Created during this pass; every attribute and child must be written. */
  JustCreated: 0,
  /** Deep-cloned from a template; cached values hold but listeners must be rebound. */
  JustCloned: 1,
  /** Reused from a previous pass; only changed values are written. */
  Existing: 2,
} as const;

export type ElementStatus = (typeof ElementStatus)[keyof typeof ElementStatus];

// === MOUNT STATUS ===

export const MountStatus = {
  /** Constructed but never attached to a host element. */
  Never: 0,
  /** Attached to a host element by a parent component. */
  Mounted: 1,
  /** Previously attached; its handle has been released. */
  Unmounted: 2,
  /** Application root: attached for the lifetime of the application. */
  PermanentlyMounted: 3,
} as const;

export type MountStatus = (typeof MountStatus)[keyof typeof MountStatus];

// === LIST ITEM CREATION ===

/**
 * How a list creates elements for new items:
 * - `clone` deep-clones an already rendered item and patches it
 * - `new` builds every item from scratch
 */
export type ListElementCreation = 'clone' | 'new';

// === NAMESPACES ===

export const SVG_NAMESPACE = 'http://www.w3.org/2000/svg';

/** Comment text placed on the invisible end marker of a grouped fragment. */
export const GROUP_END_MARKER = 'end of grouped nodes';
