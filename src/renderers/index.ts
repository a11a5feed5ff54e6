/**
 * Spindle Renderers - Pluggable Rendering Engines
 *
 * @example
 * // Web target (default)
 * const app = new Application(counter).mount(document.body);
 *
 * @example
 * // Non-web target or tests
 * import { VirtualRenderer } from 'spindle/renderers';
 * const renderer = new VirtualRenderer({ debug: true });
 * const app = new Application(counter, { renderer }).mount(renderer.getRoot());
 *
 * @module spindle/renderers
 */

// Type exports
export type {
  HostElement,
  HostEvent,
  HostListener,
  HostNode,
  IRendererAdapter
} from './types.js';

// DOM Renderer (web target)
export { DOMRenderer, SafeHTML } from './dom.js';

// Virtual Renderer (non-web targets, tests)
export {
  VirtualRenderer,
  VNode,
  createVirtualRenderer,
  ELEMENT_NODE,
  TEXT_NODE,
  COMMENT_NODE
} from './virtual.js';
export type { VirtualEvent, VirtualNodeType } from './virtual.js';
