/**
 * Spindle - Retained-Mode Rendering Engine
 *
 * No virtual DOM: render functions walk a persistent node tree and write
 * only the attributes, text and children that changed since the last pass.
 *
 * @example
 * import { Application } from 'spindle';
 *
 * const app = new Application({
 *   init: () => ({ count: 0 }),
 *   render(state, root) {
 *     root
 *       .child('button', b => b.on('click', root.comp.handler(s => { s.count++; })).text('+'))
 *       .text(state.count);
 *   }
 * }).mount(document.body);
 *
 * @module spindle
 */

// Core exports
export { Application } from './core/app.js';
export type { ApplicationOptions } from './core/app.js';
export { Checklist, ChildComp, Comp } from './core/component.js';
export type { Command, ComponentDefinition, UpdateOutcome } from './core/component.js';
export { ElementRender, MatchIfRender, NodesRender } from './core/render.js';
export type { ItemRender, Printable } from './core/render.js';

// Scheduling
export { runUpdate, scheduleUpdate, updateQueue } from './core/scheduler.js';
export type { DeferredUpdate, Mutator } from './core/scheduler.js';

// Keyed lists
export { uuidKey } from './core/keyed-list.js';
export type { KeyValue } from './core/keyed-list.js';
export { reconcileKeyedList } from './core/reconcile.js';
export type { KeyedListConfig, ReconcileStats } from './core/reconcile.js';

// Ambient
export { configure, resetConfig } from './core/config.js';
export type { SpindleConfig } from './core/config.js';
export { ContractViolationError } from './core/errors.js';
export { listen, listenTarget } from './core/events.js';
export type { Listener } from './core/events.js';
export { SafeHTML } from './core/safe-html.js';
export type { HTMLSanitizer } from './core/safe-html.js';

// Constants
export { ElementStatus, MountStatus } from './core/symbols.js';
export type { ListElementCreation } from './core/symbols.js';

// Renderers
export { DOMRenderer } from './renderers/dom.js';
export { VirtualRenderer, createVirtualRenderer } from './renderers/virtual.js';
export type { HostElement, HostEvent, HostListener, HostNode, IRendererAdapter } from './renderers/types.js';
