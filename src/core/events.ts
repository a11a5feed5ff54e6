/**
 * Listener binding.
 *
 * A Listener is the handle returned when a handler is attached. The attribute
 * cache keeps one per `on()` slot; components keep the ones registered through
 * `Comp.registerListener`. Removing it detaches the handler.
 */

import type { HostListener, HostNode, IRendererAdapter } from '../renderers/types.js';

export interface Listener {
  remove(): void;
}

class BoundListener implements Listener {
  private active = true;

  constructor(
    private readonly renderer: IRendererAdapter,
    private readonly target: HostNode,
    private readonly type: string,
    private readonly handler: HostListener
  ) {
    renderer.addEventListener(target, type, handler);
  }

  remove(): void {
    if (!this.active) return;
    this.active = false;
    this.renderer.removeEventListener(this.target, this.type, this.handler);
  }
}

/**
 * Attach `handler` to `target` and return a handle that detaches it.
 */
export function listen(
  renderer: IRendererAdapter,
  target: HostNode,
  type: string,
  handler: HostListener
): Listener {
  return new BoundListener(renderer, target, type, handler);
}

/**
 * Adapt a native EventTarget (window, document) to a Listener.
 */
export function listenTarget(target: EventTarget, type: string, handler: (event: Event) => void): Listener {
  target.addEventListener(type, handler);
  return {
    remove: () => target.removeEventListener(type, handler)
  };
}
