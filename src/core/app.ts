/**
 * Spindle Core - Application
 *
 * Binds a root component to an existing host element for the lifetime of the
 * application.
 *
 * @example
 * // Web target (default renderer)
 * const app = new Application(todoList).mount(document.body);
 *
 * @example
 * // Non-web target
 * const renderer = new VirtualRenderer();
 * const app = new Application(todoList, { renderer }).mount(renderer.getRoot());
 */

import { DOMRenderer } from '../renderers/dom.js';
import type { HostElement, IRendererAdapter } from '../renderers/types.js';
import { VirtualRenderer } from '../renderers/virtual.js';
import { RootComp, type Comp, type ComponentDefinition } from './component.js';
import { warn } from './log.js';
import { Element } from './nodes.js';

export interface ApplicationOptions {
  /** Renderer adapter; defaults to DOMRenderer */
  renderer?: IRendererAdapter;
}

export class Application<S extends object> {
  readonly renderer: IRendererAdapter;
  private root: RootComp<S> | null = null;

  constructor(private readonly definition: ComponentDefinition<S>, options: ApplicationOptions = {}) {
    this.renderer = options.renderer ?? DOMRenderer;
  }

  get isMounted(): boolean {
    return this.root !== null;
  }

  /**
   * Handle to the root component.
   * @throws Error when the application is not mounted
   */
  get comp(): Comp<S> {
    if (!this.root) {
      throw new Error('Spindle: the application is not mounted. Call mount() first.');
    }
    return this.root.comp;
  }

  /**
   * Initialize the root component and render it into `el`.
   * Without an argument, mounts to document.body (browser) or the
   * VirtualRenderer root.
   */
  mount(el?: HostElement): this {
    if (this.root) {
      warn('mount() called on an application that is already mounted. Ignoring duplicate mount.');
      return this;
    }
    const host = el ?? this.defaultRoot();
    this.root = new RootComp(this.definition, Element.fromHost(this.renderer, host));
    return this;
  }

  /**
   * Destroy the root component: registered listeners are removed and the
   * root element's content is cleared. Called from inside a root update, the
   * content goes at once and the rest once that update has finished.
   */
  unmount(): this {
    if (!this.root) {
      warn('unmount() called on an application that is not mounted. Ignoring.');
      return this;
    }
    this.root.dispose();
    this.root = null;
    return this;
  }

  /** Read the root component state outside of an update */
  peek<R>(fn: (state: S) => R): R {
    if (!this.root) {
      throw new Error('Spindle: the application is not mounted. Call mount() first.');
    }
    return this.root.peek(fn);
  }

  private defaultRoot(): HostElement {
    if (this.renderer instanceof VirtualRenderer) {
      return this.renderer.getRoot();
    }
    if (this.renderer.isBrowser && typeof document !== 'undefined') {
      return document.body;
    }
    throw new Error(
      'Spindle: No root element provided for mount().\n' +
      'For non-browser targets, call: app.mount(renderer.getRoot())'
    );
  }
}
