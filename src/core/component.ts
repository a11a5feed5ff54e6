/**
 * Spindle Core - Components
 *
 * A component is a state object plus a render function. The engine keeps each
 * live component in an InstanceSlot:
 *
 * - the owner (ChildComp, or the Application root) holds the slot strongly
 *   and empties it on dispose
 * - any number of Comp handles reference the slot without owning it; once the
 *   slot is empty their updates are silently dropped
 * - at most one update borrows the instance at a time; a second attempt is
 *   deferred through the update queue
 *
 * @example
 * const counter: ComponentDefinition<{ count: number }> = {
 *   init: () => ({ count: 0 }),
 *   render(state, root) {
 *     root
 *       .child('button', b => b.on('click', root.comp.handler(s => { s.count++; })).text('+'))
 *       .text(state.count);
 *   }
 * };
 */

import type { HostElement, HostEvent, HostListener, IRendererAdapter } from '../renderers/types.js';
import { contractViolation } from './errors.js';
import type { Listener } from './events.js';
import { Element, type ComponentHandle } from './nodes.js';
import { ElementRender } from './render.js';
import { runUpdate, scheduleUpdate, updateQueue, type Mutator } from './scheduler.js';
import { ElementStatus, MountStatus } from './symbols.js';

/**
 * Work to run after an update has rendered, with the component handle and
 * its post-update state.
 */
export interface Command<S extends object> {
  execute(comp: Comp<S>, state: S): void;
}

/**
 * What a mutator returns:
 * - nothing or `true`: render
 * - `false`: skip rendering
 * - a Command: render, then run it
 * - a Checklist: full control
 */
export type UpdateOutcome<S extends object> = void | boolean | Checklist<S> | Command<S>;

export class Checklist<S extends object> {
  private skip = false;
  private commands: Command<S>[] = [];

  static from<S extends object>(outcome: UpdateOutcome<S>): Checklist<S> {
    if (outcome instanceof Checklist) {
      return outcome;
    }
    const checklist = new Checklist<S>();
    if (outcome === false) {
      checklist.skipRender();
    } else if (typeof outcome === 'object' && outcome !== null) {
      checklist.addCommand(outcome);
    }
    return checklist;
  }

  get shouldRender(): boolean {
    return !this.skip;
  }

  skipRender(): this {
    this.skip = true;
    return this;
  }

  /** Queue a command; commands run after rendering, in the order added */
  addCommand(command: Command<S>): this {
    this.commands.push(command);
    return this;
  }

  /**
   * Schedule work on another component. It runs once the current update has
   * finished.
   */
  updateRelatedComponent(job: () => void): this {
    scheduleUpdate(job);
    return this;
  }

  takeCommands(): Command<S>[] {
    const commands = this.commands;
    this.commands = [];
    return commands;
  }
}

export interface ComponentDefinition<S extends object> {
  /** Build the initial state. `comp` may be captured for callbacks. */
  init(comp: Comp<S>): S;
  /**
   * Render the component into its root element. Must emit the same
   * attribute and child positions on every pass.
   */
  render(state: S, root: ElementRender<S>): void;
  /** Runs before every mutator */
  beforeUpdate?(state: S): void;
}

/**
 * Exclusive-access cell shared by a component's owner and its handles.
 * @internal
 */
export class InstanceSlot<S extends object> {
  instance: ComponentInstance<S> | null = null;
  private borrowed = false;

  tryBorrow(): boolean {
    if (this.borrowed) return false;
    this.borrowed = true;
    return true;
  }

  release(): void {
    this.borrowed = false;
  }
}

export class ComponentInstance<S extends object> {
  state: S | null = null;
  private readonly listeners: Listener[] = [];
  private firstRender = true;

  constructor(
    private readonly definition: ComponentDefinition<S>,
    public root: Element | null,
    public mountStatus: MountStatus
  ) {}

  private ownState(): S {
    if (this.state === null) {
      return contractViolation('component state used before init() returned');
    }
    return this.state;
  }

  isMounted(): boolean {
    return this.mountStatus === MountStatus.Mounted || this.mountStatus === MountStatus.PermanentlyMounted;
  }

  render(comp: Comp<S>): void {
    const root = this.root;
    if (!root) return;
    const state = this.ownState();
    const status = this.firstRender ? ElementStatus.JustCreated : ElementStatus.Existing;
    this.firstRender = false;
    const element = new ElementRender<S>({ comp, state }, root, status);
    this.definition.render(state, element);
    element.finish();
  }

  update<A>(comp: Comp<S>, mutator: Mutator<S, A>, arg: A): void {
    const state = this.ownState();
    this.definition.beforeUpdate?.(state);
    this.extraUpdate(comp, Checklist.from(mutator(state, arg)));
  }

  /** Render unless skipped (and only while mounted), then run commands */
  extraUpdate(comp: Comp<S>, checklist: Checklist<S>): void {
    if (checklist.shouldRender && this.isMounted()) {
      this.render(comp);
    }
    const state = this.ownState();
    for (const command of checklist.takeCommands()) {
      command.execute(comp, state);
    }
  }

  mount(root: Element, status: MountStatus): void {
    this.root = root;
    this.mountStatus = status;
    this.firstRender = true;
  }

  /** Stop rendering and hand back the root element, still undisposed */
  detachRoot(): Element | null {
    const root = this.root;
    this.root = null;
    this.mountStatus = MountStatus.Unmounted;
    return root;
  }

  unmount(): void {
    this.detachRoot()?.dispose();
  }

  registerListener(listener: Listener): void {
    this.listeners.push(listener);
  }

  /** Remove listeners and rendered content */
  destroy(): void {
    for (const listener of this.listeners.splice(0)) {
      listener.remove();
    }
    const root = this.root;
    if (root) {
      root.renderer.clearContent(root.host);
      root.dispose();
      this.root = null;
    }
  }
}

/**
 * Non-owning component handle. Cheap to copy into callbacks; every update
 * made through it goes through the update scheduler.
 */
export class Comp<S extends object> {
  constructor(/** @internal */ readonly slot: InstanceSlot<S>) {}

  /** False once the component has been destroyed */
  get isAlive(): boolean {
    return this.slot.instance !== null;
  }

  update(mutator: (state: S) => UpdateOutcome<S>): void {
    runUpdate(this, mutator, undefined);
  }

  updateArg<A>(arg: A, mutator: (state: S, arg: A) => UpdateOutcome<S>): void {
    runUpdate(this, mutator, arg);
  }

  /** A zero-argument function that updates this component */
  callback(mutator: (state: S) => UpdateOutcome<S>): () => void {
    return () => this.update(mutator);
  }

  /** A one-argument function that updates this component with its argument */
  callbackArg<A>(mutator: (state: S, arg: A) => UpdateOutcome<S>): (arg: A) => void {
    return (arg: A) => this.updateArg(arg, mutator);
  }

  /** An event handler that ignores the event */
  handler(mutator: (state: S) => UpdateOutcome<S>): HostListener {
    return () => this.update(mutator);
  }

  /** An event handler that passes the event to the mutator */
  handlerArg(mutator: (state: S, event: HostEvent) => UpdateOutcome<S>): HostListener {
    return (event: HostEvent) => this.updateArg(event, mutator);
  }

  /**
   * Keep `listener` until the component is destroyed (for window/document
   * listeners). Registering on a destroyed component removes it at once.
   */
  registerListener(listener: Listener): void {
    const instance = this.slot.instance;
    if (instance === null) {
      listener.remove();
      return;
    }
    instance.registerListener(listener);
  }
}

/**
 * Strong owner of a component instance.
 */
export abstract class ComponentOwner<S extends object> {
  protected readonly slot = new InstanceSlot<S>();
  readonly comp: Comp<S>;

  protected constructor(definition: ComponentDefinition<S>, root: Element | null, mountStatus: MountStatus) {
    this.comp = new Comp(this.slot);
    this.slot.instance = new ComponentInstance(definition, root, mountStatus);
    updateQueue.runAsOwner(() => {
      this.withInstance('initialize', instance => {
        instance.state = definition.init(this.comp);
        if (instance.isMounted()) {
          instance.render(this.comp);
        }
      });
    });
  }

  /** Borrow the instance for `fn`. A busy or destroyed instance is a contract violation. */
  protected withInstance<R>(action: string, fn: (instance: ComponentInstance<S>) => R): R {
    const instance = this.slot.instance;
    if (instance === null) {
      return contractViolation(`cannot ${action} a destroyed component`);
    }
    if (!this.slot.tryBorrow()) {
      return contractViolation(`cannot ${action} a component while it is updating`);
    }
    try {
      return fn(instance);
    } finally {
      this.slot.release();
    }
  }

  get mountStatus(): MountStatus {
    return this.slot.instance?.mountStatus ?? MountStatus.Unmounted;
  }

  get isDestroyed(): boolean {
    return this.slot.instance === null;
  }

  /** Read the state outside of an update */
  peek<R>(fn: (state: S) => R): R {
    return this.withInstance('read', instance => {
      if (instance.state === null) {
        return contractViolation('component state read before init() returned');
      }
      return fn(instance.state);
    });
  }

  /**
   * Destroy the component: listeners are removed, its content is cleared and
   * every Comp handle becomes inert.
   */
  dispose(): void {
    const instance = this.slot.instance;
    if (instance === null) return;
    this.slot.instance = null;
    if (this.slot.tryBorrow()) {
      try {
        instance.destroy();
      } finally {
        this.slot.release();
      }
      return;
    }
    // Busy: the running update finishes against an unmounted instance, so
    // only the host content goes now.
    const root = instance.detachRoot();
    root?.renderer.clearContent(root.host);
    scheduleUpdate(() => {
      instance.destroy();
      root?.dispose();
    });
  }
}

/**
 * A component owned by another component's state and mounted into one of
 * its elements with `ElementRender.component(child)`.
 */
export class ChildComp<S extends object> extends ComponentOwner<S> {
  private generation = 0;

  constructor(definition: ComponentDefinition<S>) {
    super(definition, null, MountStatus.Never);
  }

  static create<S extends object>(definition: ComponentDefinition<S>): ChildComp<S> {
    return new ChildComp(definition);
  }

  /**
   * Attach to `host` and render immediately. Used by ElementRender.component().
   */
  mountTo(renderer: IRendererAdapter, host: HostElement): ComponentHandle {
    const generation = ++this.generation;
    updateQueue.runAsOwner(() => {
      this.withInstance('mount', instance => {
        instance.mount(Element.fromHost(renderer, host), MountStatus.Mounted);
        instance.render(this.comp);
      });
    });
    return new MountedHandle(this, renderer, host, generation);
  }

  /** True when `handle` is the handle of the current mount */
  ownsHandle(handle: ComponentHandle): boolean {
    return handle instanceof MountedHandle && handle.owner === this && handle.generation === this.generation &&
      this.mountStatus === MountStatus.Mounted;
  }

  /** @internal */
  detach(generation: number): void {
    const instance = this.slot.instance;
    if (instance === null || generation !== this.generation) {
      return;
    }
    if (!this.slot.tryBorrow()) {
      // The host already belongs to whatever is mounted next
      const root = instance.detachRoot();
      scheduleUpdate(() => root?.dispose());
      return;
    }
    try {
      instance.unmount();
    } finally {
      this.slot.release();
    }
  }
}

class MountedHandle<S extends object> implements ComponentHandle {
  constructor(
    readonly owner: ChildComp<S>,
    private readonly renderer: IRendererAdapter,
    private readonly host: HostElement,
    readonly generation: number
  ) {}

  release(): void {
    this.renderer.clearContent(this.host);
    this.owner.detach(this.generation);
  }
}

/**
 * Owner of an application root: mounted permanently into an existing element.
 */
export class RootComp<S extends object> extends ComponentOwner<S> {
  constructor(definition: ComponentDefinition<S>, root: Element) {
    super(definition, root, MountStatus.PermanentlyMounted);
  }
}
