/**
 * Spindle Core - Update Scheduler
 *
 * Components are updated synchronously, but an update may reach a component
 * that is already in the middle of one (a mutator updating its parent, which
 * re-renders and fires an event back into the child). Such an update is not
 * an error: it is wrapped in a closure and appended to a process-wide FIFO.
 *
 * The first update on the stack becomes the owner of the queue. When its own
 * work is done it drains the FIFO, running deferred updates in the order they
 * were scheduled. Nested updates never drain, so a deferred update always runs
 * after the update that blocked it has finished.
 */

import type { Comp, UpdateOutcome } from './component.js';
import { getConfig, handleError } from './config.js';

export type DeferredUpdate = () => void;

export type Mutator<S extends object, A> = (state: S, arg: A) => UpdateOutcome<S>;

export class UpdateQueue {
  private jobs: DeferredUpdate[] = [];
  private head = 0;
  private running = false;

  /** Deferred updates waiting to run */
  get size(): number {
    return this.jobs.length - this.head;
  }

  /** True while an owner is on the stack */
  get isRunning(): boolean {
    return this.running;
  }

  add(job: DeferredUpdate): void {
    this.jobs.push(job);
  }

  /**
   * Run `task`. If no other task is running, this call owns the queue:
   * it drains every deferred update before returning.
   */
  runAsOwner(task: () => void): void {
    if (this.running) {
      task();
      return;
    }
    this.running = true;
    try {
      task();
      this.drain();
    } finally {
      this.running = false;
    }
  }

  private drain(): void {
    const limit = getConfig().maxDrainIterations;
    let executed = 0;

    while (this.head < this.jobs.length) {
      if (++executed > limit) {
        const dropped = this.size;
        this.jobs = [];
        this.head = 0;
        handleError(
          new Error(
            `Spindle: Maximum update depth exceeded (${limit} deferred updates in one drain). ` +
            `${dropped} pending updates were dropped. ` +
            'This usually means two components keep updating each other.'
          ),
          'update queue'
        );
        return;
      }
      const job = this.jobs[this.head++];
      job();
    }

    this.jobs = [];
    this.head = 0;
  }
}

/** The process-wide queue shared by every component */
export const updateQueue = new UpdateQueue();

/**
 * Append a closure to the queue. It never runs synchronously: it runs when
 * the current owner drains, or when the next update on an idle stack finishes.
 */
export function scheduleUpdate(job: DeferredUpdate): void {
  updateQueue.add(job);
}

/**
 * Apply `mutator` to the component behind `comp` and re-render it.
 *
 * - destroyed component: nothing happens
 * - component busy with another update: deferred to the queue
 */
export function runUpdate<S extends object, A>(comp: Comp<S>, mutator: Mutator<S, A>, arg: A): void {
  updateQueue.runAsOwner(() => {
    const slot = comp.slot;
    const instance = slot.instance;
    if (instance === null) {
      return;
    }
    if (!slot.tryBorrow()) {
      updateQueue.add(() => runUpdate(comp, mutator, arg));
      return;
    }
    try {
      instance.update(comp, mutator, arg);
    } finally {
      slot.release();
    }
  });
}
