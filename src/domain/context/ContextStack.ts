/**
 * @fileoverview ContextStack - AsyncLocalStorage-based span context
 *
 * @packageDocumentation
 * @module @lumberline/core/domain/context
 *
 * ## Why AsyncLocalStorage
 *
 * A telemetry core has to answer "which span is open right now?" for every
 * event. A single global stack breaks as soon as two requests interleave:
 *
 * ```typescript
 * // ❌ One stack for the whole process
 * async function handle(req) {
 *   const span = open('request');   // pushes 1
 *   await db.query();               // another request runs and pushes 2
 *   info('validated');              // attributed to span 2!
 *   close(span);                    // top is 2, not 1 -> mismatch
 * }
 * ```
 *
 * AsyncLocalStorage gives each async task its own store. The store here is
 * a `ContextStack`; a task that needs its own spans runs on a forked copy,
 * so after every `await` `current()` again reflects the task's own spans.
 *
 * ```typescript
 * await Promise.all([
 *   ContextStack.fork(async () => { ... }),  // task A: own stack
 *   ContextStack.fork(async () => { ... }),  // task B: own stack
 * ]);
 * ```
 *
 * @see {@link https://nodejs.org/api/async_context.html | Node.js AsyncLocalStorage}
 */

import { AsyncLocalStorage } from 'async_hooks';
import { ContextMismatchException } from '../exceptions/exceptions';
import type { SpanId } from '../spans/SpanId';
import type { IContextStack } from './IContextStack';

/**
 * ContextStack - stack of open spans for one execution context.
 *
 * @remarks
 * **Scoping:**
 *
 * - `ContextStack.run(stack, fn)` makes `stack` current for `fn` and
 *   everything it schedules.
 * - `ContextStack.fork(fn)` runs `fn` on a copy of the current stack.
 * - `ContextStack.isolated(fn)` runs `fn` on an empty stack.
 *
 * A stack made current by one of these belongs to that scope and is
 * changed in place. Outside any scope, {@link ContextStack.push} and
 * {@link ContextStack.pop} never change the stack they find: they attach
 * a changed copy to the current execution context with `enterWith`.
 * Callbacks scheduled earlier keep the stack they captured, so two
 * independent callbacks never push onto the same stack.
 *
 * @example
 * ```typescript
 * const stack = ContextStack.current();
 * stack.enter(1);
 * stack.current(); // 1
 * stack.exit(1);
 * stack.current(); // undefined
 * ```
 */
export class ContextStack implements IContextStack {
  /**
   * Singleton storage shared by every stack.
   *
   * @private
   */
  private static als = new AsyncLocalStorage<ContextStack>();

  private readonly ids: SpanId[];

  /**
   * @param initial - Open span identifiers, outermost first
   * @param scoped - False for stacks attached outside any scope; those are
   *   replaced rather than changed by `push` and `pop`
   */
  constructor(
    initial: readonly SpanId[] = [],
    private readonly scoped = true,
  ) {
    this.ids = [...initial];
  }

  // ==================== Scope Management ====================

  /**
   * Stack of the current execution context.
   *
   * Outside any scope with no span entered yet, this is a new empty stack
   * that is not attached to anything.
   */
  static current(): ContextStack {
    return ContextStack.als.getStore() ?? new ContextStack([], false);
  }

  /**
   * Enter `id` on the current execution context.
   */
  static push(id: SpanId): void {
    const store = ContextStack.als.getStore();
    if (store?.scoped) {
      store.enter(id);
      return;
    }

    const next = new ContextStack(store?.ids, false);
    next.enter(id);
    ContextStack.als.enterWith(next);
  }

  /**
   * Exit `id` on the current execution context.
   *
   * @throws ContextMismatchException when `id` is not the top; nothing
   *   changes
   */
  static pop(id: SpanId): void {
    const store = ContextStack.als.getStore();
    if (store?.scoped) {
      store.exit(id);
      return;
    }

    const next = new ContextStack(store?.ids, false);
    next.exit(id);
    ContextStack.als.enterWith(next);
  }

  /**
   * Whether a stack is attached to the current execution context.
   */
  static hasContext(): boolean {
    return ContextStack.als.getStore() !== undefined;
  }

  /**
   * Run `callback` with `stack` as the current stack.
   *
   * The stack stays current for every async operation `callback` starts,
   * including promise continuations after `await`.
   */
  static run<R>(stack: ContextStack, callback: () => R): R {
    return ContextStack.als.run(stack, callback);
  }

  /**
   * Run `callback` on a fork of the current stack.
   *
   * Spans opened inside are children of the caller's current span, but
   * the caller's stack is never modified by the callback.
   */
  static fork<R>(callback: () => R): R {
    return ContextStack.run(ContextStack.current().fork(), callback);
  }

  /**
   * Run `callback` on an empty stack.
   */
  static isolated<R>(callback: () => R): R {
    return ContextStack.run(new ContextStack(), callback);
  }

  // ==================== IContextStack Implementation ====================

  current(): SpanId | undefined {
    return this.ids.length === 0 ? undefined : this.ids[this.ids.length - 1];
  }

  enter(id: SpanId): void {
    this.ids.push(id);
  }

  /**
   * {@inheritDoc IContextStack.exit}
   */
  exit(id: SpanId): void {
    const top = this.current();
    if (top !== id) {
      throw new ContextMismatchException(top, id);
    }
    this.ids.pop();
  }

  get depth(): number {
    return this.ids.length;
  }

  snapshot(): readonly SpanId[] {
    return Object.freeze([...this.ids]);
  }

  fork(): ContextStack {
    return new ContextStack(this.ids);
  }
}
