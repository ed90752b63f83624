/**
 * @lumberline/core - Context Stack Interface
 *
 * @module domain/context/IContextStack
 */

import type { SpanId } from '../spans/SpanId';

/**
 * Per-execution-context stack of open span identifiers.
 *
 * The innermost open span sits on top. Every event emitted in the
 * execution context is attributed to that span.
 *
 * @remarks
 * A stack belongs to exactly one execution context (an async task).
 * Pushes happen only when a span is entered in that context and pops
 * only when the same span exits there. Popping anything but the top is
 * a contract violation: it fails with `ContextMismatchException` and
 * leaves the stack untouched.
 */
export interface IContextStack {
  /**
   * Identifier of the innermost open span, or undefined if none is open.
   */
  current(): SpanId | undefined;

  /**
   * Push a span that was just entered.
   */
  enter(id: SpanId): void;

  /**
   * Pop `id`, which must be the current top.
   *
   * @throws ContextMismatchException when `id` is not the top
   */
  exit(id: SpanId): void;

  /**
   * Number of open spans on this stack.
   */
  readonly depth: number;

  /**
   * Copy of the open span identifiers, outermost first.
   */
  snapshot(): readonly SpanId[];

  /**
   * Create an independent stack that starts with the same open spans.
   *
   * Used when spawning a concurrent task: spans the child opens are
   * parented to this stack's top, but neither stack sees the other's
   * later pushes or pops.
   */
  fork(): IContextStack;
}
