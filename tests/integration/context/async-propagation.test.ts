/**
 * @file Context Propagation Integration Tests
 * @description Validates that the span context stack follows async work
 *
 * GUARANTEES:
 * - The current stack is visible in Promise.then() chains
 * - The current stack is visible in Promise.all() parallel operations
 * - The current stack is visible in setTimeout/setImmediate callbacks
 * - Forked tasks never see each other's spans
 */

import { describe, it, expect } from '@jest/globals';
import { ContextStack } from '../../../src/index';

describe('Context Propagation - AsyncLocalStorage', () => {
  // ============================================================================
  // TEST GROUP 1: Promise Chain Propagation
  // ============================================================================

  describe('Promise Chain Propagation', () => {
    it('should propagate the stack through Promise.then() chain', async () => {
      const seen: (number | undefined)[] = [];

      await ContextStack.run(new ContextStack([11]), async () => {
        await Promise.resolve()
          .then(() => {
            seen.push(ContextStack.current().current());
          })
          .then(() => {
            seen.push(ContextStack.current().current());
          });
      });

      expect(seen).toEqual([11, 11]);
    });

    it('should keep spans entered before an await', async () => {
      await ContextStack.isolated(async () => {
        ContextStack.current().enter(3);
        await Promise.resolve();
        expect(ContextStack.current().current()).toBe(3);
        ContextStack.current().exit(3);
      });
    });
  });

  // ============================================================================
  // TEST GROUP 2: Parallel Operations
  // ============================================================================

  describe('Parallel Operations - Promise.all()', () => {
    it('should expose the same stack to all parallel operations', async () => {
      const stack = new ContextStack([1, 2]);

      const tops = await ContextStack.run(stack, () =>
        Promise.all(
          [5, 1, 3].map(async (ms) => {
            await sleep(ms);
            return ContextStack.current().current();
          }),
        ),
      );

      expect(tops).toEqual([2, 2, 2]);
    });
  });

  // ============================================================================
  // TEST GROUP 3: Timer Functions
  // ============================================================================

  describe('Timer Functions', () => {
    it('should propagate the stack through setTimeout', async () => {
      const stack = new ContextStack([8]);

      const seen = await ContextStack.run(
        stack,
        () =>
          new Promise<ContextStack>((resolve) => {
            setTimeout(() => resolve(ContextStack.current()), 1);
          }),
      );

      expect(seen).toBe(stack);
    });

    it('should propagate the stack through setImmediate', async () => {
      const stack = new ContextStack([9]);

      const seen = await ContextStack.run(
        stack,
        () =>
          new Promise<ContextStack>((resolve) => {
            setImmediate(() => resolve(ContextStack.current()));
          }),
      );

      expect(seen).toBe(stack);
    });
  });

  // ============================================================================
  // TEST GROUP 4: Isolation Between Concurrent Tasks
  // ============================================================================

  describe('Context Isolation - Concurrent Tasks', () => {
    it('should isolate forked stacks between interleaved tasks', async () => {
      const results = await ContextStack.isolated(() =>
        Promise.all(
          [1, 2, 3].map((id) =>
            ContextStack.fork(async () => {
              ContextStack.current().enter(id);
              await sleep(4 - id);
              const top = ContextStack.current().current();
              ContextStack.current().exit(id);
              return top;
            }),
          ),
        ),
      );

      expect(results).toEqual([1, 2, 3]);
    });

    it('should handle 100 concurrent tasks with isolated stacks', async () => {
      const ids = Array.from({ length: 100 }, (_, i) => i + 1);

      const results = await ContextStack.isolated(() =>
        Promise.all(
          ids.map((id) =>
            ContextStack.fork(async () => {
              ContextStack.current().enter(id);
              await sleep(id % 5);
              return ContextStack.current().snapshot();
            }),
          ),
        ),
      );

      expect(results).toEqual(ids.map((id) => [id]));
    });

    it('should give forks the parent spans but not share later ones', async () => {
      await ContextStack.run(new ContextStack([1]), async () => {
        await ContextStack.fork(async () => {
          ContextStack.current().enter(2);
          await sleep(1);
          expect(ContextStack.current().snapshot()).toEqual([1, 2]);
        });

        expect(ContextStack.current().snapshot()).toEqual([1]);
      });
    });
  });
});
