/**
 * @fileoverview Jest test setup and global utilities
 *
 * Provides polling and timing helpers shared by the suites.
 */

// Makes this file a module so `declare global` applies
export {};

// ============================================================================
// Global Type Declarations
// ============================================================================

declare global {
  /**
   * Wait for condition to be true
   * @param condition Function that returns boolean
   * @param timeout Maximum time to wait in ms
   * @param interval Check interval in ms
   */
  function waitFor(
    condition: () => boolean,
    timeout?: number,
    interval?: number,
  ): Promise<void>;

  /**
   * Sleep for specified milliseconds
   */
  function sleep(ms: number): Promise<void>;
}

// ============================================================================
// Global Utility Functions
// ============================================================================

/**
 * Wait for a condition to be true with timeout
 *
 * @throws Error if timeout is reached
 *
 * @example
 * ```typescript
 * await waitFor(() => sink.lines().length === 3, 2000, 5);
 * ```
 */
async function waitFor(
  condition: () => boolean,
  timeout = 5000,
  interval = 10,
): Promise<void> {
  const startTime = Date.now();
  while (!condition()) {
    if (Date.now() - startTime > timeout) {
      throw new Error(`Timeout waiting for condition after ${timeout}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, interval));
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

Object.assign(globalThis, { waitFor, sleep });
