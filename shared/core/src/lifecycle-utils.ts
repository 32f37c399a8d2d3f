/**
 * Lifecycle Utilities
 *
 * Helpers for clearing intervals and timeouts. Returns null for direct
 * assignment:
 *
 * ```typescript
 * this.pollInterval = clearIntervalSafe(this.pollInterval);
 * ```
 */

/**
 * Clear an interval and return null for assignment.
 * Safe to call with null (no-op).
 */
export function clearIntervalSafe(interval: NodeJS.Timeout | null): null {
  if (interval) {
    clearInterval(interval);
  }
  return null;
}

/**
 * Clear a timeout and return null for assignment.
 * Safe to call with null (no-op).
 */
export function clearTimeoutSafe(timeout: NodeJS.Timeout | null): null {
  if (timeout) {
    clearTimeout(timeout);
  }
  return null;
}
