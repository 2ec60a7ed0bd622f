/**
 * Budget policy types: eviction and compression over a ledger.
 */

export interface SlidingWindowOptions {
  /** Most recent entries exempt from eviction. Default: 3 */
  preserveRecent?: number;
}

/** Outcome of a sliding-window pass. */
export interface SlidingWindowResult {
  /** Entries evicted by this pass. */
  removed: number;
  removedTokens: number;
  /** Ledger total after the pass. */
  totalTokens: number;
  /** True when preserved entries alone still exceed the ceiling. */
  overBudget: boolean;
}

export interface CompressionOptions {
  /** Most recent entries never compressed. Default: 5 */
  keepRecent?: number;
  /** Candidates that get a digest line. Default: 5 */
  summaryLimit?: number;
  /** Maximum characters of state text quoted per line. Default: 100 */
  stateTruncateLength?: number;
}
