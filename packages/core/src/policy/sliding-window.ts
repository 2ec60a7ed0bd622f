/**
 * Sliding-window eviction.
 *
 * System entries and the most recent `preserveRecent` entries are kept;
 * everything else is evicted oldest-first until the ledger fits the
 * ceiling. When preserved entries alone exceed the ceiling the pass stops
 * and reports `overBudget` instead of throwing.
 */

import type { IMessageLedger, SlidingWindowOptions, SlidingWindowResult } from "@tallyline/sdk";
import { createLogger } from "@tallyline/shared";
import type { Logger } from "@tallyline/shared";
import { assertTokenCount } from "../ledger/index.js";

export const DEFAULT_PRESERVE_RECENT = 3;

const defaultLogger = createLogger("SlidingWindow");

/** Positions exempt from eviction: system entries plus the recent tail. */
export function preservedIndices(ledger: IMessageLedger, preserveRecent: number): Set<number> {
  const preserved = new Set<number>();
  const entries = ledger.entries();

  entries.forEach((e, i) => {
    if (e.message.role === "system") preserved.add(i);
  });

  if (entries.length > preserveRecent) {
    for (let i = entries.length - preserveRecent; i < entries.length; i++) {
      preserved.add(i);
    }
  }

  return preserved;
}

export function applySlidingWindow(
  ledger: IMessageLedger,
  maxTokens: number,
  options: SlidingWindowOptions = {},
  logger: Logger = defaultLogger,
): SlidingWindowResult {
  const preserveRecent = options.preserveRecent ?? DEFAULT_PRESERVE_RECENT;
  assertTokenCount("maxTokens", maxTokens);
  assertTokenCount("preserveRecent", preserveRecent);

  if (ledger.totalTokens() <= maxTokens) {
    return { removed: 0, removedTokens: 0, totalTokens: ledger.totalTokens(), overBudget: false };
  }

  const preserved = preservedIndices(ledger, preserveRecent);
  const entries = ledger.entries();

  // Pick victims oldest-first against a projected total, then remove from
  // the highest position down so earlier indices stay valid.
  let projected = ledger.totalTokens();
  const victims: number[] = [];
  for (let i = 0; i < entries.length && projected > maxTokens; i++) {
    if (preserved.has(i)) continue;
    victims.push(i);
    projected -= entries[i].metadata.tokens;
  }

  let removedTokens = 0;
  for (let k = victims.length - 1; k >= 0; k--) {
    removedTokens += ledger.removeAt(victims[k]).metadata.tokens;
  }

  const totalTokens = ledger.totalTokens();
  const overBudget = totalTokens > maxTokens;

  logger.debug("Sliding window applied", {
    removed: victims.length,
    removedTokens,
    totalTokens,
    maxTokens,
  });
  if (overBudget) {
    logger.warn("Preserved entries exceed token budget", {
      totalTokens,
      maxTokens,
      preserved: preserved.size,
    });
  }

  return { removed: victims.length, removedTokens, totalTokens, overBudget };
}
