/**
 * Message ledger interface: the ordered, token-accounted history.
 */

import type { AgentDecision, HistoryMessage } from "../types/message.js";
import type { EntryMetadata, LedgerEntry } from "../types/entry.js";

export interface IMessageLedger {
  /** Number of stored entries. */
  readonly size: number;

  /** Id the next agent turn will use for its tool invocation. */
  readonly nextToolCallId: number;

  /**
   * Insert an entry at `position` (0..size), or append when omitted.
   * Throws InvalidArgumentError on a negative token cost or bad position.
   */
  add(message: HistoryMessage, metadata: EntryMetadata, position?: number): void;

  /**
   * Append an `ai` message wrapping the decision as a tool invocation,
   * followed by its empty `tool-result`. Returns the invocation id.
   */
  addAgentTurn(decision: AgentDecision): string;

  /** Ordered messages with metadata stripped. */
  snapshotMessages(): HistoryMessage[];

  /** Cached sum of all entry token costs. */
  totalTokens(): number;

  /** Remove the first non-system entry, if any. */
  removeOldestNonSystem(): LedgerEntry | undefined;

  /** Remove the last entry when it is a `human` message and size > 2. */
  removeTrailingStateIfPresent(): LedgerEntry | undefined;

  /** Read-only copy of all entries in order. */
  entries(): readonly LedgerEntry[];

  /** Entry at `index`, or undefined when out of range. */
  entryAt(index: number): LedgerEntry | undefined;

  /** Remove and return the entry at `index`. Throws when out of range. */
  removeAt(index: number): LedgerEntry;
}
