/**
 * Ledger entry types.
 */

import type { HistoryMessage } from "./message.js";

/** Accounting data attached to every stored message. */
export interface EntryMetadata {
  /** Caller-estimated token cost. Non-negative integer. */
  readonly tokens: number;
  /** Optional label, e.g. "state" or "summary". */
  readonly messageType?: string;
}

/** One stored (message, metadata) pair. */
export interface LedgerEntry {
  readonly message: HistoryMessage;
  readonly metadata: EntryMetadata;
}
