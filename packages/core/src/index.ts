// Ledger
export {
  createMessageLedger,
  AGENT_OUTPUT_TOOL,
  DEFAULT_AGENT_TURN_TOKENS,
  DEFAULT_TOOL_RESULT_TOKENS,
} from "./ledger/index.js";
export type { MessageLedgerOptions } from "./ledger/index.js";

// Budget policy
export {
  applySlidingWindow,
  preservedIndices,
  compressHistory,
  compressionCandidates,
  actionLabel,
  contentToText,
  DIGEST_HEADER,
  DEFAULT_PRESERVE_RECENT,
  DEFAULT_KEEP_RECENT,
  DEFAULT_SUMMARY_LIMIT,
  DEFAULT_STATE_TRUNCATE_LENGTH,
} from "./policy/index.js";

// Persistence
export {
  serializeLedger,
  deserializeLedger,
  jsonMessageCodec,
  HistoryMessageSchema,
  SerializedLedgerSchema,
  SerializedEntrySchema,
} from "./persistence/index.js";
export type {
  DeserializeOptions,
  MessageCodec,
  SerializedLedger,
  SerializedEntry,
} from "./persistence/index.js";

// History manager
export {
  createHistoryManager,
  SUMMARY_MESSAGE_TYPE,
  STATE_MESSAGE_TYPE,
} from "./history/index.js";
export type {
  HistoryManager,
  HistoryManagerOptions,
  HistoryManagerState,
  BudgetReport,
} from "./history/index.js";
