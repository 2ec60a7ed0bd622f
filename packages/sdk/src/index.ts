// Types
export type {
  MessageRole,
  ContentPart,
  MessageContent,
  ToolInvocation,
  SystemMessage,
  HumanMessage,
  AiMessage,
  ToolResultMessage,
  HistoryMessage,
  AgentDecision,
} from "./types/message.js";

export type { EntryMetadata, LedgerEntry } from "./types/entry.js";

// Errors
export {
  HistoryError,
  InvalidArgumentError,
  MalformedStateError,
  ConfigError,
} from "./errors/base.js";

export { ErrorCode } from "./errors/codes.js";
export type { ErrorCodeValue } from "./errors/codes.js";

// Interfaces
export type { IMessageLedger } from "./interfaces/ledger.js";
export type {
  SlidingWindowOptions,
  SlidingWindowResult,
  CompressionOptions,
} from "./interfaces/policy.js";
