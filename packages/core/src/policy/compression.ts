/**
 * Summarizing compression.
 *
 * Older non-system entries are replaced by a short digest: one line per
 * summarized entry plus a count of the rest. The digest is returned to
 * the caller; reinserting it is the caller's decision.
 *
 * The digest is the header, a newline, then the lines joined by newlines,
 * so a digest with no lines ends in "\n".
 */

import type {
  AiMessage,
  CompressionOptions,
  IMessageLedger,
  LedgerEntry,
  MessageContent,
} from "@tallyline/sdk";
import { createLogger } from "@tallyline/shared";
import type { Logger } from "@tallyline/shared";
import { assertTokenCount } from "../ledger/index.js";

export const DEFAULT_KEEP_RECENT = 5;
export const DEFAULT_SUMMARY_LIMIT = 5;
export const DEFAULT_STATE_TRUNCATE_LENGTH = 100;

export const DIGEST_HEADER = "Previous actions summary:";

const defaultLogger = createLogger("Compression");

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Flatten message content to text; image parts become "[image]". */
export function contentToText(content: MessageContent): string {
  if (typeof content === "string") return content;
  return content.map((part) => (part.type === "text" ? part.text : "[image]")).join(" ");
}

/**
 * Label of the first action in an `ai` message's first tool invocation:
 * the first key of `args.action[0]`, or its string form when it is not
 * an object.
 */
export function actionLabel(message: AiMessage): string | undefined {
  const call = message.toolCalls?.[0];
  if (!call) return undefined;
  const actions = call.args.action;
  if (!Array.isArray(actions) || actions.length === 0) return undefined;
  const first: unknown = actions[0];
  if (isPlainObject(first)) {
    return Object.keys(first)[0];
  }
  return String(first);
}

function truncate(text: string, limit: number): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

function digestLine(entry: LedgerEntry, stateTruncateLength: number): string | undefined {
  const { message } = entry;
  switch (message.role) {
    case "ai": {
      const label = actionLabel(message);
      return label === undefined ? undefined : `• Executed: ${label}`;
    }
    case "human":
      return `• State: ${truncate(contentToText(message.content), stateTruncateLength)}`;
    default:
      return undefined;
  }
}

/** Positions eligible for compression: non-system, outside the recent tail. */
export function compressionCandidates(ledger: IMessageLedger, keepRecent: number): number[] {
  const entries = ledger.entries();
  const end = Math.max(0, entries.length - keepRecent);
  const candidates: number[] = [];
  for (let i = 0; i < end; i++) {
    if (entries[i].message.role !== "system") candidates.push(i);
  }
  return candidates;
}

export function compressHistory(
  ledger: IMessageLedger,
  maxTokens: number,
  options: CompressionOptions = {},
  logger: Logger = defaultLogger,
): string | undefined {
  const keepRecent = options.keepRecent ?? DEFAULT_KEEP_RECENT;
  const summaryLimit = options.summaryLimit ?? DEFAULT_SUMMARY_LIMIT;
  const stateTruncateLength = options.stateTruncateLength ?? DEFAULT_STATE_TRUNCATE_LENGTH;
  assertTokenCount("maxTokens", maxTokens);
  assertTokenCount("keepRecent", keepRecent);
  assertTokenCount("summaryLimit", summaryLimit);
  assertTokenCount("stateTruncateLength", stateTruncateLength);

  if (ledger.totalTokens() <= maxTokens) return undefined;

  const candidates = compressionCandidates(ledger, keepRecent);
  if (candidates.length === 0) {
    logger.debug("Nothing to compress", { totalTokens: ledger.totalTokens(), maxTokens });
    return undefined;
  }

  const lines: string[] = [];
  for (const index of candidates.slice(0, summaryLimit)) {
    const entry = ledger.entryAt(index);
    if (!entry) continue;
    const line = digestLine(entry, stateTruncateLength);
    if (line !== undefined) lines.push(line);
  }
  if (candidates.length > summaryLimit) {
    lines.push(`• ... and ${candidates.length - summaryLimit} more actions`);
  }

  let removedTokens = 0;
  for (let k = candidates.length - 1; k >= 0; k--) {
    removedTokens += ledger.removeAt(candidates[k]).metadata.tokens;
  }

  logger.debug("History compressed", {
    removed: candidates.length,
    removedTokens,
    totalTokens: ledger.totalTokens(),
    maxTokens,
  });

  return `${DIGEST_HEADER}\n${lines.join("\n")}`;
}
