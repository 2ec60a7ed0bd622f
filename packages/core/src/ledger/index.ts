/**
 * MessageLedger: ordered history entries with a running token total.
 *
 * The ledger is passive: it never evicts on its own. Budget policies act
 * on it through `removeAt` and the removal helpers below. Every mutation
 * updates the entry list and the cached total together.
 */

import type {
  AgentDecision,
  EntryMetadata,
  HistoryMessage,
  IMessageLedger,
  LedgerEntry,
} from "@tallyline/sdk";
import { InvalidArgumentError } from "@tallyline/sdk";
import { createLogger } from "@tallyline/shared";
import type { Logger } from "@tallyline/shared";

/** Tool name given to the invocation that wraps an agent decision. */
export const AGENT_OUTPUT_TOOL = "AgentOutput";

export const DEFAULT_AGENT_TURN_TOKENS = 100;
export const DEFAULT_TOOL_RESULT_TOKENS = 10;

export interface MessageLedgerOptions {
  /** Initial entries, e.g. from a restored snapshot. */
  entries?: readonly LedgerEntry[];
  /** Counter for agent-turn tool invocation ids. Default: 1 */
  nextToolCallId?: number;
  /** Estimated cost of the `ai` message of an agent turn. Default: 100 */
  agentTurnTokens?: number;
  /** Estimated cost of the paired `tool-result`. Default: 10 */
  toolResultTokens?: number;
  logger?: Logger;
}

export function assertTokenCount(argument: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidArgumentError(argument, `must be a non-negative integer, got ${value}`);
  }
}

function freezeEntry(message: HistoryMessage, metadata: EntryMetadata): LedgerEntry {
  return Object.freeze({ message, metadata: Object.freeze({ ...metadata }) });
}

export function createMessageLedger(options: MessageLedgerOptions = {}): IMessageLedger {
  const logger = options.logger ?? createLogger("MessageLedger");
  const agentTurnTokens = options.agentTurnTokens ?? DEFAULT_AGENT_TURN_TOKENS;
  const toolResultTokens = options.toolResultTokens ?? DEFAULT_TOOL_RESULT_TOKENS;
  assertTokenCount("agentTurnTokens", agentTurnTokens);
  assertTokenCount("toolResultTokens", toolResultTokens);

  let toolCallId = options.nextToolCallId ?? 1;
  if (!Number.isInteger(toolCallId) || toolCallId < 1) {
    throw new InvalidArgumentError("nextToolCallId", `must be a positive integer, got ${toolCallId}`);
  }

  const entries: LedgerEntry[] = [];
  let currentTokens = 0;

  for (const initial of options.entries ?? []) {
    assertTokenCount("tokens", initial.metadata.tokens);
    entries.push(freezeEntry(initial.message, initial.metadata));
    currentTokens += initial.metadata.tokens;
  }

  function removeAt(index: number): LedgerEntry {
    if (!Number.isInteger(index) || index < 0 || index >= entries.length) {
      throw new InvalidArgumentError("index", `${index} is outside 0..${entries.length - 1}`);
    }
    const [removed] = entries.splice(index, 1);
    currentTokens -= removed.metadata.tokens;
    logger.debug("Entry removed", {
      index,
      role: removed.message.role,
      tokens: removed.metadata.tokens,
      totalTokens: currentTokens,
    });
    return removed;
  }

  const ledger: IMessageLedger = {
    get size(): number {
      return entries.length;
    },

    get nextToolCallId(): number {
      return toolCallId;
    },

    add(message: HistoryMessage, metadata: EntryMetadata, position?: number): void {
      assertTokenCount("tokens", metadata.tokens);
      if (position === undefined) {
        entries.push(freezeEntry(message, metadata));
      } else {
        if (!Number.isInteger(position) || position < 0 || position > entries.length) {
          throw new InvalidArgumentError("position", `${position} is outside 0..${entries.length}`);
        }
        entries.splice(position, 0, freezeEntry(message, metadata));
      }
      currentTokens += metadata.tokens;
    },

    addAgentTurn(decision: AgentDecision): string {
      const id = String(toolCallId);
      toolCallId++;
      ledger.add(
        {
          role: "ai",
          content: "",
          toolCalls: [{ id, name: AGENT_OUTPUT_TOOL, args: structuredClone(decision) }],
        },
        { tokens: agentTurnTokens },
      );
      ledger.add({ role: "tool-result", content: "", toolCallId: id }, { tokens: toolResultTokens });
      return id;
    },

    snapshotMessages(): HistoryMessage[] {
      return entries.map((e) => e.message);
    },

    totalTokens(): number {
      return currentTokens;
    },

    removeOldestNonSystem(): LedgerEntry | undefined {
      const index = entries.findIndex((e) => e.message.role !== "system");
      if (index === -1) return undefined;
      return removeAt(index);
    },

    removeTrailingStateIfPresent(): LedgerEntry | undefined {
      if (entries.length <= 2) return undefined;
      if (entries[entries.length - 1].message.role !== "human") return undefined;
      return removeAt(entries.length - 1);
    },

    entries(): readonly LedgerEntry[] {
      return [...entries];
    },

    entryAt(index: number): LedgerEntry | undefined {
      return Number.isInteger(index) && index >= 0 ? entries[index] : undefined;
    },

    removeAt,
  };

  return ledger;
}
