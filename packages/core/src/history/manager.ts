/**
 * HistoryManager -- per-session history under a token ceiling.
 *
 * Owns one MessageLedger and applies the configured budget strategy on
 * demand. With the "compress" strategy the digest is reinserted as a
 * `human` entry after the leading system messages; if that still does
 * not fit, the sliding window runs as a fallback.
 */

import type {
  AgentDecision,
  HistoryMessage,
  IMessageLedger,
  MessageContent,
} from "@tallyline/sdk";
import { ConfigError, ErrorCode, MalformedStateError } from "@tallyline/sdk";
import {
  createLogger,
  estimateTokens,
  formatZodError,
  HistoryConfigSchema,
  validateInput,
} from "@tallyline/shared";
import type { BudgetStrategy, HistoryConfig, HistoryConfigInput, Logger } from "@tallyline/shared";
import { randomUUID } from "node:crypto";
import { z } from "zod";
import { createMessageLedger } from "../ledger/index.js";
import { applySlidingWindow, compressHistory, contentToText } from "../policy/index.js";
import { deserializeLedger, serializeLedger, SerializedLedgerSchema } from "../persistence/index.js";
import type { MessageCodec, SerializedLedger } from "../persistence/index.js";

export const SUMMARY_MESSAGE_TYPE = "summary";
export const STATE_MESSAGE_TYPE = "state";

/** Persisted manager state: the ledger plus its tool-call counter. */
export interface HistoryManagerState {
  history: SerializedLedger;
  tool_id: number;
}

const HistoryManagerStateSchema = z.object({
  history: SerializedLedgerSchema,
  tool_id: z.number().int().positive(),
});

export interface HistoryManagerOptions {
  /** Previously persisted state to resume from. */
  state?: unknown;
  codec?: MessageCodec;
  sessionId?: string;
  logger?: Logger;
}

/** Outcome of one `fitToBudget` call. */
export interface BudgetReport {
  strategy: BudgetStrategy;
  /** Total before the call. */
  before: number;
  /** Total after the call. */
  after: number;
  /** Entries evicted or compressed away. */
  removed: number;
  /** Digest inserted by the compress strategy, if any. */
  digest?: string;
  /** Preserved entries alone exceed the ceiling. */
  overBudget: boolean;
}

export interface HistoryManager {
  readonly config: Readonly<HistoryConfig>;
  readonly ledger: IMessageLedger;
  addSystemMessage(content: MessageContent, tokens?: number): void;
  addStateMessage(content: MessageContent, tokens?: number, messageType?: string): void;
  addAgentTurn(decision: AgentDecision): string;
  /** Drop a just-added state message before retrying a step. */
  removeLastState(): boolean;
  getMessages(): HistoryMessage[];
  totalTokens(): number;
  fitToBudget(): BudgetReport;
  toState(): HistoryManagerState;
}

function resolveConfig(input: HistoryConfigInput): HistoryConfig {
  const result = validateInput(HistoryConfigSchema, input);
  if (!result.success || !result.data) {
    throw new ConfigError(`Invalid history config: ${result.error ?? "unknown error"}`, {
      code: ErrorCode.CONFIG_VALIDATION_ERROR,
    });
  }
  return result.data;
}

function restoreLedger(
  raw: unknown,
  config: HistoryConfig,
  codec: MessageCodec | undefined,
  logger: Logger,
): IMessageLedger {
  const parsed = HistoryManagerStateSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedStateError(formatZodError(parsed.error));
  }
  return deserializeLedger(parsed.data.history, {
    codec,
    nextToolCallId: parsed.data.tool_id,
    agentTurnTokens: config.agentTurnTokens,
    toolResultTokens: config.toolResultTokens,
    logger: logger.child("ledger"),
  });
}

export function createHistoryManager(
  configInput: HistoryConfigInput,
  options: HistoryManagerOptions = {},
): HistoryManager {
  const config = resolveConfig(configInput);
  const logger = options.logger ? options.logger.child("history") : createLogger("HistoryManager");
  logger.setContext({
    sessionId: options.sessionId,
    ledgerId: randomUUID(),
  });

  const ledger =
    options.state === undefined
      ? createMessageLedger({
          agentTurnTokens: config.agentTurnTokens,
          toolResultTokens: config.toolResultTokens,
          logger: logger.child("ledger"),
        })
      : restoreLedger(options.state, config, options.codec, logger);

  function tokensFor(content: MessageContent, tokens: number | undefined): number {
    return tokens ?? estimateTokens(contentToText(content));
  }

  /** Position right after the run of system entries at the head. */
  function afterLeadingSystem(): number {
    let i = 0;
    while (i < ledger.size && ledger.entryAt(i)?.message.role === "system") i++;
    return i;
  }

  function runSlidingWindow(): { removed: number } {
    return applySlidingWindow(
      ledger,
      config.maxTokens,
      { preserveRecent: config.preserveRecent },
      logger.child("sliding-window"),
    );
  }

  function runCompression(): { removed: number; digest?: string } {
    const sizeBefore = ledger.size;
    const digest = compressHistory(
      ledger,
      config.maxTokens,
      {
        keepRecent: config.keepRecent,
        summaryLimit: config.summaryLimit,
        stateTruncateLength: config.stateTruncateLength,
      },
      logger.child("compression"),
    );
    if (digest === undefined) return { removed: 0 };

    const removed = sizeBefore - ledger.size;
    ledger.add(
      { role: "human", content: digest },
      { tokens: estimateTokens(digest), messageType: SUMMARY_MESSAGE_TYPE },
      afterLeadingSystem(),
    );
    return { removed, digest };
  }

  return {
    config,
    ledger,

    addSystemMessage(content: MessageContent, tokens?: number): void {
      ledger.add({ role: "system", content }, { tokens: tokensFor(content, tokens) });
    },

    addStateMessage(content: MessageContent, tokens?: number, messageType = STATE_MESSAGE_TYPE): void {
      ledger.add({ role: "human", content }, { tokens: tokensFor(content, tokens), messageType });
    },

    addAgentTurn(decision: AgentDecision): string {
      return ledger.addAgentTurn(decision);
    },

    removeLastState(): boolean {
      return ledger.removeTrailingStateIfPresent() !== undefined;
    },

    getMessages(): HistoryMessage[] {
      return ledger.snapshotMessages();
    },

    totalTokens(): number {
      return ledger.totalTokens();
    },

    fitToBudget(): BudgetReport {
      const before = ledger.totalTokens();
      if (before <= config.maxTokens) {
        return { strategy: config.strategy, before, after: before, removed: 0, overBudget: false };
      }

      const stop = logger.time(`${config.strategy} pass`);
      let removed = 0;
      let digest: string | undefined;

      if (config.strategy === "compress") {
        const compressed = runCompression();
        removed += compressed.removed;
        digest = compressed.digest;
      }
      if (ledger.totalTokens() > config.maxTokens) {
        removed += runSlidingWindow().removed;
      }
      stop();

      const after = ledger.totalTokens();
      const overBudget = after > config.maxTokens;
      logger.info("History fitted to budget", {
        strategy: config.strategy,
        before,
        after,
        removed,
        maxTokens: config.maxTokens,
        overBudget,
      });

      return {
        strategy: config.strategy,
        before,
        after,
        removed,
        ...(digest !== undefined ? { digest } : {}),
        overBudget,
      };
    },

    toState(): HistoryManagerState {
      return {
        history: serializeLedger(ledger, options.codec),
        tool_id: ledger.nextToolCallId,
      };
    },
  };
}
