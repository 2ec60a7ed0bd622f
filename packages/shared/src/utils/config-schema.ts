/**
 * Zod schema for history manager configuration.
 *
 * Defaults keep the established eviction behaviour: three recent entries
 * survive a sliding-window pass, the last five are never compressed,
 * and an agent turn costs 100 + 10 tokens.
 */

import { z } from "zod";

export const BudgetStrategySchema = z.enum(["sliding-window", "compress"]);

export const HistoryConfigSchema = z.object({
  maxTokens: z.number().int().positive("maxTokens must be a positive integer"),
  strategy: BudgetStrategySchema.default("sliding-window"),
  preserveRecent: z.number().int().nonnegative().default(3),
  keepRecent: z.number().int().nonnegative().default(5),
  summaryLimit: z.number().int().positive().default(5),
  stateTruncateLength: z.number().int().positive().default(100),
  agentTurnTokens: z.number().int().nonnegative().default(100),
  toolResultTokens: z.number().int().nonnegative().default(10),
});

export type BudgetStrategy = z.infer<typeof BudgetStrategySchema>;

/** Fully resolved configuration, defaults applied. */
export type HistoryConfig = z.infer<typeof HistoryConfigSchema>;

/** Configuration as accepted from callers; defaulted fields optional. */
export type HistoryConfigInput = z.input<typeof HistoryConfigSchema>;
