export { createLogger } from "./logger/index.js";
export type { Logger, LogLevel, LogContext } from "./logger/index.js";

export { validateInput, formatZodError } from "./utils/validation.js";
export type { ValidationResult } from "./utils/validation.js";

export { HistoryConfigSchema, BudgetStrategySchema } from "./utils/config-schema.js";
export type { HistoryConfig, HistoryConfigInput, BudgetStrategy } from "./utils/config-schema.js";

export { estimateTokens } from "./utils/tokens.js";
