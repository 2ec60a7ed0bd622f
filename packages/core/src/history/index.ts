export { createHistoryManager, SUMMARY_MESSAGE_TYPE, STATE_MESSAGE_TYPE } from "./manager.js";
export type {
  HistoryManager,
  HistoryManagerOptions,
  HistoryManagerState,
  BudgetReport,
} from "./manager.js";
