export {
  applySlidingWindow,
  preservedIndices,
  DEFAULT_PRESERVE_RECENT,
} from "./sliding-window.js";
export {
  compressHistory,
  compressionCandidates,
  actionLabel,
  contentToText,
  DIGEST_HEADER,
  DEFAULT_KEEP_RECENT,
  DEFAULT_SUMMARY_LIMIT,
  DEFAULT_STATE_TRUNCATE_LENGTH,
} from "./compression.js";
