/**
 * Error code constants shared by the error hierarchy.
 */

export const ErrorCode = {
  INVALID_ARGUMENT: "INVALID_ARGUMENT",
  MALFORMED_STATE: "MALFORMED_STATE",
  CONFIG_ERROR: "CONFIG_ERROR",
  CONFIG_VALIDATION_ERROR: "CONFIG_VALIDATION_ERROR",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];
