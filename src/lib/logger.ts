/**
 * Console logging utilities
 *
 * - Error logging: logs classified error codes with optional detail
 * - Debug logging: category-prefixed messages
 */

/**
 * Error codes for classified error logging
 * Format: E_CATEGORY_DETAIL
 */
export const ErrorCode = {
  // Configuration errors
  CONFIG_INVALID: "E_CONFIG_INVALID",

  // Asset discovery errors
  ASSET_DIR_UNREADABLE: "E_ASSET_DIR_UNREADABLE",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Error log context
 */
type ErrorContext = {
  /** Error code for classification */
  code: ErrorCodeType;
  /** Optional: additional context */
  detail?: string;
};

/**
 * Log a classified error to console.error
 */
export const logError = (context: ErrorContext): void => {
  const { code, detail } = context;

  const parts = [
    `[Error] ${code}`,
    detail ? `detail="${detail}"` : null,
  ].filter(Boolean);

  console.error(parts.join(" "));
};

/**
 * Log categories for debug logging
 */
export type LogCategory = "Config" | "Assets" | "Layout";

/**
 * Log a debug message with category prefix
 */
export const logDebug = (category: LogCategory, message: string): void => {
  console.debug(`[${category}] ${message}`);
};
