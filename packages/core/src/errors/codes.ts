/**
 * Error Code Infrastructure
 * Stable error codes shared by every bytefill package.
 */

// Stable error codes grouped by domain
export enum ErrorCode {
  // Read Errors (E100–E199)
  END_OF_STREAM = 'E100',
  INVALID_READ_REQUEST = 'E101',
  INSUFFICIENT_SEED_DATA = 'E102',

  // Configuration Errors (E300–E399)
  INVALID_CONFIGURATION = 'E300',

  // Platform Adapter Errors (E400–E499)
  MEMORY_FILE_FAILED = 'E400',
}

const ERROR_TITLES = {
  [ErrorCode.END_OF_STREAM]: 'end of stream',
  [ErrorCode.INVALID_READ_REQUEST]: 'invalid read request',
  [ErrorCode.INSUFFICIENT_SEED_DATA]: 'insufficient seed data',
  [ErrorCode.INVALID_CONFIGURATION]: 'invalid configuration',
  [ErrorCode.MEMORY_FILE_FAILED]: 'memory file failed',
} satisfies Record<ErrorCode, string>;

export function getErrorTitle(code: ErrorCode): string {
  return ERROR_TITLES[code];
}
