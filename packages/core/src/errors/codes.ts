/**
 * Error Code Infrastructure
 * Stable error codes and CLI exit code mappings.
 */

// Stable error codes grouped by domain
export enum ErrorCode {
  // Generation Errors (E100–E199)
  GENERATION_PRECONDITION_FAILED = 'E100',

  // Configuration Errors (E300–E399)
  UNKNOWN_SIZE_TIER = 'E300',
  INVALID_OPTION = 'E301',
  INVALID_TERM_BANK = 'E302',

  // Output Errors (E400–E499)
  OUTPUT_WRITE_FAILED = 'E400',
  SERIALIZATION_FAILED = 'E401',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.GENERATION_PRECONDITION_FAILED]: 30,
  [ErrorCode.UNKNOWN_SIZE_TIER]: 50,
  [ErrorCode.INVALID_OPTION]: 51,
  [ErrorCode.INVALID_TERM_BANK]: 52,
  [ErrorCode.OUTPUT_WRITE_FAILED]: 60,
  [ErrorCode.SERIALIZATION_FAILED]: 61,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
