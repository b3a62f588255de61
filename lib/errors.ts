export const ERROR_CODES = {
  VALIDATION_FAILED: "VALIDATION_FAILED",
  CONFIGURATION_MISSING: "CONFIGURATION_MISSING",
  BODY_UNREADABLE: "BODY_UNREADABLE",
} as const;

export type ReportErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export class ReportServiceError extends Error {
  constructor(readonly code: ReportErrorCode, message: string) {
    super(message);
    this.name = "ReportServiceError";
  }
}

// Bad or contradictory caller input. Raised before anything is written.
export class ReportValidationError extends ReportServiceError {
  constructor(
    message: string,
    readonly issues: string[] = [],
    code: ReportErrorCode = ERROR_CODES.VALIDATION_FAILED
  ) {
    super(code, message);
    this.name = "ReportValidationError";
  }
}

export class ConfigurationError extends ReportServiceError {
  constructor(message: string, readonly missing: string[] = []) {
    super(ERROR_CODES.CONFIGURATION_MISSING, message);
    this.name = "ConfigurationError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
