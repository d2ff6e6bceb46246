/**
 * Error types and codes for the surveyor.
 * All errors raised by the surveyor extend SurveyorError.
 */

/**
 * Base error class for all surveyor errors.
 */
export class SurveyorError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SurveyorError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration errors (bad path, malformed manifest or config file).
 * Fatal to a single package, or to the run when raised before discovery ends.
 */
export class ConfigError extends SurveyorError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Parser/resolver failures. The package is skipped.
 */
export class ResolveError extends SurveyorError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ResolveError';
  }
}

/**
 * Dependency installation failures.
 * Aborts the run when installation is required.
 */
export class InstallError extends ResolveError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.INSTALL_FAILED, message, details);
    this.name = 'InstallError';
  }
}

/**
 * A detector met a syntactic shape it cannot classify.
 * Never swallowed: the driver records it as a coverage gap.
 */
export class DetectorCoverageError extends SurveyorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.DETECTOR_COVERAGE, message, details);
    this.name = 'DetectorCoverageError';
  }
}

/**
 * Unexpected fault while visiting one file. Contained to that file.
 */
export class TraversalError extends SurveyorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.TRAVERSAL_FAILED, message, details);
    this.name = 'TraversalError';
  }
}

/**
 * Illegal driver phase transition.
 */
export class StateError extends SurveyorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.ILLEGAL_TRANSITION, message, details);
    this.name = 'StateError';
  }
}

export const ErrorCodes = {
  // Configuration errors (C001-C005)
  PATH_NOT_FOUND: 'C001',
  MANIFEST_MISSING: 'C002',
  MANIFEST_INVALID: 'C003',
  CONFIG_INVALID: 'C004',
  NO_PACKAGES: 'C005',

  // Resolution errors (R001-R003)
  RESOLVE_FAILED: 'R001',
  TSCONFIG_INVALID: 'R002',
  INSTALL_FAILED: 'R003',

  // Detector and traversal errors
  DETECTOR_COVERAGE: 'D001',
  TRAVERSAL_FAILED: 'T001',

  // Driver state
  ILLEGAL_TRANSITION: 'S001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
