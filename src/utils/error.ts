export enum ErrorCodes {
  // Input Errors
  INVALID_SEGMENT = "INVALID_SEGMENT",
  EMPTY_SEGMENT = "EMPTY_SEGMENT",
  INVALID_BRIEF = "INVALID_BRIEF",

  // Generation Errors
  GENERATION_TIMEOUT = "GENERATION_TIMEOUT",
  GENERATION_FAILED = "GENERATION_FAILED",
  MALFORMED_RESPONSE = "MALFORMED_RESPONSE",
  GENERATION_CANCELLED = "GENERATION_CANCELLED",
  GENERATION_UNAVAILABLE = "GENERATION_UNAVAILABLE",
  STALE_RESULT = "STALE_RESULT",

  // Configuration Errors
  INVALID_CONFIG = "INVALID_CONFIG",
  PATTERN_LIBRARY_INVALID = "PATTERN_LIBRARY_INVALID",

  // Session Errors
  CALL_NOT_ACTIVE = "CALL_NOT_ACTIVE",
}

export enum ErrorSeverity {
  LOW = "low",
  MEDIUM = "medium",
  HIGH = "high",
  CRITICAL = "critical",
}

export interface ErrorMetadata {
  component: string;
  originalError?: string;
  segmentId?: number;
  tier?: 2 | 3;
  budgetMs?: number;
  [key: string]: unknown;
}

export class CoachError extends Error {
  code: ErrorCodes;
  severity: ErrorSeverity;
  metadata: ErrorMetadata;

  constructor(
    message: string,
    code: ErrorCodes,
    severity: ErrorSeverity,
    metadata: Partial<ErrorMetadata>
  ) {
    super(message);
    this.name = "CoachError";
    this.code = code;
    this.severity = severity;
    this.metadata = {
      ...metadata,
      component: metadata.component || "unknown",
    };
  }
}

// Malformed transcript input. Dropped, never changes state.
export class InputError extends CoachError {
  constructor(
    message: string,
    metadata: Partial<ErrorMetadata>,
    code: ErrorCodes = ErrorCodes.INVALID_SEGMENT
  ) {
    super(message, code, ErrorSeverity.LOW, metadata);
    this.name = "InputError";
  }
}

export class GenerationTimeout extends CoachError {
  constructor(tier: 2 | 3, budgetMs: number, metadata: Partial<ErrorMetadata> = {}) {
    super(
      `Tier ${tier} generation exceeded its ${budgetMs}ms budget`,
      ErrorCodes.GENERATION_TIMEOUT,
      ErrorSeverity.LOW,
      { ...metadata, tier, budgetMs }
    );
    this.name = "GenerationTimeout";
  }
}

export class GenerationServiceError extends CoachError {
  constructor(
    message: string,
    metadata: Partial<ErrorMetadata>,
    code: ErrorCodes = ErrorCodes.GENERATION_FAILED
  ) {
    super(message, code, ErrorSeverity.MEDIUM, metadata);
    this.name = "GenerationServiceError";
  }
}

export class GenerationCancelled extends CoachError {
  constructor(reason: string, metadata: Partial<ErrorMetadata> = {}) {
    super(
      `Generation cancelled: ${reason}`,
      ErrorCodes.GENERATION_CANCELLED,
      ErrorSeverity.LOW,
      { ...metadata, reason }
    );
    this.name = "GenerationCancelled";
  }
}

export class StaleResult extends CoachError {
  constructor(capturedGeneration: number, currentGeneration: number, metadata: Partial<ErrorMetadata> = {}) {
    super(
      `Result generated at generation ${capturedGeneration} is stale (now ${currentGeneration})`,
      ErrorCodes.STALE_RESULT,
      ErrorSeverity.LOW,
      { ...metadata, capturedGeneration, currentGeneration }
    );
    this.name = "StaleResult";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
