// ============================================
// Standard error types for consistent handling
// ============================================

export type ErrorCode =
  | "RETRIEVAL_UNAVAILABLE"
  | "GENERATION_FAILED"
  | "PERSISTENCE_FAILED"
  | "CONFIG_ERROR"
  | "VALIDATION_ERROR"
  | "UNKNOWN_ERROR"
  // API-specific error codes
  | "API_VALIDATION_ERROR"
  | "API_INTERNAL_ERROR";

export interface AppError {
  code: ErrorCode;
  message: string;
  requestId?: string;
  cause?: unknown;
  context?: Record<string, unknown>;
}

export class AssistantError extends Error implements AppError {
  code: ErrorCode;
  requestId?: string;
  override cause?: unknown;
  context?: Record<string, unknown>;

  constructor(options: AppError) {
    super(options.message);
    this.name = "AssistantError";
    this.code = options.code;
    this.requestId = options.requestId;
    this.cause = options.cause;
    this.context = options.context;
  }

  toJSON(): AppError {
    return {
      code: this.code,
      message: this.message,
      requestId: this.requestId,
      context: this.context,
    };
  }
}

/** Create a retrieval error (index empty, store unreachable) */
export function retrievalError(message: string, cause?: unknown): AssistantError {
  return new AssistantError({ code: "RETRIEVAL_UNAVAILABLE", message, cause });
}

/** Create a generation error (text generator failed or returned nothing usable) */
export function generationError(message: string, cause?: unknown): AssistantError {
  return new AssistantError({ code: "GENERATION_FAILED", message, cause });
}

/** Create a persistence error */
export function persistenceError(
  message: string,
  cause?: unknown,
  context?: Record<string, unknown>
): AssistantError {
  return new AssistantError({ code: "PERSISTENCE_FAILED", message, cause, context });
}

/** Create a configuration error */
export function configError(message: string, context?: Record<string, unknown>): AssistantError {
  return new AssistantError({ code: "CONFIG_ERROR", message, context });
}

/** Create a validation error */
export function validationError(message: string, context?: Record<string, unknown>): AssistantError {
  return new AssistantError({ code: "VALIDATION_ERROR", message, context });
}

/** Narrow an unknown error to a specific code */
export function hasErrorCode(err: unknown, code: ErrorCode): err is AssistantError {
  return err instanceof AssistantError && err.code === code;
}

/** Wrap unknown errors */
export function wrapError(err: unknown, requestId?: string): AssistantError {
  if (err instanceof AssistantError) {
    return err;
  }

  const message = err instanceof Error ? err.message : String(err);
  return new AssistantError({
    code: "UNKNOWN_ERROR",
    message,
    requestId,
    cause: err,
  });
}

/** User-friendly error messages */
export function getUserMessage(error: AppError): string {
  switch (error.code) {
    case "RETRIEVAL_UNAVAILABLE":
      return "I couldn't search the documents right now. Please try again.";
    case "GENERATION_FAILED":
      return "Sorry, I encountered an error. Please try again.";
    case "PERSISTENCE_FAILED":
      return "I couldn't finalize the booking due to an internal error.";
    case "API_VALIDATION_ERROR":
      return "Invalid request parameters.";
    case "API_INTERNAL_ERROR":
      return "An internal error occurred. Please try again.";
    default:
      return "Something went wrong. Please try again.";
  }
}
