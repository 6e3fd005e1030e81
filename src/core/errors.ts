/**
 * Custom Error Types
 * Structured errors shared by the research and answer pipelines
 */

/**
 * Base error class for all Game Scout errors
 */
export class ScoutError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options?: {
      cause?: Error;
      context?: Record<string, unknown>;
      retryable?: boolean;
    }
  ) {
    super(message);
    this.name = "ScoutError";
    this.code = code;
    this.context = options?.context;
    this.retryable = options?.retryable ?? false;

    if (options?.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      retryable: this.retryable,
    };
  }
}

/**
 * Configuration errors
 */
export class ConfigError extends ScoutError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", { context, retryable: false });
    this.name = "ConfigError";
  }
}

/**
 * Agent execution errors (Claude Agent SDK runs)
 */
export class AgentError extends ScoutError {
  public readonly profile: string;

  constructor(
    message: string,
    profile: string,
    options?: {
      cause?: Error;
      context?: Record<string, unknown>;
      retryable?: boolean;
    }
  ) {
    super(message, "AGENT_ERROR", options);
    this.name = "AgentError";
    this.profile = profile;
  }
}

/**
 * A structured capability response that could not be parsed or validated.
 * Handled like any other transient source failure.
 */
export class ExtractionError extends ScoutError {
  public readonly task: string;
  public readonly issues: string[];

  constructor(
    task: string,
    message: string,
    options?: { issues?: string[]; rawPreview?: string; cause?: Error }
  ) {
    super(`Extraction failed for ${task}: ${message}`, "EXTRACTION_ERROR", {
      cause: options?.cause,
      context: { task, rawPreview: options?.rawPreview },
      retryable: false,
    });
    this.name = "ExtractionError";
    this.task = task;
    this.issues = options?.issues ?? [];
  }
}

/**
 * Failure of a single external source (HTTP status, malformed payload)
 */
export class SourceError extends ScoutError {
  public readonly source: string;
  public readonly statusCode?: number;
  public readonly url?: string;

  constructor(
    message: string,
    source: string,
    options?: {
      cause?: Error;
      statusCode?: number;
      url?: string;
      context?: Record<string, unknown>;
    }
  ) {
    const status = options?.statusCode;
    const retryable = status === 429 || (status !== undefined && status >= 500);
    super(message, "SOURCE_ERROR", {
      cause: options?.cause,
      context: { ...options?.context, source, statusCode: status, url: options?.url },
      retryable,
    });
    this.name = "SourceError";
    this.source = source;
    this.statusCode = status;
    this.url = options?.url;
  }
}

/**
 * Provider rejected the call for missing or invalid credentials (HTTP 401)
 */
export class AuthRequiredError extends SourceError {
  constructor(source: string, url?: string) {
    super(`${source} requires authentication`, source, { statusCode: 401, url });
    this.name = "AuthRequiredError";
  }
}

/**
 * Requested item does not exist at the provider
 */
export class NotFoundError extends ScoutError {
  constructor(what: string, context?: Record<string, unknown>) {
    super(`Not found: ${what}`, "NOT_FOUND", { context, retryable: false });
    this.name = "NotFoundError";
  }
}

/**
 * Network/connectivity errors (timeouts, resets)
 */
export class NetworkError extends ScoutError {
  constructor(message: string, cause?: Error) {
    super(message, "NETWORK_ERROR", { cause, retryable: true });
    this.name = "NetworkError";
  }
}

/**
 * Validation errors (inputs, file names)
 */
export class ValidationError extends ScoutError {
  public readonly field?: string;

  constructor(message: string, options?: { field?: string; context?: Record<string, unknown> }) {
    super(message, "VALIDATION_ERROR", { context: options?.context, retryable: false });
    this.name = "ValidationError";
    this.field = options?.field;
  }
}

/**
 * Entity store read/write failures
 */
export class StoreError extends ScoutError {
  public readonly operation: string;

  constructor(operation: string, message: string, cause?: Error) {
    super(`Store ${operation} failed: ${message}`, "STORE_ERROR", {
      cause,
      context: { operation },
      retryable: false,
    });
    this.name = "StoreError";
    this.operation = operation;
  }
}

/**
 * Rejected entity status change
 */
export class InvalidStatusTransitionError extends ScoutError {
  constructor(entityId: number, from: string, to: string) {
    super(`Entity ${entityId} cannot move from ${from} to ${to}`, "INVALID_TRANSITION", {
      context: { entityId, from, to },
      retryable: false,
    });
    this.name = "InvalidStatusTransitionError";
  }
}

/**
 * Unrecoverable orchestration failure
 */
export class ResearchError extends ScoutError {
  public readonly entityName: string;

  constructor(entityName: string, message: string, cause?: Error) {
    super(`Research of "${entityName}" failed: ${message}`, "RESEARCH_ERROR", {
      cause,
      context: { entityName },
      retryable: false,
    });
    this.name = "ResearchError";
    this.entityName = entityName;
  }
}

/**
 * Type guard to check if error is a Scout error
 */
export function isScoutError(error: unknown): error is ScoutError {
  return error instanceof ScoutError;
}

/**
 * Type guard for retryable errors
 */
export function isRetryableError(error: unknown): boolean {
  if (isScoutError(error)) {
    return error.retryable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes("timeout") ||
      message.includes("econnreset") ||
      message.includes("econnrefused") ||
      message.includes("rate limit") ||
      message.includes("overloaded")
    );
  }

  return false;
}

/**
 * Normalize anything thrown into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Convert any failure into the short message shown to chat users
 */
export function toUserMessage(error: unknown): string {
  if (error instanceof ValidationError) {
    return `Sorry, I couldn't use that: ${error.message}`;
  }
  return "Sorry, something went wrong while I was looking into that. Please try again in a moment.";
}
