/**
 * Error types for structured error handling in the environment resolver
 */

/**
 * Stable machine-readable codes, one per error class
 */
export type ResolutionErrorCode =
  | "VALIDATION_FAILED"
  | "MISSING_FIELD"
  | "MALFORMED_REFERENCE"
  | "DUPLICATE_NAME"
  | "ENVIRONMENT_NOT_FOUND"
  | "DOCUMENT_PARSE_FAILED"
  | "DOCUMENT_SOURCE_FAILED";

/**
 * Base error class for all resolution errors
 * Carries the environment being resolved so callers can report per environment
 */
export abstract class EnvironmentResolutionError extends Error {
  public abstract readonly code: ResolutionErrorCode;
  public readonly environmentName: string | undefined;
  public readonly timestamp: Date;
  public readonly context: Record<string, unknown>;

  constructor(
    message: string,
    environmentName: string | undefined,
    context: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = this.constructor.name;
    this.environmentName = environmentName;
    this.timestamp = new Date();
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Returns a structured representation of the error for logging
   */
  toLogFormat(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      environmentName: this.environmentName,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * Rule a raw descriptor broke during schema validation
 */
export type ValidationRule =
  | "required"
  | "type"
  | "range"
  | "format"
  | "cross-field"
  | "unique";

/**
 * Error thrown when a field is missing, mistyped or out of range
 */
export class ValidationError extends EnvironmentResolutionError {
  public readonly code = "VALIDATION_FAILED";
  public readonly fieldPath: string;
  public readonly rule: ValidationRule;

  constructor(
    message: string,
    environmentName: string,
    fieldPath: string,
    rule: ValidationRule,
    context: Record<string, unknown> = {},
  ) {
    super(`[${environmentName}] ${fieldPath}: ${message}`, environmentName, {
      ...context,
      fieldPath,
      rule,
    });
    this.fieldPath = fieldPath;
    this.rule = rule;
  }
}

/**
 * Error thrown when a required field is set in neither the defaults nor the overrides
 */
export class MissingFieldError extends EnvironmentResolutionError {
  public readonly code = "MISSING_FIELD";
  public readonly fieldPath: string;

  constructor(
    environmentName: string,
    fieldPath: string,
    context: Record<string, unknown> = {},
  ) {
    super(
      `[${environmentName}] ${fieldPath}: required field is not set by the defaults or the environment`,
      environmentName,
      { ...context, fieldPath },
    );
    this.fieldPath = fieldPath;
  }
}

/**
 * Error thrown when a location or identifier string has the wrong shape
 */
export class DescriptorReferenceError extends EnvironmentResolutionError {
  public readonly code = "MALFORMED_REFERENCE";
  public readonly reason = "malformed-reference";
  public readonly fieldPath: string;
  public readonly reference: string;

  constructor(
    message: string,
    environmentName: string,
    fieldPath: string,
    reference: string,
    context: Record<string, unknown> = {},
  ) {
    super(`[${environmentName}] ${fieldPath}: ${message}`, environmentName, {
      ...context,
      fieldPath,
      reference,
    });
    this.fieldPath = fieldPath;
    this.reference = reference;
  }
}

/**
 * Error thrown when two environments are registered under the same name
 */
export class DuplicateNameError extends EnvironmentResolutionError {
  public readonly code = "DUPLICATE_NAME";

  constructor(environmentName: string, context: Record<string, unknown> = {}) {
    super(
      `Environment "${environmentName}" is already registered`,
      environmentName,
      context,
    );
  }
}

/**
 * Error thrown when looking up an environment that was never registered
 */
export class NotFoundError extends EnvironmentResolutionError {
  public readonly code = "ENVIRONMENT_NOT_FOUND";
  public readonly knownEnvironments: string[];

  constructor(environmentName: string, knownEnvironments: string[]) {
    const known = knownEnvironments.length > 0 ? knownEnvironments.join(", ") : "none";
    super(
      `Environment "${environmentName}" not found. Known environments: ${known}`,
      environmentName,
      { knownEnvironments },
    );
    this.knownEnvironments = knownEnvironments;
  }
}

/**
 * Error thrown when an environment document is not valid JSON or has the wrong shape
 */
export class DocumentParseError extends EnvironmentResolutionError {
  public readonly code = "DOCUMENT_PARSE_FAILED";
  public readonly origin: string;

  constructor(
    message: string,
    origin: string,
    environmentName?: string,
    context: Record<string, unknown> = {},
  ) {
    super(`${origin}: ${message}`, environmentName, { ...context, origin });
    this.origin = origin;
  }
}

/**
 * Error thrown when a document cannot be read from its source
 */
export class DocumentSourceError extends EnvironmentResolutionError {
  public readonly code = "DOCUMENT_SOURCE_FAILED";
  public readonly location: string;

  constructor(
    message: string,
    location: string,
    context: Record<string, unknown> = {},
  ) {
    super(`${location}: ${message}`, undefined, { ...context, location });
    this.location = location;
  }
}

/**
 * Utility function to generate correlation IDs for resolution runs
 */
export function generateCorrelationId(): string {
  return `eres-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
}
