/**
 * Error taxonomy for the provisioning options library.
 *
 * Every error carries a registered {@link ErrorCode}; the message shown depends
 * on the environment the error was raised in: production gets the generic
 * `prodMessage`, everything else the `devMessage` filled from the context.
 */

export enum ErrorCategory {
  VALIDATION = 'VALIDATION',
  CONFIGURATION = 'CONFIGURATION'
}

export enum ErrorSeverity {
  CRITICAL = 'CRITICAL',  // library defaults unusable
  ERROR = 'ERROR'         // call rejected, instance unchanged
}

export enum ErrorEnvironment {
  DEVELOPMENT = 'DEVELOPMENT',
  PRODUCTION = 'PRODUCTION',
  TEST = 'TEST'
}

/**
 * `devMessage` may reference context entries as `{name}`.
 */
export interface ErrorCode {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly devMessage: string;
  readonly prodMessage: string;
  readonly suggestions?: readonly string[];
}

/**
 * Process-wide table of error codes. A code string names one definition only.
 */
export class ErrorCodeRegistry {
  private static readonly codes = new Map<string, ErrorCode>();

  static register(errorCode: ErrorCode): ErrorCode {
    if (this.codes.has(errorCode.code)) {
      throw new Error(`Error code ${errorCode.code} is already registered`);
    }
    const frozen = Object.freeze({ ...errorCode });
    this.codes.set(frozen.code, frozen);
    return frozen;
  }
}

/**
 * Replaces `{key}` markers with the matching context value.
 * Unknown keys are left as written.
 */
export function formatErrorMessage(template: string, context: Readonly<Record<string, unknown>>): string {
  return template.replace(/\{(\w+)\}/g, (marker, key: string) => {
    if (!(key in context)) {
      return marker;
    }
    const value = context[key];
    return typeof value === 'string' ? value : JSON.stringify(value);
  });
}

export abstract class ProvisioningError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly suggestions: readonly string[];
  readonly context: Readonly<Record<string, unknown>>;
  readonly originalError?: Error;

  constructor(
    errorCode: ErrorCode,
    context: Record<string, unknown> = {},
    originalError?: Error,
    environment: ErrorEnvironment = ErrorEnvironment.DEVELOPMENT
  ) {
    super(environment === ErrorEnvironment.PRODUCTION
      ? errorCode.prodMessage
      : formatErrorMessage(errorCode.devMessage, context));

    this.name = new.target.name;
    this.code = errorCode.code;
    this.category = errorCode.category;
    this.severity = errorCode.severity;
    this.suggestions = errorCode.suggestions ?? [];
    this.context = context;
    this.originalError = originalError;
  }
}

/** Input rejected by a setter or by plain-config parsing */
export class ValidationError extends ProvisioningError {}

/** A setter argument was missing, malformed or out of range */
export class InvalidArgumentError extends ValidationError {}

/** A domain name without a recognized public suffix */
export class InvalidDomainError extends ValidationError {}

/** The process environment holds unsupported library settings */
export class ConfigurationError extends ProvisioningError {}
