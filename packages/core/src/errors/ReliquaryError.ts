/**
 * ReliquaryError - Error hierarchy for Reliquary
 *
 * Registry operations never throw: lookups and failed creations come back as
 * null/false. These errors belong to setup-time and caller-input paths.
 *
 * Error types:
 * - ConfigError: config file structure/validation errors (fatal)
 * - PropertyError: a property value that does not match its kind (error)
 * - TypeRegistrationError: two resource classes claiming one type name (fatal)
 * - ManifestError: unreadable or malformed manifest documents (error)
 */

export type ErrorSeverity = 'fatal' | 'error' | 'warning';

/**
 * Context for error reporting
 */
export interface ErrorContext {
  filePath?: string;
  resourceName?: string;
  typeName?: string;
  property?: string;
  [key: string]: unknown;
}

/**
 * JSON representation of ReliquaryError
 */
export interface ReliquaryErrorJSON {
  code: string;
  severity: ErrorSeverity;
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

/**
 * Abstract base class for all Reliquary errors.
 */
export abstract class ReliquaryError extends Error {
  abstract readonly code: string;
  abstract readonly severity: ErrorSeverity;
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.suggestion = suggestion;

    // Keep instanceof working for subclasses
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): ReliquaryErrorJSON {
    return {
      code: this.code,
      severity: this.severity,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

/**
 * Configuration error - malformed .reliquary/config.yaml values
 *
 * Severity: fatal (always)
 * Codes: ERR_CONFIG_INVALID
 */
export class ConfigError extends ReliquaryError {
  readonly code = 'ERR_CONFIG_INVALID';
  readonly severity = 'fatal' as const;
}

/**
 * Property error - empty name, or a value that does not fit its declared kind
 *
 * Severity: error (always)
 * Codes: ERR_PROPERTY_INVALID
 */
export class PropertyError extends ReliquaryError {
  readonly code = 'ERR_PROPERTY_INVALID';
  readonly severity = 'error' as const;
}

/**
 * Type registration error - a different class already owns the type name
 *
 * Severity: fatal (always)
 * Codes: ERR_TYPE_NAME_CONFLICT
 */
export class TypeRegistrationError extends ReliquaryError {
  readonly code = 'ERR_TYPE_NAME_CONFLICT';
  readonly severity = 'fatal' as const;
}

/**
 * Manifest error - the document could not be read or does not have the
 * expected shape
 *
 * Severity: error (always)
 * Codes: ERR_MANIFEST_UNREADABLE, ERR_MANIFEST_INVALID
 */
export class ManifestError extends ReliquaryError {
  readonly code: string;
  readonly severity = 'error' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}
