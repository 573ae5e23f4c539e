/**
 * Error types for the conversion pipeline.
 *
 * `fatal` errors abort the whole run before anything is written.
 * `description` errors are caught at the description boundary: the
 * description is skipped and the run continues.
 */

export type ErrorSeverity = 'fatal' | 'description';

export class Bf2MarcError extends Error {
  readonly severity: ErrorSeverity;

  constructor(message: string, severity: ErrorSeverity, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.severity = severity;
  }
}

/** Bad format name, unreadable or malformed configuration, rule or query file. */
export class ConfigurationError extends Bf2MarcError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'fatal', options);
  }
}

/** No source was given and standard input stayed empty. */
export class NoInputError extends Bf2MarcError {
  constructor(message = 'No input: no sources given and nothing arrived on standard input') {
    super(message, 'fatal');
  }
}

export class SourceError extends Bf2MarcError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(message, 'fatal', options);
    this.source = source;
  }
}

export class QueryError extends Bf2MarcError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'fatal', options);
  }
}

export class DereferenceError extends Bf2MarcError {
  readonly iri: string;

  constructor(iri: string, message: string, options?: { cause?: unknown }) {
    super(message, 'description', options);
    this.iri = iri;
  }
}

export class StripingError extends Bf2MarcError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'description', options);
  }
}

export class ConversionError extends Bf2MarcError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'description', options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
