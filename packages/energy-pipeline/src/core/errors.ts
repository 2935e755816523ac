/**
 * Energy Pipeline Error Types
 *
 * Every condition the pipeline detects is raised as a PipelineError subclass
 * carrying the stage that failed and, when known, the source row and column.
 *
 * FATAL: LoadError, FormatError, SchemaError, ValidationError, ConfigurationError
 * NON-FATAL: GeoParseError (collected per region, geometry omitted)
 */

/**
 * Pipeline stages where an error can be raised
 */
export type PipelineStage =
  | 'load'
  | 'format'
  | 'schema'
  | 'clean'
  | 'transform'
  | 'geo'
  | 'filter'
  | 'config';

export interface PipelineErrorDetails {
  readonly stage: PipelineStage;
  /** 1-based data row number (header excluded) */
  readonly row?: number;
  /** Source header name or logical field name */
  readonly column?: string;
  readonly cause?: unknown;
}

export abstract class PipelineError extends Error {
  readonly stage: PipelineStage;
  readonly row?: number;
  readonly column?: string;

  constructor(message: string, details: PipelineErrorDetails) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.stage = details.stage;
    this.row = details.row;
    this.column = details.column;
  }

  /** Fatal errors abort startup; non-fatal ones are collected */
  get fatal(): boolean {
    return true;
  }

  /**
   * Create a formatted error message for logging
   */
  toLogString(): string {
    const parts = [`${this.name}: ${this.message}`, `  Stage: ${this.stage}`];
    if (this.row !== undefined) {
      parts.push(`  Row: ${this.row}`);
    }
    if (this.column !== undefined) {
      parts.push(`  Column: ${this.column}`);
    }
    return parts.join('\n');
  }
}

/**
 * Source file missing, unreadable, or not valid UTF-8.
 */
export class LoadError extends PipelineError {
  readonly name = 'LoadError' as const;

  constructor(message: string, details: Omit<PipelineErrorDetails, 'stage'> = {}) {
    super(message, { ...details, stage: 'load' });
    Object.setPrototypeOf(this, LoadError.prototype);
  }
}

/**
 * Wrong delimiter, ragged rows, or a cell that cannot be read as its type.
 */
export class FormatError extends PipelineError {
  readonly name = 'FormatError' as const;

  constructor(message: string, details: Omit<PipelineErrorDetails, 'stage'> = {}) {
    super(message, { ...details, stage: 'format' });
    Object.setPrototypeOf(this, FormatError.prototype);
  }
}

/**
 * Required columns missing from the header, or a required energy type absent.
 */
export class SchemaError extends PipelineError {
  readonly name = 'SchemaError' as const;

  constructor(
    message: string,
    public readonly missing: readonly string[],
    details: Omit<PipelineErrorDetails, 'stage'> & { readonly stage?: 'schema' | 'transform' } = {}
  ) {
    super(message, { ...details, stage: details.stage ?? 'schema' });
    Object.setPrototypeOf(this, SchemaError.prototype);
  }
}

/**
 * A dataset invariant does not hold after cleaning, or a filter spec is invalid.
 */
export class ValidationError extends PipelineError {
  readonly name = 'ValidationError' as const;

  constructor(
    message: string,
    details: Omit<PipelineErrorDetails, 'stage'> & { readonly stage?: 'clean' | 'filter' } = {}
  ) {
    super(message, { ...details, stage: details.stage ?? 'clean' });
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Malformed geometry text for one region. Collected, never thrown out of
 * the extractor.
 */
export class GeoParseError extends PipelineError {
  readonly name = 'GeoParseError' as const;

  constructor(
    message: string,
    public readonly regionCode: string,
    details: Omit<PipelineErrorDetails, 'stage'> = {}
  ) {
    super(message, { ...details, stage: 'geo' });
    Object.setPrototypeOf(this, GeoParseError.prototype);
  }

  override get fatal(): boolean {
    return false;
  }

  override toLogString(): string {
    return `${super.toLogString()}\n  Region: ${this.regionCode}`;
  }
}

/**
 * Invalid configuration file, environment variable, or CLI option.
 */
export class ConfigurationError extends PipelineError {
  readonly name = 'ConfigurationError' as const;

  constructor(message: string, details: Omit<PipelineErrorDetails, 'stage'> = {}) {
    super(message, { ...details, stage: 'config' });
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Type guard to check if an error is a PipelineError
 */
export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
