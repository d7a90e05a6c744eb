/**
 * Error hierarchy for the pipeline framework.
 *
 * All library errors inherit from TributaryError. Dataset failures are the
 * only errors that wrap backend causes; configuration, mode, environment and
 * log-level errors fail fast and are never wrapped.
 */

// ---------------------------------------------------------------------------
// TributaryError: base for all library errors
// ---------------------------------------------------------------------------

/** Base error for all framework errors. */
export class TributaryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "TributaryError";
  }
}

// ---------------------------------------------------------------------------
// DatasetError: failures of dataset operations
// ---------------------------------------------------------------------------

/** Failure of a dataset operation, tagged with the dataset name. */
export class DatasetError extends TributaryError {
  /** Name of the dataset whose operation failed. */
  readonly datasetName: string;

  constructor(
    message: string,
    options: { datasetName: string; cause?: unknown },
  ) {
    super(message, { cause: options.cause });
    this.name = "DatasetError";
    this.datasetName = options.datasetName;
  }
}

/**
 * Translate a failure escaping a dataset backend into a DatasetError.
 * A DatasetError raised by the backend is returned as-is.
 */
export function toDatasetError(
  error: unknown,
  datasetName: string,
  message: string,
): DatasetError {
  if (error instanceof DatasetError) {
    return error;
  }
  return new DatasetError(message, { datasetName, cause: error });
}

// ---------------------------------------------------------------------------
// Fail-fast errors
// ---------------------------------------------------------------------------

/** Unresolvable type identifiers, malformed records, invalid settings. */
export class ConfigurationError extends TributaryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/** A value in a config tree that flat `$NAME` substitution cannot handle. */
export class InvalidParamTypeError extends ConfigurationError {
  /** The `typeof` of the offending value (`"null"` for null). */
  readonly valueType: string;

  constructor(valueType: string) {
    super(
      `Invalid value type ${valueType}. Expected object, array, string, number or boolean.`,
    );
    this.name = "InvalidParamTypeError";
    this.valueType = valueType;
  }
}

/** An operation was invoked in the wrong node mode or before setup. */
export class ModeError extends TributaryError {
  constructor(message: string) {
    super(message);
    this.name = "ModeError";
  }
}

/** A `{$NAME}` placeholder referenced an unset environment variable. */
export class MissingEnvironmentVariableError extends TributaryError {
  readonly variable: string;

  constructor(variable: string) {
    super(
      `Failed to inject environment variable. ${variable} was not found.`,
    );
    this.name = "MissingEnvironmentVariableError";
    this.variable = variable;
  }
}

/** `Node.log` was called with a level outside the allowed set. */
export class InvalidLogLevelError extends TributaryError {
  readonly level: string;
  readonly validLevels: readonly string[];

  constructor(level: string, validLevels: readonly string[]) {
    super(
      `Invalid logging level ${level}. Valid options are: ${validLevels.join(", ")}`,
    );
    this.name = "InvalidLogLevelError";
    this.level = level;
    this.validLevels = validLevels;
  }
}
