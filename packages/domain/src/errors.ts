export type PipelineErrorCode =
  | 'NOT_FOUND'
  | 'LOAD_ERROR'
  | 'COORDINATE_RANGE'
  | 'CONFIGURATION';

/**
 * Base class for every failure the emissions pipeline surfaces.
 * A run either returns a full result or throws exactly one of these.
 */
export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;

  constructor(
    message: string,
    readonly details: Readonly<Record<string, unknown>> = {},
  ) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotFoundError extends PipelineError {
  readonly code = 'NOT_FOUND' as const;

  constructor(readonly sourcePath: string) {
    super(`File not found at: ${sourcePath}`, { sourcePath });
  }
}

export class LoadError extends PipelineError {
  readonly code = 'LOAD_ERROR' as const;

  constructor(readonly causeMessage: string) {
    super(`Error reading delivery data: ${causeMessage}`, { cause: causeMessage });
  }
}

export class CoordinateRangeError extends PipelineError {
  readonly code = 'COORDINATE_RANGE' as const;

  constructor(
    readonly tripIndex: number,
    readonly field: string,
    readonly value: number,
  ) {
    super(`Trip ${tripIndex}: ${field} = ${value} is outside the valid coordinate range`, {
      tripIndex,
      field,
      value,
    });
  }
}

export class ConfigurationError extends PipelineError {
  readonly code = 'CONFIGURATION' as const;

  constructor(
    message: string,
    readonly option: string,
  ) {
    super(message, { option });
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}
