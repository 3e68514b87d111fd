import type { StageName } from './types';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Rejected before any stage runs, e.g. an empty topic. */
export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputError';
  }
}

export type UpstreamErrorKind =
  | 'rate_limit'
  | 'quota'
  | 'auth'
  | 'model_not_found'
  | 'bad_request'
  | 'server'
  | 'timeout'
  | 'network'
  | 'empty_response'
  | 'unknown';

/** The call to the model API itself failed. */
export class UpstreamError extends Error {
  stage?: StageName;

  constructor(
    public readonly kind: UpstreamErrorKind,
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'UpstreamError';
  }
}

export type MalformedResponseCode =
  | 'RESPONSE_NOT_JSON'
  | 'RESPONSE_SCHEMA_INVALID'
  | 'RESPONSE_CONTRACT_VIOLATED';

/** The model answered, but not in the shape the stage asked for. */
export class MalformedResponseError extends Error {
  stage?: StageName;

  constructor(
    public readonly code: MalformedResponseCode,
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message);
    this.name = 'MalformedResponseError';
  }
}

export type StageError = UpstreamError | MalformedResponseError;

export function isStageError(error: unknown): error is StageError {
  return error instanceof UpstreamError || error instanceof MalformedResponseError;
}
