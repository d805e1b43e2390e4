// src/utils/errors.ts — error taxonomy shared by the flight and policy pipelines

export type ErrorCode = 'configuration_error' | 'data_error' | 'invalid_argument' | 'upstream_error';

export interface ValidationIssue {
  path: string;
  message: string;
}

export abstract class TravelAssistantError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid chunking, index or environment parameters. Raised at startup. */
export class ConfigurationError extends TravelAssistantError {
  readonly code = 'configuration_error';

  constructor(
    message: string,
    public readonly setting?: string,
  ) {
    super(setting ? `${setting}: ${message}` : message);
  }
}

/** Malformed catalog record or index snapshot. */
export class DataError extends TravelAssistantError {
  readonly code = 'data_error';

  constructor(
    message: string,
    public readonly record?: string,
    public readonly field?: string,
    options?: { cause?: unknown },
  ) {
    super(DataError.describe(message, record, field), options);
  }

  private static describe(message: string, record?: string, field?: string): string {
    const where = [record && `record ${record}`, field && `field "${field}"`].filter(Boolean).join(', ');
    return where ? `${where}: ${message}` : message;
  }
}

/** Caller bug: bad retrieval k, malformed structured criteria. */
export class InvalidArgumentError extends TravelAssistantError {
  readonly code = 'invalid_argument';

  constructor(
    message: string,
    public readonly issues: ValidationIssue[] = [],
  ) {
    super(message);
  }
}

export type UpstreamCall = 'embedding' | 'generation';

/** The embedding or text-generation call failed. Never retried inside the core. */
export class UpstreamError extends TravelAssistantError {
  readonly code = 'upstream_error';

  constructor(
    public readonly call: UpstreamCall,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${call} call failed: ${message}`, options);
  }

  static wrap(call: UpstreamCall, err: unknown): UpstreamError {
    if (err instanceof UpstreamError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new UpstreamError(call, message, { cause: err });
  }
}

export function isTravelAssistantError(err: unknown): err is TravelAssistantError {
  return err instanceof TravelAssistantError;
}
