/**
 * ReleaseRelay — Error Taxonomy
 *
 * FetchError, ParseError and ConfigError abort an invocation.
 * DeliveryError and StoreUnavailableError are recorded per record.
 */

export type RelayErrorCode =
  | 'FETCH_FAILED'
  | 'PARSE_FAILED'
  | 'STORE_UNAVAILABLE'
  | 'DELIVERY_FAILED'
  | 'CONFIG_INVALID';

export abstract class RelayError extends Error {
  abstract readonly code: RelayErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FetchError extends RelayError {
  readonly code = 'FETCH_FAILED' as const;

  constructor(
    message: string,
    readonly url: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ParseError extends RelayError {
  readonly code = 'PARSE_FAILED' as const;
}

export class ConfigError extends RelayError {
  readonly code = 'CONFIG_INVALID' as const;

  constructor(
    message: string,
    readonly issues: string[] = [],
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class StoreUnavailableError extends RelayError {
  readonly code = 'STORE_UNAVAILABLE' as const;
}

export type DeliveryFailureReason =
  | 'unreachable'
  | 'rejected'
  | 'rate_limited'
  | 'timeout';

export class DeliveryError extends RelayError {
  readonly code = 'DELIVERY_FAILED' as const;

  constructor(
    message: string,
    readonly reason: DeliveryFailureReason,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isTimeoutError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === 'TimeoutError' || error.name === 'AbortError')
  );
}
