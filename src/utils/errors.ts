import type { HarvestFailure, HarvestFailureKind } from '../types.js';

export abstract class HarvestError extends Error {
  abstract readonly kind: HarvestFailureKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Cookie bootstrap could not complete. Non-fatal: the session continues degraded. */
export class ConnectionError extends HarvestError {
  readonly kind = 'connection' as const;
}

export class HttpError extends HarvestError {
  readonly kind = 'http' as const;

  constructor(
    message: string,
    readonly url: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class MalformedResponseError extends HarvestError {
  readonly kind = 'malformed_response' as const;
}

export function describeError(error: unknown): HarvestFailure {
  if (error instanceof HttpError) {
    return error.status === undefined
      ? { kind: error.kind, message: error.message }
      : { kind: error.kind, message: error.message, status: error.status };
  }
  if (error instanceof HarvestError) {
    return { kind: error.kind, message: error.message };
  }
  return { kind: 'unknown', message: error instanceof Error ? error.message : String(error) };
}
