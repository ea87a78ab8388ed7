/**
 * Failure kinds a one-shot fix can resolve with.
 *
 * - restricted: authorization insufficient or revoked mid-flight
 * - timedOut: deadline elapsed before a qualifying sample arrived
 * - cancelled: explicit cancellation
 * - providerFailure: the provider reported an error; wraps it as `cause`
 */
export type PositionErrorKind = 'restricted' | 'timedOut' | 'cancelled' | 'providerFailure';

const DESCRIPTIONS: Record<PositionErrorKind, string> = {
  restricted: 'Restricted',
  timedOut: 'Timed out',
  cancelled: 'Cancelled',
  providerFailure: 'Provider failure',
};

export class PositionError extends Error {
  readonly kind: PositionErrorKind;

  constructor(kind: PositionErrorKind, message?: string, options?: { cause?: unknown }) {
    super(message ?? DESCRIPTIONS[kind], options);
    this.name = 'PositionError';
    this.kind = kind;
  }

  static restricted(): PositionError {
    return new PositionError('restricted');
  }

  static timedOut(): PositionError {
    return new PositionError('timedOut');
  }

  static cancelled(): PositionError {
    return new PositionError('cancelled');
  }

  /** Wrap an underlying provider error; non-Error values are kept as the cause too */
  static providerFailure(cause: unknown): PositionError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new PositionError('providerFailure', `${DESCRIPTIONS.providerFailure}: ${detail}`, { cause });
  }

  /** Human-readable label for the kind */
  get description(): string {
    return DESCRIPTIONS[this.kind];
  }
}

export function isPositionError(value: unknown): value is PositionError {
  return value instanceof PositionError;
}

/** Thrown by RequestRegistry.add when the id is already registered */
export class DuplicateRequestIdError extends Error {
  readonly requestId: string;

  constructor(requestId: string) {
    super(`Fix request ${requestId} is already registered`);
    this.name = 'DuplicateRequestIdError';
    this.requestId = requestId;
  }
}
