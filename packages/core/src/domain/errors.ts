export type RateLimiterErrorCode = 'CONFIGURATION' | 'CANCELLED';

export class RateLimiterError extends Error {
  public readonly code: RateLimiterErrorCode;

  constructor(code: RateLimiterErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class RateLimiterConfigurationError extends RateLimiterError {
  public readonly field: string;

  constructor(field: string, message: string) {
    super('CONFIGURATION', message);
    this.field = field;
  }
}

export class AdmissionCancelledError extends RateLimiterError {
  constructor(reason?: unknown) {
    super('CANCELLED', 'Admission cancelled before capacity was granted', { cause: reason });
  }
}
