export class ParkWhizError extends Error {
  status?: number;
  data?: unknown;

  constructor(message: string, details: { status?: number; data?: unknown } = {}) {
    super(message);
    this.name = "ParkWhizError";
    this.status = details.status;
    this.data = details.data;
  }
}

/** 401 from the provider, or a token exchange that did not yield a token. Never retried. */
export class AuthenticationError extends ParkWhizError {
  constructor(message: string, details: { status?: number; data?: unknown } = {}) {
    super(message, details);
    this.name = "AuthenticationError";
  }
}

export class TimeoutError extends ParkWhizError {
  constructor(message: string) {
    super(message);
    this.name = "TimeoutError";
  }
}

export class NotFoundError extends ParkWhizError {
  constructor(message: string, details: { status?: number; data?: unknown } = {}) {
    super(message, { status: 404, ...details });
    this.name = "NotFoundError";
  }
}

export class RateLimitError extends ParkWhizError {
  constructor(message: string, details: { status?: number; data?: unknown } = {}) {
    super(message, { status: 429, ...details });
    this.name = "RateLimitError";
  }
}

export class ExtractionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ExtractionError";
  }
}

export const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));
