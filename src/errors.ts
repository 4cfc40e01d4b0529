export type TimerErrorCode = "unauthorized" | "not_found" | "invalid_state" | "rate_limited";

export class TimerServiceError extends Error {
  constructor(
    readonly code: TimerErrorCode,
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnauthorizedError extends TimerServiceError {
  constructor(message = "Missing or invalid credentials.") {
    super("unauthorized", 401, message);
  }
}

export class NotFoundError extends TimerServiceError {
  constructor(message = "Timer not found.") {
    super("not_found", 404, message);
  }
}

export class InvalidStateError extends TimerServiceError {
  constructor(message: string) {
    super("invalid_state", 400, message);
  }
}

export class RateLimitedError extends TimerServiceError {
  constructor(
    readonly tokens: number,
    readonly periodSeconds: number
  ) {
    super("rate_limited", 429, `Rate limit exceeded (${tokens} per ${periodSeconds}s).`);
  }
}
