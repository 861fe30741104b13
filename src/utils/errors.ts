import { MESSAGES } from "./constants";

export class AppError extends Error {
  public readonly status: number;

  constructor(message: string, status = 500) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, 500);
  }
}

export class EmptyRequestError extends AppError {
  constructor() {
    super(MESSAGES.EMPTY_REQUEST, 400);
  }
}

/**
 * Raised for any failure of the completion service: auth, rate limit,
 * network and empty responses all end up here.
 */
export class CompletionError extends AppError {
  constructor(message: string, public readonly provider?: string) {
    super(message, 502);
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
