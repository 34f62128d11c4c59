export type FetchFailureReason = 'status' | 'content-type' | 'empty' | 'network';

export class FetchError extends Error {
  readonly url: string;
  readonly reason: FetchFailureReason;
  readonly status?: number;

  constructor(
    url: string,
    reason: FetchFailureReason,
    message: string,
    options: { status?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'FetchError';
    this.url = url;
    this.reason = reason;
    this.status = options.status;
  }
}

// Bad caller input. Raised before any request is made.
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}
