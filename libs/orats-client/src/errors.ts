import type { ZodIssue } from 'zod';

export class OratsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OratsError';
  }
}

/**
 * A request could not be constructed. `field` is the wire-independent field
 * name of the first offending value (empty for whole-object checks).
 */
export class OratsValidationError extends OratsError {
  constructor(
    message: string,
    public readonly field: string,
    public readonly issues: readonly ZodIssue[] = [],
  ) {
    super(message);
    this.name = 'OratsValidationError';
  }
}

export class OratsRequestError extends OratsError {
  constructor(
    message: string,
    public readonly status: number,
    public readonly responseBody?: string,
  ) {
    super(message);
    this.name = 'OratsRequestError';
  }
}

export class OratsAuthenticationError extends OratsRequestError {
  constructor(message: string, responseBody?: string) {
    super(message, 401, responseBody);
    this.name = 'OratsAuthenticationError';
  }
}

/** The token is valid but its subscription does not cover the resource. */
export class OratsPermissionError extends OratsRequestError {
  constructor(message: string, responseBody?: string) {
    super(message, 403, responseBody);
    this.name = 'OratsPermissionError';
  }
}

export class OratsNotFoundError extends OratsRequestError {
  constructor(message: string, responseBody?: string) {
    super(message, 404, responseBody);
    this.name = 'OratsNotFoundError';
  }
}

export class OratsRateLimitError extends OratsRequestError {
  constructor(
    message: string,
    responseBody?: string,
    public readonly retryAfterMs?: number,
  ) {
    super(message, 429, responseBody);
    this.name = 'OratsRateLimitError';
  }
}

/** Transport failure or a 5xx from upstream; status is 0 when no response arrived. */
export class OratsNetworkError extends OratsRequestError {
  constructor(message: string, status = 0, responseBody?: string) {
    super(message, status, responseBody);
    this.name = 'OratsNetworkError';
  }
}

export class OratsResponseParseError extends OratsError {
  constructor(
    message: string,
    public readonly resource: string,
    public readonly issues: readonly ZodIssue[] = [],
  ) {
    super(message);
    this.name = 'OratsResponseParseError';
  }
}

export function errorForStatus(
  status: number,
  message: string,
  responseBody?: string,
  retryAfterMs?: number,
): OratsRequestError {
  switch (status) {
    case 401:
      return new OratsAuthenticationError(message, responseBody);
    case 403:
      return new OratsPermissionError(message, responseBody);
    case 404:
      return new OratsNotFoundError(message, responseBody);
    case 429:
      return new OratsRateLimitError(message, responseBody, retryAfterMs);
    default:
      if (status >= 500) {
        return new OratsNetworkError(message, status, responseBody);
      }
      return new OratsRequestError(message, status, responseBody);
  }
}
