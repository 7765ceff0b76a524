/**
 * Error reported by the exchange in a response body rather than thrown by the transport
 */
export class ExchangeApiError extends Error {
  readonly status?: number;
  readonly operation: string;

  constructor(operation: string, message: string, status?: number) {
    super(`${operation} failed: ${message}`);
    this.name = 'ExchangeApiError';
    this.operation = operation;
    this.status = status;
  }
}

/**
 * Raised by the paper exchange when a failure was injected for an operation
 */
export class InjectedFailureError extends Error {
  constructor(operation: string) {
    super(`${operation} unavailable (injected failure)`);
    this.name = 'InjectedFailureError';
  }
}
