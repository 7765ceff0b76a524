/**
 * Outcome of an operation that wraps an external call
 */
export type Result<T> =
  | { success: true; data: T }
  | { success: false; error: string };
