import type { Result } from '@rebatemaker/types';

export function ok<T>(data: T): Result<T> {
  return { success: true, data };
}

export function fail<T = never>(error: string): Result<T> {
  return { success: false, error };
}

/**
 * Extract a readable message from anything thrown
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

/**
 * Run an async call and capture any throw as a failed Result
 */
export async function attempt<T>(fn: () => Promise<T>): Promise<Result<T>> {
  try {
    return ok(await fn());
  } catch (error) {
    return fail(toErrorMessage(error));
  }
}
