import { randomBytes } from 'crypto';

/**
 * Generate a short ID for runs and paper orders
 */
export function generateShortId(prefix: string = ''): string {
  const id = randomBytes(8).toString('base64url');
  return prefix ? `${prefix}_${id}` : id;
}
