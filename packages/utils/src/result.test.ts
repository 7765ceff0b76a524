import { describe, it, expect } from 'vitest';
import { ok, fail, toErrorMessage, attempt } from './result';

describe('result helpers', () => {
  it('builds success and failure values', () => {
    expect(ok(3)).toEqual({ success: true, data: 3 });
    expect(fail('nope')).toEqual({ success: false, error: 'nope' });
  });

  it('extracts messages from thrown values', () => {
    expect(toErrorMessage(new Error('boom'))).toBe('boom');
    expect(toErrorMessage('plain')).toBe('plain');
    expect(toErrorMessage({ code: 7 })).toBe('{"code":7}');
    expect(toErrorMessage(undefined)).toBe('undefined');
  });

  it('captures rejections from wrapped calls', async () => {
    await expect(attempt(async () => 'x')).resolves.toEqual({ success: true, data: 'x' });
    await expect(
      attempt(async () => {
        throw new Error('ECONNRESET');
      })
    ).resolves.toEqual({ success: false, error: 'ECONNRESET' });
  });
});
