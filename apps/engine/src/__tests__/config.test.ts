import { describe, it, expect } from 'vitest';
import { createExchange, describeConfig, loadConfig } from '../config';
import { PaperExchange } from '../exchange/paper-exchange';
import { silentLogger } from './helpers/fixtures';

const TEST_PRIVATE_KEY = `0x${'11'.repeat(32)}`;

describe('loadConfig', () => {
  it('should turn the environment into run settings', () => {
    const result = loadConfig({
      INSTRUMENTS: 'm1:t1, m2:t2',
      PAPER_TRADING: 'true',
      RISK_AMOUNT: '50',
      DURATION_MINUTES: '2',
    });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.instruments).toEqual([
      { marketId: 'm1', tokenId: 't1' },
      { marketId: 'm2', tokenId: 't2' },
    ]);
    expect(result.data.run).toEqual({ riskAmount: 50, maxSpread: 0.03, durationMs: 120_000 });
    expect(result.data.loop).toEqual({ refreshIntervalMs: 30_000, recoveryIntervalMs: 5_000, feeRateBps: 0 });
    expect(result.data.paperTrading).toBe(true);
    expect(result.data.publishEvents).toBe(false);
  });

  it('should enable event publishing when a Redis URL is configured', () => {
    const result = loadConfig({
      INSTRUMENTS: 'm1:t1',
      PAPER_TRADING: 'true',
      REDIS_URL: 'redis://localhost:6379',
    });

    expect(result.success && result.data.publishEvents).toBe(true);
  });

  it('should list every invalid variable', () => {
    const result = loadConfig({ PAPER_TRADING: 'true', MAX_SPREAD: '2' });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toContain('Environment validation failed:');
    expect(result.error).toContain('  - INSTRUMENTS: Required');
    expect(result.error).toContain('  - MAX_SPREAD: ');
  });
});

describe('describeConfig', () => {
  it('should mask credentials', () => {
    const result = loadConfig({ INSTRUMENTS: 'm1:t1', PRIVATE_KEY: TEST_PRIVATE_KEY });
    expect(result.success).toBe(true);
    if (!result.success) return;

    const described = describeConfig(result.data);

    expect(described.PRIVATE_KEY).toBe('0x11********');
    expect(described.CLOB_HOST).toBe('https://clob.polymarket.com');
    expect(described.instruments).toBe(1);
  });
});

describe('createExchange', () => {
  it('should use the paper exchange in paper trading mode', async () => {
    const result = loadConfig({ INSTRUMENTS: 'm1:t1', PAPER_TRADING: '1' });
    expect(result.success).toBe(true);
    if (!result.success) return;

    const exchange = await createExchange(result.data, silentLogger());

    expect(exchange).toBeInstanceOf(PaperExchange);
  });
});
