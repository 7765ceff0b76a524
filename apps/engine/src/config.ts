import type { Instrument, Result } from '@rebatemaker/types';
import { fail, ok, redactObject, safeValidateEnv } from '@rebatemaker/utils';
import type { EnvConfig, Logger, RunParamsInput } from '@rebatemaker/utils';
import { ClobClient } from '@polymarket/clob-client';
import { ClobExchangeClient, connectClob } from './exchange/clob-client';
import { PAPER_ACCOUNT_ADDRESS, PaperExchange } from './exchange/paper-exchange';
import type { ExchangeClient, MarketCatalog } from './exchange/types';
import type { StrategyLoopConfig } from './strategy-loop';

export interface EngineConfig {
  env: EnvConfig;
  instruments: Instrument[];
  run: RunParamsInput;
  loop: StrategyLoopConfig;
  paperTrading: boolean;
  rewardsTotal: number;
  /** Run events go to Redis only when REDIS_URL is set */
  publishEvents: boolean;
}

export function toEngineConfig(env: EnvConfig): EngineConfig {
  return {
    env,
    instruments: env.INSTRUMENTS,
    run: {
      riskAmount: env.RISK_AMOUNT,
      maxSpread: env.MAX_SPREAD,
      durationMs: Math.round(env.DURATION_MINUTES * 60_000),
    },
    loop: {
      refreshIntervalMs: env.REFRESH_INTERVAL_MS,
      recoveryIntervalMs: env.RECOVERY_INTERVAL_MS,
      feeRateBps: env.FEE_RATE_BPS,
    },
    paperTrading: env.PAPER_TRADING,
    rewardsTotal: env.REWARDS_TOTAL,
    publishEvents: env.REDIS_URL !== undefined,
  };
}

/**
 * Validate the environment into engine settings; the error lists every issue
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): Result<EngineConfig> {
  const result = safeValidateEnv(source);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`);
    return fail(`Environment validation failed:\n  - ${issues.join('\n  - ')}`);
  }
  return ok(toEngineConfig(result.data));
}

/**
 * Settings safe to log
 */
export function describeConfig(config: EngineConfig): Record<string, unknown> {
  return redactObject({
    CLOB_HOST: config.env.CLOB_HOST,
    CHAIN_ID: config.env.CHAIN_ID,
    PRIVATE_KEY: config.env.PRIVATE_KEY,
    FUNDER_ADDRESS: config.env.FUNDER_ADDRESS,
    CLOB_API_KEY: config.env.CLOB_API_KEY,
    REDIS_URL: config.env.REDIS_URL,
    paperTrading: config.paperTrading,
    instruments: config.instruments.length,
    run: config.run,
    loop: config.loop,
  });
}

/**
 * Paper exchange over the live public book in dry runs, otherwise an
 * authenticated CLOB client
 */
export async function createExchange(
  config: EngineConfig,
  logger: Logger
): Promise<ExchangeClient & MarketCatalog> {
  const { env } = config;
  if (config.paperTrading) {
    const bookSource = new ClobExchangeClient(
      new ClobClient(env.CLOB_HOST, env.CHAIN_ID),
      { accountAddress: PAPER_ACCOUNT_ADDRESS },
      logger.child({ component: 'exchange' })
    );
    logger.info(
      { host: env.CLOB_HOST },
      'Paper trading: quoting against the live book; orders stay in process and never fill'
    );
    return new PaperExchange({ bookSource });
  }

  if (!env.PRIVATE_KEY) {
    throw new Error('PRIVATE_KEY is required unless PAPER_TRADING is enabled');
  }

  const creds =
    env.CLOB_API_KEY && env.CLOB_API_SECRET && env.CLOB_API_PASSPHRASE
      ? { key: env.CLOB_API_KEY, secret: env.CLOB_API_SECRET, passphrase: env.CLOB_API_PASSPHRASE }
      : undefined;

  const { api, accountAddress } = await connectClob({
    host: env.CLOB_HOST,
    chainId: env.CHAIN_ID,
    privateKey: env.PRIVATE_KEY,
    signatureType: env.SIGNATURE_TYPE,
    funderAddress: env.FUNDER_ADDRESS,
    creds,
  });
  logger.info({ accountAddress, derivedCreds: creds === undefined }, 'Connected to CLOB');

  return new ClobExchangeClient(api, { accountAddress }, logger.child({ component: 'exchange' }));
}
