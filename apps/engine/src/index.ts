import type { RunSummary } from '@rebatemaker/types';
import {
  SECRET_KEYS,
  createChildLogger,
  createLogger,
  formatDuration,
  formatPnl,
  instrumentKey,
  redactSecrets,
  registerSecretValues,
  toErrorMessage,
} from '@rebatemaker/utils';
import { createExchange, describeConfig, loadConfig } from './config';
import { StaticRewardsSource } from './exchange/rewards';
import { discoverInstruments } from './market-catalog';
import { OrderManager } from './order-manager';
import { QuotePricer } from './quote-pricer';
import { startInstrumentRun } from './runner';
import type { InstrumentRun } from './runner';
import { RunPublisher } from './services/publisher';
import { closeRedis } from './services/redis';

// Validate environment variables at startup
const configResult = loadConfig();
if (!configResult.success) {
  console.error(configResult.error);
  process.exit(1);
}
const config = configResult.data;

registerSecretValues(SECRET_KEYS.map((key) => process.env[key]));

const logger = createLogger({ service: 'engine', pretty: config.env.LOG_PRETTY });

async function listMarkets(search: string | undefined): Promise<void> {
  const exchange = await createExchange(config, logger);
  const instruments = await discoverInstruments(exchange, { search });
  if (!instruments.success) {
    throw new Error(instruments.error);
  }

  logger.info({ count: instruments.data.length }, 'Reward markets');
  for (const instrument of instruments.data) {
    logger.info(
      {
        ref: instrumentKey(instrument),
        minSize: instrument.rewardsMinSize,
        maxSpread: instrument.rewardsMaxSpread,
      },
      instrument.label ?? instrument.description
    );
  }
}

async function main(): Promise<void> {
  const listIndex = process.argv.indexOf('--list-markets');
  if (listIndex !== -1) {
    await listMarkets(process.argv[listIndex + 1]);
    return;
  }

  logger.info(describeConfig(config), 'Starting liquidity maker');

  const exchange = await createExchange(config, logger);
  const publisher = config.publishEvents
    ? new RunPublisher(createChildLogger(logger, { component: 'publisher' }))
    : null;

  const context = {
    exchange,
    rewards: new StaticRewardsSource(config.rewardsTotal),
    pricer: new QuotePricer(exchange, createChildLogger(logger, { component: 'pricer' })),
    orders: new OrderManager(exchange, createChildLogger(logger, { component: 'orders' })),
    publisher,
    logger,
    loop: config.loop,
    run: config.run,
  };

  const runs: InstrumentRun[] = config.instruments.map((instrument) => startInstrumentRun(instrument, context));

  // Graceful shutdown: loops withdraw their quotes before exiting
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down...');
    for (const run of runs) {
      run.loop.stop();
    }
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  logger.info(
    { instruments: runs.length, duration: formatDuration(config.run.durationMs) },
    'Strategy runs started. Press Ctrl+C to stop.'
  );

  const results = await Promise.allSettled(runs.map((run) => run.done));
  let failed = 0;

  results.forEach((result, index) => {
    const run = runs[index];
    if (result.status === 'fulfilled') {
      logSummary(result.value, run.tracker.getLatest()?.totalPnl);
    } else {
      failed += 1;
      logger.error(
        { instrument: instrumentKey(run.instrument), error: redactSecrets(toErrorMessage(result.reason)) },
        'Strategy run failed'
      );
    }
  });

  if (publisher) {
    await publisher.flush();
    await closeRedis();
  }

  if (failed > 0) {
    process.exitCode = 1;
  }
}

function logSummary(summary: RunSummary, totalPnl: number | undefined): void {
  logger.info(
    {
      runId: summary.runId,
      instrument: instrumentKey(summary.instrument),
      cycles: summary.cycles,
      errors: summary.errors,
      ordersPlaced: summary.ordersPlaced,
      ordersCanceled: summary.ordersCanceled,
      duration: formatDuration(summary.endedAt.getTime() - summary.startedAt.getTime()),
      totalPnl: totalPnl === undefined ? 'n/a' : formatPnl(totalPnl),
    },
    'Strategy run summary'
  );
}

main().catch((error: unknown) => {
  logger.fatal({ error: redactSecrets(toErrorMessage(error)) }, 'Failed to start engine');
  process.exit(1);
});
