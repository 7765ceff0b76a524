import Redis from 'ioredis';

let redis: Redis | null = null;
let pubClient: Redis | null = null;

function redisUrl(): string {
  return process.env.REDIS_URL || 'redis://localhost:6379';
}

/**
 * Command client, connected on first use
 */
export function getRedis(): Redis {
  if (!redis) {
    redis = new Redis(redisUrl());
  }
  return redis;
}

function getPubClient(): Redis {
  if (!pubClient) {
    pubClient = new Redis(redisUrl());
  }
  return pubClient;
}

// Channel names
export const CHANNELS = {
  /** Run lifecycle: state changes, cycle errors, summaries */
  RUNS: 'channel:runs',
  PNL: (instrument: string) => `channel:pnl:${instrument}`,
  QUOTES: (instrument: string) => `channel:quotes:${instrument}`,
};

// Key patterns
export const KEYS = {
  SEQUENCE_COUNTER: 'sequence:global',
  LATEST_PNL: (instrument: string) => `pnl:${instrument}:latest`,
};

/**
 * Get the next sequence number (atomic increment)
 */
export async function getNextSequence(): Promise<number> {
  return await getRedis().incr(KEYS.SEQUENCE_COUNTER);
}

/**
 * Publish a message to a channel with automatic sequence number injection
 */
export async function publish(channel: string, message: Record<string, unknown>): Promise<number> {
  const sequence = await getNextSequence();
  await getPubClient().publish(channel, JSON.stringify({ ...message, sequence }));
  return sequence;
}

/**
 * Keep the latest PnL snapshot readable for clients that join mid-run
 */
export async function cacheLatestPnl(instrument: string, snapshot: Record<string, unknown>): Promise<void> {
  await getRedis().set(KEYS.LATEST_PNL(instrument), JSON.stringify(snapshot));
}

/**
 * Close whichever connections were opened
 */
export async function closeRedis(): Promise<void> {
  const clients = [redis, pubClient].filter((client): client is Redis => client !== null);
  redis = null;
  pubClient = null;
  await Promise.all(clients.map((client) => client.quit()));
}
