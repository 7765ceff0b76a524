// Constants
export {
  MIN_PRICE,
  MAX_PRICE,
  NEUTRAL_MID_PRICE,
  EMPTY_BID_PRICE,
  EMPTY_ASK_PRICE,
  PRICE_DECIMALS,
  AMOUNT_DECIMALS,
  REFRESH_INTERVAL_MS,
  RECOVERY_INTERVAL_MS,
  DEFAULT_MAX_SPREAD,
  DEFAULT_DURATION_MINUTES,
  DEFAULT_RISK_AMOUNT,
  DEFAULT_FEE_RATE_BPS,
  DEFAULT_CLOB_HOST,
  POLYGON_CHAIN_ID,
  END_CURSOR,
} from './constants';

// Validation schemas
export {
  LogLevelSchema,
  InstrumentRefSchema,
  instrumentKey,
  InstrumentListSchema,
  RunParamsSchema,
  EnvSchema,
  safeValidateEnv,
} from './validation';

export type { EnvConfig, RunParamsInput } from './validation';

// Formatting utilities
export {
  formatCurrency,
  formatPrice,
  formatPnl,
  formatDuration,
  shortId,
  round,
  clamp,
} from './formatting';

// Id utilities
export { generateShortId } from './ids';

// Result helpers
export { ok, fail, toErrorMessage, attempt } from './result';

// Retry utilities
export {
  retryWithBackoff,
  retry,
  calculateBackoffDelay,
  isRetryableError,
  isRetryableStatusCode,
  DEFAULT_RETRY_CONFIG,
  RETRY_PROFILES,
} from './retry';

export type { RetryConfig, RetryResult } from './retry';

// Timers
export { sleep, cancellableSleep, sleepUntilNext, systemScheduler } from './timer';

export type { Scheduler } from './timer';

// Locking
export { KeyedLock } from './lock';

// Logger utilities
export {
  createLogger,
  createChildLogger,
  getLogLevel,
  isValidLogLevel,
  LOG_LEVELS,
  DEFAULT_LOG_LEVELS,
} from './logger';

export type { Logger, Level, LoggerConfig, LogLevel, Environment } from './logger';

// Secret redaction
export {
  SECRET_KEYS,
  registerSecretValues,
  clearSecretValues,
  redactSecrets,
  redactValue,
  containsSecret,
  redactObject,
} from './secrets';

export type { SecretKey } from './secrets';
