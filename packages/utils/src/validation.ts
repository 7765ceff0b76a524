import { z } from 'zod';
import type { Instrument } from '@rebatemaker/types';
import {
  DEFAULT_CLOB_HOST,
  DEFAULT_DURATION_MINUTES,
  DEFAULT_FEE_RATE_BPS,
  DEFAULT_MAX_SPREAD,
  DEFAULT_RISK_AMOUNT,
  POLYGON_CHAIN_ID,
  RECOVERY_INTERVAL_MS,
  REFRESH_INTERVAL_MS,
} from './constants';

// Log level validation
export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

// Boolean string validation (handles 'true', 'false', '1', '0')
const BooleanStringSchema = z.enum(['true', 'false', '1', '0']).transform((val) => val === 'true' || val === '1');

/**
 * One instrument as `marketId:tokenId`
 */
export const InstrumentRefSchema = z
  .string()
  .trim()
  .regex(/^[^:\s]+:[^:\s]+$/, 'Instrument must be written as marketId:tokenId')
  .transform((ref): Instrument => {
    const [marketId, tokenId] = ref.split(':');
    return { marketId, tokenId };
  });

/**
 * Registry and channel key of an instrument, the inverse of InstrumentRefSchema
 */
export function instrumentKey(instrument: Instrument): string {
  return `${instrument.marketId}:${instrument.tokenId}`;
}

/**
 * Comma-separated instrument list, e.g. `0xabc:123,0xdef:456`
 */
export const InstrumentListSchema = z
  .string()
  .transform((list) => list.split(',').map((item) => item.trim()).filter((item) => item.length > 0))
  .pipe(z.array(InstrumentRefSchema).min(1, 'At least one instrument is required'));

export const RunParamsSchema = z.object({
  riskAmount: z.number().positive(),
  maxSpread: z.number().min(0).lt(1),
  durationMs: z.number().int().positive(),
});

// Environment validation
export const EnvSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // Logging configuration
    LOG_LEVEL: LogLevelSchema.optional(),
    LOG_LEVEL_ENGINE: LogLevelSchema.optional(),
    LOG_PRETTY: BooleanStringSchema.optional().default('false'),

    // Exchange connection
    CLOB_HOST: z.string().url().default(DEFAULT_CLOB_HOST),
    CHAIN_ID: z.coerce.number().int().positive().default(POLYGON_CHAIN_ID),
    PRIVATE_KEY: z.string().regex(/^(0x)?[a-fA-F0-9]{64}$/, 'PRIVATE_KEY must be a 32-byte hex key').optional(),
    FUNDER_ADDRESS: z.string().regex(/^0x[a-fA-F0-9]{40}$/, 'FUNDER_ADDRESS must be a 0x address').optional(),
    SIGNATURE_TYPE: z.coerce.number().int().min(0).max(2).default(0),
    CLOB_API_KEY: z.string().min(1).optional(),
    CLOB_API_SECRET: z.string().min(1).optional(),
    CLOB_API_PASSPHRASE: z.string().min(1).optional(),
    PAPER_TRADING: BooleanStringSchema.optional().default('false'),

    // Strategy parameters
    INSTRUMENTS: InstrumentListSchema,
    RISK_AMOUNT: z.coerce.number().positive().default(DEFAULT_RISK_AMOUNT),
    MAX_SPREAD: z.coerce.number().min(0).lt(1).default(DEFAULT_MAX_SPREAD),
    DURATION_MINUTES: z.coerce.number().positive().default(DEFAULT_DURATION_MINUTES),
    REFRESH_INTERVAL_MS: z.coerce.number().int().positive().default(REFRESH_INTERVAL_MS),
    RECOVERY_INTERVAL_MS: z.coerce.number().int().positive().default(RECOVERY_INTERVAL_MS),
    FEE_RATE_BPS: z.coerce.number().int().min(0).default(DEFAULT_FEE_RATE_BPS),
    REWARDS_TOTAL: z.coerce.number().default(0),

    // Run-event publishing (disabled when unset)
    REDIS_URL: z.string().min(1).optional(),
  })
  .superRefine((env, ctx) => {
    if (!env.PAPER_TRADING && !env.PRIVATE_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['PRIVATE_KEY'],
        message: 'PRIVATE_KEY is required unless PAPER_TRADING is enabled',
      });
    }
    const creds = [env.CLOB_API_KEY, env.CLOB_API_SECRET, env.CLOB_API_PASSPHRASE];
    const provided = creds.filter((value) => value !== undefined).length;
    if (provided > 0 && provided < creds.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CLOB_API_KEY'],
        message: 'CLOB_API_KEY, CLOB_API_SECRET and CLOB_API_PASSPHRASE must be set together',
      });
    }
  });

/**
 * Safely validate environment variables without throwing.
 *
 * @example
 * ```typescript
 * const result = safeValidateEnv();
 * if (result.success) {
 *   console.log(result.data.INSTRUMENTS);
 * } else {
 *   console.error('Invalid env:', result.error.issues);
 * }
 * ```
 */
export function safeValidateEnv(
  env: NodeJS.ProcessEnv = process.env
): z.SafeParseReturnType<unknown, EnvConfig> {
  return EnvSchema.safeParse(env);
}

// Type exports
export type EnvConfig = z.infer<typeof EnvSchema>;
export type RunParamsInput = z.infer<typeof RunParamsSchema>;
