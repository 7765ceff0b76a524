// Exchange price bounds for outcome tokens
export const MIN_PRICE = 0.01;
export const MAX_PRICE = 0.99;

// Mid-price used when the book is empty or cannot be read
export const NEUTRAL_MID_PRICE = 0.5;

// Book defaults when one side is missing
export const EMPTY_BID_PRICE = 0;
export const EMPTY_ASK_PRICE = 1;

// Quote prices are rounded to the exchange tick
export const PRICE_DECIMALS = 2;

// USDC precision for PnL figures
export const AMOUNT_DECIMALS = 6;

// Strategy loop timing
export const REFRESH_INTERVAL_MS = 30_000;
export const RECOVERY_INTERVAL_MS = 5_000;

// Run defaults
export const DEFAULT_MAX_SPREAD = 0.03;
export const DEFAULT_DURATION_MINUTES = 60;
export const DEFAULT_RISK_AMOUNT = 100;
export const DEFAULT_FEE_RATE_BPS = 0;

// Exchange connection
export const DEFAULT_CLOB_HOST = 'https://clob.polymarket.com';
export const POLYGON_CHAIN_ID = 137;

// Cursor the CLOB returns on the last page of a paginated listing
export const END_CURSOR = 'LTE=';
