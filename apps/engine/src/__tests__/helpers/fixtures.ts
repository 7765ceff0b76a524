import type { Instrument } from '@rebatemaker/types';
import { createLogger } from '@rebatemaker/utils';
import { PaperExchange } from '../../exchange/paper-exchange';

export const INSTRUMENT: Instrument = { marketId: 'm1', tokenId: 't1' };
export const OTHER_INSTRUMENT: Instrument = { marketId: 'm2', tokenId: 't2' };

export const silentLogger = () => createLogger({ service: 'test', level: 'silent' });

/**
 * Paper exchange with bid 0.40 / ask 0.50 resting on INSTRUMENT (mid 0.45)
 */
export function seededExchange(): PaperExchange {
  const exchange = new PaperExchange({ minOrderSize: 5 });
  exchange.seedBook(INSTRUMENT.tokenId, [
    { side: 'BUY', price: 0.4, size: 100 },
    { side: 'SELL', price: 0.5, size: 100 },
  ]);
  return exchange;
}
