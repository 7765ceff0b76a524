import { describe, it, expect } from 'vitest';
import type { MarketDescriptor } from '@rebatemaker/types';
import { discoverInstruments, toRewardInstruments } from '../market-catalog';
import { PaperExchange } from '../exchange/paper-exchange';

const election: MarketDescriptor = {
  conditionId: '0xcond01',
  description: 'Market cond01 - Outcomes: Yes, No',
  tokens: [
    { tokenId: 'tok-yes', outcome: 'Yes', price: 0.6 },
    { tokenId: 'tok-no', outcome: 'No', price: 0.4 },
  ],
  rewardsMinSize: 50,
  rewardsMaxSpread: 3.5,
  acceptingOrders: true,
};

const closed: MarketDescriptor = {
  conditionId: '0xcond02',
  description: 'Market cond02 - Outcomes: Over, Under',
  tokens: [
    { tokenId: 'tok-over', outcome: 'Over' },
    { tokenId: 'tok-under', outcome: 'Under' },
  ],
  rewardsMinSize: 20,
  rewardsMaxSpread: 2,
  acceptingOrders: false,
};

describe('toRewardInstruments', () => {
  it('should produce one instrument per outcome token', () => {
    expect(toRewardInstruments([election])).toEqual([
      {
        marketId: '0xcond01',
        tokenId: 'tok-yes',
        label: 'Market cond01 - Outcomes: Yes, No [Yes]',
        description: 'Market cond01 - Outcomes: Yes, No',
        outcome: 'Yes',
        rewardsMinSize: 50,
        rewardsMaxSpread: 3.5,
      },
      {
        marketId: '0xcond01',
        tokenId: 'tok-no',
        label: 'Market cond01 - Outcomes: Yes, No [No]',
        description: 'Market cond01 - Outcomes: Yes, No',
        outcome: 'No',
        rewardsMinSize: 50,
        rewardsMaxSpread: 3.5,
      },
    ]);
  });
});

describe('discoverInstruments', () => {
  function catalog(): PaperExchange {
    const exchange = new PaperExchange();
    exchange.addMarket(election);
    exchange.addMarket(closed);
    return exchange;
  }

  it('should skip markets that are not accepting orders', async () => {
    const result = await discoverInstruments(catalog());

    expect(result.success && result.data.map((instrument) => instrument.tokenId)).toEqual(['tok-yes', 'tok-no']);
  });

  it('should include closed markets on request', async () => {
    const result = await discoverInstruments(catalog(), { acceptingOnly: false });

    expect(result.success && result.data).toHaveLength(4);
  });

  it('should filter by outcome name without regard to case', async () => {
    const result = await discoverInstruments(catalog(), { search: 'UNDER', acceptingOnly: false });

    expect(result.success && result.data.map((instrument) => instrument.marketId)).toEqual([
      '0xcond02',
      '0xcond02',
    ]);
  });

  it('should report a catalog failure', async () => {
    const exchange = catalog();
    exchange.failNext('listRewardMarkets');

    const result = await discoverInstruments(exchange);

    expect(result).toEqual({
      success: false,
      error: 'Failed to list reward markets: listRewardMarkets unavailable (injected failure)',
    });
  });
});
