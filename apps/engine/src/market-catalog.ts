import type { Instrument, MarketDescriptor, Result } from '@rebatemaker/types';
import { attempt, fail, ok } from '@rebatemaker/utils';
import type { MarketCatalog } from './exchange/types';

export interface RewardInstrument extends Instrument {
  description: string;
  outcome: string;
  rewardsMinSize: number;
  rewardsMaxSpread: number;
}

export interface DiscoverOptions {
  /** Case-insensitive match against outcome names and the description */
  search?: string;
  /** Skip markets that are not accepting orders (default true) */
  acceptingOnly?: boolean;
}

/**
 * One instrument per outcome token of each market
 */
export function toRewardInstruments(markets: readonly MarketDescriptor[]): RewardInstrument[] {
  return markets.flatMap((market) =>
    market.tokens.map((token) => ({
      marketId: market.conditionId,
      tokenId: token.tokenId,
      label: `${market.description} [${token.outcome}]`,
      description: market.description,
      outcome: token.outcome,
      rewardsMinSize: market.rewardsMinSize,
      rewardsMaxSpread: market.rewardsMaxSpread,
    }))
  );
}

function matches(market: MarketDescriptor, search: string): boolean {
  const needle = search.toLowerCase();
  return (
    market.description.toLowerCase().includes(needle) ||
    market.tokens.some((token) => token.outcome.toLowerCase().includes(needle))
  );
}

/**
 * List instruments that currently earn liquidity rewards
 */
export async function discoverInstruments(
  catalog: MarketCatalog,
  options: DiscoverOptions = {}
): Promise<Result<RewardInstrument[]>> {
  const { search, acceptingOnly = true } = options;

  const markets = await attempt(() => catalog.listRewardMarkets());
  if (!markets.success) {
    return fail(`Failed to list reward markets: ${markets.error}`);
  }

  const selected = markets.data
    .filter((market) => !acceptingOnly || market.acceptingOrders)
    .filter((market) => !search || matches(market, search));
  return ok(toRewardInstruments(selected));
}
