import type { RewardsSource } from './types';

/**
 * Rewards are paid out daily by the exchange and not exposed per order, so the
 * figure is supplied by configuration
 */
export class StaticRewardsSource implements RewardsSource {
  constructor(private readonly total: number = 0) {}

  async getRewardsTotal(): Promise<number> {
    return this.total;
  }
}
