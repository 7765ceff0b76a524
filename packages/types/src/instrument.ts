/**
 * A tradeable outcome token within a market. Immutable for the life of a run.
 */
export interface Instrument {
  /** Market (condition) id */
  marketId: string;
  /** Outcome token id quoted by the run */
  tokenId: string;
  label?: string;
}
