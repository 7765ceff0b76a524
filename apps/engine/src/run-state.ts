import type { Instrument, OrderSide, RunSummary } from '@rebatemaker/types';
import { generateShortId } from '@rebatemaker/utils';
import type { RunParamsInput } from '@rebatemaker/utils';

/**
 * Everything one strategy run owns. Created per run and handed to the loop's
 * steps explicitly; two runs never share one.
 */
export interface RunState {
  readonly runId: string;
  readonly instrument: Instrument;
  /** Per-side order size: half the risk amount */
  readonly size: number;
  readonly maxSpread: number;
  readonly startedAt: number;
  readonly deadline: number;
  /** Id of the resting quote on each side, if any */
  activeQuotes: Record<OrderSide, string | null>;
  cycles: number;
  errors: number;
  ordersPlaced: number;
  ordersCanceled: number;
}

export function createRunState(
  instrument: Instrument,
  params: RunParamsInput,
  startedAt: number,
  runId: string = generateShortId('run')
): RunState {
  return {
    runId,
    instrument: { ...instrument },
    size: params.riskAmount / 2,
    maxSpread: params.maxSpread,
    startedAt,
    deadline: startedAt + params.durationMs,
    activeQuotes: { BUY: null, SELL: null },
    cycles: 0,
    errors: 0,
    ordersPlaced: 0,
    ordersCanceled: 0,
  };
}

export function summarizeRun(run: RunState, endedAt: number): RunSummary {
  return {
    runId: run.runId,
    instrument: { ...run.instrument },
    cycles: run.cycles,
    errors: run.errors,
    ordersPlaced: run.ordersPlaced,
    ordersCanceled: run.ordersCanceled,
    startedAt: new Date(run.startedAt),
    endedAt: new Date(endedAt),
  };
}
