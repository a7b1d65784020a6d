import { STATUS_MAX } from "./statusCode";

/** Counters indexed by status code; always `STATUS_MAX + 1` long. */
export type StatusHistogram = number[];

export interface AggregateSummary {
  readonly numberProcessed: number;
  readonly histogram: readonly number[];
}

export function emptyHistogram(): StatusHistogram {
  return new Array<number>(STATUS_MAX + 1).fill(0);
}
