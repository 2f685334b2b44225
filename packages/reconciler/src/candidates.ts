/**
 * Candidate Generation
 *
 * Blocks source B on a coarse key (symbol + trade date) so each A record
 * is scored only against plausible partners instead of the full cross
 * product. Pairs below the review threshold are discarded here.
 */

import type { MatchCandidatePair, TradeRecord } from "@tradebreak/types";
import type { MatcherConfig } from "./config.js";
import { scorePair } from "./scoring.js";

export function blockingKey(record: TradeRecord): string {
  return `${record.symbol}|${record.tradeDate}`;
}

export interface CandidateSet {
  /** Pairs at or above the review threshold, in generation order */
  readonly candidates: readonly MatchCandidatePair[];
  /** Pairs actually scored (sharing a blocking key) */
  readonly scored: number;
}

export function generateCandidates(
  recordsA: readonly TradeRecord[],
  recordsB: readonly TradeRecord[],
  config: MatcherConfig,
): CandidateSet {
  const index = new Map<string, TradeRecord[]>();
  for (const b of recordsB) {
    const key = blockingKey(b);
    const bucket = index.get(key) ?? [];
    bucket.push(b);
    index.set(key, bucket);
  }

  const candidates: MatchCandidatePair[] = [];
  let scored = 0;

  for (const a of recordsA) {
    const bucket = index.get(blockingKey(a));
    if (!bucket) continue;

    for (const b of bucket) {
      scored++;
      const pair = scorePair(a, b, config);
      if (pair && pair.score >= config.reviewThreshold) {
        candidates.push(pair);
      }
    }
  }

  return { candidates, scored };
}
