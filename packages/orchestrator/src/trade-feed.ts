/**
 * Trade Feed — where a run's raw records come from.
 *
 * Venue connectors implement TradeFeed. The in-memory feed holds batches
 * pushed in over HTTP or by tests.
 */

import type { SourceId } from "@tradebreak/types";
import { rawExternalRef } from "@tradebreak/reconciler";
import { TradeFeedError } from "./errors.js";

export interface TradeFeed {
  /**
   * Raw records one source reported for a trade date, unvalidated.
   *
   * @throws TradeFeedError when the source has nothing for that date
   */
  load(sourceId: SourceId, tradeDate: string, signal?: AbortSignal): Promise<readonly unknown[]>;
}

export interface FeedIngestResult {
  /** Records new to the batch */
  readonly added: number;
  /** Records that replaced an earlier one with the same externalRef */
  readonly replaced: number;
  /** Batch size afterwards */
  readonly total: number;
}

interface FeedBatch {
  readonly records: unknown[];
  /** externalRef → position in `records` */
  readonly positions: Map<string, number>;
}

export class InMemoryTradeFeed implements TradeFeed {
  private readonly batches = new Map<string, FeedBatch>();

  /**
   * Merge raw records into a source's batch for a trade date.
   *
   * A record whose externalRef is already in the batch replaces the
   * earlier one in place, so a re-sent or corrected batch does not
   * duplicate. Records without a readable reference are appended and left
   * for the normalizer to reject. An empty list still registers the batch:
   * the source reported nothing for that date.
   */
  ingest(sourceId: SourceId, tradeDate: string, records: readonly unknown[]): FeedIngestResult {
    const key = feedKey(sourceId, tradeDate);
    const batch = this.batches.get(key) ?? { records: [], positions: new Map<string, number>() };
    let added = 0;
    let replaced = 0;

    for (const record of records) {
      const ref = rawExternalRef(record);
      const at = ref === undefined ? undefined : batch.positions.get(ref);
      if (at !== undefined) {
        batch.records[at] = record;
        replaced++;
        continue;
      }
      if (ref !== undefined) batch.positions.set(ref, batch.records.length);
      batch.records.push(record);
      added++;
    }

    this.batches.set(key, batch);
    return { added, replaced, total: batch.records.length };
  }

  /** Drop a source's batch. Returns whether one existed. */
  clear(sourceId: SourceId, tradeDate: string): boolean {
    return this.batches.delete(feedKey(sourceId, tradeDate));
  }

  async load(sourceId: SourceId, tradeDate: string, signal?: AbortSignal): Promise<readonly unknown[]> {
    signal?.throwIfAborted();
    const batch = this.batches.get(feedKey(sourceId, tradeDate));
    if (batch === undefined) {
      throw new TradeFeedError(
        "SOURCE_NOT_LOADED",
        `No records loaded for source '${sourceId}' on ${tradeDate}`,
      );
    }
    return [...batch.records];
  }
}

function feedKey(sourceId: SourceId, tradeDate: string): string {
  return `${sourceId}|${tradeDate}`;
}
