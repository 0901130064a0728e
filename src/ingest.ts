import { describeError } from './errors.js';
import type { EventStore } from './eventStore.js';
import { parseMatchListing, type MatchSource } from './source.js';
import type { EventRecord, PollOutcome } from './types.js';

/**
 * One fetch-and-parse cycle against the source, bounded by a hard timeout.
 * Never throws: any failure becomes `{ ok: false }` so callers leave the
 * store untouched for the cycle.
 */
export class SourcePoller {
  constructor(
    private readonly source: MatchSource,
    private readonly baseUrl: string,
    private readonly timeoutMs: number,
    private readonly timeZone = 'UTC'
  ) {}

  async poll(): Promise<PollOutcome> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new Error(`poll timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);
    });

    try {
      const listings = await Promise.race([this.source.fetchListings(controller.signal), deadline]);
      const matches = parseMatchListing(listings.matches, 'match', this.baseUrl, this.timeZone);
      const results = parseMatchListing(listings.results, 'result', this.baseUrl, this.timeZone);

      // A match can sit on both pages right after it ends; the result wins.
      const byId = new Map<string, EventRecord>(matches.events.map(e => [e.external_id, e]));
      let duplicates = 0;
      for (const e of results.events) {
        if (byId.delete(e.external_id)) duplicates++;
        byId.set(e.external_id, e);
      }
      return {
        ok: true,
        events: [...byId.values()],
        skipped: matches.skipped + results.skipped + duplicates,
      };
    } catch (err) {
      return { ok: false, reason: describeError(err) };
    } finally {
      clearTimeout(timer);
    }
  }
}

export type SyncSummary = {
  ok: boolean;
  inserted: number;
  updated: number;
  unchanged: number;
  skipped: number;
  pruned: number;
  reason?: string;
};

export type SyncOptions = {
  now?: Date;
  retentionMs?: number;
};

/** Polls once and merges the result into the store. */
export async function syncOnce(poller: SourcePoller, store: EventStore, opts: SyncOptions = {}): Promise<SyncSummary> {
  const now = opts.now ?? new Date();
  const summary: SyncSummary = { ok: false, inserted: 0, updated: 0, unchanged: 0, skipped: 0, pruned: 0 };

  const outcome = await poller.poll();
  if (!outcome.ok) {
    console.error(`[Poller] Poll failed: ${outcome.reason}`);
    return { ...summary, reason: outcome.reason };
  }

  summary.ok = true;
  summary.skipped = outcome.skipped;
  for (const e of outcome.events) {
    try {
      const result = await store.upsert(e, now);
      if (result.type === 'inserted') summary.inserted++;
      else if (result.changed) summary.updated++;
      else summary.unchanged++;
    } catch (err) {
      console.error(`[Store] Failed to upsert event ${e.external_id}`, err);
    }
  }
  store.recordSync(now);

  if (opts.retentionMs !== undefined) {
    summary.pruned = store.pruneStale(new Date(now.getTime() - opts.retentionMs));
  }

  console.log(
    `[Poller] Sync complete: inserted=${summary.inserted}, updated=${summary.updated}, unchanged=${summary.unchanged}, skipped=${summary.skipped}, pruned=${summary.pruned}`
  );
  return summary;
}
