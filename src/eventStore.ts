import type { Db } from './db.js';
import { hashEvent } from './hash.js';
import { KeyedLock } from './lock.js';
import type {
  DeliveryStatus,
  EventKind,
  EventRecord,
  MatchStatus,
  NotificationType,
  StoredEvent,
  UpsertOutcome,
} from './types.js';

type EventRow = {
  external_id: string;
  kind: EventKind;
  team_a: string;
  team_b: string;
  flag_a: string;
  flag_b: string;
  score_a: number | null;
  score_b: number | null;
  winner: number | null;
  event_group: string;
  series: string | null;
  status: MatchStatus;
  url: string;
  scheduled_at: string | null;
  notified: number;
  notified_late: number;
  notified_at: string | null;
  result_announced: number;
  first_seen_at: string;
  last_seen_at: string;
  content_hash: string;
};

export type ListOptions = {
  limit: number;
  groupContains?: string;
};

export type MarkOptions = {
  at: Date;
  late?: boolean;
};

/** Operations available while holding the lock for one event. */
export interface LockedEvent {
  get(): StoredEvent | null;
  markNotified(opts: MarkOptions): boolean;
  markResultAnnounced(): boolean;
}

function toStored(row: EventRow): StoredEvent {
  const score: [number, number] | null =
    row.score_a !== null && row.score_b !== null ? [row.score_a, row.score_b] : null;
  return {
    external_id: row.external_id,
    kind: row.kind,
    participants: [row.team_a, row.team_b],
    flags: [row.flag_a, row.flag_b],
    score,
    winner: row.winner === 0 || row.winner === 1 ? row.winner : null,
    event_group: row.event_group,
    series: row.series,
    status: row.status,
    url: row.url,
    scheduled_at: row.scheduled_at,
    notified: row.notified === 1,
    notified_late: row.notified_late === 1,
    notified_at: row.notified_at,
    result_announced: row.result_announced === 1,
    first_seen_at: row.first_seen_at,
    last_seen_at: row.last_seen_at,
    content_hash: row.content_hash,
  };
}

// Timestamps are always written with toISOString(), so they compare as text.
const iso = (d: Date) => d.toISOString();

/**
 * Deduplicated table of known matches and results, keyed by the source's id.
 *
 * Writes to one event are serialized through a per-id lock (`withLock`);
 * each write is a single statement inside a transaction, so a record is never
 * left half-written. Reads take no lock.
 */
export class EventStore {
  private readonly locks = new KeyedLock();

  constructor(private readonly db: Db) {}

  withLock<T>(externalId: string, fn: (event: LockedEvent) => Promise<T> | T): Promise<T> {
    return this.locks.run(externalId, () =>
      fn({
        get: () => this.get(externalId),
        markNotified: opts => this.markNotifiedUnlocked(externalId, opts),
        markResultAnnounced: () => this.markResultAnnouncedUnlocked(externalId),
      })
    );
  }

  upsert(event: EventRecord, now: Date = new Date()): Promise<UpsertOutcome> {
    return this.locks.run(event.external_id, () => this.upsertUnlocked(event, now));
  }

  markNotified(externalId: string, opts: MarkOptions): Promise<boolean> {
    return this.locks.run(externalId, () => this.markNotifiedUnlocked(externalId, opts));
  }

  markResultAnnounced(externalId: string): Promise<boolean> {
    return this.locks.run(externalId, () => this.markResultAnnouncedUnlocked(externalId));
  }

  get(externalId: string): StoredEvent | null {
    const row = this.db.prepare('SELECT * FROM events WHERE external_id = ?').get(externalId) as EventRow | undefined;
    return row ? toStored(row) : null;
  }

  /** Matches not yet notified that start within [now, now + leadMs]. */
  dueForNotification(now: Date, leadMs: number): StoredEvent[] {
    const rows = this.db.prepare(
      `SELECT * FROM events
       WHERE kind = 'match' AND notified = 0 AND scheduled_at IS NOT NULL
         AND scheduled_at >= ? AND scheduled_at <= ?
       ORDER BY scheduled_at, external_id`
    ).all(iso(now), iso(new Date(now.getTime() + leadMs))) as EventRow[];
    return rows.map(toStored);
  }

  /** Matches never notified whose start passed within the last graceMs. */
  overdueForNotification(now: Date, graceMs: number): StoredEvent[] {
    const rows = this.db.prepare(
      `SELECT * FROM events
       WHERE kind = 'match' AND notified = 0 AND scheduled_at IS NOT NULL
         AND scheduled_at >= ? AND scheduled_at < ?
       ORDER BY scheduled_at, external_id`
    ).all(iso(new Date(now.getTime() - graceMs)), iso(now)) as EventRow[];
    return rows.map(toStored);
  }

  /** Results not yet announced whose match started within the last windowMs. */
  resultsForAnnouncement(now: Date, windowMs: number): StoredEvent[] {
    const rows = this.db.prepare(
      `SELECT * FROM events
       WHERE kind = 'result' AND result_announced = 0 AND scheduled_at IS NOT NULL
         AND scheduled_at >= ? AND scheduled_at <= ?
       ORDER BY scheduled_at, external_id`
    ).all(iso(new Date(now.getTime() - windowMs)), iso(now)) as EventRow[];
    return rows.map(toStored);
  }

  listUpcoming(opts: ListOptions): StoredEvent[] {
    return this.list('match', 'ASC', opts);
  }

  listResults(opts: ListOptions): StoredEvent[] {
    return this.list('result', 'DESC', opts);
  }

  // Only events the latest successful sync reported; anything older has left the source's lists.
  private list(kind: EventKind, order: 'ASC' | 'DESC', { limit, groupContains }: ListOptions): StoredEvent[] {
    const since = this.lastSyncedAt();
    const filter = [
      groupContains ? ' AND instr(lower(event_group), lower(@group)) > 0' : '',
      since ? ' AND last_seen_at >= @since' : '',
    ].join('');
    const rows = this.db.prepare(
      `SELECT * FROM events WHERE kind = @kind${filter}
       ORDER BY scheduled_at IS NULL, scheduled_at ${order}, external_id
       LIMIT @limit`
    ).all({
      kind,
      limit,
      ...(groupContains ? { group: groupContains } : {}),
      ...(since ? { since: iso(since) } : {}),
    }) as EventRow[];
    return rows.map(toStored);
  }

  recordSync(now: Date) {
    this.db.prepare(
      `INSERT INTO sync_state (key, value) VALUES ('last_synced_at', ?)
       ON CONFLICT(key) DO UPDATE SET value = excluded.value`
    ).run(iso(now));
  }

  lastSyncedAt(): Date | null {
    const row = this.db.prepare(`SELECT value FROM sync_state WHERE key = 'last_synced_at'`).get() as { value: string } | undefined;
    return row ? new Date(row.value) : null;
  }

  /** Removes events no poll has reported since `cutoff`, with their delivery log rows. */
  pruneStale(cutoff: Date): number {
    const stale = iso(cutoff);
    return this.db.transaction(() => {
      this.db.prepare(
        'DELETE FROM notifications_log WHERE external_id IN (SELECT external_id FROM events WHERE last_seen_at < ?)'
      ).run(stale);
      return this.db.prepare('DELETE FROM events WHERE last_seen_at < ?').run(stale).changes;
    })();
  }

  deliveryStatus(guildId: string, externalId: string, type: NotificationType): DeliveryStatus | null {
    const row = this.db.prepare(
      'SELECT status FROM notifications_log WHERE guild_id = ? AND external_id = ? AND type = ?'
    ).get(guildId, externalId, type) as { status: DeliveryStatus } | undefined;
    return row?.status ?? null;
  }

  hasDelivery(guildId: string, externalId: string, type: NotificationType): boolean {
    const row = this.db.prepare(
      'SELECT 1 FROM notifications_log WHERE guild_id = ? AND external_id = ? AND type = ?'
    ).get(guildId, externalId, type);
    return row !== undefined;
  }

  recordDelivery(guildId: string, externalId: string, type: NotificationType, status: DeliveryStatus, detail: string | null = null) {
    this.db.prepare(
      `INSERT INTO notifications_log (guild_id, external_id, type, status, detail)
       VALUES (?, ?, ?, ?, ?)
       ON CONFLICT(guild_id, external_id, type) DO UPDATE SET
         status = excluded.status, detail = excluded.detail, posted_at = datetime('now')`
    ).run(guildId, externalId, type, status, detail);
  }

  private upsertUnlocked(e: EventRecord, now: Date): UpsertOutcome {
    const content_hash = hashEvent(e);
    const seen = iso(now);
    const params = {
      external_id: e.external_id,
      kind: e.kind,
      team_a: e.participants[0],
      team_b: e.participants[1],
      flag_a: e.flags[0],
      flag_b: e.flags[1],
      score_a: e.score ? e.score[0] : null,
      score_b: e.score ? e.score[1] : null,
      winner: e.winner,
      event_group: e.event_group,
      series: e.series,
      status: e.status,
      url: e.url,
      scheduled_at: e.scheduled_at,
      seen,
      content_hash,
    };

    return this.db.transaction((): UpsertOutcome => {
      const prev = this.db.prepare('SELECT content_hash FROM events WHERE external_id = ?').get(e.external_id) as
        | { content_hash: string }
        | undefined;

      if (!prev) {
        this.db.prepare(
          `INSERT INTO events (external_id, kind, team_a, team_b, flag_a, flag_b, score_a, score_b, winner,
             event_group, series, status, url, scheduled_at, first_seen_at, last_seen_at, content_hash)
           VALUES (@external_id, @kind, @team_a, @team_b, @flag_a, @flag_b, @score_a, @score_b, @winner,
             @event_group, @series, @status, @url, @scheduled_at, @seen, @seen, @content_hash)`
        ).run(params);
        return { type: 'inserted' };
      }

      // Notification columns are never part of this update.
      this.db.prepare(
        `UPDATE events SET
           kind = @kind, team_a = @team_a, team_b = @team_b, flag_a = @flag_a, flag_b = @flag_b,
           score_a = @score_a, score_b = @score_b, winner = @winner, event_group = @event_group,
           series = @series, status = @status, url = @url, scheduled_at = @scheduled_at,
           last_seen_at = @seen, content_hash = @content_hash
         WHERE external_id = @external_id`
      ).run(params);
      return { type: 'updated', changed: prev.content_hash !== content_hash };
    })();
  }

  private markNotifiedUnlocked(externalId: string, { at, late = false }: MarkOptions): boolean {
    const info = this.db.prepare(
      'UPDATE events SET notified = 1, notified_late = ?, notified_at = ? WHERE external_id = ? AND notified = 0'
    ).run(late ? 1 : 0, iso(at), externalId);
    return info.changes === 1;
  }

  private markResultAnnouncedUnlocked(externalId: string): boolean {
    const info = this.db.prepare(
      'UPDATE events SET result_announced = 1 WHERE external_id = ? AND result_announced = 0'
    ).run(externalId);
    return info.changes === 1;
  }
}
