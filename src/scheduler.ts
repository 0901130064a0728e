/**
 * Notification scheduler: turns due matches and fresh results into one
 * delivery per subscribed guild.
 *
 * Per event: Pending -> Notified (terminal), with a `late` flag when the
 * notification goes out after the scheduled start. The transition happens
 * under the event's store lock, after every recipient has been attempted.
 * Each attempt is logged as pending before the send, so a restart in the
 * middle of an event never repeats a guild.
 */

import type { EventStore, LockedEvent } from './eventStore.js';
import type { GuildConfigStore } from './guildConfig.js';
import { buildMatchMessage, buildResultMessage, type NotificationMessage, type Notifier } from './notify.js';
import { describeError } from './errors.js';
import type { MatchDetailSource } from './source.js';
import type { EventRecord, GuildTarget, MatchDetail, NotificationType, StoredEvent } from './types.js';

export type Recipient = {
  target: GuildTarget;
  reason: string;
};

export type SchedulerOptions = {
  lateGraceMs: number;
  resultWindowMs: number;
  // Match page lookup for richer reminders; without it reminders use listing data only.
  details?: MatchDetailSource;
  detailTimeoutMs?: number;
};

export type TickSummary = {
  notified: number;
  late: number;
  delivered: number;
  failed: number;
  results: number;
};

const same = (a: string, b: string) => a.trim().toLowerCase() === b.trim().toLowerCase();

/**
 * Guilds subscribed to the event: event-group matches first, then team
 * matches on either participant. One entry per guild.
 */
export function resolveRecipients(event: EventRecord, targets: GuildTarget[]): Recipient[] {
  const byGuild = new Map<string, Recipient>();

  for (const target of targets) {
    const group = target.subscriptions.find(s => s.kind === 'event_group' && same(s.value, event.event_group));
    if (group) byGuild.set(target.guild_id, { target, reason: `Event: ${group.value}` });
  }
  for (const target of targets) {
    if (byGuild.has(target.guild_id)) continue;
    const team = target.subscriptions.find(
      s => s.kind === 'team' && event.participants.some(p => same(s.value, p))
    );
    if (team) byGuild.set(target.guild_id, { target, reason: `Team: ${team.value}` });
  }

  return [...byGuild.values()];
}

export class NotificationScheduler {
  constructor(
    private readonly store: EventStore,
    private readonly guilds: GuildConfigStore,
    private readonly notifier: Notifier,
    private readonly opts: SchedulerOptions
  ) {}

  async tick(now: Date = new Date()): Promise<TickSummary> {
    const summary: TickSummary = { notified: 0, late: 0, delivered: 0, failed: 0, results: 0 };
    const targets = this.guilds.listTargets();

    const maxLead = targets.reduce((max, t) => Math.max(max, t.lead_ms), 0);
    const due = [
      ...this.store.overdueForNotification(now, this.opts.lateGraceMs),
      ...this.store.dueForNotification(now, maxLead),
    ];

    for (const event of due) {
      try {
        await this.store.withLock(event.external_id, locked => this.notifyMatch(locked, targets, now, summary));
      } catch (err) {
        console.error(`[Scheduler] Error processing match ${event.external_id}:`, err);
      }
    }

    for (const event of this.store.resultsForAnnouncement(now, this.opts.resultWindowMs)) {
      try {
        await this.store.withLock(event.external_id, locked => this.announceResult(locked, targets, summary));
      } catch (err) {
        console.error(`[Scheduler] Error processing result ${event.external_id}:`, err);
      }
    }

    if (due.length > 0 || summary.results > 0) {
      console.log(
        `[Scheduler] Tick complete: notified=${summary.notified} (late=${summary.late}), results=${summary.results}, delivered=${summary.delivered}, failed=${summary.failed}`
      );
    }
    return summary;
  }

  private async notifyMatch(locked: LockedEvent, targets: GuildTarget[], now: Date, summary: TickSummary) {
    // Re-read under the lock: another tick or a poll may have changed it.
    const event = locked.get();
    if (!event || event.kind !== 'match' || event.notified || !event.scheduled_at) return;

    const untilStart = new Date(event.scheduled_at).getTime() - now.getTime();
    const late = untilStart < 0;
    const recipients = resolveRecipients(event, targets);
    // A guild with a shorter lead time is not due yet; the event stays pending for it.
    const ready = recipients.filter(r => late || untilStart <= r.target.lead_ms);

    const outstanding = ready.filter(r => !this.store.hasDelivery(r.target.guild_id, event.external_id, 'match'));
    const detail = outstanding.length > 0 ? await this.loadDetail(event) : null;

    await this.deliverAll(event, 'match', ready, r => buildMatchMessage(event, r.reason, now, detail), summary);

    if (ready.length === recipients.length && locked.markNotified({ at: now, late })) {
      summary.notified++;
      if (late) summary.late++;
    }
  }

  private async loadDetail(event: StoredEvent): Promise<MatchDetail | null> {
    if (!this.opts.details) return null;
    try {
      return await this.opts.details.fetchMatchDetail(event.url, AbortSignal.timeout(this.opts.detailTimeoutMs ?? 10_000));
    } catch (err) {
      console.warn(`[Scheduler] Match page for ${event.external_id} unavailable, sending listing data only: ${describeError(err)}`);
      return null;
    }
  }

  private async announceResult(locked: LockedEvent, targets: GuildTarget[], summary: TickSummary) {
    const event = locked.get();
    if (!event || event.kind !== 'result' || event.result_announced) return;

    const recipients = resolveRecipients(event, targets);
    await this.deliverAll(event, 'result', recipients, r => buildResultMessage(event, r.reason), summary);

    if (locked.markResultAnnounced()) summary.results++;
  }

  private async deliverAll(
    event: StoredEvent,
    type: NotificationType,
    recipients: Recipient[],
    build: (r: Recipient) => NotificationMessage,
    summary: TickSummary
  ) {
    for (const r of recipients) {
      const guildId = r.target.guild_id;
      if (this.store.hasDelivery(guildId, event.external_id, type)) continue;

      this.store.recordDelivery(guildId, event.external_id, type, 'pending');
      const result = await this.notifier.send(r.target.channel_id, build(r));
      if (result.ok) {
        this.store.recordDelivery(guildId, event.external_id, type, 'sent');
        summary.delivered++;
      } else {
        // Not retried: at most one attempt per guild and event.
        this.store.recordDelivery(guildId, event.external_id, type, 'failed', result.reason);
        summary.failed++;
        console.error(`[Scheduler] Delivery of ${type} ${event.external_id} to guild ${guildId} failed: ${result.reason}`);
      }
    }
  }
}
