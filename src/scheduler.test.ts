import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { openDatabase } from './db.js';
import { EventStore } from './eventStore.js';
import { NOW, inMinutes, makeDetail, makeEvent } from './fixtures/events.js';
import { GuildConfigStore } from './guildConfig.js';
import type { NotificationMessage, Notifier } from './notify.js';
import { NotificationScheduler, resolveRecipients } from './scheduler.js';
import type { MatchDetailSource } from './source.js';
import type { DeliveryResult, GuildTarget, SubscriptionKind } from './types.js';

const MIN = 60_000;

class FakeNotifier implements Notifier {
  sent: { channelId: string; message: NotificationMessage }[] = [];
  failing = new Set<string>();

  async send(channelId: string, message: NotificationMessage): Promise<DeliveryResult> {
    this.sent.push({ channelId, message });
    return this.failing.has(channelId) ? { ok: false, reason: 'Missing Access' } : { ok: true };
  }
}

const target = (guild_id: string, subs: [SubscriptionKind, string][]): GuildTarget => ({
  guild_id,
  channel_id: `c-${guild_id}`,
  lead_ms: 15 * MIN,
  subscriptions: subs.map(([kind, value]) => ({ guild_id, kind, value })),
});

describe('resolveRecipients', () => {
  it('prefers an event subscription over a team subscription for the same guild', () => {
    const recipients = resolveRecipients(makeEvent(), [
      target('g1', [['team', 'Sentinels'], ['event_group', 'vct stage 2']]),
      target('g2', [['team', 'nrg']]),
      target('g3', [['team', 'Sentinels Academy']]),
    ]);

    expect(recipients.map(r => [r.target.guild_id, r.reason])).toEqual([
      ['g1', 'Event: vct stage 2'],
      ['g2', 'Team: nrg'],
    ]);
  });

  it('lists a guild once when both teams match', () => {
    const recipients = resolveRecipients(makeEvent(), [target('g1', [['team', 'NRG'], ['team', 'Sentinels']])]);
    expect(recipients).toHaveLength(1);
  });
});

describe('NotificationScheduler', () => {
  let store: EventStore;
  let guilds: GuildConfigStore;
  let notifier: FakeNotifier;
  let scheduler: NotificationScheduler;

  beforeEach(() => {
    const db = openDatabase(':memory:');
    store = new EventStore(db);
    guilds = new GuildConfigStore(db, 15 * MIN);
    notifier = new FakeNotifier();
    scheduler = new NotificationScheduler(store, guilds, notifier, {
      lateGraceMs: 30 * MIN,
      resultWindowMs: 360 * MIN,
    });
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const subscribe = (guildId: string, team: string, leadMinutes = 15) => {
    guilds.setNotificationChannel(guildId, `c-${guildId}`);
    guilds.setLeadTime(guildId, leadMinutes);
    guilds.addSubscription(guildId, 'team', team);
  };

  it('notifies a subscribed guild once when the match enters its lead window', async () => {
    subscribe('g1', 'Sentinels');
    await store.upsert(makeEvent({ scheduled_at: inMinutes(10) }), NOW);

    const first = await scheduler.tick(NOW);
    expect(first).toEqual({ notified: 1, late: 0, delivered: 1, failed: 0, results: 0 });
    expect(notifier.sent.map(s => s.channelId)).toEqual(['c-g1']);
    expect(notifier.sent[0].message.embeds[0].description).toBe('*Subscribed: Team: Sentinels*');
    expect(store.get('1001')?.notified).toBe(true);

    await scheduler.tick(new Date(NOW.getTime() + MIN));
    expect(notifier.sent).toHaveLength(1);
  });

  it('waits until the match is inside the lead window', async () => {
    subscribe('g1', 'Sentinels');
    await store.upsert(makeEvent({ scheduled_at: inMinutes(40) }), NOW);

    await scheduler.tick(NOW);
    expect(notifier.sent).toEqual([]);
    expect(store.get('1001')?.notified).toBe(false);
  });

  it('marks the event once even when one guild fails and another succeeds', async () => {
    subscribe('g1', 'Sentinels');
    subscribe('g2', 'NRG');
    notifier.failing.add('c-g1');
    await store.upsert(makeEvent(), NOW);

    const summary = await scheduler.tick(NOW);

    expect(summary).toEqual({ notified: 1, late: 0, delivered: 1, failed: 1, results: 0 });
    expect(notifier.sent.map(s => s.channelId).sort()).toEqual(['c-g1', 'c-g2']);
    expect(store.deliveryStatus('g1', '1001', 'match')).toBe('failed');
    expect(store.deliveryStatus('g2', '1001', 'match')).toBe('sent');

    await scheduler.tick(NOW);
    expect(notifier.sent).toHaveLength(2);
  });

  it('sends a late notification for a match that started within the grace window', async () => {
    subscribe('g1', 'Sentinels');
    await store.upsert(makeEvent({ scheduled_at: inMinutes(-5) }), NOW);

    const summary = await scheduler.tick(NOW);

    expect(summary.late).toBe(1);
    expect(notifier.sent[0].message.embeds[0].title).toBe('🔔 Match started 5m ago');
    expect(store.get('1001')?.notified_late).toBe(true);
  });

  it('never notifies a match that started before the grace window', async () => {
    subscribe('g1', 'Sentinels');
    await store.upsert(makeEvent({ scheduled_at: inMinutes(-45) }), NOW);

    await scheduler.tick(NOW);
    expect(notifier.sent).toEqual([]);
    expect(store.get('1001')?.notified).toBe(false);
  });

  it('honours each guild lead time and marks the event after the last one', async () => {
    subscribe('g1', 'Sentinels', 60);
    subscribe('g2', 'NRG', 5);
    await store.upsert(makeEvent({ scheduled_at: inMinutes(30) }), NOW);

    await scheduler.tick(NOW);
    expect(notifier.sent.map(s => s.channelId)).toEqual(['c-g1']);
    expect(store.get('1001')?.notified).toBe(false);

    await scheduler.tick(new Date(NOW.getTime() + 26 * MIN));
    expect(notifier.sent.map(s => s.channelId)).toEqual(['c-g1', 'c-g2']);
    expect(store.get('1001')?.notified).toBe(true);
  });

  it('does not resend to a guild whose attempt was logged before a restart', async () => {
    subscribe('g1', 'Sentinels');
    subscribe('g2', 'NRG');
    await store.upsert(makeEvent(), NOW);
    store.recordDelivery('g1', '1001', 'match', 'pending');

    await scheduler.tick(NOW);

    expect(notifier.sent.map(s => s.channelId)).toEqual(['c-g2']);
    expect(store.get('1001')?.notified).toBe(true);
  });

  it('marks a due match that no guild follows', async () => {
    subscribe('g1', 'FNATIC');
    await store.upsert(makeEvent(), NOW);

    expect((await scheduler.tick(NOW)).notified).toBe(1);
    expect(notifier.sent).toEqual([]);
  });

  it('ignores guilds without a notification channel', async () => {
    guilds.addSubscription('g1', 'team', 'Sentinels');
    await store.upsert(makeEvent(), NOW);

    await scheduler.tick(NOW);
    expect(notifier.sent).toEqual([]);
  });

  it('delivers once when two ticks overlap', async () => {
    subscribe('g1', 'Sentinels');
    await store.upsert(makeEvent(), NOW);

    await Promise.all([scheduler.tick(NOW), scheduler.tick(NOW)]);
    expect(notifier.sent).toHaveLength(1);
  });

  it('keeps going when one event throws', async () => {
    subscribe('g1', 'Sentinels');
    await store.upsert(makeEvent({ external_id: 'a', scheduled_at: inMinutes(5) }), NOW);
    await store.upsert(makeEvent({ external_id: 'b', scheduled_at: inMinutes(6) }), NOW);
    const send = vi.spyOn(notifier, 'send');
    send.mockRejectedValueOnce(new Error('socket hang up'));

    const summary = await scheduler.tick(NOW);

    expect(summary.notified).toBe(1);
    expect(store.get('a')?.notified).toBe(false);
    expect(store.deliveryStatus('g1', 'a', 'match')).toBe('pending');
    expect(store.get('b')?.notified).toBe(true);
  });

  it('announces a completed match once', async () => {
    subscribe('g1', 'NRG');
    await store.upsert(
      makeEvent({ kind: 'result', status: 'Completed', score: [1, 2], winner: 1, scheduled_at: inMinutes(-90) }),
      NOW
    );

    const summary = await scheduler.tick(NOW);
    await scheduler.tick(NOW);

    expect(summary.results).toBe(1);
    expect(notifier.sent).toHaveLength(1);
    expect(notifier.sent[0].message.embeds[0].fields?.[0].value).toBe('||1 : 2 🏆||');
    expect(store.get('1001')?.result_announced).toBe(true);
  });

  describe('with match pages', () => {
    const withDetails = (fetchMatchDetail: MatchDetailSource['fetchMatchDetail']) =>
      new NotificationScheduler(store, guilds, notifier, {
        lateGraceMs: 30 * MIN,
        resultWindowMs: 360 * MIN,
        details: { fetchMatchDetail },
        detailTimeoutMs: 1000,
      });

    it('fetches the match page once and sends the enriched reminder', async () => {
      subscribe('g1', 'Sentinels');
      subscribe('g2', 'NRG');
      await store.upsert(makeEvent(), NOW);
      const fetchMatchDetail = vi.fn<MatchDetailSource['fetchMatchDetail']>(async () => makeDetail());

      await withDetails(fetchMatchDetail).tick(NOW);

      expect(fetchMatchDetail).toHaveBeenCalledTimes(1);
      expect(fetchMatchDetail.mock.calls[0][0]).toBe('https://www.vlr.gg/1001/sentinels-vs-nrg');
      expect(notifier.sent.map(s => s.message.embeds.length)).toEqual([2, 2]);
      expect(notifier.sent[0].message.embeds[0].fields?.[0].value).toBe('Bo3 | Saturday, October 18th 3:00 PM UTC');
    });

    it('falls back to listing data when the match page fails', async () => {
      subscribe('g1', 'Sentinels');
      await store.upsert(makeEvent(), NOW);

      const summary = await withDetails(() => Promise.reject(new Error('HTTP 404'))).tick(NOW);

      expect(summary.delivered).toBe(1);
      expect(notifier.sent[0].message.embeds).toHaveLength(1);
      expect(notifier.sent[0].message.embeds[0].fields?.[1].value).toBe('\u200b');
      expect(store.get('1001')?.notified).toBe(true);
    });

    it('does not fetch the match page when no guild is due', async () => {
      subscribe('g1', 'FNATIC');
      await store.upsert(makeEvent(), NOW);
      const fetchMatchDetail = vi.fn<MatchDetailSource['fetchMatchDetail']>(async () => makeDetail());

      await withDetails(fetchMatchDetail).tick(NOW);

      expect(fetchMatchDetail).not.toHaveBeenCalled();
    });
  });
});
