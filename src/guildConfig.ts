import type { Db } from './db.js';
import type { GuildSettings, GuildTarget, Subscription, SubscriptionKind } from './types.js';

export const MIN_LEAD_MINUTES = 1;
export const MAX_LEAD_MINUTES = 24 * 60;

const subscriptionKey = (value: string) => value.trim().toLowerCase();

/**
 * Per-guild notification settings: channel, lead time and subscriptions.
 */
export class GuildConfigStore {
  constructor(
    private readonly db: Db,
    private readonly defaultLeadMs: number
  ) {}

  getSettings(guildId: string): GuildSettings | null {
    const row = this.db.prepare('SELECT guild_id, channel_id, lead_minutes FROM guild_settings WHERE guild_id = ?').get(guildId) as
      | GuildSettings
      | undefined;
    return row ?? null;
  }

  getNotificationChannel(guildId: string): string | null {
    return this.getSettings(guildId)?.channel_id ?? null;
  }

  setNotificationChannel(guildId: string, channelId: string | null) {
    this.db.prepare(
      'INSERT INTO guild_settings(guild_id, channel_id) VALUES (?,?) ON CONFLICT(guild_id) DO UPDATE SET channel_id = excluded.channel_id'
    ).run(guildId, channelId);
  }

  getLeadTime(guildId: string): number {
    const minutes = this.getSettings(guildId)?.lead_minutes;
    return minutes == null ? this.defaultLeadMs : minutes * 60_000;
  }

  setLeadTime(guildId: string, minutes: number) {
    if (!Number.isInteger(minutes) || minutes < MIN_LEAD_MINUTES || minutes > MAX_LEAD_MINUTES) {
      throw new RangeError(`Lead time must be a whole number of minutes between ${MIN_LEAD_MINUTES} and ${MAX_LEAD_MINUTES}`);
    }
    this.db.prepare(
      'INSERT INTO guild_settings(guild_id, lead_minutes) VALUES (?,?) ON CONFLICT(guild_id) DO UPDATE SET lead_minutes = excluded.lead_minutes'
    ).run(guildId, minutes);
  }

  getSubscriptions(guildId: string): Subscription[] {
    return this.db.prepare(
      'SELECT guild_id, kind, value FROM guild_subscriptions WHERE guild_id = ? ORDER BY kind, value_key'
    ).all(guildId) as Subscription[];
  }

  /** Returns false when an equal (case-insensitive) subscription already exists. */
  addSubscription(guildId: string, kind: SubscriptionKind, value: string): boolean {
    const trimmed = value.trim();
    if (!trimmed) throw new RangeError('Subscription value must not be empty');
    const info = this.db.prepare(
      'INSERT OR IGNORE INTO guild_subscriptions(guild_id, kind, value, value_key) VALUES (?,?,?,?)'
    ).run(guildId, kind, trimmed, subscriptionKey(trimmed));
    return info.changes === 1;
  }

  removeSubscription(guildId: string, kind: SubscriptionKind, value: string): boolean {
    const info = this.db.prepare(
      'DELETE FROM guild_subscriptions WHERE guild_id = ? AND kind = ? AND value_key = ?'
    ).run(guildId, kind, subscriptionKey(value));
    return info.changes === 1;
  }

  /** Guilds with a notification channel, with their effective lead time and subscriptions. */
  listTargets(): GuildTarget[] {
    const rows = this.db.prepare(
      'SELECT guild_id, channel_id, lead_minutes FROM guild_settings WHERE channel_id IS NOT NULL ORDER BY guild_id'
    ).all() as { guild_id: string; channel_id: string; lead_minutes: number | null }[];
    return rows.map(r => ({
      guild_id: r.guild_id,
      channel_id: r.channel_id,
      lead_ms: r.lead_minutes == null ? this.defaultLeadMs : r.lead_minutes * 60_000,
      subscriptions: this.getSubscriptions(r.guild_id),
    }));
  }
}
