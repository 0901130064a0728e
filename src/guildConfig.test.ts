import { beforeEach, describe, expect, it } from 'vitest';
import { openDatabase } from './db.js';
import { GuildConfigStore } from './guildConfig.js';

const DEFAULT_LEAD = 15 * 60_000;

describe('GuildConfigStore', () => {
  let guilds: GuildConfigStore;

  beforeEach(() => {
    guilds = new GuildConfigStore(openDatabase(':memory:'), DEFAULT_LEAD);
  });

  it('sets and clears the notification channel', () => {
    expect(guilds.getNotificationChannel('g1')).toBeNull();
    guilds.setNotificationChannel('g1', 'c1');
    expect(guilds.getNotificationChannel('g1')).toBe('c1');
    guilds.setNotificationChannel('g1', null);
    expect(guilds.getNotificationChannel('g1')).toBeNull();
  });

  it('falls back to the default lead time', () => {
    expect(guilds.getLeadTime('g1')).toBe(DEFAULT_LEAD);
    guilds.setLeadTime('g1', 30);
    expect(guilds.getLeadTime('g1')).toBe(30 * 60_000);
  });

  it('keeps the channel when the lead time changes', () => {
    guilds.setNotificationChannel('g1', 'c1');
    guilds.setLeadTime('g1', 5);
    expect(guilds.getSettings('g1')).toEqual({ guild_id: 'g1', channel_id: 'c1', lead_minutes: 5 });
  });

  it('rejects lead times outside 1..1440 minutes', () => {
    expect(() => guilds.setLeadTime('g1', 0)).toThrow(RangeError);
    expect(() => guilds.setLeadTime('g1', 1441)).toThrow(RangeError);
    expect(() => guilds.setLeadTime('g1', 2.5)).toThrow(RangeError);
  });

  it('treats subscriptions case-insensitively', () => {
    expect(guilds.addSubscription('g1', 'team', 'Sentinels')).toBe(true);
    expect(guilds.addSubscription('g1', 'team', ' sentinels ')).toBe(false);
    expect(guilds.addSubscription('g1', 'event_group', 'Sentinels')).toBe(true);

    expect(guilds.getSubscriptions('g1')).toEqual([
      { guild_id: 'g1', kind: 'event_group', value: 'Sentinels' },
      { guild_id: 'g1', kind: 'team', value: 'Sentinels' },
    ]);

    expect(guilds.removeSubscription('g1', 'team', 'SENTINELS')).toBe(true);
    expect(guilds.removeSubscription('g1', 'team', 'SENTINELS')).toBe(false);
    expect(guilds.getSubscriptions('g1')).toEqual([{ guild_id: 'g1', kind: 'event_group', value: 'Sentinels' }]);
  });

  it('rejects empty subscription values', () => {
    expect(() => guilds.addSubscription('g1', 'team', '   ')).toThrow(RangeError);
  });

  it('lists only guilds with a channel as targets', () => {
    guilds.setNotificationChannel('g1', 'c1');
    guilds.setLeadTime('g1', 60);
    guilds.addSubscription('g1', 'team', 'NRG');
    guilds.setLeadTime('g2', 10);
    guilds.addSubscription('g2', 'team', 'NRG');

    expect(guilds.listTargets()).toEqual([
      {
        guild_id: 'g1',
        channel_id: 'c1',
        lead_ms: 60 * 60_000,
        subscriptions: [{ guild_id: 'g1', kind: 'team', value: 'NRG' }],
      },
    ]);
  });
});
