import type { APIEmbed } from 'discord-api-types/v10';
import { formatEta } from './eta.js';
import type { EventStore } from './eventStore.js';
import type { GuildConfigStore } from './guildConfig.js';
import type { SyncSummary } from './ingest.js';
import { EMBED_COLOR, formatScoreLine } from './notify.js';
import type { StoredEvent, SubscriptionKind } from './types.js';

export const MAX_LIST = 20;

export type ListFilter = 'all' | 'vct' | 'gc';

const FILTERS: Record<ListFilter, { label: string; groupContains?: string }> = {
  all: { label: 'Valorant' },
  vct: { label: 'VCT', groupContains: 'Champions Tour' },
  gc: { label: 'Game Changers', groupContains: 'Game Changers' },
};

export type CommandDeps = {
  store: EventStore;
  guilds: GuildConfigStore;
  sync: () => Promise<SyncSummary>;
  now?: () => Date;
};

const kindLabel = (kind: SubscriptionKind) => (kind === 'team' ? 'team' : 'event');

export function setChannel({ guilds }: CommandDeps, guildId: string, channelId: string | null): string {
  guilds.setNotificationChannel(guildId, channelId);
  return channelId ? `VLR channel has been set to <#${channelId}>` : 'VLR channel has been cleared';
}

export function setLeadTime({ guilds }: CommandDeps, guildId: string, minutes: number): string {
  try {
    guilds.setLeadTime(guildId, minutes);
  } catch (err) {
    if (err instanceof RangeError) return err.message;
    throw err;
  }
  return `Match notifications will be sent ${minutes} mins before.`;
}

export function subscribe({ guilds }: CommandDeps, guildId: string, kind: SubscriptionKind, value: string): string {
  const name = value.trim();
  if (!name) return 'Give a team or event name to subscribe to.';
  if (!guilds.addSubscription(guildId, kind, name)) {
    return `Already subscribed to ${kindLabel(kind)} "${name}".`;
  }
  return `Subscribed to ${kindLabel(kind)} "${name}".`;
}

export function unsubscribe({ guilds }: CommandDeps, guildId: string, kind: SubscriptionKind, value: string): string {
  const name = value.trim();
  if (!guilds.removeSubscription(guildId, kind, name)) {
    return `Not subscribed to ${kindLabel(kind)} "${name}".`;
  }
  return `Unsubscribed from ${kindLabel(kind)} "${name}".`;
}

export function listSubscriptions({ guilds }: CommandDeps, guildId: string): string {
  const subs = guilds.getSubscriptions(guildId);
  const events = subs.filter(s => s.kind === 'event_group').map(s => s.value);
  const teams = subs.filter(s => s.kind === 'team').map(s => s.value);
  const channel = guilds.getNotificationChannel(guildId);
  const lead = Math.round(guilds.getLeadTime(guildId) / 60_000);
  return [
    `Channel: ${channel ? `<#${channel}>` : 'not set'}`,
    `Lead time: ${lead} mins`,
    `Events: ${events.length ? events.join(', ') : 'none'}`,
    `Teams: ${teams.length ? teams.join(', ') : 'none'}`,
  ].join('\n');
}

export async function manualUpdate({ sync }: CommandDeps): Promise<string> {
  const result = await sync();
  if (!result.ok) return `Update from VLR failed: ${result.reason ?? 'unknown error'}`;
  return `Updated matches from VLR (${result.inserted} new, ${result.updated} changed).`;
}

function retrievedLine(store: EventStore, now: Date): string {
  const last = store.lastSyncedAt();
  if (!last) return 'Not retrieved yet.';
  const delta = Math.max(0, Math.floor((now.getTime() - last.getTime()) / 1000));
  return `Retrieved ${Math.floor(delta / 60)} min ${delta % 60} sec ago.`;
}

const teamText = (e: StoredEvent, i: 0 | 1) => [e.flags[i], e.participants[i]].filter(Boolean).join(' ');
const matchup = (e: StoredEvent) => `${teamText(e, 0)} vs. ${teamText(e, 1)}`;

function minutesBetween(from: Date, iso: string | null): number {
  if (!iso) return 0;
  return Math.round((new Date(iso).getTime() - from.getTime()) / 60_000);
}

async function loadList(deps: CommandDeps, list: (store: EventStore) => StoredEvent[]): Promise<StoredEvent[]> {
  const rows = list(deps.store);
  if (rows.length === 0 && deps.store.lastSyncedAt() === null) {
    console.log('[Cmd] Event store unpopulated, pulling from source');
    await deps.sync();
    return list(deps.store);
  }
  return rows;
}

export type ListRequest = { count?: number; filter?: ListFilter };

const clampCount = (n: number | undefined) => Math.min(Math.max(n ?? 5, 1), MAX_LIST);

export async function matchList(deps: CommandDeps, req: ListRequest = {}): Promise<APIEmbed> {
  const f = FILTERS[req.filter ?? 'all'];
  const limit = clampCount(req.count);
  const rows = await loadList(deps, s => s.listUpcoming({ limit, groupContains: f.groupContains }));
  const now = deps.now?.() ?? new Date();

  return {
    title: `Upcoming ${f.label} Matches`,
    description: retrievedLine(deps.store, now),
    color: EMBED_COLOR,
    fields: rows.map(e => ({
      name: e.status === 'LIVE' ? '\u{1F534} LIVE' : `${e.status} ${formatEta(minutesBetween(now, e.scheduled_at))}`,
      value: `[${matchup(e)}](${e.url})\n*${e.event_group}*`,
      inline: false,
    })),
  };
}

export async function resultList(deps: CommandDeps, req: ListRequest = {}): Promise<APIEmbed> {
  const f = FILTERS[req.filter ?? 'all'];
  const limit = clampCount(req.count);
  const rows = await loadList(deps, s => s.listResults({ limit, groupContains: f.groupContains }));
  const now = deps.now?.() ?? new Date();

  return {
    title: `Completed ${f.label} Matches`,
    description: retrievedLine(deps.store, now),
    color: EMBED_COLOR,
    fields: rows.map(e => ({
      name: `Completed ${formatEta(-minutesBetween(now, e.scheduled_at))} ago`,
      value: `[${matchup(e)}](${e.url})\n||${formatScoreLine(e)}||\n*${e.event_group}*`,
      inline: false,
    })),
  };
}
