export type EventKind = 'match' | 'result';

export type MatchStatus = 'Upcoming' | 'LIVE' | 'Completed';

export type TeamPair<T> = [T, T];

// Normalized listing item. Equal inputs must produce deep-equal records.
export type EventRecord = {
  external_id: string;
  kind: EventKind;
  participants: TeamPair<string>;
  flags: TeamPair<string>; // emoji, '' when the source has none
  score: TeamPair<number> | null;
  winner: 0 | 1 | null;
  event_group: string;
  series: string | null;
  status: MatchStatus;
  url: string;
  scheduled_at: string | null; // ISO
};

export type StoredEvent = EventRecord & {
  notified: boolean;
  notified_late: boolean;
  notified_at: string | null; // ISO
  result_announced: boolean;
  first_seen_at: string; // ISO
  last_seen_at: string; // ISO
  content_hash: string;
};

export type UpsertOutcome =
  | { type: 'inserted' }
  | { type: 'updated'; changed: boolean };

export type SubscriptionKind = 'team' | 'event_group';

export type Subscription = {
  guild_id: string;
  kind: SubscriptionKind;
  value: string;
};

export type GuildSettings = {
  guild_id: string;
  channel_id: string | null;
  lead_minutes: number | null;
};

// A guild that can receive notifications right now.
export type GuildTarget = {
  guild_id: string;
  channel_id: string;
  lead_ms: number;
  subscriptions: Subscription[];
};

export type NotificationType = 'match' | 'result';

// 'pending' is written before the send so an interrupted attempt is never repeated.
export type DeliveryStatus = 'pending' | 'sent' | 'failed';

export type DeliveryResult = { ok: true } | { ok: false; reason: string };

export type PollOutcome =
  | { ok: true; events: EventRecord[]; skipped: number }
  | { ok: false; reason: string };

// Enrichment read from a match page, when it can be fetched.
export type Player = {
  name: string;
  flag: string;
  url: string;
};

export type TeamDetail = {
  name: string;
  url: string;
  logo: string | null;
  players: Player[];
};

export type MatchDetail = {
  event: string;
  eventUrl: string | null;
  format: string; // "Bo3"
  date: string;
  teams: TeamPair<TeamDetail>;
};
