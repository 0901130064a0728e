import { openDatabase, type Db } from './db.js';
import type { Config } from './env.js';
import { EventStore } from './eventStore.js';
import { GuildConfigStore } from './guildConfig.js';
import { SourcePoller, syncOnce, type SyncSummary } from './ingest.js';
import { DiscordNotifier, type Notifier } from './notify.js';
import { NotificationScheduler } from './scheduler.js';
import { VlrSource, type MatchDetailSource, type MatchSource } from './source.js';

export type App = {
  db: Db;
  store: EventStore;
  guilds: GuildConfigStore;
  poller: SourcePoller;
  scheduler: NotificationScheduler;
  sync: () => Promise<SyncSummary>;
};

export type AppOverrides = {
  db?: Db;
  source?: MatchSource;
  details?: MatchDetailSource;
  notifier?: Notifier;
};

// Wires the owned instances together; both entry points and tests build through here.
export function createApp(config: Config, overrides: AppOverrides = {}): App {
  const db = overrides.db ?? openDatabase(config.dbPath);
  const store = new EventStore(db);
  const guilds = new GuildConfigStore(db, config.defaultLeadMs);
  const vlr = new VlrSource(config.sourceBaseUrl, config.fetchTimeoutMs);
  const source = overrides.source ?? vlr;
  const details = overrides.details ?? vlr;
  const poller = new SourcePoller(source, config.sourceBaseUrl, config.fetchTimeoutMs, config.sourceTimeZone);
  const notifier = overrides.notifier ?? new DiscordNotifier(config.discordToken, config.deliveryTimeoutMs);
  const scheduler = new NotificationScheduler(store, guilds, notifier, {
    lateGraceMs: config.lateGraceMs,
    resultWindowMs: config.resultWindowMs,
    details,
    detailTimeoutMs: config.fetchTimeoutMs,
  });

  return {
    db,
    store,
    guilds,
    poller,
    scheduler,
    sync: () => syncOnce(poller, store, { retentionMs: config.retentionMs }),
  };
}
