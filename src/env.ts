import fs from 'node:fs';
import dotenv from 'dotenv';
import { z } from 'zod';

// Load base .env if present
if (fs.existsSync('.env')) {
  dotenv.config({ path: '.env' });
}
// Then override with .env.local if present
if (fs.existsSync('.env.local')) {
  dotenv.config({ path: '.env.local', override: true });
}

function isTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

const minutes = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  DISCORD_TOKEN: z.string().default(''),
  APP_ID: z.string().default(''),
  GUILD_IDS: z.string().default(''),
  GUILD_ID: z.string().default(''),
  DB_PATH: z.string().min(1).default('/botdata/bot.db'),
  SOURCE_BASE_URL: z.string().url().default('https://www.vlr.gg'),
  SOURCE_TZ: z.string().min(1).default('UTC').refine(isTimeZone, { message: 'Unknown IANA time zone' }),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  DELIVERY_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  POLL_CRON: z.string().min(1).default('*/5 * * * *'),
  TICK_CRON: z.string().min(1).default('* * * * *'),
  TZ: z.string().min(1).default('UTC'),
  DEFAULT_LEAD_MINUTES: minutes(15),
  LATE_GRACE_MINUTES: minutes(30),
  RESULT_WINDOW_MINUTES: minutes(360),
  EVENT_RETENTION_DAYS: z.coerce.number().int().positive().default(14),
  RUN_ONCE: z.string().optional(),
});

export type Config = {
  discordToken: string;
  appId: string;
  guildIds: string[];
  dbPath: string;
  sourceBaseUrl: string;
  sourceTimeZone: string;
  fetchTimeoutMs: number;
  deliveryTimeoutMs: number;
  pollCron: string;
  tickCron: string;
  timezone: string;
  defaultLeadMs: number;
  lateGraceMs: number;
  resultWindowMs: number;
  retentionMs: number;
  runOnce: boolean;
};

const MINUTE_MS = 60_000;

export function loadConfig(input: NodeJS.ProcessEnv): Config {
  // Blank values in .env files mean "use the default".
  const cleaned = Object.fromEntries(
    Object.entries(input).filter(([, v]) => v !== undefined && v.trim() !== '')
  );
  const env = EnvSchema.parse(cleaned);

  return Object.freeze({
    discordToken: env.DISCORD_TOKEN,
    appId: env.APP_ID,
    guildIds: (env.GUILD_IDS || env.GUILD_ID)
      .split(',')
      .map(s => s.trim())
      .filter(Boolean),
    dbPath: env.DB_PATH,
    sourceBaseUrl: env.SOURCE_BASE_URL.replace(/\/+$/, ''),
    sourceTimeZone: env.SOURCE_TZ,
    fetchTimeoutMs: env.FETCH_TIMEOUT_MS,
    deliveryTimeoutMs: env.DELIVERY_TIMEOUT_MS,
    pollCron: env.POLL_CRON,
    tickCron: env.TICK_CRON,
    timezone: env.TZ,
    defaultLeadMs: env.DEFAULT_LEAD_MINUTES * MINUTE_MS,
    lateGraceMs: env.LATE_GRACE_MINUTES * MINUTE_MS,
    resultWindowMs: env.RESULT_WINDOW_MINUTES * MINUTE_MS,
    retentionMs: env.EVENT_RETENTION_DAYS * 24 * 60 * MINUTE_MS,
    runOnce: env.RUN_ONCE === '1',
  });
}
