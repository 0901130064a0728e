import axios, { type AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import { flagEmoji } from './eta.js';
import type { EventKind, EventRecord, MatchDetail, MatchStatus, Player, TeamDetail, TeamPair } from './types.js';

export type Listings = {
  matches: string;
  results: string;
};

/** Where listing pages come from. Tests substitute an in-memory source. */
export interface MatchSource {
  fetchListings(signal: AbortSignal): Promise<Listings>;
}

/** Per-match page lookup used to enrich reminders. */
export interface MatchDetailSource {
  fetchMatchDetail(url: string, signal: AbortSignal): Promise<MatchDetail>;
}

export class ListingFormatError extends Error {
  constructor(kind: EventKind) {
    super(`No ${kind} listing found in page`);
    this.name = 'ListingFormatError';
  }
}

export class MatchDetailFormatError extends Error {
  constructor(url: string) {
    super(`No match header found at ${url}`);
    this.name = 'MatchDetailFormatError';
  }
}

export type ParsedListing = {
  events: EventRecord[];
  skipped: number;
};

const MONTHS = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

type DayLabel = { year: number; month: number; day: number };

// "Sat, October 18, 2026" (optionally followed by a "Today" tag)
export function parseDayLabel(text: string): DayLabel | null {
  const m = /([A-Za-z]+)\s+(\d{1,2}),\s*(\d{4})/.exec(text);
  if (!m) return null;
  const month = MONTHS.indexOf(m[1].toLowerCase());
  if (month === -1) return null;
  return { year: Number(m[3]), month, day: Number(m[2]) };
}

// Milliseconds `timeZone` is ahead of UTC at instant `ms`.
function zoneOffset(ms: number, timeZone: string): number {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    year: 'numeric',
    month: 'numeric',
    day: 'numeric',
    hour: 'numeric',
    minute: 'numeric',
    second: 'numeric',
  }).formatToParts(new Date(ms));
  const part = (type: Intl.DateTimeFormatPartTypes) => Number(parts.find(p => p.type === type)?.value ?? 0);
  const wall = Date.UTC(part('year'), part('month') - 1, part('day'), part('hour'), part('minute'), part('second'));
  return wall - Math.floor(ms / 1000) * 1000;
}

// Listing times are wall-clock times in `timeZone`; "TBD" and anything unparsable -> null.
export function toInstant(day: DayLabel | null, timeText: string, timeZone = 'UTC'): string | null {
  if (!day) return null;
  const m = /^(\d{1,2}):(\d{2})\s*([AP]M)$/i.exec(timeText.trim());
  if (!m) return null;
  let hours = Number(m[1]) % 12;
  if (m[3].toUpperCase() === 'PM') hours += 12;
  const wall = Date.UTC(day.year, day.month, day.day, hours, Number(m[2]));
  // Second pass settles wall times next to a DST change.
  let ms = wall - zoneOffset(wall, timeZone);
  ms = wall - zoneOffset(ms, timeZone);
  return new Date(ms).toISOString();
}

const collapse = (s: string) => s.replace(/\s+/g, ' ').trim();

/**
 * Normalizes one listing page (`/matches` or `/matches/results`) into event
 * records. Items that cannot be normalized are skipped and counted.
 */
export function parseMatchListing(html: string, kind: EventKind, baseUrl: string, timeZone = 'UTC'): ParsedListing {
  const $ = cheerio.load(html);
  if ($('.wf-card').length === 0) {
    throw new ListingFormatError(kind);
  }

  const events: EventRecord[] = [];
  const seen = new Set<string>();
  let skipped = 0;
  let day: DayLabel | null = null;

  $('.wf-label.mod-large, a.match-item').each((_, el) => {
    const node = $(el);
    if (node.hasClass('wf-label')) {
      day = parseDayLabel(collapse(node.clone().children().remove().end().text()));
      return;
    }

    const href = node.attr('href') ?? '';
    const id = /^\/(\d+)(?:\/|$)/.exec(href)?.[1];

    const teams = node.find('.match-item-vs-team').toArray().map(t => {
      const team = $(t);
      const scoreText = team.find('.match-item-vs-team-score').text().trim();
      return {
        name: collapse(team.find('.match-item-vs-team-name').text()),
        flag: flagEmoji(team.find('.flag').attr('class')),
        score: /^\d+$/.test(scoreText) ? Number(scoreText) : null,
        winner: team.hasClass('mod-winner'),
      };
    });

    const eventNode = node.find('.match-item-event').first();
    const series = collapse(eventNode.find('.match-item-event-series').text());
    const group = collapse(eventNode.clone().children('.match-item-event-series').remove().end().text());
    const scheduled = toInstant(day, node.find('.match-item-time').text(), timeZone);

    if (!id || teams.length !== 2 || !teams[0].name || !teams[1].name || !group) {
      console.warn(`[Poller] Skipping unreadable ${kind} item`, { href });
      skipped++;
      return;
    }
    if (kind === 'match' && !scheduled) {
      console.warn(`[Poller] Skipping match ${id} without a start time`);
      skipped++;
      return;
    }
    if (seen.has(id)) return;
    seen.add(id);

    const [a, b] = teams;
    const score: TeamPair<number> | null = a.score !== null && b.score !== null ? [a.score, b.score] : null;
    let status: MatchStatus = 'Completed';
    if (kind === 'match') {
      status = node.find('.ml-status').text().trim().toUpperCase() === 'LIVE' ? 'LIVE' : 'Upcoming';
    }

    events.push({
      external_id: id,
      kind,
      participants: [a.name, b.name],
      flags: [a.flag, b.flag],
      score,
      winner: kind === 'result' ? (a.winner ? 0 : b.winner ? 1 : null) : null,
      event_group: group,
      series: series || null,
      status,
      url: `${baseUrl}${href}`,
      scheduled_at: scheduled,
    });
  });

  return { events, skipped };
}

const absolute = (baseUrl: string, href: string) => {
  if (href.startsWith('//')) return `https:${href}`;
  if (href.startsWith('/')) return `${baseUrl}${href}`;
  return href;
};

/**
 * Reads a match page: team links and logos, event line, format, date line
 * and the two rosters from the all-maps stats table.
 */
export function parseMatchDetail(html: string, url: string, baseUrl: string): MatchDetail {
  const $ = cheerio.load(html);
  const header = $('.match-header');
  if (header.length === 0) {
    throw new MatchDetailFormatError(url);
  }

  const team = (n: 1 | 2, players: Player[]): TeamDetail => {
    const link = header.find(`a.match-header-link.mod-${n}`).first();
    const logo = link.find('img').attr('src');
    return {
      name: collapse(header.find(`.match-header-link-name.mod-${n}`).text()),
      url: absolute(baseUrl, link.attr('href') ?? ''),
      logo: logo ? absolute(baseUrl, logo) : null,
      players,
    };
  };

  const rosters = $('.vm-stats-game[data-game-id="all"] tbody').toArray().map(tbody =>
    $(tbody).find('tr').toArray().flatMap(row => {
      const link = $(row).find('a').first();
      const name = collapse(link.find('.text-of').first().text() || link.text()).split(' ')[0];
      if (!name) return [];
      return [{
        name,
        flag: flagEmoji($(row).find('i.flag').attr('class')),
        url: absolute(baseUrl, link.attr('href') ?? ''),
      }];
    })
  );

  const event = header.find('.match-header-event').first();
  const notes = header.find('.match-header-vs-note').toArray().map(n => collapse($(n).text()));
  const eventHref = event.attr('href');

  return {
    event: collapse(event.text()),
    eventUrl: eventHref ? absolute(baseUrl, eventHref) : null,
    format: notes.find(n => /^bo\d+$/i.test(n)) ?? notes[0] ?? '',
    date: collapse(header.find('.match-header-date').text()),
    teams: [team(1, rosters[0] ?? []), team(2, rosters[1] ?? [])],
  };
}

export class VlrSource implements MatchSource, MatchDetailSource {
  private client: AxiosInstance;

  constructor(private readonly baseUrl: string, timeoutMs: number) {
    this.client = axios.create({
      baseURL: baseUrl,
      timeout: timeoutMs,
      responseType: 'text',
      headers: { Accept: 'text/html' },
    });
  }

  async fetchListings(signal: AbortSignal): Promise<Listings> {
    const [matches, results] = await Promise.all([
      this.client.get<string>('/matches', { signal }),
      this.client.get<string>('/matches/results', { signal }),
    ]);
    return { matches: matches.data, results: results.data };
  }

  async fetchMatchDetail(url: string, signal: AbortSignal): Promise<MatchDetail> {
    const page = await this.client.get<string>(url, { signal });
    return parseMatchDetail(page.data, url, this.baseUrl);
  }
}
