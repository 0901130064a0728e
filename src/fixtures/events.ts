import type { EventRecord, MatchDetail } from '../types.js';

export const NOW = new Date('2026-10-18T12:00:00.000Z');

// ISO instant `minutes` from NOW.
export const inMinutes = (minutes: number, from: Date = NOW) =>
  new Date(from.getTime() + minutes * 60_000).toISOString();

export function makeEvent(overrides: Partial<EventRecord> = {}): EventRecord {
  return {
    external_id: '1001',
    kind: 'match',
    participants: ['Sentinels', 'NRG'],
    flags: ['🇺🇸', '🇺🇸'],
    score: null,
    winner: null,
    event_group: 'VCT Stage 2',
    series: 'Week 3',
    status: 'Upcoming',
    url: 'https://www.vlr.gg/1001/sentinels-vs-nrg',
    scheduled_at: inMinutes(10),
    ...overrides,
  };
}

// Same data src/fixtures/match.html parses to.
export function makeDetail(overrides: Partial<MatchDetail> = {}): MatchDetail {
  return {
    event: 'Champions Tour 2026: Americas Stage 2 Regular Season: Week 3',
    eventUrl: 'https://www.vlr.gg/event/9001/champions-tour-2026-americas-stage-2/regular-season',
    format: 'Bo3',
    date: 'Saturday, October 18th 3:00 PM UTC',
    teams: [
      {
        name: 'Sentinels',
        url: 'https://www.vlr.gg/team/2/sentinels',
        logo: 'https://owcdn.net/img/sentinels.png',
        players: [
          { name: 'TenZ', flag: '🇨🇦', url: 'https://www.vlr.gg/player/9/tenz' },
          { name: 'zekken', flag: '🇺🇸', url: 'https://www.vlr.gg/player/10/zekken' },
        ],
      },
      {
        name: 'NRG',
        url: 'https://www.vlr.gg/team/1034/nrg',
        logo: 'https://www.vlr.gg/img/vlr/tmp/vlr.png',
        players: [{ name: 's0m', flag: '', url: 'https://www.vlr.gg/player/20/s0m' }],
      },
    ],
    ...overrides,
  };
}
