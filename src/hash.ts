import crypto from 'node:crypto';
import type { EventRecord } from './types.js';

// Covers every field a poll may change. Notification state is not part of it.
export function hashEvent(e: EventRecord): string {
  const canonical = JSON.stringify({
    kind: e.kind,
    participants: e.participants,
    flags: e.flags,
    score: e.score,
    winner: e.winner,
    event_group: e.event_group,
    series: e.series,
    status: e.status,
    url: e.url,
    scheduled_at: e.scheduled_at,
  });
  return crypto.createHash('sha256').update(canonical).digest('hex');
}
