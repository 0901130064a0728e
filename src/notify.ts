import { REST } from '@discordjs/rest';
import { Routes, type APIEmbed, type RESTPostAPIChannelMessageJSONBody } from 'discord-api-types/v10';
import { describeError } from './errors.js';
import { formatEta } from './eta.js';
import type { DeliveryResult, EventRecord, MatchDetail, TeamDetail } from './types.js';

export const EMBED_COLOR = 0xff4654;

export type NotificationMessage = {
  embeds: APIEmbed[];
};

/** Delivery of one message to one channel. Failures are values, not exceptions. */
export interface Notifier {
  send(channelId: string, message: NotificationMessage): Promise<DeliveryResult>;
}

const teamLabel = (e: EventRecord, i: 0 | 1) => [e.flags[i], e.participants[i]].filter(Boolean).join(' ');

function rosterField(team: TeamDetail) {
  const players = team.players.map(p => [p.flag, `[${p.name}](${p.url})`].filter(Boolean).join(' '));
  return {
    name: team.name,
    value: [`\u{1F465} [Team](${team.url})`, ...players].join('\n'),
    inline: true,
  };
}

/**
 * Reminder for one match. With a match page `detail` the embed carries the
 * rosters and both team logos (the second logo in an extra embed sharing the
 * url, which Discord shows as one gallery); without it, the listing data only.
 */
export function buildMatchMessage(e: EventRecord, reason: string, now: Date, detail: MatchDetail | null = null): NotificationMessage {
  const startMs = e.scheduled_at ? new Date(e.scheduled_at).getTime() : now.getTime();
  const started = startMs < now.getTime();
  const minutes = Math.round(Math.abs(startMs - now.getTime()) / 60_000);
  const title = started
    ? `\u{1F514} Match started ${formatEta(minutes)} ago`
    : `\u{1F514} Upcoming Match in ${formatEta(minutes)}`;
  const when = e.scheduled_at ? `<t:${Math.floor(startMs / 1000)}:F>` : 'TBD';

  if (!detail) {
    return {
      embeds: [{
        title,
        description: `*Subscribed: ${reason}*`,
        color: EMBED_COLOR,
        url: e.url,
        fields: [
          { name: e.event_group, value: `${e.series ?? 'Match'} | ${when}`, inline: false },
          { name: teamLabel(e, 0), value: e.status === 'LIVE' ? '\u{1F534} LIVE' : '\u200b', inline: true },
          { name: teamLabel(e, 1), value: '\u200b', inline: true },
        ],
      }],
    };
  }

  const [first, second] = detail.teams;
  const embeds: APIEmbed[] = [{
    title,
    description: `*Subscribed: ${reason}*`,
    color: EMBED_COLOR,
    url: e.url,
    fields: [
      { name: detail.event || e.event_group, value: `${detail.format || e.series || 'Match'} | ${detail.date || when}`, inline: false },
      rosterField(first),
      rosterField(second),
    ],
    ...(first.logo ? { image: { url: first.logo } } : {}),
  }];
  if (second.logo) {
    embeds.push({ url: e.url, image: { url: second.logo } });
  }
  return { embeds };
}

// Score is spoilered; the trophy sits on the winner's side.
export function formatScoreLine(e: EventRecord): string {
  const trophy = '\u{1F3C6}';
  const [a, b] = e.score ?? [0, 0];
  return `${e.winner === 0 ? trophy : ''} ${a} : ${b} ${e.winner === 1 ? trophy : ''}`.trim();
}

export function buildResultMessage(e: EventRecord, reason: string): NotificationMessage {
  return {
    embeds: [{
      title: '\u2705 Match Complete',
      description: `*Subscribed: ${reason}*`,
      color: EMBED_COLOR,
      url: e.url,
      fields: [
        { name: `${teamLabel(e, 0)} vs. ${teamLabel(e, 1)}`, value: `||${formatScoreLine(e)}||`, inline: false },
        { name: 'Event', value: `*${e.event_group}*`, inline: false },
      ],
    }],
  };
}

/** The slice of the REST client used for delivery. */
export type MessagePoster = Pick<REST, 'post'>;

export class DiscordNotifier implements Notifier {
  private readonly rest: MessagePoster | null;

  constructor(token: string, timeoutMs: number, rest?: MessagePoster) {
    if (rest) {
      this.rest = rest;
    } else if (token) {
      this.rest = new REST({ version: '10', timeout: timeoutMs }).setToken(token);
    } else {
      console.warn('[Notify] DISCORD_TOKEN not set; deliveries will fail');
      this.rest = null;
    }
  }

  async send(channelId: string, message: NotificationMessage): Promise<DeliveryResult> {
    if (!this.rest) return { ok: false, reason: 'no-token' };
    const body: RESTPostAPIChannelMessageJSONBody = {
      embeds: message.embeds,
      allowed_mentions: { parse: [] },
    };
    try {
      await this.rest.post(Routes.channelMessages(channelId), { body });
      return { ok: true };
    } catch (err) {
      console.error('[Notify] Failed to send message', { channelId, err });
      return { ok: false, reason: describeError(err) };
    }
  }
}
