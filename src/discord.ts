import type { APIEmbed, RESTPostAPIWebhookWithTokenJSONBody } from 'discord-api-types/v10';
import {
  type DisplayOptions,
  type Markup,
  chunkLines,
  dayColor,
  dayLines,
  formatCounts,
  formatDateRange,
  formatTimezoneLine,
  truncate,
} from './format.js';
import type { Digest } from './types.js';

export type DiscordMessage = RESTPostAPIWebhookWithTokenJSONBody;

export type DiscordOptions = DisplayOptions & {
  mentionRoleId: string | null;
  hideMentionInstructions: boolean;
};

// https://discord.com/developers/docs/resources/message#embed-object-embed-limits
export const DISCORD_LIMITS = {
  content: 2000,
  embedTitle: 256,
  embedDescription: 4096,
  embedsPerMessage: 10,
  embedTotal: 6000,
} as const;

export const MENTION_INSTRUCTIONS = "If you'd like to be notified when new content is available, join this role!";

export const discordMarkup: Markup = {
  bold: (text) => `**${text}**`,
  italic: (text) => `*${text}*`,
  strike: (text) => `~~${text}~~`,
  escape: (text) => text.replace(/([\\*_~`|>])/g, '\\$1'),
};

function headerContent(digest: Digest, options: DiscordOptions, now: Date): string {
  const lines = [`# ${discordMarkup.escape(options.header)}`];
  if (options.showDateRange) lines.push(`### ${formatDateRange(digest.window, digest.timezone)}`);
  lines.push('', formatCounts(digest.counts, discordMarkup));
  if (options.showTimezone) lines.push('', discordMarkup.italic(formatTimezoneLine(digest.timezone, now)));

  // Mention goes last so a truncated header never cuts it off.
  let tail = '';
  if (options.mentionRoleId) {
    tail = `\n\n<@&${options.mentionRoleId}>`;
    if (!options.hideMentionInstructions) tail += `\n${discordMarkup.italic(MENTION_INSTRUCTIONS)}`;
  }
  return truncate(lines.join('\n'), DISCORD_LIMITS.content - tail.length) + tail;
}

export function dayEmbeds(digest: Digest, options: DisplayOptions): APIEmbed[] {
  const embeds: APIEmbed[] = [];
  for (const day of digest.days) {
    const color = dayColor(day.weekday, options.startWeekOnMonday);
    const chunks = chunkLines(dayLines(day.tv, day.movie, discordMarkup, options), DISCORD_LIMITS.embedDescription);
    chunks.forEach((description, i) => {
      const title = i === 0 ? day.name : `${day.name} (cont.)`;
      embeds.push({ title: truncate(title, DISCORD_LIMITS.embedTitle), description, color });
    });
  }
  return embeds;
}

function embedSize(embed: APIEmbed): number {
  return (embed.title?.length ?? 0) + (embed.description?.length ?? 0);
}

// Greedy packing under the per-message embed count and character total.
export function packEmbeds(embeds: readonly APIEmbed[]): APIEmbed[][] {
  const batches: APIEmbed[][] = [];
  let batch: APIEmbed[] = [];
  let size = 0;
  for (const embed of embeds) {
    const n = embedSize(embed);
    if (batch.length > 0 && (batch.length >= DISCORD_LIMITS.embedsPerMessage || size + n > DISCORD_LIMITS.embedTotal)) {
      batches.push(batch);
      batch = [];
      size = 0;
    }
    batch.push(embed);
    size += n;
  }
  if (batch.length > 0) batches.push(batch);
  return batches;
}

/**
 * Renders a digest as Discord webhook messages: the header, then the days as
 * embeds, then the custom footer if there is one.
 */
export function formatDiscord(digest: Digest, options: DiscordOptions, now: Date): DiscordMessage[] {
  const allowed = options.mentionRoleId ? { roles: [options.mentionRoleId] } : { parse: [] };
  const messages: DiscordMessage[] = [{ content: headerContent(digest, options, now), allowed_mentions: allowed }];

  for (const embeds of packEmbeds(dayEmbeds(digest, options))) {
    messages.push({ embeds, allowed_mentions: { parse: [] } });
  }

  if (options.footer) {
    messages.push({ content: truncate(options.footer, DISCORD_LIMITS.content), allowed_mentions: { parse: [] } });
  }
  return messages;
}
