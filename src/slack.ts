import type { IncomingWebhookSendArguments } from '@slack/webhook';
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

export type SlackMessage = IncomingWebhookSendArguments;
type SlackAttachment = NonNullable<SlackMessage['attachments']>[number];

export const SLACK_LIMITS = {
  headerText: 150,
  sectionText: 3000,
  attachmentText: 3000,
  attachmentsPerMessage: 20,
} as const;

// Slack only needs &, < and > escaped in mrkdwn text.
export const slackMarkup: Markup = {
  bold: (text) => `*${text}*`,
  italic: (text) => `_${text}_`,
  strike: (text) => `~${text}~`,
  escape: (text) => text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;'),
};

function hexColor(color: number): string {
  return `#${color.toString(16).padStart(6, '0')}`;
}

function headerMessage(digest: Digest, options: DisplayOptions, now: Date): SlackMessage {
  const title = truncate(options.header, SLACK_LIMITS.headerText);
  const lines: string[] = [];
  if (options.showDateRange) lines.push(slackMarkup.bold(formatDateRange(digest.window, digest.timezone)));
  lines.push(formatCounts(digest.counts, slackMarkup));
  if (options.showTimezone) lines.push(slackMarkup.italic(formatTimezoneLine(digest.timezone, now)));

  return {
    text: title,
    blocks: [
      { type: 'header', text: { type: 'plain_text', text: title, emoji: true } },
      { type: 'section', text: { type: 'mrkdwn', text: truncate(lines.join('\n\n'), SLACK_LIMITS.sectionText) } },
    ],
  };
}

export function dayAttachments(digest: Digest, options: DisplayOptions): SlackAttachment[] {
  const attachments: SlackAttachment[] = [];
  for (const day of digest.days) {
    const color = hexColor(dayColor(day.weekday, options.startWeekOnMonday));
    const chunks = chunkLines(dayLines(day.tv, day.movie, slackMarkup, options), SLACK_LIMITS.attachmentText);
    chunks.forEach((text, i) => {
      attachments.push({
        color,
        title: i === 0 ? day.name : `${day.name} (cont.)`,
        text,
        fallback: `${day.name}: ${day.tv.length + day.movie.length} item(s)`,
        mrkdwn_in: ['text'],
      });
    });
  }
  return attachments;
}

/**
 * Renders a digest as Slack incoming-webhook messages: the header blocks,
 * then the days as coloured attachments, then the custom footer if any.
 */
export function formatSlack(digest: Digest, options: DisplayOptions, now: Date): SlackMessage[] {
  const messages: SlackMessage[] = [headerMessage(digest, options, now)];

  const attachments = dayAttachments(digest, options);
  for (let i = 0; i < attachments.length; i += SLACK_LIMITS.attachmentsPerMessage) {
    messages.push({ attachments: attachments.slice(i, i + SLACK_LIMITS.attachmentsPerMessage) });
  }

  if (options.footer) {
    const text = truncate(options.footer, SLACK_LIMITS.sectionText);
    messages.push({ text, blocks: [{ type: 'section', text: { type: 'mrkdwn', text } }] });
  }
  return messages;
}
