import { describe, expect, it } from 'vitest';
import { buildDigest } from '../src/digest.js';
import { SLACK_LIMITS, formatSlack } from '../src/slack.js';
import type { DateWindow } from '../src/types.js';
import { at, display, item } from './helpers.js';

const week: DateWindow = { from: at('2024-03-11T00:00:00Z'), to: at('2024-03-18T00:00:00Z') };
const now = at('2024-03-11T09:00:00Z');

describe('formatSlack', () => {
  const digest = buildDigest(
    [
      item('The Show - S01E02 - Pilot', '2024-03-12T20:00:00Z'),
      item('Film', '2024-03-12T00:00:00Z', { type: 'movie', allDay: true, end: '2024-03-13T00:00:00Z' }),
    ],
    week,
    'UTC',
  );

  it('sends header blocks, then the days as attachments', () => {
    expect(formatSlack(digest, display, now)).toEqual([
      {
        text: 'TV Guide',
        blocks: [
          { type: 'header', text: { type: 'plain_text', text: 'TV Guide', emoji: true } },
          {
            type: 'section',
            text: { type: 'mrkdwn', text: '*March 11 - March 17, 2024*\n\n📺 *1 episode*  ·  🎬 *1 movie*' },
          },
        ],
      },
      {
        attachments: [
          {
            color: '#2ecc71',
            title: 'Tuesday, Mar 12',
            text: '8:00 PM: *The Show* - S01E02 - _Pilot_\n\n*MOVIES*\n*Film*',
            fallback: 'Tuesday, Mar 12: 2 item(s)',
            mrkdwn_in: ['text'],
          },
        ],
      },
    ]);
  });

  it('adds the timezone line in italics', () => {
    const [header] = formatSlack(digest, { ...display, showTimezone: true }, now);
    expect(header.blocks?.[1]).toEqual({
      type: 'section',
      text: {
        type: 'mrkdwn',
        text: '*March 11 - March 17, 2024*\n\n📺 *1 episode*  ·  🎬 *1 movie*\n\n_Times are shown in UTC_',
      },
    });
  });

  it('appends the custom footer as a section', () => {
    const messages = formatSlack(digest, { ...display, footer: 'Brought to you by test' }, now);
    expect(messages[messages.length - 1]).toEqual({
      text: 'Brought to you by test',
      blocks: [{ type: 'section', text: { type: 'mrkdwn', text: 'Brought to you by test' } }],
    });
  });

  it('sends only the header for an empty digest', () => {
    const messages = formatSlack(buildDigest([], week, 'UTC'), display, now);
    expect(messages).toHaveLength(1);
    expect(messages[0].blocks?.[1]).toEqual({
      type: 'section',
      text: { type: 'mrkdwn', text: '*March 11 - March 17, 2024*\n\nNothing scheduled for this period.' },
    });
  });
});

describe('Slack day attachments', () => {
  it('continues a long day in further attachments', () => {
    const items = Array.from({ length: 200 }, (_, i) =>
      item(`Show ${i} - S01E02 - A reasonably long episode title`, '2024-03-12T20:00:00Z'),
    );
    const [, days] = formatSlack(buildDigest(items, week, 'UTC'), display, now);
    const attachments = days.attachments ?? [];
    expect(attachments.length).toBeGreaterThan(1);
    expect(attachments[0].title).toBe('Tuesday, Mar 12');
    expect(attachments[1].title).toBe('Tuesday, Mar 12 (cont.)');
    for (const attachment of attachments) {
      expect(attachment.text?.length ?? 0).toBeLessThanOrEqual(SLACK_LIMITS.attachmentText);
    }
  });

  it('sends at most 20 attachments per message', () => {
    const month: DateWindow = { from: at('2024-03-01T00:00:00Z'), to: at('2024-03-26T00:00:00Z') };
    const items = Array.from({ length: 25 }, (_, i) =>
      item(`Show ${i} - S01E01`, new Date(Date.UTC(2024, 2, 1 + i, 20)).toISOString()),
    );
    const messages = formatSlack(buildDigest(items, month, 'UTC'), display, now);
    expect(messages.map((m) => m.attachments?.length ?? 0)).toEqual([0, 20, 5]);
    expect(messages[2].attachments?.[0].title).toBe('Thursday, Mar 21');
  });
});
