import { REST } from '@discordjs/rest';
import { IncomingWebhook } from '@slack/webhook';
import { Routes } from 'discord-api-types/v10';
import type { DiscordMessage } from './discord.js';
import { DeliveryError, errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import type { SlackMessage } from './slack.js';
import type { Destination } from './types.js';

export interface WebhookTarget<M> {
  readonly destination: Destination;
  post(message: M): Promise<void>;
}

export type Delivery = {
  destination: Destination;
  sent: number;
  total: number;
  error: DeliveryError | null;
};

const DISCORD_WEBHOOK = /^https:\/\/(?:(?:canary|ptb)\.)?discord(?:app)?\.com\/api(?:\/v\d+)?\/webhooks\/(\d+)\/([\w-]+)\/?$/;

export function parseDiscordWebhookUrl(url: string): { id: string; token: string } | null {
  const m = DISCORD_WEBHOOK.exec(url.trim());
  return m ? { id: m[1], token: m[2] } : null;
}

// HTTP status from a @discordjs/rest error (status) or an axios error
// wrapped by @slack/webhook (original.response.status).
export function statusOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  if ('status' in err && typeof err.status === 'number') return err.status;
  if ('original' in err) return statusOf(err.original);
  if ('response' in err) return statusOf(err.response);
  return undefined;
}

function toDeliveryError(destination: Destination, err: unknown): DeliveryError {
  if (err instanceof DeliveryError) return err;
  return new DeliveryError(destination, errorMessage(err), { status: statusOf(err), cause: err });
}

export class DiscordTarget implements WebhookTarget<DiscordMessage> {
  readonly destination = 'discord' as const;
  private readonly route: ReturnType<typeof Routes.webhook>;

  constructor(
    webhookUrl: string,
    private readonly rest: Pick<REST, 'post'>,
  ) {
    const parsed = parseDiscordWebhookUrl(webhookUrl);
    if (!parsed) throw new DeliveryError('discord', 'webhook URL is not a Discord webhook');
    this.route = Routes.webhook(parsed.id, parsed.token);
  }

  // One attempt per message: no retries on 5xx.
  static create(webhookUrl: string, timeoutMs: number): DiscordTarget {
    return new DiscordTarget(webhookUrl, new REST({ version: '10', timeout: timeoutMs, retries: 0 }));
  }

  async post(message: DiscordMessage): Promise<void> {
    try {
      await this.rest.post(this.route, { body: message, auth: false });
    } catch (err) {
      throw toDeliveryError(this.destination, err);
    }
  }
}

export class SlackTarget implements WebhookTarget<SlackMessage> {
  readonly destination = 'slack' as const;

  constructor(private readonly webhook: Pick<IncomingWebhook, 'send'>) {}

  static create(webhookUrl: string, timeoutMs: number): SlackTarget {
    return new SlackTarget(new IncomingWebhook(webhookUrl, { timeout: timeoutMs }));
  }

  async post(message: SlackMessage): Promise<void> {
    try {
      await this.webhook.send(message);
    } catch (err) {
      throw toDeliveryError(this.destination, err);
    }
  }
}

/**
 * Posts messages in order. The first failure stops this target (later
 * messages would arrive out of context) and is returned, not thrown.
 */
export async function deliver<M>(target: WebhookTarget<M>, messages: readonly M[], log?: Logger): Promise<Delivery> {
  const { destination } = target;
  const total = messages.length;
  let sent = 0;
  for (const message of messages) {
    try {
      await target.post(message);
      sent++;
    } catch (err) {
      const error = toDeliveryError(destination, err);
      log?.error({ destination, sent, total, status: error.status, err: error }, 'Webhook delivery failed');
      return { destination, sent, total, error };
    }
  }
  log?.info({ destination, sent, total }, 'Digest delivered');
  return { destination, sent, total, error: null };
}
