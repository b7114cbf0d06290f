import type { Logger } from "pino";
import { bigintReplacer } from "../../../sdk/core/src";
import { deleteWebhook, getActiveWebhooks, insertWebhook, listWebhooks, type Db } from "../db/schema";

export interface WebhookRequest {
  method: "POST";
  headers: Record<string, string>;
  body: string;
}

/** The slice of `fetch` the dispatcher needs; swapped out in tests. */
export type WebhookFetch = (url: string, init: WebhookRequest) => Promise<{ ok: boolean; status: number }>;

export interface Webhook {
  id: number;
  url: string;
  events: string[];
  active: boolean;
}

export class WebhookService {
  constructor(
    private readonly db: Db,
    private readonly logger: Logger,
    private readonly fetchImpl: WebhookFetch = (url, init) => fetch(url, init)
  ) {}

  /** Deliver to every active webhook subscribed to `eventType` or "*". Failures are logged, never thrown. */
  async dispatch(eventType: string, payload: object): Promise<void> {
    const body = JSON.stringify({ event: eventType, data: payload, timestamp: Date.now() }, bigintReplacer);

    for (const webhook of getActiveWebhooks(this.db)) {
      const subscribedEvents = splitEvents(webhook.events);
      if (!subscribedEvents.includes("*") && !subscribedEvents.includes(eventType)) continue;

      try {
        const response = await this.fetchImpl(webhook.url, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            ...(webhook.secret ? { "X-Webhook-Secret": webhook.secret } : {}),
          },
          body,
        });

        if (!response.ok) {
          this.logger.error({ webhook: webhook.id, status: response.status }, "Webhook delivery failed");
        } else {
          this.logger.info({ webhook: webhook.id, event: eventType }, "Webhook delivered");
        }
      } catch (err) {
        this.logger.error({ webhook: webhook.id, err }, "Webhook delivery error");
      }
    }
  }

  register(url: string, events: string[], secret?: string): number {
    return insertWebhook(this.db, url, events, secret);
  }

  list(): Webhook[] {
    return listWebhooks(this.db).map((row) => ({
      id: row.id,
      url: row.url,
      events: splitEvents(row.events),
      active: row.active === 1,
    }));
  }

  remove(id: number): boolean {
    return deleteWebhook(this.db, id);
  }
}

function splitEvents(events: string): string[] {
  return events.split(",").map((e) => e.trim());
}
