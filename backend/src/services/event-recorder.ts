import type { Logger } from "pino";
import type { SaleDesk, SaleEvent } from "../../../sdk/core/src";
import { insertEvent, insertPurchase, type Db } from "../db/schema";
import type { WebhookService } from "./webhook";

/**
 * Persists every committed desk notification and fans it out to webhooks.
 */
export class EventRecorder {
  private unsubscribe: (() => void) | null = null;
  private readonly inflight = new Set<Promise<void>>();

  constructor(
    private readonly desk: SaleDesk,
    private readonly db: Db,
    private readonly logger: Logger,
    private readonly webhookService?: WebhookService
  ) {}

  start(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.desk.onEvent((event) => this.record(event));
    this.logger.info({ desk: this.desk.address }, "Recording desk events");
  }

  stop(): void {
    if (this.unsubscribe !== null) {
      this.unsubscribe();
      this.unsubscribe = null;
      this.logger.info("Event recorder stopped");
    }
  }

  /** Resolves once every webhook dispatch started so far has settled. */
  async flush(): Promise<void> {
    await Promise.all([...this.inflight]);
  }

  private record(event: SaleEvent): void {
    const timestamp = this.desk.runtime.now();
    const { type, ...fields } = event;
    const saleIndex = "index" in event ? event.index : null;

    insertEvent(this.db, type, saleIndex, fields, timestamp);

    if (event.type === "TokensBought") {
      insertPurchase(this.db, {
        saleIndex: event.index,
        buyer: event.buyer,
        amountBought: event.amountBought,
        priceInUsd: event.priceInUsd,
        usdCost: event.usdCost,
        nativeSent: event.nativeSent,
        referralCode: event.referralCode,
        timestamp,
      });
    }

    this.logger.debug({ event: type, sale: saleIndex }, "Event captured");

    if (this.webhookService) {
      const delivery: Promise<void> = this.webhookService
        .dispatch(type, fields)
        .catch((err: unknown) => this.logger.error({ err }, "Webhook dispatch error"))
        .finally(() => this.inflight.delete(delivery));
      this.inflight.add(delivery);
    }
  }
}
