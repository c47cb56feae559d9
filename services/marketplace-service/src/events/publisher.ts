import { buildServiceAuthHeaders, type MarketplaceEvent } from "@itemex/shared";
import type { EngineLogger } from "../engine/logger.js";

export interface EventPublisher {
  publish(events: MarketplaceEvent[]): Promise<void>;
}

export const silentPublisher: EventPublisher = {
  async publish() {
    return;
  },
};

/**
 * Forwards committed events to a webhook. Delivery is best-effort: the event
 * log in the store stays authoritative, so failures are logged and dropped.
 */
export class WebhookEventPublisher implements EventPublisher {
  constructor(
    private readonly webhookUrl: string,
    private readonly log: EngineLogger,
    private readonly serviceAuthToken?: string,
  ) {}

  async publish(events: MarketplaceEvent[]): Promise<void> {
    if (events.length === 0) return;
    try {
      const response = await fetch(this.webhookUrl, {
        method: "POST",
        headers: {
          ...buildServiceAuthHeaders(this.serviceAuthToken),
          "content-type": "application/json",
        },
        body: JSON.stringify({ events }),
        signal: AbortSignal.timeout(3000),
      });
      if (!response.ok) {
        this.log.warn({ status: response.status, events: events.length }, "event webhook rejected delivery");
      }
    } catch (error) {
      this.log.warn({ err: error, events: events.length }, "event webhook unreachable");
    }
  }
}
