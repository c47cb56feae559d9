import { randomUUID } from "node:crypto";
import type {
  AdminConfig,
  Listing,
  MarketplaceEvent,
  MarketplaceEventType,
  Order,
} from "@itemex/shared";
import { SequenceAllocator, type SequenceName, type SequenceSource } from "./sequence-allocator.js";

export type PendingEvent = Omit<MarketplaceEvent, "sequence">;

export interface EventInput {
  listingId?: number;
  orderId?: number;
  actor?: string;
  details?: Record<string, unknown>;
}

/** Committed state a request reads through. */
export interface StateReader extends SequenceSource {
  getListing(listingId: number): Listing | null;
  getOrder(orderId: number): Order | null;
  getAdminConfig(): AdminConfig | null;
}

export interface ChangeSet {
  listingsPut: Listing[];
  listingsDeleted: number[];
  ordersPut: Order[];
  events: PendingEvent[];
  sequences: Partial<Record<SequenceName, number>>;
  adminConfig: AdminConfig | null;
}

function eventIdNow(): string {
  return `EVT-${new Date().toISOString()}-${randomUUID().split("-")[0]}`;
}

/**
 * Per-request overlay on the store. Reads see the request's own writes;
 * nothing reaches the store until the change set is committed.
 */
export class UnitOfWork {
  // null marks a deletion
  private readonly listings = new Map<number, Listing | null>();
  private readonly orders = new Map<number, Order>();
  private readonly events: PendingEvent[] = [];
  private readonly sequences: SequenceAllocator;
  private adminConfig: AdminConfig | null = null;

  constructor(private readonly base: StateReader) {
    this.sequences = new SequenceAllocator(base);
  }

  getListing(listingId: number): Listing | null {
    const staged = this.listings.get(listingId);
    if (staged !== undefined) return staged;
    return this.base.getListing(listingId);
  }

  putListing(listing: Listing): void {
    this.listings.set(listing.listingId, listing);
  }

  deleteListing(listingId: number): void {
    this.listings.set(listingId, null);
  }

  getOrder(orderId: number): Order | null {
    return this.orders.get(orderId) ?? this.base.getOrder(orderId);
  }

  putOrder(order: Order): void {
    this.orders.set(order.orderId, order);
  }

  getAdminConfig(): AdminConfig | null {
    return this.adminConfig ?? this.base.getAdminConfig();
  }

  putAdminConfig(config: AdminConfig): void {
    this.adminConfig = config;
  }

  nextId(name: SequenceName): number {
    return this.sequences.next(name);
  }

  emit(type: MarketplaceEventType, input: EventInput = {}): PendingEvent {
    const event: PendingEvent = {
      eventId: eventIdNow(),
      type,
      occurredAt: new Date().toISOString(),
      listingId: input.listingId,
      orderId: input.orderId,
      actor: input.actor,
      details: input.details ?? {},
    };
    this.events.push(event);
    return event;
  }

  stagedEvents(): readonly PendingEvent[] {
    return this.events;
  }

  changes(): ChangeSet {
    const listingsPut: Listing[] = [];
    const listingsDeleted: number[] = [];
    for (const [listingId, listing] of this.listings) {
      if (listing) listingsPut.push(listing);
      else listingsDeleted.push(listingId);
    }
    return {
      listingsPut,
      listingsDeleted,
      ordersPut: [...this.orders.values()],
      events: [...this.events],
      sequences: this.sequences.stagedValues(),
      adminConfig: this.adminConfig,
    };
  }
}
