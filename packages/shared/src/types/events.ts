export type MarketplaceEventType =
  | "LISTING_CREATED"
  | "ORDER_PLACED"
  | "ITEM_SOLD"
  | "ITEM_NO_LONGER_AVAILABLE"
  | "ITEM_NO_LONGER_EXISTS"
  | "ORDER_CANCELLED"
  | "FEE_PERCENT_CHANGED"
  | "MINIMUM_FEE_CHANGED"
  | "ADMIN_CHANGED";

export interface MarketplaceEvent {
  eventId: string;
  sequence: number;     // commit order, assigned by the store
  type: MarketplaceEventType;
  occurredAt: string;
  listingId?: number;
  orderId?: number;
  actor?: string;
  details: Record<string, unknown>;
}

export interface EventFilter {
  listingId?: number;
  orderId?: number;
  type?: MarketplaceEventType;
}
