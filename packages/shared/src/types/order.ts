import type { Address, Amount } from "./listing.js";

export type OrderStatus = "PENDING" | "FULFILLED" | "CANCELLED";

export type OrderCancelReason =
  | "ITEM_NO_LONGER_EXISTS"
  | "OWNERSHIP_CHANGED"
  | "LISTING_REMOVED";

export interface Order {
  orderId: number;
  listingId: number;
  itemId: string;
  price: Amount;
  platformFee: Amount;
  sellerAmount: Amount;
  buyer: Address;
  seller: Address;
  itemRegistryAddress: Address;
  createdAt: string;
  updatedAt: string;
  status: OrderStatus;
  cancelReason?: OrderCancelReason;
}

export type SettlementOutcome =
  | { outcome: "FULFILLED"; orderId: number }
  | { outcome: "CANCELLED"; orderId: number; reason: OrderCancelReason }
  | { outcome: "ALREADY_SETTLED"; orderId: number; status: Exclude<OrderStatus, "PENDING"> };
