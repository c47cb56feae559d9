export type MarketplaceErrorCode =
  | "INVALID_REGISTRY"
  | "INVALID_PRICE"
  | "SAME_PARTY"
  | "INVALID_FEE_PERCENT"
  | "INVALID_ADDRESS"
  | "NOT_AUTHORIZED"
  | "NOT_ADMIN"
  | "UNAUTHORIZED"
  | "INVALID_LISTING"
  | "ITEM_NOT_FOUND"
  | "OWNERSHIP_CHANGED"
  | "ITEM_NO_LONGER_EXISTS"
  | "INVALID_ORDER"
  | "INSUFFICIENT_ALLOWANCE"
  | "INSUFFICIENT_BALANCE"
  | "EXTERNAL_REVERT"
  | "EXTERNAL_PANIC"
  | "EXTERNAL_FAILURE";

export interface MarketplaceErrorDetails {
  listingId?: number;
  orderId?: number;
  itemId?: string;
  reason?: string;
  panicCode?: number;
  data?: string;
  required?: string;
  available?: string;
}

export interface ErrorResponse {
  error: string;
  message: string;
  details?: MarketplaceErrorDetails;
}
