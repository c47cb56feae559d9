import type { AdminConfig, FeeSchedule, Listing } from "./listing.js";
import type { MarketplaceEvent } from "./events.js";
import type { Order, OrderStatus, SettlementOutcome } from "./order.js";

export interface CreateListingRequest {
  itemId: string;
  price: string;
  registryAddress: string;
  metadataURI: string;
}

export interface CreateListingResponse {
  listingId: number;
  listing: Listing;
}

export interface GetListingResponse {
  listing: Listing;
}

export interface ListListingsResponse {
  listings: Listing[];
}

export interface PlaceOrderRequest {
  listingId: number;
}

export interface PlaceOrderResponse {
  orderId: number;
  order: Order;
}

export interface GetOrderResponse {
  order: Order;
}

export interface ListOrdersQuery {
  status?: OrderStatus;
  listingId?: number;
}

export interface ListOrdersResponse {
  orders: Order[];
}

export interface SettlementCallbackRequest {
  from: string;
  amount: string;
  payload: string;      // 0x-prefixed ABI-encoded uint256 order id
}

export interface SettlementCallbackResponse {
  settlement: SettlementOutcome;
}

export type GetFeesResponse = FeeSchedule;

export interface GetAdminConfigResponse {
  config: AdminConfig;
}

export interface ChangeFeePercentRequest {
  feePercentBasisPoints: number;
}

export interface ChangeMinimumFeeRequest {
  minimumFee: string;
}

export interface SetAdminRequest {
  admin: string;
}

export interface AdminConfigResponse {
  config: AdminConfig;
}

export interface ListEventsResponse {
  events: MarketplaceEvent[];
}
