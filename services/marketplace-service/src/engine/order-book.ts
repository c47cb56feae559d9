import type { Address, Listing, Order, OrderCancelReason, OrderStatus } from "@itemex/shared";
import { MarketplaceError } from "../errors.js";
import type { FeeQuote } from "./fees.js";
import { formatAmount } from "./fees.js";
import type { EngineLogger } from "./logger.js";
import type { UnitOfWork } from "./unit-of-work.js";

export interface PlaceOrderInput {
  listing: Listing;
  buyer: Address;
  quote: FeeQuote;
}

export class OrderBook {
  constructor(private readonly log: EngineLogger) {}

  place(uow: UnitOfWork, input: PlaceOrderInput): Order {
    const now = new Date().toISOString();
    const order: Order = {
      orderId: uow.nextId("order"),
      listingId: input.listing.listingId,
      itemId: input.listing.itemId,
      price: input.listing.price,
      platformFee: formatAmount(input.quote.platformFee),
      sellerAmount: formatAmount(input.quote.sellerAmount),
      buyer: input.buyer,
      seller: input.listing.recordedOwner,
      itemRegistryAddress: input.listing.itemRegistryAddress,
      createdAt: now,
      updatedAt: now,
      status: "PENDING",
    };
    uow.putOrder(order);
    uow.emit("ORDER_PLACED", {
      listingId: order.listingId,
      orderId: order.orderId,
      actor: order.buyer,
      details: {
        itemId: order.itemId,
        price: order.price,
        platformFee: order.platformFee,
        sellerAmount: order.sellerAmount,
        seller: order.seller,
      },
    });
    this.log.info({ orderId: order.orderId, listingId: order.listingId }, "order placed");
    return order;
  }

  get(uow: UnitOfWork, orderId: number): Order | null {
    return uow.getOrder(orderId);
  }

  fulfill(uow: UnitOfWork, order: Order): Order {
    return this.transition(uow, order, "FULFILLED");
  }

  cancel(uow: UnitOfWork, order: Order, reason: OrderCancelReason): Order {
    const cancelled = this.transition(uow, order, "CANCELLED", reason);
    uow.emit("ORDER_CANCELLED", {
      listingId: order.listingId,
      orderId: order.orderId,
      details: { reason },
    });
    this.log.warn({ orderId: order.orderId, reason }, "order cancelled");
    return cancelled;
  }

  // PENDING -> FULFILLED | CANCELLED, nothing else
  private transition(
    uow: UnitOfWork,
    order: Order,
    status: Exclude<OrderStatus, "PENDING">,
    cancelReason?: OrderCancelReason,
  ): Order {
    const current = uow.getOrder(order.orderId);
    if (!current || current.status !== "PENDING") {
      throw new MarketplaceError(
        "INVALID_ORDER",
        `Order ${order.orderId} is not pending`,
        { orderId: order.orderId },
      );
    }
    const updated: Order = {
      ...current,
      status,
      updatedAt: new Date().toISOString(),
      ...(cancelReason ? { cancelReason } : {}),
    };
    uow.putOrder(updated);
    return updated;
  }
}
