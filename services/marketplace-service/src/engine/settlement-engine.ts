import type { Address, Listing, Order, OrderCancelReason, SettlementOutcome } from "@itemex/shared";
import { sameAddress, isZeroAddress } from "../address.js";
import { externalError, failureDetails, MarketplaceError } from "../errors.js";
import type { AdminPolicy } from "./admin-policy.js";
import type {
  ExternalFailure,
  FungibleLedger,
  ItemRegistry,
  ItemRegistryResolver,
} from "./external.js";
import { formatAmount, quotePlatformFee } from "./fees.js";
import type { ListingRegistry } from "./listing-registry.js";
import type { EngineLogger } from "./logger.js";
import type { OrderBook } from "./order-book.js";
import { decodeOrderPayload, encodeOrderPayload } from "./order-payload.js";
import type { RequestScope } from "./request-scope.js";
import type { UnitOfWork } from "./unit-of-work.js";

export interface SettlementEngineOptions {
  listings: ListingRegistry;
  orders: OrderBook;
  policy: AdminPolicy;
  registries: ItemRegistryResolver;
  ledger: FungibleLedger;
  marketplaceAddress: Address;
  ledgerAddress: Address;
  log: EngineLogger;
}

type OwnershipCheck =
  | { status: "CURRENT" }
  | { status: "GONE"; failure: ExternalFailure }
  | { status: "CHANGED"; currentOwner: Address };

async function checkOwnership(registry: ItemRegistry, listing: Listing): Promise<OwnershipCheck> {
  const owner = await registry.ownerOf(listing.itemId);
  if (!owner.ok) return { status: "GONE", failure: owner.failure };
  if (!sameAddress(owner.value, listing.recordedOwner)) {
    return { status: "CHANGED", currentOwner: owner.value };
  }
  return { status: "CURRENT" };
}

export class SettlementEngine {
  private readonly listings: ListingRegistry;
  private readonly orders: OrderBook;
  private readonly policy: AdminPolicy;
  private readonly registries: ItemRegistryResolver;
  private readonly ledger: FungibleLedger;
  private readonly marketplaceAddress: Address;
  private readonly ledgerAddress: Address;
  private readonly log: EngineLogger;

  constructor(options: SettlementEngineOptions) {
    this.listings = options.listings;
    this.orders = options.orders;
    this.policy = options.policy;
    this.registries = options.registries;
    this.ledger = options.ledger;
    this.marketplaceAddress = options.marketplaceAddress;
    this.ledgerAddress = options.ledgerAddress;
    this.log = options.log;
  }

  /**
   * Opens an order on a listing and moves the price (buyer to seller) and the
   * fee (seller to marketplace). The item moves later, when the ledger calls
   * back after the fee leg.
   */
  async buy(scope: RequestScope, caller: Address, listingId: number): Promise<Order> {
    const { uow } = scope;
    const listing = this.listings.get(uow, listingId);
    if (!listing) {
      throw new MarketplaceError("INVALID_LISTING", `Listing ${listingId} does not exist`, {
        listingId,
      });
    }

    const registry = this.registries(listing.itemRegistryAddress);
    const ownership = await checkOwnership(registry, listing);
    if (ownership.status !== "CURRENT") {
      throw this.retireStaleListing(uow, listing, ownership);
    }

    const fees = this.policy.fees(uow);
    const price = BigInt(listing.price);
    if (price < fees.minimumFee) {
      throw new MarketplaceError("INVALID_PRICE", "Listing price is below the current minimum fee", {
        listingId,
        required: formatAmount(fees.minimumFee),
      });
    }

    if (sameAddress(caller, listing.recordedOwner)) {
      throw new MarketplaceError("SAME_PARTY", "Seller cannot buy their own listing", { listingId });
    }

    const quote = quotePlatformFee(price, fees.feePercentBasisPoints, fees.minimumFee);
    const order = this.orders.place(uow, { listing, buyer: caller, quote });

    await this.requireFunds(order, price, quote.platformFee);

    const priceLeg = await this.ledger.transferFrom(order.buyer, order.seller, price);
    if (!priceLeg.ok) {
      throw externalError(priceLeg.failure, "Price transfer", { orderId: order.orderId, listingId });
    }
    if (!priceLeg.value) {
      throw new MarketplaceError("EXTERNAL_FAILURE", "Ledger declined the price transfer", {
        orderId: order.orderId,
        listingId,
      });
    }

    await this.collectFee(scope, order, quote.platformFee);

    return this.orders.get(uow, order.orderId) ?? order;
  }

  /**
   * Ledger callback after the fee leg. Re-validates the order against what the
   * ledger reports and the item against the registry, then releases the item.
   * A replay for an order that is already terminal changes nothing.
   */
  async completeSettlement(
    uow: UnitOfWork,
    caller: Address,
    from: Address,
    amount: bigint,
    payload: string,
  ): Promise<SettlementOutcome> {
    const orderId = decodeOrderPayload(payload);
    if (orderId === null) {
      throw new MarketplaceError("INVALID_ORDER", "Callback payload does not encode an order id");
    }

    if (!sameAddress(caller, this.ledgerAddress)) {
      throw new MarketplaceError("UNAUTHORIZED", "Settlement callbacks are accepted from the ledger only", {
        orderId,
      });
    }

    const order = this.orders.get(uow, orderId);
    if (!order) {
      throw new MarketplaceError("INVALID_ORDER", `Order ${orderId} does not exist`, { orderId });
    }
    if (order.status !== "PENDING") {
      this.log.info({ orderId, status: order.status }, "settlement callback replayed for a settled order");
      return { outcome: "ALREADY_SETTLED", orderId, status: order.status };
    }

    this.verifyCallbackMatchesOrder(order, from, amount);

    const listing = this.listings.get(uow, order.listingId);
    if (!listing) {
      return this.cancel(uow, order, "LISTING_REMOVED");
    }

    const registry = this.registries(listing.itemRegistryAddress);
    const ownership = await checkOwnership(registry, listing);
    if (ownership.status !== "CURRENT") {
      this.retireStaleListing(uow, listing, ownership);
      return this.cancel(
        uow,
        order,
        ownership.status === "GONE" ? "ITEM_NO_LONGER_EXISTS" : "OWNERSHIP_CHANGED",
      );
    }

    await this.requireOperatorApproval(registry, listing, order.orderId);

    const transfer = await registry.safeTransferFrom(listing.recordedOwner, order.buyer, listing.itemId);
    if (!transfer.ok) {
      throw externalError(transfer.failure, "Item transfer", {
        orderId,
        listingId: listing.listingId,
        itemId: listing.itemId,
      });
    }

    this.listings.remove(uow, listing.listingId);
    this.orders.fulfill(uow, order);
    uow.emit("ITEM_SOLD", {
      listingId: listing.listingId,
      orderId,
      actor: order.buyer,
      details: {
        itemId: listing.itemId,
        seller: order.seller,
        buyer: order.buyer,
        price: order.price,
        platformFee: order.platformFee,
        sellerAmount: order.sellerAmount,
      },
    });
    this.log.info({ orderId, listingId: listing.listingId, itemId: listing.itemId }, "item sold");
    return { outcome: "FULFILLED", orderId };
  }

  private async requireFunds(order: Order, price: bigint, platformFee: bigint): Promise<void> {
    const ids = { orderId: order.orderId, listingId: order.listingId };

    const balance = await this.ledger.balanceOf(order.buyer);
    if (!balance.ok) throw externalError(balance.failure, "Balance query", ids);
    if (balance.value < price) {
      throw new MarketplaceError("INSUFFICIENT_BALANCE", "Buyer balance does not cover the price", {
        ...ids,
        required: formatAmount(price),
        available: formatAmount(balance.value),
      });
    }

    const buyerAllowance = await this.ledger.allowance(order.buyer, this.marketplaceAddress);
    if (!buyerAllowance.ok) throw externalError(buyerAllowance.failure, "Allowance query", ids);
    if (buyerAllowance.value < price) {
      throw new MarketplaceError(
        "INSUFFICIENT_ALLOWANCE",
        "Buyer has not authorized the marketplace to spend the price",
        { ...ids, required: formatAmount(price), available: formatAmount(buyerAllowance.value) },
      );
    }

    const sellerAllowance = await this.ledger.allowance(order.seller, this.marketplaceAddress);
    if (!sellerAllowance.ok) throw externalError(sellerAllowance.failure, "Allowance query", ids);
    if (sellerAllowance.value < platformFee) {
      throw new MarketplaceError(
        "INSUFFICIENT_ALLOWANCE",
        "Seller has not authorized the marketplace to collect the platform fee",
        { ...ids, required: formatAmount(platformFee), available: formatAmount(sellerAllowance.value) },
      );
    }
  }

  private async collectFee(scope: RequestScope, order: Order, platformFee: bigint): Promise<void> {
    const ids = { orderId: order.orderId, listingId: order.listingId };

    const feeLeg = await this.whileAwaitingCallback(scope, order.orderId, () =>
      this.ledger.transferWithCallback(
        order.seller,
        this.marketplaceAddress,
        platformFee,
        encodeOrderPayload(order.orderId),
      ),
    );

    // A failed callback is reported under its own kind, not as the ledger's failure.
    if (scope.callbackFailure) {
      throw scope.callbackFailure.error;
    }
    if (!feeLeg.ok) {
      throw externalError(feeLeg.failure, "Fee transfer", ids);
    }
    if (!feeLeg.value) {
      throw new MarketplaceError("EXTERNAL_FAILURE", "Ledger declined the fee transfer", ids);
    }
    if (!scope.callbackOutcome) {
      this.log.warn(ids, "fee collected without a settlement callback; order stays pending");
    }
  }

  private async whileAwaitingCallback<T>(
    scope: RequestScope,
    orderId: number,
    call: () => Promise<T>,
  ): Promise<T> {
    scope.awaitingCallbackFor = orderId;
    try {
      return await call();
    } finally {
      scope.awaitingCallbackFor = null;
    }
  }

  private verifyCallbackMatchesOrder(order: Order, from: Address, amount: bigint): void {
    const ids = { orderId: order.orderId, listingId: order.listingId };
    if (isZeroAddress(order.buyer) || sameAddress(order.buyer, order.seller)) {
      throw new MarketplaceError("INVALID_ORDER", "Order has no valid buyer", ids);
    }
    if (!sameAddress(from, order.seller)) {
      throw new MarketplaceError("INVALID_ORDER", "Fee was not paid by the order's seller", ids);
    }
    if (amount !== BigInt(order.platformFee)) {
      throw new MarketplaceError("INVALID_ORDER", "Fee amount does not match the order", {
        ...ids,
        required: order.platformFee,
        available: formatAmount(amount),
      });
    }
  }

  /**
   * Approved-for-all first, then single-item approval. Only a failure of the
   * second query counts against the seller.
   */
  private async requireOperatorApproval(
    registry: ItemRegistry,
    listing: Listing,
    orderId: number,
  ): Promise<void> {
    const ids = { orderId, listingId: listing.listingId, itemId: listing.itemId };
    const operator = await registry.isApprovedForAll(listing.recordedOwner, this.marketplaceAddress);
    if (operator.ok && operator.value) return;

    const approved = await registry.getApproved(listing.itemId);
    if (!approved.ok) {
      throw new MarketplaceError(
        "NOT_AUTHORIZED",
        "Marketplace approval for the item could not be confirmed",
        { ...ids, ...failureDetails(approved.failure) },
      );
    }
    if (!sameAddress(approved.value, this.marketplaceAddress)) {
      throw new MarketplaceError("NOT_AUTHORIZED", "Seller has not approved the marketplace to move the item", ids);
    }
  }

  private retireStaleListing(
    uow: UnitOfWork,
    listing: Listing,
    ownership: Exclude<OwnershipCheck, { status: "CURRENT" }>,
  ): MarketplaceError {
    const ids = { listingId: listing.listingId, itemId: listing.itemId };
    this.listings.remove(uow, listing.listingId);

    if (ownership.status === "GONE") {
      uow.emit("ITEM_NO_LONGER_EXISTS", {
        listingId: listing.listingId,
        details: {
          itemId: listing.itemId,
          registry: listing.itemRegistryAddress,
          ...failureDetails(ownership.failure),
        },
      });
      this.log.warn(ids, "listed item no longer exists; listing removed");
      return new MarketplaceError(
        "ITEM_NO_LONGER_EXISTS",
        `Item ${listing.itemId} no longer exists`,
        { ...ids, ...failureDetails(ownership.failure) },
      );
    }

    uow.emit("ITEM_NO_LONGER_AVAILABLE", {
      listingId: listing.listingId,
      details: {
        itemId: listing.itemId,
        recordedOwner: listing.recordedOwner,
        currentOwner: ownership.currentOwner,
      },
    });
    this.log.warn({ ...ids, currentOwner: ownership.currentOwner }, "listed item changed hands; listing removed");
    return new MarketplaceError(
      "OWNERSHIP_CHANGED",
      `Item ${listing.itemId} is no longer owned by the seller`,
      ids,
    );
  }

  private cancel(uow: UnitOfWork, order: Order, reason: OrderCancelReason): SettlementOutcome {
    this.orders.cancel(uow, order, reason);
    return { outcome: "CANCELLED", orderId: order.orderId, reason };
  }
}
