import type { Address, Listing } from "@itemex/shared";
import { isZeroAddress, sameAddress } from "../address.js";
import { externalError, failureDetails, MarketplaceError } from "../errors.js";
import type { AdminPolicy } from "./admin-policy.js";
import type { ExternalFailure, ItemRegistry, ItemRegistryResolver } from "./external.js";
import { formatAmount } from "./fees.js";
import type { EngineLogger } from "./logger.js";
import type { UnitOfWork } from "./unit-of-work.js";

export interface ListInput {
  itemId: string;
  price: bigint;
  registryAddress: Address;
  metadataURI: string;
}

function itemLookupError(failure: ExternalFailure, itemId: string): MarketplaceError {
  if (failure.kind === "reason") {
    return new MarketplaceError(
      "ITEM_NOT_FOUND",
      `Item ${itemId} not found: ${failure.reason}`,
      { itemId, ...failureDetails(failure) },
    );
  }
  return externalError(failure, `ownerOf(${itemId})`, { itemId });
}

/**
 * Owner, single-item approval, operator approval, in that order. A failing
 * approval query means "not approved" and the next check still runs.
 */
async function isOwnerOrApproved(
  registry: ItemRegistry,
  itemId: string,
  owner: Address,
  caller: Address,
): Promise<boolean> {
  if (sameAddress(owner, caller)) return true;

  const approved = await registry.getApproved(itemId);
  if (approved.ok && sameAddress(approved.value, caller)) return true;

  const operator = await registry.isApprovedForAll(owner, caller);
  return operator.ok && operator.value;
}

export class ListingRegistry {
  constructor(
    private readonly registries: ItemRegistryResolver,
    private readonly policy: AdminPolicy,
    private readonly log: EngineLogger,
  ) {}

  async list(uow: UnitOfWork, caller: Address, input: ListInput): Promise<Listing> {
    if (isZeroAddress(input.registryAddress)) {
      throw new MarketplaceError("INVALID_REGISTRY", "Item registry address must not be the zero address", {
        itemId: input.itemId,
      });
    }

    const { minimumFee } = this.policy.fees(uow);
    if (input.price < minimumFee) {
      throw new MarketplaceError("INVALID_PRICE", "Price must be at least the minimum fee", {
        itemId: input.itemId,
        required: formatAmount(minimumFee),
      });
    }

    const registry = this.registries(input.registryAddress);
    const owner = await registry.ownerOf(input.itemId);
    if (!owner.ok) {
      throw itemLookupError(owner.failure, input.itemId);
    }

    if (!(await isOwnerOrApproved(registry, input.itemId, owner.value, caller))) {
      throw new MarketplaceError(
        "NOT_AUTHORIZED",
        "Caller is neither the owner nor approved for this item",
        { itemId: input.itemId },
      );
    }

    const listing: Listing = {
      listingId: uow.nextId("listing"),
      itemId: input.itemId,
      price: formatAmount(input.price),
      recordedOwner: owner.value,
      itemRegistryAddress: input.registryAddress,
      metadataURI: input.metadataURI,
      createdAt: new Date().toISOString(),
    };
    uow.putListing(listing);
    uow.emit("LISTING_CREATED", {
      listingId: listing.listingId,
      actor: caller,
      details: {
        itemId: listing.itemId,
        price: listing.price,
        owner: listing.recordedOwner,
        registry: listing.itemRegistryAddress,
        metadataURI: listing.metadataURI,
      },
    });
    this.log.info(
      { listingId: listing.listingId, itemId: listing.itemId, price: listing.price },
      "listing created",
    );
    return listing;
  }

  get(uow: UnitOfWork, listingId: number): Listing | null {
    return uow.getListing(listingId);
  }

  remove(uow: UnitOfWork, listingId: number): void {
    uow.deleteListing(listingId);
  }
}
