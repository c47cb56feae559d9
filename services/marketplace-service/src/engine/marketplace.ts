import type {
  Address,
  AdminConfig,
  EventFilter,
  FeeSchedule,
  Listing,
  ListOrdersQuery,
  MarketplaceEvent,
  Order,
  SettlementOutcome,
} from "@itemex/shared";
import { sameAddress } from "../address.js";
import { COMMITTING_ERROR_CODES, MarketplaceError } from "../errors.js";
import type { EventPublisher } from "../events/publisher.js";
import type { ListingFilter, MarketplaceStore } from "../storage/marketplace-store.js";
import { AdminPolicy, type AdminDefaults } from "./admin-policy.js";
import type {
  FungibleLedger,
  ItemRegistryResolver,
  SettlementCallbackReceiver,
} from "./external.js";
import { ListingRegistry, type ListInput } from "./listing-registry.js";
import type { EngineLogger } from "./logger.js";
import { OrderBook } from "./order-book.js";
import { decodeOrderPayload } from "./order-payload.js";
import { RequestScope } from "./request-scope.js";
import { SerialQueue } from "./serial-queue.js";
import { SettlementEngine } from "./settlement-engine.js";
import { UnitOfWork } from "./unit-of-work.js";

export interface MarketplaceOptions {
  store: MarketplaceStore;
  registries: ItemRegistryResolver;
  ledger: FungibleLedger;
  marketplaceAddress: Address;
  ledgerAddress: Address;
  adminDefaults: AdminDefaults;
  publisher: EventPublisher;
  log: EngineLogger;
}

type RequestRun<T> =
  | { ok: true; value: T; events: MarketplaceEvent[] }
  | { ok: false; error: unknown; events: MarketplaceEvent[] };

/**
 * Entry point for every marketplace request. Writes run one at a time through
 * a serial queue against a unit of work that commits on success and is
 * discarded on failure; reads go straight to the committed store.
 */
export class Marketplace implements SettlementCallbackReceiver {
  private readonly store: MarketplaceStore;
  private readonly publisher: EventPublisher;
  private readonly log: EngineLogger;
  private readonly ledgerAddress: Address;
  private readonly policy: AdminPolicy;
  private readonly listings: ListingRegistry;
  private readonly settlement: SettlementEngine;
  private readonly queue = new SerialQueue();
  private scope: RequestScope | null = null;

  constructor(options: MarketplaceOptions) {
    this.store = options.store;
    this.publisher = options.publisher;
    this.log = options.log;
    this.ledgerAddress = options.ledgerAddress;
    this.policy = new AdminPolicy(options.adminDefaults, options.log);
    this.listings = new ListingRegistry(options.registries, this.policy, options.log);
    this.settlement = new SettlementEngine({
      listings: this.listings,
      orders: new OrderBook(options.log),
      policy: this.policy,
      registries: options.registries,
      ledger: options.ledger,
      marketplaceAddress: options.marketplaceAddress,
      ledgerAddress: options.ledgerAddress,
      log: options.log,
    });

    const seed = new UnitOfWork(this.store);
    if (this.policy.seed(seed)) {
      this.store.commit(seed.changes());
      this.log.info({ admin: options.adminDefaults.admin }, "admin configuration seeded");
    }
  }

  list(caller: Address, input: ListInput): Promise<Listing> {
    return this.execute("list", (scope) => this.listings.list(scope.uow, caller, input));
  }

  buy(caller: Address, listingId: number): Promise<Order> {
    return this.execute("buy", (scope) => this.settlement.buy(scope, caller, listingId));
  }

  async onTransferReceived(
    caller: Address,
    from: Address,
    amount: bigint,
    payload: string,
  ): Promise<SettlementOutcome> {
    // Only the ledger may join the request that is waiting on it, and only once.
    const orderId = decodeOrderPayload(payload);
    const scope = this.scope;
    if (
      orderId !== null &&
      scope &&
      sameAddress(caller, this.ledgerAddress) &&
      scope.claimCallback(orderId)
    ) {
      return this.settleWithin(scope, caller, from, amount, payload);
    }
    return this.execute("settlement-callback", (own) =>
      this.settlement.completeSettlement(own.uow, caller, from, amount, payload),
    );
  }

  changeFeePercent(caller: Address, feePercentBasisPoints: number): Promise<AdminConfig> {
    return this.execute("change-fee-percent", async (scope) =>
      this.policy.changeFeePercent(scope.uow, caller, feePercentBasisPoints),
    );
  }

  changeMinimumFee(caller: Address, minimumFee: bigint): Promise<AdminConfig> {
    return this.execute("change-minimum-fee", async (scope) =>
      this.policy.changeMinimumFee(scope.uow, caller, minimumFee),
    );
  }

  setAdmin(caller: Address, admin: Address): Promise<AdminConfig> {
    return this.execute("set-admin", async (scope) => this.policy.setAdmin(scope.uow, caller, admin));
  }

  nftInfo(listingId: number): Listing | null {
    return this.store.getListing(listingId);
  }

  orderInfo(orderId: number): Order | null {
    return this.store.getOrder(orderId);
  }

  listListings(filter: ListingFilter = {}): Listing[] {
    return this.store.listListings(filter);
  }

  listOrders(filter: ListOrdersQuery = {}): Order[] {
    return this.store.listOrders(filter);
  }

  listEvents(filter: EventFilter = {}): MarketplaceEvent[] {
    return this.store.listEvents(filter);
  }

  adminConfig(): AdminConfig {
    return this.policy.current(new UnitOfWork(this.store));
  }

  feePercent(): number {
    return this.adminConfig().feePercentBasisPoints;
  }

  minimumFee(): bigint {
    return BigInt(this.adminConfig().minimumFee);
  }

  fees(): FeeSchedule {
    const config = this.adminConfig();
    return {
      feePercentBasisPoints: config.feePercentBasisPoints,
      minimumFee: config.minimumFee,
    };
  }

  /** Callback delivered while `buy` waits on the fee leg for the same order. */
  private async settleWithin(
    scope: RequestScope,
    caller: Address,
    from: Address,
    amount: bigint,
    payload: string,
  ): Promise<SettlementOutcome> {
    try {
      const outcome = await this.settlement.completeSettlement(scope.uow, caller, from, amount, payload);
      scope.callbackOutcome = outcome;
      return outcome;
    } catch (error) {
      scope.callbackFailure = { error };
      throw error;
    }
  }

  private async execute<T>(label: string, work: (scope: RequestScope) => Promise<T>): Promise<T> {
    const run = await this.queue.run(async (): Promise<RequestRun<T>> => {
      const scope = new RequestScope(label, new UnitOfWork(this.store));
      this.scope = scope;
      try {
        const value = await work(scope);
        return { ok: true, value, events: this.commit(scope) };
      } catch (error) {
        if (error instanceof MarketplaceError && COMMITTING_ERROR_CODES.has(error.code)) {
          return { ok: false, error, events: this.commit(scope) };
        }
        this.log.warn(
          {
            request: label,
            code: error instanceof MarketplaceError ? error.code : undefined,
            discardedEvents: scope.uow.stagedEvents().length,
          },
          "request aborted; staged changes discarded",
        );
        throw error;
      } finally {
        this.scope = null;
      }
    });

    // Published after the queue moves on; the webhook never holds up the next request.
    this.publish(run.events);
    if (!run.ok) throw run.error;
    return run.value;
  }

  private commit(scope: RequestScope): MarketplaceEvent[] {
    const events = this.store.commit(scope.uow.changes());
    this.log.debug({ request: scope.label, events: events.length }, "request committed");
    return events;
  }

  private publish(events: MarketplaceEvent[]): void {
    if (events.length === 0) return;
    this.publisher.publish(events).catch((error: unknown) => {
      this.log.warn({ err: error, events: events.length }, "event publication failed");
    });
  }
}
