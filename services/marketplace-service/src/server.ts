import Fastify from "fastify";
import type { FastifyReply, FastifyRequest } from "fastify";
import {
  type Address,
  type AdminConfigResponse,
  CALLER_HEADER,
  type ChangeFeePercentRequest,
  type ChangeMinimumFeeRequest,
  type CreateListingRequest,
  type CreateListingResponse,
  type EventFilter,
  type GetAdminConfigResponse,
  type GetFeesResponse,
  type GetListingResponse,
  type GetOrderResponse,
  IDEMPOTENCY_HEADER,
  isServiceAuthAuthorized,
  type ListEventsResponse,
  type ListListingsResponse,
  type ListOrdersQuery,
  type ListOrdersResponse,
  type MarketplaceEventType,
  type OrderStatus,
  type PlaceOrderRequest,
  type PlaceOrderResponse,
  readHeaderValue,
  requestHash,
  SERVICE_AUTH_HEADER,
  type SetAdminRequest,
  type SettlementCallbackRequest,
  type SettlementCallbackResponse,
} from "@itemex/shared";
import { isHexString } from "ethers";
import { normalizeAddress } from "./address.js";
import { buildEthersRegistryResolver } from "./clients/item-registry-client.js";
import { isObject } from "./clients/http.js";
import { HttpFungibleLedger } from "./clients/ledger-client.js";
import { type ConfigOverrides, type MarketplaceConfig, loadConfig } from "./config.js";
import type { FungibleLedger, ItemRegistryResolver } from "./engine/external.js";
import { formatAmount, isFeePercent, parseAmount } from "./engine/fees.js";
import type { ListInput } from "./engine/listing-registry.js";
import { Marketplace } from "./engine/marketplace.js";
import { HTTP_STATUS_BY_CODE, MarketplaceError, toErrorResponse } from "./errors.js";
import { type EventPublisher, silentPublisher, WebhookEventPublisher } from "./events/publisher.js";
import { buildOpenApiSpec } from "./openapi.js";
import {
  type IdempotentAction,
  type ListingFilter,
  type MarketplaceStore,
  SqliteMarketplaceStore,
} from "./storage/marketplace-store.js";

const MARKETPLACE_EVENT_TYPES: readonly MarketplaceEventType[] = [
  "LISTING_CREATED",
  "ORDER_PLACED",
  "ITEM_SOLD",
  "ITEM_NO_LONGER_AVAILABLE",
  "ITEM_NO_LONGER_EXISTS",
  "ORDER_CANCELLED",
  "FEE_PERCENT_CHANGED",
  "MINIMUM_FEE_CHANGED",
  "ADMIN_CHANGED",
];

type Query = Record<string, string | undefined>;

function isItemId(value: unknown): value is string {
  return typeof value === "string" && /^\d+$/.test(value);
}

function parseId(value: unknown): number | null {
  const raw = typeof value === "number" ? String(value) : value;
  if (typeof raw !== "string" || !/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

function isOrderStatus(value: unknown): value is OrderStatus {
  return value === "PENDING" || value === "FULFILLED" || value === "CANCELLED";
}

function isEventType(value: unknown): value is MarketplaceEventType {
  return MARKETPLACE_EVENT_TYPES.some((type) => type === value);
}

function parseCreateListingRequest(body: unknown): CreateListingRequest | null {
  if (!isObject(body)) return null;
  if (!isItemId(body.itemId)) return null;
  const price = parseAmount(body.price);
  if (price === null) return null;
  const registryAddress = normalizeAddress(body.registryAddress);
  if (!registryAddress) return null;
  if (typeof body.metadataURI !== "string") return null;
  return {
    itemId: body.itemId,
    price: formatAmount(price),
    registryAddress,
    metadataURI: body.metadataURI,
  };
}

function toListInput(request: CreateListingRequest): ListInput {
  return {
    itemId: request.itemId,
    price: BigInt(request.price),
    registryAddress: request.registryAddress,
    metadataURI: request.metadataURI,
  };
}

function parsePlaceOrderRequest(body: unknown): PlaceOrderRequest | null {
  if (!isObject(body)) return null;
  const listingId = parseId(body.listingId);
  return listingId === null ? null : { listingId };
}

function parseCallbackRequest(body: unknown): SettlementCallbackRequest | null {
  if (!isObject(body)) return null;
  const from = normalizeAddress(body.from);
  if (!from) return null;
  const amount = parseAmount(body.amount);
  if (amount === null) return null;
  if (typeof body.payload !== "string" || !isHexString(body.payload)) return null;
  return { from, amount: formatAmount(amount), payload: body.payload };
}

function parseChangeFeePercentRequest(body: unknown): ChangeFeePercentRequest | null {
  if (!isObject(body)) return null;
  if (!isFeePercent(body.feePercentBasisPoints)) return null;
  return { feePercentBasisPoints: body.feePercentBasisPoints };
}

function parseChangeMinimumFeeRequest(body: unknown): ChangeMinimumFeeRequest | null {
  if (!isObject(body)) return null;
  const minimumFee = parseAmount(body.minimumFee);
  return minimumFee === null ? null : { minimumFee: formatAmount(minimumFee) };
}

function parseSetAdminRequest(body: unknown): SetAdminRequest | null {
  if (!isObject(body)) return null;
  const admin = normalizeAddress(body.admin);
  return admin ? { admin } : null;
}

function parseListingQuery(query: Query): ListingFilter | null {
  const filter: ListingFilter = {};
  if (query.registry !== undefined) {
    const registry = normalizeAddress(query.registry);
    if (!registry) return null;
    filter.registry = registry;
  }
  if (query.owner !== undefined) {
    const owner = normalizeAddress(query.owner);
    if (!owner) return null;
    filter.owner = owner;
  }
  return filter;
}

function parseOrderQuery(query: Query): ListOrdersQuery | null {
  const filter: ListOrdersQuery = {};
  if (query.status !== undefined) {
    if (!isOrderStatus(query.status)) return null;
    filter.status = query.status;
  }
  if (query.listingId !== undefined) {
    const listingId = parseId(query.listingId);
    if (listingId === null) return null;
    filter.listingId = listingId;
  }
  return filter;
}

function parseEventQuery(query: Query): EventFilter | null {
  const filter: EventFilter = {};
  if (query.listingId !== undefined) {
    const listingId = parseId(query.listingId);
    if (listingId === null) return null;
    filter.listingId = listingId;
  }
  if (query.orderId !== undefined) {
    const orderId = parseId(query.orderId);
    if (orderId === null) return null;
    filter.orderId = orderId;
  }
  if (query.type !== undefined) {
    if (!isEventType(query.type)) return null;
    filter.type = query.type;
  }
  return filter;
}

function statusCodeOf(error: unknown): number {
  if (isObject(error) && typeof error.statusCode === "number") return error.statusCode;
  return 500;
}

function readCaller(req: FastifyRequest, reply: FastifyReply): Address | null {
  const raw = readHeaderValue(req.headers[CALLER_HEADER]);
  if (!raw) {
    reply.code(401).send({
      error: "missing_caller",
      message: `Set '${CALLER_HEADER}' header`,
    });
    return null;
  }
  const caller = normalizeAddress(raw);
  if (!caller) {
    reply.code(400).send({
      error: "invalid_caller",
      message: `'${CALLER_HEADER}' must be an address`,
    });
    return null;
  }
  return caller;
}

function replayIdempotentIfExists(
  reply: FastifyReply,
  store: MarketplaceStore,
  action: IdempotentAction,
  idempotencyKey: string | null,
  hash: string,
): boolean {
  if (!idempotencyKey) return false;
  const existing = store.getIdempotencyRecord(action, idempotencyKey);
  if (!existing) return false;

  if (existing.requestHash !== hash) {
    reply.code(409).send({
      error: "idempotency_key_reuse_conflict",
      message: "Idempotency key already used with different payload",
    });
    return true;
  }

  reply.code(existing.responseStatus).send(existing.responseBody);
  return true;
}

/**
 * Keys whose first request is still running. A retry that arrives before the
 * response is saved must not run the work a second time.
 */
function beginIdempotentRequest(
  reply: FastifyReply,
  inFlight: Set<string>,
  action: IdempotentAction,
  idempotencyKey: string | null,
): boolean {
  if (!idempotencyKey) return true;
  const slot = `${action}:${idempotencyKey}`;
  if (inFlight.has(slot)) {
    reply.code(409).send({
      error: "idempotency_request_in_progress",
      message: "A request with this idempotency key is still being processed",
    });
    return false;
  }
  inFlight.add(slot);
  return true;
}

function endIdempotentRequest(
  inFlight: Set<string>,
  action: IdempotentAction,
  idempotencyKey: string | null,
): void {
  if (idempotencyKey) inFlight.delete(`${action}:${idempotencyKey}`);
}

function saveIdempotentResponse(
  store: MarketplaceStore,
  action: IdempotentAction,
  idempotencyKey: string | null,
  hash: string,
  responseStatus: number,
  responseBody: unknown,
): void {
  if (!idempotencyKey) return;
  store.putIdempotencyRecord({
    action,
    idempotencyKey,
    requestHash: hash,
    responseStatus,
    responseBody,
    createdAt: new Date().toISOString(),
  });
}

function buildLedger(config: MarketplaceConfig): FungibleLedger {
  if (!config.ledgerUrl) {
    throw new Error("LEDGER_URL is required (or pass ledger in buildServer options)");
  }
  return new HttpFungibleLedger(config.ledgerUrl, config.marketplaceAddress, config.serviceAuthToken);
}

export interface BuildServerOptions {
  store?: MarketplaceStore;
  dbPath?: string;
  ledger?: FungibleLedger;
  itemRegistries?: ItemRegistryResolver;
  publisher?: EventPublisher;
  config?: ConfigOverrides;
  env?: Record<string, string | undefined>;
  serviceBaseUrl?: string;
  logger?: boolean;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const env = options.env ?? process.env;
  const app = Fastify({
    logger: options.logger ?? { level: env.LOG_LEVEL || "info" },
  });
  const config = loadConfig(env, { ...options.config, dbPath: options.dbPath ?? options.config?.dbPath });
  const log = app.log.child({ component: "marketplace" });

  const ledger = options.ledger || buildLedger(config);
  const store = options.store || new SqliteMarketplaceStore(config.dbPath);
  const ownStore = !options.store;
  const registries =
    options.itemRegistries ||
    buildEthersRegistryResolver({ rpcUrl: config.chainRpcUrl, privateKey: config.chainPrivateKey });
  const publisher =
    options.publisher ||
    (config.eventsWebhookUrl
      ? new WebhookEventPublisher(config.eventsWebhookUrl, log, config.serviceAuthToken)
      : silentPublisher);

  const marketplace = new Marketplace({
    store,
    registries,
    ledger,
    marketplaceAddress: config.marketplaceAddress,
    ledgerAddress: config.ledgerAddress,
    adminDefaults: {
      admin: config.adminAddress,
      feePercentBasisPoints: config.feePercentBasisPoints,
      minimumFee: config.minimumFee,
    },
    publisher,
    log,
  });
  const inFlight = new Set<string>();

  const serviceBaseUrl =
    options.serviceBaseUrl || env.SERVICE_BASE_URL || `http://127.0.0.1:${env.PORT || 4102}`;

  function requireServiceAuth(req: FastifyRequest, reply: FastifyReply): boolean {
    if (isServiceAuthAuthorized(req.headers[SERVICE_AUTH_HEADER], config.serviceAuthToken)) {
      return true;
    }
    reply.code(401).send({
      error: "unauthorized_service",
      message: `Missing or invalid '${SERVICE_AUTH_HEADER}' header`,
    });
    return false;
  }

  app.setErrorHandler((error, req, reply) => {
    if (error instanceof MarketplaceError) {
      req.log.info({ code: error.code, details: error.details }, "marketplace request rejected");
      return reply.code(HTTP_STATUS_BY_CODE[error.code]).send(toErrorResponse(error));
    }
    const statusCode = statusCodeOf(error);
    if (statusCode < 500) {
      return reply.code(statusCode).send({
        error: "invalid_request",
        message: error instanceof Error ? error.message : "Malformed request",
      });
    }
    req.log.error({ err: error }, "unhandled marketplace failure");
    return reply.code(500).send({ error: "internal_error", message: "Internal server error" });
  });

  app.get("/health", async () => ({ ok: true, service: "marketplace-service" }));
  app.get("/openapi.json", async () => buildOpenApiSpec(serviceBaseUrl));

  app.post("/listings", async (req, reply) => {
    const caller = readCaller(req, reply);
    if (!caller) return;

    const parsed = parseCreateListingRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected itemId, price (base-10 integers), registryAddress and metadataURI",
      });
    }

    const idempotencyKey = readHeaderValue(req.headers[IDEMPOTENCY_HEADER]);
    const hash = requestHash({ caller, body: req.body });
    if (replayIdempotentIfExists(reply, store, "CREATE_LISTING", idempotencyKey, hash)) {
      return;
    }
    if (!beginIdempotentRequest(reply, inFlight, "CREATE_LISTING", idempotencyKey)) return;

    try {
      const listing = await marketplace.list(caller, toListInput(parsed));
      const response: CreateListingResponse = { listingId: listing.listingId, listing };
      saveIdempotentResponse(store, "CREATE_LISTING", idempotencyKey, hash, 201, response);
      return reply.code(201).send(response);
    } finally {
      endIdempotentRequest(inFlight, "CREATE_LISTING", idempotencyKey);
    }
  });

  app.get<{ Querystring: Query }>("/listings", async (req, reply) => {
    const filter = parseListingQuery(req.query);
    if (!filter) {
      return reply.code(400).send({
        error: "invalid_query",
        message: "registry and owner must be addresses",
      });
    }
    const response: ListListingsResponse = { listings: marketplace.listListings(filter) };
    return response;
  });

  app.get<{ Params: { listingId: string } }>("/listings/:listingId", async (req, reply) => {
    const listingId = parseId(req.params.listingId);
    if (listingId === null) {
      return reply.code(400).send({ error: "invalid_listing_id" });
    }
    const listing = marketplace.nftInfo(listingId);
    if (!listing) {
      return reply.code(404).send({ error: "listing_not_found" });
    }
    const response: GetListingResponse = { listing };
    return response;
  });

  app.post("/orders", async (req, reply) => {
    const caller = readCaller(req, reply);
    if (!caller) return;

    const parsed = parsePlaceOrderRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected listingId",
      });
    }

    const idempotencyKey = readHeaderValue(req.headers[IDEMPOTENCY_HEADER]);
    const hash = requestHash({ caller, body: parsed });
    if (replayIdempotentIfExists(reply, store, "PLACE_ORDER", idempotencyKey, hash)) {
      return;
    }
    if (!beginIdempotentRequest(reply, inFlight, "PLACE_ORDER", idempotencyKey)) return;

    try {
      const order = await marketplace.buy(caller, parsed.listingId);
      const response: PlaceOrderResponse = { orderId: order.orderId, order };
      saveIdempotentResponse(store, "PLACE_ORDER", idempotencyKey, hash, 201, response);
      return reply.code(201).send(response);
    } finally {
      endIdempotentRequest(inFlight, "PLACE_ORDER", idempotencyKey);
    }
  });

  app.get<{ Querystring: Query }>("/orders", async (req, reply) => {
    const filter = parseOrderQuery(req.query);
    if (!filter) {
      return reply.code(400).send({
        error: "invalid_query",
        message: "status must be one of PENDING, FULFILLED, CANCELLED; listingId must be a positive integer",
      });
    }
    const response: ListOrdersResponse = { orders: marketplace.listOrders(filter) };
    return response;
  });

  app.get<{ Params: { orderId: string } }>("/orders/:orderId", async (req, reply) => {
    const orderId = parseId(req.params.orderId);
    if (orderId === null) {
      return reply.code(400).send({ error: "invalid_order_id" });
    }
    const order = marketplace.orderInfo(orderId);
    if (!order) {
      return reply.code(404).send({ error: "order_not_found" });
    }
    const response: GetOrderResponse = { order };
    return response;
  });

  app.post("/settlement/callback", async (req, reply) => {
    if (!requireServiceAuth(req, reply)) return;
    const caller = readCaller(req, reply);
    if (!caller) return;

    const parsed = parseCallbackRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected from (address), amount (base-10 integer) and payload (hex)",
      });
    }

    const settlement = await marketplace.onTransferReceived(
      caller,
      parsed.from,
      BigInt(parsed.amount),
      parsed.payload,
    );
    const response: SettlementCallbackResponse = { settlement };
    return response;
  });

  app.get("/fees", async () => {
    const response: GetFeesResponse = marketplace.fees();
    return response;
  });

  app.get("/admin/config", async () => {
    const response: GetAdminConfigResponse = { config: marketplace.adminConfig() };
    return response;
  });

  app.post("/admin/fee-percent", async (req, reply) => {
    const caller = readCaller(req, reply);
    if (!caller) return;
    const parsed = parseChangeFeePercentRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected feePercentBasisPoints as an integer between 0 and 10000",
      });
    }
    const response: AdminConfigResponse = {
      config: await marketplace.changeFeePercent(caller, parsed.feePercentBasisPoints),
    };
    return response;
  });

  app.post("/admin/minimum-fee", async (req, reply) => {
    const caller = readCaller(req, reply);
    if (!caller) return;
    const parsed = parseChangeMinimumFeeRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected minimumFee as a base-10 integer",
      });
    }
    const response: AdminConfigResponse = {
      config: await marketplace.changeMinimumFee(caller, BigInt(parsed.minimumFee)),
    };
    return response;
  });

  app.post("/admin/admin", async (req, reply) => {
    const caller = readCaller(req, reply);
    if (!caller) return;
    const parsed = parseSetAdminRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected admin as an address",
      });
    }
    const response: AdminConfigResponse = { config: await marketplace.setAdmin(caller, parsed.admin) };
    return response;
  });

  app.get<{ Querystring: Query }>("/events", async (req, reply) => {
    const filter = parseEventQuery(req.query);
    if (!filter) {
      return reply.code(400).send({
        error: "invalid_query",
        message: "listingId and orderId must be positive integers; type must be a marketplace event type",
      });
    }
    const response: ListEventsResponse = { events: marketplace.listEvents(filter) };
    return response;
  });

  app.addHook("onClose", async () => {
    if (ownStore) {
      store.close();
    }
  });

  return app;
}
