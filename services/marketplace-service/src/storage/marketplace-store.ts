import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import type {
  AdminConfig,
  EventFilter,
  Listing,
  ListOrdersQuery,
  MarketplaceEvent,
  Order,
} from "@itemex/shared";
import type { SequenceName } from "../engine/sequence-allocator.js";
import type { ChangeSet, StateReader } from "../engine/unit-of-work.js";

export interface ListingFilter {
  registry?: string;
  owner?: string;
}

export type IdempotentAction = "CREATE_LISTING" | "PLACE_ORDER";

export interface IdempotencyRecord {
  action: IdempotentAction;
  idempotencyKey: string;
  requestHash: string;
  responseStatus: number;
  responseBody: unknown;
  createdAt: string;
}

export interface MarketplaceStore extends StateReader {
  listListings(filter?: ListingFilter): Listing[];
  listOrders(filter?: ListOrdersQuery): Order[];
  listEvents(filter?: EventFilter): MarketplaceEvent[];
  /** Applies a change set atomically and returns its events with their sequence numbers. */
  commit(changes: ChangeSet): MarketplaceEvent[];
  getIdempotencyRecord(action: IdempotentAction, idempotencyKey: string): IdempotencyRecord | null;
  putIdempotencyRecord(record: IdempotencyRecord): void;
  close(): void;
}

interface ListingRow {
  listing_json: string;
}

interface OrderRow {
  order_json: string;
}

interface EventRow {
  sequence: number;
  event_json: string;
}

interface SequenceRow {
  value: number;
}

interface AdminRow {
  admin: string;
  fee_percent_bps: number;
  minimum_fee: string;
  updated_at: string;
}

interface IdempotencyRow {
  action: IdempotentAction;
  idempotency_key: string;
  request_hash: string;
  response_status: number;
  response_json: string;
  created_at: string;
}

export class SqliteMarketplaceStore implements MarketplaceStore {
  private readonly db: Database.Database;
  private readonly putListingStmt: Database.Statement<[number, string, string, string, string]>;
  private readonly deleteListingStmt: Database.Statement<[number]>;
  private readonly getListingStmt: Database.Statement<[number], ListingRow>;
  private readonly putOrderStmt: Database.Statement<[number, number, string, string, string]>;
  private readonly getOrderStmt: Database.Statement<[number], OrderRow>;
  private readonly putEventStmt: Database.Statement<
    [string, string, number | null, number | null, string, string]
  >;
  private readonly getSequenceStmt: Database.Statement<[string], SequenceRow>;
  private readonly putSequenceStmt: Database.Statement<[string, number]>;
  private readonly getAdminStmt: Database.Statement<[], AdminRow>;
  private readonly putAdminStmt: Database.Statement<[string, number, string, string]>;
  private readonly getIdempotencyStmt: Database.Statement<[string, string], IdempotencyRow>;
  private readonly putIdempotencyStmt: Database.Statement<
    [string, string, string, number, string, string]
  >;
  private readonly applyChanges: (changes: ChangeSet) => MarketplaceEvent[];

  constructor(dbPath: string) {
    mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS listings (
        listing_id INTEGER PRIMARY KEY,
        item_id TEXT NOT NULL,
        registry_address TEXT NOT NULL,
        recorded_owner TEXT NOT NULL,
        listing_json TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_listings_registry_owner
      ON listings(registry_address, recorded_owner);

      CREATE TABLE IF NOT EXISTS orders (
        order_id INTEGER PRIMARY KEY,
        listing_id INTEGER NOT NULL,
        status TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        order_json TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_orders_listing
      ON orders(listing_id, order_id);

      CREATE TABLE IF NOT EXISTS marketplace_events (
        sequence INTEGER PRIMARY KEY AUTOINCREMENT,
        event_id TEXT NOT NULL UNIQUE,
        event_type TEXT NOT NULL,
        listing_id INTEGER,
        order_id INTEGER,
        occurred_at TEXT NOT NULL,
        event_json TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS sequences (
        name TEXT PRIMARY KEY,
        value INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS admin_config (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        admin TEXT NOT NULL,
        fee_percent_bps INTEGER NOT NULL,
        minimum_fee TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS marketplace_idempotency (
        action TEXT NOT NULL,
        idempotency_key TEXT NOT NULL,
        request_hash TEXT NOT NULL,
        response_status INTEGER NOT NULL,
        response_json TEXT NOT NULL,
        created_at TEXT NOT NULL,
        PRIMARY KEY(action, idempotency_key)
      );
    `);

    this.putListingStmt = this.db.prepare<[number, string, string, string, string]>(`
      INSERT INTO listings (listing_id, item_id, registry_address, recorded_owner, listing_json)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(listing_id) DO UPDATE SET
        item_id = excluded.item_id,
        registry_address = excluded.registry_address,
        recorded_owner = excluded.recorded_owner,
        listing_json = excluded.listing_json
    `);

    this.deleteListingStmt = this.db.prepare<[number]>(`
      DELETE FROM listings WHERE listing_id = ?
    `);

    this.getListingStmt = this.db.prepare<[number], ListingRow>(`
      SELECT listing_json
      FROM listings
      WHERE listing_id = ?
      LIMIT 1
    `);

    this.putOrderStmt = this.db.prepare<[number, number, string, string, string]>(`
      INSERT INTO orders (order_id, listing_id, status, updated_at, order_json)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(order_id) DO UPDATE SET
        status = excluded.status,
        updated_at = excluded.updated_at,
        order_json = excluded.order_json
    `);

    this.getOrderStmt = this.db.prepare<[number], OrderRow>(`
      SELECT order_json
      FROM orders
      WHERE order_id = ?
      LIMIT 1
    `);

    this.putEventStmt = this.db.prepare<
      [string, string, number | null, number | null, string, string]
    >(`
      INSERT INTO marketplace_events (event_id, event_type, listing_id, order_id, occurred_at, event_json)
      VALUES (?, ?, ?, ?, ?, ?)
    `);

    this.getSequenceStmt = this.db.prepare<[string], SequenceRow>(`
      SELECT value FROM sequences WHERE name = ? LIMIT 1
    `);

    this.putSequenceStmt = this.db.prepare<[string, number]>(`
      INSERT INTO sequences (name, value)
      VALUES (?, ?)
      ON CONFLICT(name) DO UPDATE SET value = excluded.value
    `);

    this.getAdminStmt = this.db.prepare<[], AdminRow>(`
      SELECT admin, fee_percent_bps, minimum_fee, updated_at
      FROM admin_config
      WHERE id = 1
    `);

    this.putAdminStmt = this.db.prepare<[string, number, string, string]>(`
      INSERT INTO admin_config (id, admin, fee_percent_bps, minimum_fee, updated_at)
      VALUES (1, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        admin = excluded.admin,
        fee_percent_bps = excluded.fee_percent_bps,
        minimum_fee = excluded.minimum_fee,
        updated_at = excluded.updated_at
    `);

    this.getIdempotencyStmt = this.db.prepare<[string, string], IdempotencyRow>(`
      SELECT action, idempotency_key, request_hash, response_status, response_json, created_at
      FROM marketplace_idempotency
      WHERE action = ? AND idempotency_key = ?
      LIMIT 1
    `);

    this.putIdempotencyStmt = this.db.prepare<[string, string, string, number, string, string]>(`
      INSERT INTO marketplace_idempotency (action, idempotency_key, request_hash, response_status, response_json, created_at)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT(action, idempotency_key) DO NOTHING
    `);

    this.applyChanges = this.db.transaction((changes: ChangeSet): MarketplaceEvent[] => {
      for (const listing of changes.listingsPut) {
        this.putListingStmt.run(
          listing.listingId,
          listing.itemId,
          listing.itemRegistryAddress,
          listing.recordedOwner,
          JSON.stringify(listing),
        );
      }
      for (const listingId of changes.listingsDeleted) {
        this.deleteListingStmt.run(listingId);
      }
      for (const order of changes.ordersPut) {
        this.putOrderStmt.run(
          order.orderId,
          order.listingId,
          order.status,
          order.updatedAt,
          JSON.stringify(order),
        );
      }
      for (const [name, value] of Object.entries(changes.sequences)) {
        if (value !== undefined) this.putSequenceStmt.run(name, value);
      }
      if (changes.adminConfig) {
        this.putAdminStmt.run(
          changes.adminConfig.admin,
          changes.adminConfig.feePercentBasisPoints,
          changes.adminConfig.minimumFee,
          changes.adminConfig.updatedAt,
        );
      }
      return changes.events.map((event) => {
        const info = this.putEventStmt.run(
          event.eventId,
          event.type,
          event.listingId ?? null,
          event.orderId ?? null,
          event.occurredAt,
          JSON.stringify(event),
        );
        return { ...event, sequence: Number(info.lastInsertRowid) };
      });
    });
  }

  getListing(listingId: number): Listing | null {
    const row = this.getListingStmt.get(listingId);
    if (!row) return null;
    return JSON.parse(row.listing_json) as Listing;
  }

  listListings(filter: ListingFilter = {}): Listing[] {
    const clauses: string[] = [];
    const params: string[] = [];
    if (filter.registry !== undefined) {
      clauses.push("registry_address = ?");
      params.push(filter.registry);
    }
    if (filter.owner !== undefined) {
      clauses.push("recorded_owner = ?");
      params.push(filter.owner);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
    const rows = this.db
      .prepare<string[], ListingRow>(`SELECT listing_json FROM listings ${where} ORDER BY listing_id ASC`)
      .all(...params);
    return rows.map((row) => JSON.parse(row.listing_json) as Listing);
  }

  getOrder(orderId: number): Order | null {
    const row = this.getOrderStmt.get(orderId);
    if (!row) return null;
    return JSON.parse(row.order_json) as Order;
  }

  listOrders(filter: ListOrdersQuery = {}): Order[] {
    const clauses: string[] = [];
    const params: Array<string | number> = [];
    if (filter.status !== undefined) {
      clauses.push("status = ?");
      params.push(filter.status);
    }
    if (filter.listingId !== undefined) {
      clauses.push("listing_id = ?");
      params.push(filter.listingId);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
    const rows = this.db
      .prepare<Array<string | number>, OrderRow>(`SELECT order_json FROM orders ${where} ORDER BY order_id ASC`)
      .all(...params);
    return rows.map((row) => JSON.parse(row.order_json) as Order);
  }

  listEvents(filter: EventFilter = {}): MarketplaceEvent[] {
    const clauses: string[] = [];
    const params: Array<string | number> = [];
    if (filter.listingId !== undefined) {
      clauses.push("listing_id = ?");
      params.push(filter.listingId);
    }
    if (filter.orderId !== undefined) {
      clauses.push("order_id = ?");
      params.push(filter.orderId);
    }
    if (filter.type !== undefined) {
      clauses.push("event_type = ?");
      params.push(filter.type);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
    const rows = this.db
      .prepare<Array<string | number>, EventRow>(
        `SELECT sequence, event_json FROM marketplace_events ${where} ORDER BY sequence ASC`,
      )
      .all(...params);
    return rows.map((row) => ({
      ...(JSON.parse(row.event_json) as Omit<MarketplaceEvent, "sequence">),
      sequence: row.sequence,
    }));
  }

  currentSequence(name: SequenceName): number {
    return this.getSequenceStmt.get(name)?.value ?? 0;
  }

  getAdminConfig(): AdminConfig | null {
    const row = this.getAdminStmt.get();
    if (!row) return null;
    return {
      admin: row.admin,
      feePercentBasisPoints: row.fee_percent_bps,
      minimumFee: row.minimum_fee,
      updatedAt: row.updated_at,
    };
  }

  commit(changes: ChangeSet): MarketplaceEvent[] {
    return this.applyChanges(changes);
  }

  getIdempotencyRecord(action: IdempotentAction, idempotencyKey: string): IdempotencyRecord | null {
    const row = this.getIdempotencyStmt.get(action, idempotencyKey);
    if (!row) return null;
    return {
      action: row.action,
      idempotencyKey: row.idempotency_key,
      requestHash: row.request_hash,
      responseStatus: row.response_status,
      responseBody: JSON.parse(row.response_json),
      createdAt: row.created_at,
    };
  }

  putIdempotencyRecord(record: IdempotencyRecord): void {
    this.putIdempotencyStmt.run(
      record.action,
      record.idempotencyKey,
      record.requestHash,
      record.responseStatus,
      JSON.stringify(record.responseBody),
      record.createdAt,
    );
  }

  close(): void {
    this.db.close();
  }
}
