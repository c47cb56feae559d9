import type { Address } from "@itemex/shared";
import { normalizeAddress } from "./address.js";
import { isFeePercent, parseAmount } from "./engine/fees.js";

const DEFAULT_MARKETPLACE_DB_PATH = "data/marketplace-service.db";
const DEFAULT_CHAIN_RPC_URL = "http://127.0.0.1:8545";
const DEFAULT_FEE_PERCENT_BPS = 300;
const DEFAULT_MINIMUM_FEE = 1n;

export interface MarketplaceConfig {
  dbPath: string;
  marketplaceAddress: Address;
  ledgerAddress: Address;
  ledgerUrl?: string;
  adminAddress: Address;
  feePercentBasisPoints: number;
  minimumFee: bigint;
  serviceAuthToken?: string;
  chainRpcUrl: string;
  chainPrivateKey?: string;
  eventsWebhookUrl?: string;
}

export class ConfigError extends Error {
  constructor(
    readonly variable: string,
    message: string,
  ) {
    super(`${variable}: ${message}`);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function trimUrl(value: string | undefined): string | undefined {
  return optional(value)?.replace(/\/$/, "");
}

function requireAddress(variable: string, value: string | undefined): Address {
  if (value === undefined) {
    throw new ConfigError(variable, "is required");
  }
  const address = normalizeAddress(value);
  if (!address) {
    throw new ConfigError(variable, `'${value}' is not a valid address`);
  }
  return address;
}

function readFeePercent(value: number | string | undefined): number {
  if (value === undefined) return DEFAULT_FEE_PERCENT_BPS;
  const parsed = typeof value === "number" ? value : Number(value);
  if (!isFeePercent(parsed)) {
    throw new ConfigError("FEE_PERCENT_BPS", "must be an integer between 0 and 10000");
  }
  return parsed;
}

function readMinimumFee(value: bigint | string | undefined): bigint {
  if (value === undefined) return DEFAULT_MINIMUM_FEE;
  if (typeof value === "bigint") {
    if (value < 0n) throw new ConfigError("MINIMUM_FEE", "must not be negative");
    return value;
  }
  const parsed = parseAmount(value);
  if (parsed === null) {
    throw new ConfigError("MINIMUM_FEE", "must be a non-negative integer amount");
  }
  return parsed;
}

export type ConfigOverrides = Partial<MarketplaceConfig>;

/** Explicit overrides win over the environment. */
export function loadConfig(env: Env = process.env, overrides: ConfigOverrides = {}): MarketplaceConfig {
  return {
    dbPath: overrides.dbPath || optional(env.MARKETPLACE_DB_PATH) || DEFAULT_MARKETPLACE_DB_PATH,
    marketplaceAddress: requireAddress(
      "MARKETPLACE_ADDRESS",
      overrides.marketplaceAddress ?? optional(env.MARKETPLACE_ADDRESS),
    ),
    ledgerAddress: requireAddress("LEDGER_ADDRESS", overrides.ledgerAddress ?? optional(env.LEDGER_ADDRESS)),
    ledgerUrl: trimUrl(overrides.ledgerUrl ?? env.LEDGER_URL),
    adminAddress: requireAddress("ADMIN_ADDRESS", overrides.adminAddress ?? optional(env.ADMIN_ADDRESS)),
    feePercentBasisPoints: readFeePercent(overrides.feePercentBasisPoints ?? optional(env.FEE_PERCENT_BPS)),
    minimumFee: readMinimumFee(overrides.minimumFee ?? optional(env.MINIMUM_FEE)),
    serviceAuthToken: overrides.serviceAuthToken ?? optional(env.SERVICE_AUTH_TOKEN),
    chainRpcUrl: trimUrl(overrides.chainRpcUrl ?? env.CHAIN_RPC_URL) || DEFAULT_CHAIN_RPC_URL,
    chainPrivateKey: overrides.chainPrivateKey ?? optional(env.CHAIN_PRIVATE_KEY),
    eventsWebhookUrl: overrides.eventsWebhookUrl ?? optional(env.EVENTS_WEBHOOK_URL),
  };
}
