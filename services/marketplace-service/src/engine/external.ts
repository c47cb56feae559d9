import type { Address, SettlementOutcome } from "@itemex/shared";

/**
 * How an external collaborator failed: with an explicit reason string, with an
 * arithmetic/overflow fault, or with nothing but raw data.
 */
export type ExternalFailure =
  | { kind: "reason"; reason: string }
  | { kind: "panic"; code: number }
  | { kind: "opaque"; data: string };

export type ExternalResult<T> =
  | { ok: true; value: T }
  | { ok: false; failure: ExternalFailure };

export function succeeded<T>(value: T): ExternalResult<T> {
  return { ok: true, value };
}

export function failed<T = never>(failure: ExternalFailure): ExternalResult<T> {
  return { ok: false, failure };
}

/** Item-ownership registry holding the items being sold. */
export interface ItemRegistry {
  ownerOf(itemId: string): Promise<ExternalResult<Address>>;
  getApproved(itemId: string): Promise<ExternalResult<Address>>;
  isApprovedForAll(owner: Address, operator: Address): Promise<ExternalResult<boolean>>;
  /** Moves the item with the marketplace as operator; applies fully or not at all. */
  safeTransferFrom(from: Address, to: Address, itemId: string): Promise<ExternalResult<void>>;
}

export type ItemRegistryResolver = (registryAddress: Address) => ItemRegistry;

/**
 * Fungible-balance ledger the price and the fee are paid in. Transfers are
 * made with the marketplace as spender.
 */
export interface FungibleLedger {
  balanceOf(owner: Address): Promise<ExternalResult<bigint>>;
  allowance(owner: Address, spender: Address): Promise<ExternalResult<bigint>>;
  transferFrom(from: Address, to: Address, amount: bigint): Promise<ExternalResult<boolean>>;
  /**
   * Moves `amount` and, before returning, invokes the receiver's
   * `onTransferReceived(ledger, from, amount, payload)`. A failing callback
   * fails the transfer.
   */
  transferWithCallback(
    from: Address,
    to: Address,
    amount: bigint,
    payload: string,
  ): Promise<ExternalResult<boolean>>;
}

/** The one capability the ledger holds on the marketplace. */
export interface SettlementCallbackReceiver {
  onTransferReceived(
    caller: Address,
    from: Address,
    amount: bigint,
    payload: string,
  ): Promise<SettlementOutcome>;
}
