import { buildServiceAuthHeaders, type Address } from "@itemex/shared";
import {
  failed,
  succeeded,
  type ExternalFailure,
  type ExternalResult,
  type FungibleLedger,
} from "../engine/external.js";
import { formatAmount, parseAmount } from "../engine/fees.js";
import { isObject, requestJson, type HttpResult } from "./http.js";

/**
 * Ledger error bodies carry `reason` for an explicit revert, `panicCode` for
 * an arithmetic fault, and optionally raw `data`.
 */
export function classifyLedgerFailure(result: HttpResult): ExternalFailure {
  if (result.status === 0) {
    return { kind: "opaque", data: result.error ?? "ledger unreachable" };
  }
  const body = result.data;
  if (isObject(body)) {
    if (typeof body.panicCode === "number" && Number.isInteger(body.panicCode)) {
      return { kind: "panic", code: body.panicCode };
    }
    if (typeof body.reason === "string" && body.reason.length > 0) {
      return { kind: "reason", reason: body.reason };
    }
    if (typeof body.data === "string") {
      return { kind: "opaque", data: body.data };
    }
  }
  return { kind: "opaque", data: result.error ?? `ledger responded ${result.status}` };
}

function readAmountField(result: HttpResult, field: string): ExternalResult<bigint> {
  if (!result.ok) return failed(classifyLedgerFailure(result));
  const value = isObject(result.data) ? parseAmount(result.data[field]) : null;
  if (value === null) {
    return failed({ kind: "opaque", data: `ledger response is missing '${field}'` });
  }
  return succeeded(value);
}

function readSuccess(result: HttpResult): ExternalResult<boolean> {
  if (!result.ok) return failed(classifyLedgerFailure(result));
  if (!isObject(result.data) || typeof result.data.success !== "boolean") {
    return failed({ kind: "opaque", data: "ledger response is missing 'success'" });
  }
  return succeeded(result.data.success);
}

/**
 * Fungible ledger reached over HTTP. The marketplace acts as spender
 * (`operator`); the ledger delivers the fee-leg callback to
 * `POST /settlement/callback` before it answers the transfer.
 */
export class HttpFungibleLedger implements FungibleLedger {
  constructor(
    private readonly baseUrl: string,
    private readonly operator: Address,
    private readonly serviceAuthToken?: string,
  ) {}

  async balanceOf(owner: Address): Promise<ExternalResult<bigint>> {
    const result = await requestJson(`${this.baseUrl}/balances/${encodeURIComponent(owner)}`, {
      method: "GET",
      headers: buildServiceAuthHeaders(this.serviceAuthToken),
    });
    return readAmountField(result, "balance");
  }

  async allowance(owner: Address, spender: Address): Promise<ExternalResult<bigint>> {
    const result = await requestJson(
      `${this.baseUrl}/allowances/${encodeURIComponent(owner)}/${encodeURIComponent(spender)}`,
      { method: "GET", headers: buildServiceAuthHeaders(this.serviceAuthToken) },
    );
    return readAmountField(result, "allowance");
  }

  async transferFrom(from: Address, to: Address, amount: bigint): Promise<ExternalResult<boolean>> {
    return readSuccess(
      await this.post("/transfers/from", {
        operator: this.operator,
        from,
        to,
        amount: formatAmount(amount),
      }),
    );
  }

  async transferWithCallback(
    from: Address,
    to: Address,
    amount: bigint,
    payload: string,
  ): Promise<ExternalResult<boolean>> {
    return readSuccess(
      // the callback round trip happens inside this request
      await this.post(
        "/transfers/with-callback",
        { operator: this.operator, from, to, amount: formatAmount(amount), payload },
        30000,
      ),
    );
  }

  private post(path: string, body: Record<string, string>, timeoutMs?: number): Promise<HttpResult> {
    return requestJson(
      `${this.baseUrl}${path}`,
      {
        method: "POST",
        headers: {
          ...buildServiceAuthHeaders(this.serviceAuthToken),
          "content-type": "application/json",
        },
        body: JSON.stringify(body),
      },
      timeoutMs,
    );
  }
}
