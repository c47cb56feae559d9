import type {
  ErrorResponse,
  MarketplaceErrorCode,
  MarketplaceErrorDetails,
} from "@itemex/shared";
import type { ExternalFailure } from "./engine/external.js";

export class MarketplaceError extends Error {
  constructor(
    readonly code: MarketplaceErrorCode,
    message: string,
    readonly details: MarketplaceErrorDetails = {},
  ) {
    super(message);
    this.name = "MarketplaceError";
  }
}

export const HTTP_STATUS_BY_CODE: Record<MarketplaceErrorCode, number> = {
  INVALID_REGISTRY: 400,
  INVALID_PRICE: 400,
  SAME_PARTY: 400,
  INVALID_FEE_PERCENT: 400,
  INVALID_ADDRESS: 400,
  NOT_AUTHORIZED: 403,
  NOT_ADMIN: 403,
  UNAUTHORIZED: 401,
  INVALID_LISTING: 404,
  ITEM_NOT_FOUND: 404,
  OWNERSHIP_CHANGED: 409,
  ITEM_NO_LONGER_EXISTS: 409,
  INVALID_ORDER: 409,
  INSUFFICIENT_ALLOWANCE: 422,
  INSUFFICIENT_BALANCE: 422,
  EXTERNAL_REVERT: 502,
  EXTERNAL_PANIC: 502,
  EXTERNAL_FAILURE: 502,
};

/**
 * Drift failures of `buy`: the listing removal and its event are committed
 * before the error reaches the caller.
 */
export const COMMITTING_ERROR_CODES: ReadonlySet<MarketplaceErrorCode> = new Set([
  "OWNERSHIP_CHANGED",
  "ITEM_NO_LONGER_EXISTS",
]);

export function failureDetails(failure: ExternalFailure): MarketplaceErrorDetails {
  if (failure.kind === "reason") return { reason: failure.reason };
  if (failure.kind === "panic") return { panicCode: failure.code };
  return { data: failure.data };
}

/**
 * Re-raises an external failure under the kind that tells an explicit revert
 * reason apart from an arithmetic fault and from an unexplained failure.
 */
export function externalError(
  failure: ExternalFailure,
  action: string,
  details: MarketplaceErrorDetails = {},
): MarketplaceError {
  const merged = { ...details, ...failureDetails(failure) };
  if (failure.kind === "reason") {
    return new MarketplaceError("EXTERNAL_REVERT", `${action} reverted: ${failure.reason}`, merged);
  }
  if (failure.kind === "panic") {
    return new MarketplaceError(
      "EXTERNAL_PANIC",
      `${action} hit an arithmetic fault (panic code ${failure.code})`,
      merged,
    );
  }
  return new MarketplaceError("EXTERNAL_FAILURE", `${action} failed without a reason`, merged);
}

export function toErrorResponse(error: MarketplaceError): ErrorResponse {
  const response: ErrorResponse = {
    error: error.code.toLowerCase(),
    message: error.message,
  };
  if (Object.keys(error.details).length > 0) {
    response.details = error.details;
  }
  return response;
}
