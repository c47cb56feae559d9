import type { SettlementOutcome } from "@itemex/shared";
import type { UnitOfWork } from "./unit-of-work.js";

/**
 * State of the top-level request currently holding the queue. While `buy`
 * waits on the fee leg, the ledger's callback for that order runs inside this
 * scope instead of queueing behind it.
 */
export class RequestScope {
  awaitingCallbackFor: number | null = null;
  callbackOutcome: SettlementOutcome | null = null;
  callbackFailure: { error: unknown } | null = null;

  constructor(
    readonly label: string,
    readonly uow: UnitOfWork,
  ) {}

  /** Takes the one in-scope callback slot for `orderId`; later callbacks queue. */
  claimCallback(orderId: number): boolean {
    if (this.awaitingCallbackFor !== orderId) return false;
    this.awaitingCallbackFor = null;
    return true;
  }
}
