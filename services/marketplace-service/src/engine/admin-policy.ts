import type { Address, AdminConfig } from "@itemex/shared";
import { isZeroAddress, sameAddress } from "../address.js";
import { MarketplaceError } from "../errors.js";
import { formatAmount, isFeePercent } from "./fees.js";
import type { EngineLogger } from "./logger.js";
import type { UnitOfWork } from "./unit-of-work.js";

export interface AdminDefaults {
  admin: Address;
  feePercentBasisPoints: number;
  minimumFee: bigint;
}

export interface ActiveFees {
  feePercentBasisPoints: number;
  minimumFee: bigint;
}

/**
 * Fee configuration and the privileged role that may change it. Changes
 * apply to listings and orders created afterwards; an order keeps the fee it
 * was quoted.
 */
export class AdminPolicy {
  constructor(
    private readonly defaults: AdminDefaults,
    private readonly log: EngineLogger,
  ) {}

  seed(uow: UnitOfWork): boolean {
    if (uow.getAdminConfig()) return false;
    if (!isFeePercent(this.defaults.feePercentBasisPoints)) {
      throw new MarketplaceError(
        "INVALID_FEE_PERCENT",
        `Fee percent must be an integer between 0 and 10000 basis points`,
      );
    }
    uow.putAdminConfig({
      admin: this.defaults.admin,
      feePercentBasisPoints: this.defaults.feePercentBasisPoints,
      minimumFee: formatAmount(this.defaults.minimumFee),
      updatedAt: new Date().toISOString(),
    });
    return true;
  }

  current(uow: UnitOfWork): AdminConfig {
    const config = uow.getAdminConfig();
    if (!config) {
      throw new Error("Admin configuration has not been seeded");
    }
    return config;
  }

  fees(uow: UnitOfWork): ActiveFees {
    const config = this.current(uow);
    return {
      feePercentBasisPoints: config.feePercentBasisPoints,
      minimumFee: BigInt(config.minimumFee),
    };
  }

  changeFeePercent(uow: UnitOfWork, caller: Address, feePercentBasisPoints: number): AdminConfig {
    const config = this.requireAdmin(uow, caller);
    if (!isFeePercent(feePercentBasisPoints)) {
      throw new MarketplaceError(
        "INVALID_FEE_PERCENT",
        "Fee percent must be an integer between 0 and 10000 basis points",
      );
    }
    const updated = this.write(uow, { ...config, feePercentBasisPoints });
    uow.emit("FEE_PERCENT_CHANGED", {
      actor: caller,
      details: { from: config.feePercentBasisPoints, to: feePercentBasisPoints },
    });
    this.log.info({ from: config.feePercentBasisPoints, to: feePercentBasisPoints }, "fee percent changed");
    return updated;
  }

  changeMinimumFee(uow: UnitOfWork, caller: Address, minimumFee: bigint): AdminConfig {
    const config = this.requireAdmin(uow, caller);
    const updated = this.write(uow, { ...config, minimumFee: formatAmount(minimumFee) });
    uow.emit("MINIMUM_FEE_CHANGED", {
      actor: caller,
      details: { from: config.minimumFee, to: updated.minimumFee },
    });
    this.log.info({ from: config.minimumFee, to: updated.minimumFee }, "minimum fee changed");
    return updated;
  }

  setAdmin(uow: UnitOfWork, caller: Address, admin: Address): AdminConfig {
    const config = this.requireAdmin(uow, caller);
    if (isZeroAddress(admin)) {
      throw new MarketplaceError("INVALID_ADDRESS", "Admin must not be the zero address");
    }
    const updated = this.write(uow, { ...config, admin });
    uow.emit("ADMIN_CHANGED", { actor: caller, details: { from: config.admin, to: admin } });
    this.log.info({ from: config.admin, to: admin }, "admin role handed over");
    return updated;
  }

  private requireAdmin(uow: UnitOfWork, caller: Address): AdminConfig {
    const config = this.current(uow);
    if (!sameAddress(config.admin, caller)) {
      throw new MarketplaceError("NOT_ADMIN", "Only the marketplace admin may change this setting");
    }
    return config;
  }

  private write(uow: UnitOfWork, config: AdminConfig): AdminConfig {
    const updated = { ...config, updatedAt: new Date().toISOString() };
    uow.putAdminConfig(updated);
    return updated;
  }
}
