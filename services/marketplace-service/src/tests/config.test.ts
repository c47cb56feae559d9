import assert from "node:assert/strict";
import test from "node:test";
import { getAddress } from "ethers";
import { ConfigError, loadConfig } from "../config.js";
import { ADDR } from "./fakes.js";

const MIXED_CASE = "0xabcdefabcdefabcdefabcdefabcdefabcdefabcd";

const requiredEnv = {
  MARKETPLACE_ADDRESS: ADDR.marketplace,
  LEDGER_ADDRESS: ADDR.ledger,
  ADMIN_ADDRESS: MIXED_CASE,
};

function configError(variable: string, message?: string) {
  return (error: unknown) => {
    assert.ok(error instanceof ConfigError);
    assert.equal(error.variable, variable);
    if (message) assert.equal(error.message, message);
    return true;
  };
}

test("applies defaults and normalizes addresses", () => {
  const config = loadConfig(requiredEnv);

  assert.equal(config.marketplaceAddress, ADDR.marketplace);
  assert.equal(config.adminAddress, getAddress(MIXED_CASE));
  assert.equal(config.dbPath, "data/marketplace-service.db");
  assert.equal(config.feePercentBasisPoints, 300);
  assert.equal(config.minimumFee, 1n);
  assert.equal(config.chainRpcUrl, "http://127.0.0.1:8545");
  assert.equal(config.ledgerUrl, undefined);
  assert.equal(config.serviceAuthToken, undefined);
});

test("reads optional settings from the environment", () => {
  const config = loadConfig({
    ...requiredEnv,
    MARKETPLACE_DB_PATH: "/tmp/market.db",
    LEDGER_URL: "http://ledger:4103/",
    FEE_PERCENT_BPS: "250",
    MINIMUM_FEE: "10",
    SERVICE_AUTH_TOKEN: " test-secret ",
    EVENTS_WEBHOOK_URL: "http://events:4105/marketplace",
  });

  assert.equal(config.dbPath, "/tmp/market.db");
  assert.equal(config.ledgerUrl, "http://ledger:4103");
  assert.equal(config.feePercentBasisPoints, 250);
  assert.equal(config.minimumFee, 10n);
  assert.equal(config.serviceAuthToken, "test-secret");
  assert.equal(config.eventsWebhookUrl, "http://events:4105/marketplace");
});

test("explicit overrides win over the environment", () => {
  const config = loadConfig(
    { ...requiredEnv, FEE_PERCENT_BPS: "250", MINIMUM_FEE: "10" },
    { feePercentBasisPoints: 0, minimumFee: 0n, dbPath: "/tmp/override.db" },
  );
  assert.equal(config.feePercentBasisPoints, 0);
  assert.equal(config.minimumFee, 0n);
  assert.equal(config.dbPath, "/tmp/override.db");
});

test("rejects missing and malformed values naming the variable", () => {
  assert.throws(
    () => loadConfig({ MARKETPLACE_ADDRESS: ADDR.marketplace, ADMIN_ADDRESS: ADDR.admin }),
    configError("LEDGER_ADDRESS", "LEDGER_ADDRESS: is required"),
  );
  assert.throws(
    () => loadConfig({ ...requiredEnv, ADMIN_ADDRESS: "nope" }),
    configError("ADMIN_ADDRESS", "ADMIN_ADDRESS: 'nope' is not a valid address"),
  );
  assert.throws(() => loadConfig({ ...requiredEnv, FEE_PERCENT_BPS: "10001" }), configError("FEE_PERCENT_BPS"));
  assert.throws(() => loadConfig({ ...requiredEnv, FEE_PERCENT_BPS: "3.5" }), configError("FEE_PERCENT_BPS"));
  assert.throws(() => loadConfig({ ...requiredEnv, MINIMUM_FEE: "-1" }), configError("MINIMUM_FEE"));
});
