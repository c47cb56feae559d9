import assert from "node:assert/strict";
import test from "node:test";
import type { MarketplaceErrorCode } from "@itemex/shared";
import { ZeroAddress } from "../address.js";
import { encodeOrderPayload } from "../engine/order-payload.js";
import { MarketplaceError } from "../errors.js";
import { ADDR, createHarness, type Harness, type HarnessOptions } from "./fakes.js";

function hasCode(code: MarketplaceErrorCode, details?: Record<string, unknown>) {
  return (error: unknown) => {
    assert.ok(error instanceof MarketplaceError, `expected MarketplaceError, got ${String(error)}`);
    assert.equal(error.code, code);
    if (details) assert.deepEqual(error.details, details);
    return true;
  };
}

async function withHarness(run: (h: Harness) => Promise<void>, options: HarnessOptions = {}) {
  const h = createHarness(options);
  try {
    await run(h);
  } finally {
    h.cleanup();
  }
}

function listItem(h: Harness, itemId = "7", price = 2n, caller: string = ADDR.seller) {
  return h.marketplace.list(caller, {
    itemId,
    price,
    registryAddress: ADDR.registry,
    metadataURI: `ipfs://item-${itemId}`,
  });
}

function eventTypes(h: Harness) {
  return h.marketplace.listEvents().map((event) => event.type);
}

test("list stores the snapshot that nftInfo returns", async () => {
  await withHarness(async (h) => {
    h.registry.mintApproved("7", ADDR.seller);
    const listing = await listItem(h);

    assert.equal(listing.listingId, 1);
    assert.equal(listing.recordedOwner, ADDR.seller);
    assert.equal(listing.price, "2");
    assert.equal(listing.metadataURI, "ipfs://item-7");
    assert.deepEqual(h.marketplace.nftInfo(1), listing);
    assert.deepEqual(eventTypes(h), ["LISTING_CREATED"]);
    assert.equal(h.publisher.published.length, 1);
    assert.equal(h.publisher.published[0]?.sequence, 1);
  });
});

test("event delivery does not hold up the next request", async () => {
  await withHarness(async (h) => {
    h.registry.mintApproved("7", ADDR.seller);
    h.registry.mintApproved("8", ADDR.seller);
    h.publisher.stall = new Promise<void>(() => {});

    await listItem(h, "7");
    await listItem(h, "8");
    h.publisher.stall = null;
    h.publisher.failure = new Error("webhook down");
    h.registry.mintApproved("9", ADDR.seller);
    const third = await listItem(h, "9");

    assert.equal(third.listingId, 3);
    assert.deepEqual(
      h.publisher.published.map((event) => event.listingId),
      [1, 2, 3],
    );
    assert.deepEqual(eventTypes(h), ["LISTING_CREATED", "LISTING_CREATED", "LISTING_CREATED"]);
  });
});

test("list accepts an approved address and an operator on behalf of the owner", async () => {
  await withHarness(async (h) => {
    h.registry.mint("7", ADDR.seller);
    h.registry.approve("7", ADDR.other);
    const approved = await listItem(h, "7", 2n, ADDR.other);
    assert.equal(approved.recordedOwner, ADDR.seller);

    h.registry.mint("8", ADDR.seller);
    h.registry.setApprovalForAll(ADDR.seller, ADDR.other, true);
    h.registry.failures.getApproved = { kind: "reason", reason: "query disabled" };
    const operated = await listItem(h, "8", 2n, ADDR.other);
    assert.equal(operated.listingId, 2);
    assert.equal(operated.recordedOwner, ADDR.seller);
  });
});

test("list rejects bad registries, prices and callers", async () => {
  await withHarness(async (h) => {
    h.registry.mint("7", ADDR.seller);

    await assert.rejects(
      h.marketplace.list(ADDR.seller, {
        itemId: "7",
        price: 2n,
        registryAddress: ZeroAddress,
        metadataURI: "",
      }),
      hasCode("INVALID_REGISTRY"),
    );
    await assert.rejects(listItem(h, "7", 0n), hasCode("INVALID_PRICE", { itemId: "7", required: "1" }));
    await assert.rejects(listItem(h, "7", 2n, ADDR.other), hasCode("NOT_AUTHORIZED", { itemId: "7" }));
    await assert.rejects(
      listItem(h, "9"),
      hasCode("ITEM_NOT_FOUND", { itemId: "9", reason: "ERC721: invalid token ID" }),
    );
    assert.deepEqual(h.marketplace.listListings(), []);
    assert.deepEqual(eventTypes(h), []);
  });
});

test("list maps ownerOf failures by kind", async () => {
  await withHarness(async (h) => {
    h.registry.failures.ownerOf = { kind: "panic", code: 0x11 };
    await assert.rejects(listItem(h), hasCode("EXTERNAL_PANIC", { itemId: "7", panicCode: 17 }));

    h.registry.failures.ownerOf = { kind: "opaque", data: "0xdeadbeef" };
    await assert.rejects(listItem(h), hasCode("EXTERNAL_FAILURE", { itemId: "7", data: "0xdeadbeef" }));
  });
});

test("end-to-end sale settles through the ledger callback", async () => {
  await withHarness(async (h) => {
    h.prepareSale("7", 2n);
    await listItem(h);

    const order = await h.marketplace.buy(ADDR.buyer, 1);

    assert.equal(order.orderId, 1);
    assert.equal(order.status, "FULFILLED");
    assert.equal(order.platformFee, "1");
    assert.equal(order.sellerAmount, "1");
    assert.equal(h.registry.ownerOfNow("7"), ADDR.buyer);
    assert.equal(h.ledger.balanceNow(ADDR.buyer), 0n);
    assert.equal(h.ledger.balanceNow(ADDR.seller), 1n);
    assert.equal(h.ledger.balanceNow(ADDR.marketplace), 1n);
    assert.deepEqual(h.ledger.callbacks, [{ outcome: "FULFILLED", orderId: 1 }]);
    assert.equal(h.marketplace.nftInfo(1), null);
    assert.equal(h.marketplace.orderInfo(1)?.status, "FULFILLED");
    assert.deepEqual(eventTypes(h), ["LISTING_CREATED", "ORDER_PLACED", "ITEM_SOLD"]);
    assert.deepEqual(
      h.publisher.published.map((event) => event.sequence),
      [1, 2, 3],
    );

    await assert.rejects(h.marketplace.buy(ADDR.buyer, 1), hasCode("INVALID_LISTING", { listingId: 1 }));
  });
});

test("the marketplace may move an item through operator approval", async () => {
  await withHarness(async (h) => {
    h.registry.mint("7", ADDR.seller);
    h.registry.setApprovalForAll(ADDR.seller, ADDR.marketplace, true);
    h.ledger.mint(ADDR.buyer, 2n);
    h.ledger.approve(ADDR.buyer, 2n);
    h.ledger.approve(ADDR.seller, 1n);
    await listItem(h);

    const order = await h.marketplace.buy(ADDR.buyer, 1);
    assert.equal(order.status, "FULFILLED");
    assert.equal(h.registry.ownerOfNow("7"), ADDR.buyer);
  });
});

test("ownership drift since listing removes the listing and commits the event", async () => {
  await withHarness(async (h) => {
    h.prepareSale("7", 2n);
    await listItem(h);
    h.registry.forceTransfer("7", ADDR.other);

    await assert.rejects(
      h.marketplace.buy(ADDR.buyer, 1),
      hasCode("OWNERSHIP_CHANGED", { listingId: 1, itemId: "7" }),
    );
    assert.equal(h.marketplace.nftInfo(1), null);
    assert.deepEqual(h.marketplace.listOrders(), []);
    assert.deepEqual(eventTypes(h), ["LISTING_CREATED", "ITEM_NO_LONGER_AVAILABLE"]);
    const [, drift] = h.marketplace.listEvents();
    assert.deepEqual(drift?.details, {
      itemId: "7",
      recordedOwner: ADDR.seller,
      currentOwner: ADDR.other,
    });

    await assert.rejects(h.marketplace.buy(ADDR.buyer, 1), hasCode("INVALID_LISTING"));
  });
});

test("a burned item removes the listing with ITEM_NO_LONGER_EXISTS", async () => {
  await withHarness(async (h) => {
    h.prepareSale("7", 2n);
    await listItem(h);
    h.registry.burn("7");

    await assert.rejects(
      h.marketplace.buy(ADDR.buyer, 1),
      hasCode("ITEM_NO_LONGER_EXISTS", {
        listingId: 1,
        itemId: "7",
        reason: "ERC721: invalid token ID",
      }),
    );
    assert.equal(h.marketplace.nftInfo(1), null);
    assert.deepEqual(eventTypes(h), ["LISTING_CREATED", "ITEM_NO_LONGER_EXISTS"]);
  });
});

test("a seller cannot buy their own listing", async () => {
  await withHarness(async (h) => {
    h.prepareSale("7", 2n);
    await listItem(h);

    await assert.rejects(h.marketplace.buy(ADDR.seller, 1), hasCode("SAME_PARTY", { listingId: 1 }));
    assert.deepEqual(h.marketplace.listOrders(), []);
    assert.deepEqual(eventTypes(h), ["LISTING_CREATED"]);
    assert.notEqual(h.marketplace.nftInfo(1), null);
  });
});

test("an aborted buy leaves nothing behind and does not consume the order id", async () => {
  await withHarness(async (h) => {
    h.prepareSale("7", 2n);
    await listItem(h);
    h.ledger.failures.transferFrom = { kind: "panic", code: 0x11 };

    await assert.rejects(
      h.marketplace.buy(ADDR.buyer, 1),
      hasCode("EXTERNAL_PANIC", { orderId: 1, listingId: 1, panicCode: 17 }),
    );
    assert.deepEqual(h.marketplace.listOrders(), []);
    assert.deepEqual(eventTypes(h), ["LISTING_CREATED"]);

    delete h.ledger.failures.transferFrom;
    const order = await h.marketplace.buy(ADDR.buyer, 1);
    assert.equal(order.orderId, 1);
    assert.equal(order.status, "FULFILLED");
  });
});

test("buy checks balance and both allowances before moving funds", async () => {
  await withHarness(async (h) => {
    h.registry.mintApproved("7", ADDR.seller);
    await listItem(h);

    await assert.rejects(
      h.marketplace.buy(ADDR.buyer, 1),
      hasCode("INSUFFICIENT_BALANCE", { orderId: 1, listingId: 1, required: "2", available: "0" }),
    );

    h.ledger.mint(ADDR.buyer, 2n);
    h.ledger.approve(ADDR.buyer, 1n);
    await assert.rejects(
      h.marketplace.buy(ADDR.buyer, 1),
      hasCode("INSUFFICIENT_ALLOWANCE", { orderId: 1, listingId: 1, required: "2", available: "1" }),
    );

    h.ledger.approve(ADDR.buyer, 2n);
    await assert.rejects(
      h.marketplace.buy(ADDR.buyer, 1),
      hasCode("INSUFFICIENT_ALLOWANCE", { orderId: 1, listingId: 1, required: "1", available: "0" }),
    );

    assert.equal(h.ledger.balanceNow(ADDR.buyer), 2n);
    assert.deepEqual(h.marketplace.listOrders(), []);
  });
});

test("a declined price transfer is an external failure", async () => {
  await withHarness(async (h) => {
    h.prepareSale("7", 2n);
    await listItem(h);
    h.ledger.declines.add("transferFrom");

    await assert.rejects(
      h.marketplace.buy(ADDR.buyer, 1),
      hasCode("EXTERNAL_FAILURE", { orderId: 1, listingId: 1 }),
    );
  });
});

test("a fee leg failure without a callback keeps the ledger's kind", async () => {
  await withHarness(async (h) => {
    h.prepareSale("7", 2n);
    await listItem(h);
    h.ledger.failures.transferWithCallback = { kind: "reason", reason: "paused" };

    await assert.rejects(
      h.marketplace.buy(ADDR.buyer, 1),
      hasCode("EXTERNAL_REVERT", { orderId: 1, listingId: 1, reason: "paused" }),
    );
  });
});

test("a nested callback failure surfaces under its own kind", async () => {
  await withHarness(async (h) => {
    h.prepareSale("7", 2n);
    await listItem(h);

    h.ledger.callbackOverrides = { amount: 5n };
    await assert.rejects(
      h.marketplace.buy(ADDR.buyer, 1),
      hasCode("INVALID_ORDER", { orderId: 1, listingId: 1, required: "1", available: "5" }),
    );

    assert.equal(h.ledger.callbackErrors.length, 1);
    assert.deepEqual(h.marketplace.listOrders(), []);
    assert.equal(h.registry.ownerOfNow("7"), ADDR.seller);
  });
});

test("a callback from anyone but the ledger cannot join an in-flight purchase", async () => {
  await withHarness(async (h) => {
    h.prepareSale("7", 2n);
    await listItem(h);
    const spoofed: Array<Promise<unknown>> = [];
    h.ledger.beforeCallback = () => {
      spoofed.push(
        h.marketplace
          .onTransferReceived(ADDR.other, ADDR.seller, 1n, encodeOrderPayload(1))
          .then(
            () => null,
            (error: unknown) => error,
          ),
      );
    };

    const order = await h.marketplace.buy(ADDR.buyer, 1);

    assert.equal(order.status, "FULFILLED");
    assert.deepEqual(h.ledger.callbacks, [{ outcome: "FULFILLED", orderId: 1 }]);
    assert.equal(h.registry.ownerOfNow("7"), ADDR.buyer);
    assert.equal(h.marketplace.orderInfo(1)?.status, "FULFILLED");
    assert.equal(h.marketplace.nftInfo(1), null);

    assert.equal(spoofed.length, 1);
    hasCode("UNAUTHORIZED", { orderId: 1 })(await spoofed[0]);
    assert.equal(h.registry.transfers.length, 1);
  });
});

test("a failing item transfer aborts the sale and leaves the item with the seller", async () => {
  await withHarness(async (h) => {
    h.prepareSale("7", 2n);
    await listItem(h);
    h.registry.failures.safeTransferFrom = { kind: "opaque", data: "0x" };

    await assert.rejects(
      h.marketplace.buy(ADDR.buyer, 1),
      hasCode("EXTERNAL_FAILURE", { orderId: 1, listingId: 1, itemId: "7", data: "0x" }),
    );
    assert.equal(h.registry.ownerOfNow("7"), ADDR.seller);
    assert.notEqual(h.marketplace.nftInfo(1), null);
  });
});

test("the callback refuses to move an item the marketplace was never approved for", async () => {
  await withHarness(async (h) => {
    h.registry.mint("7", ADDR.seller);
    h.ledger.mint(ADDR.buyer, 2n);
    h.ledger.approve(ADDR.buyer, 2n);
    h.ledger.approve(ADDR.seller, 1n);
    await listItem(h);

    await assert.rejects(
      h.marketplace.buy(ADDR.buyer, 1),
      hasCode("NOT_AUTHORIZED", { orderId: 1, listingId: 1, itemId: "7" }),
    );

    h.ledger.mint(ADDR.buyer, 2n);
    h.ledger.approve(ADDR.buyer, 2n);
    h.registry.failures.getApproved = { kind: "panic", code: 0x32 };
    await assert.rejects(
      h.marketplace.buy(ADDR.buyer, 1),
      hasCode("NOT_AUTHORIZED", { orderId: 1, listingId: 1, itemId: "7", panicCode: 50 }),
    );
  });
});

test("drift detected in the callback cancels the order and commits", async () => {
  await withHarness(async (h) => {
    h.prepareSale("7", 2n);
    await listItem(h);
    h.ledger.beforeCallback = () => h.registry.forceTransfer("7", ADDR.other);

    const order = await h.marketplace.buy(ADDR.buyer, 1);

    assert.equal(order.status, "CANCELLED");
    assert.equal(order.cancelReason, "OWNERSHIP_CHANGED");
    assert.deepEqual(h.ledger.callbacks, [
      { outcome: "CANCELLED", orderId: 1, reason: "OWNERSHIP_CHANGED" },
    ]);
    assert.equal(h.marketplace.nftInfo(1), null);
    assert.deepEqual(eventTypes(h), [
      "LISTING_CREATED",
      "ORDER_PLACED",
      "ITEM_NO_LONGER_AVAILABLE",
      "ORDER_CANCELLED",
    ]);
    assert.equal(h.registry.transfers.length, 0);
  });
});

test("a standalone callback settles a pending order and replays are no-ops", async () => {
  await withHarness(async (h) => {
    h.prepareSale("7", 2n);
    await listItem(h);
    h.ledger.connect(null);

    const pending = await h.marketplace.buy(ADDR.buyer, 1);
    assert.equal(pending.status, "PENDING");
    h.ledger.connect(h.marketplace);

    const payload = encodeOrderPayload(1);
    const first = await h.marketplace.onTransferReceived(ADDR.ledger, ADDR.seller, 1n, payload);
    assert.deepEqual(first, { outcome: "FULFILLED", orderId: 1 });

    const replay = await h.marketplace.onTransferReceived(ADDR.ledger, ADDR.seller, 1n, payload);
    assert.deepEqual(replay, { outcome: "ALREADY_SETTLED", orderId: 1, status: "FULFILLED" });

    assert.equal(h.registry.transfers.length, 1);
    assert.equal(h.marketplace.listEvents({ type: "ITEM_SOLD" }).length, 1);
  });
});

test("a standalone callback validates caller, payload and order", async () => {
  await withHarness(async (h) => {
    await assert.rejects(
      h.marketplace.onTransferReceived(ADDR.ledger, ADDR.seller, 1n, "0x1234"),
      hasCode("INVALID_ORDER"),
    );
    await assert.rejects(
      h.marketplace.onTransferReceived(ADDR.other, ADDR.seller, 1n, encodeOrderPayload(1)),
      hasCode("UNAUTHORIZED", { orderId: 1 }),
    );
    await assert.rejects(
      h.marketplace.onTransferReceived(ADDR.ledger, ADDR.seller, 1n, encodeOrderPayload(99)),
      hasCode("INVALID_ORDER", { orderId: 99 }),
    );
  });
});

test("a callback for an order whose listing is gone cancels it", async () => {
  await withHarness(async (h) => {
    h.prepareSale("7", 2n);
    h.ledger.mint(ADDR.other, 2n);
    h.ledger.approve(ADDR.other, 2n);
    await listItem(h);
    h.ledger.connect(null);

    await h.marketplace.buy(ADDR.buyer, 1);
    await h.marketplace.buy(ADDR.other, 1);
    h.ledger.connect(h.marketplace);

    const sold = await h.marketplace.onTransferReceived(ADDR.ledger, ADDR.seller, 1n, encodeOrderPayload(1));
    assert.deepEqual(sold, { outcome: "FULFILLED", orderId: 1 });

    const cancelled = await h.marketplace.onTransferReceived(
      ADDR.ledger,
      ADDR.seller,
      1n,
      encodeOrderPayload(2),
    );
    assert.deepEqual(cancelled, { outcome: "CANCELLED", orderId: 2, reason: "LISTING_REMOVED" });
    assert.equal(h.marketplace.orderInfo(2)?.cancelReason, "LISTING_REMOVED");
    assert.deepEqual(
      h.marketplace.listOrders({ status: "PENDING" }),
      [],
    );
  });
});

test("concurrent purchases of one listing run one at a time", async () => {
  await withHarness(async (h) => {
    h.prepareSale("7", 2n);
    h.ledger.mint(ADDR.other, 2n);
    h.ledger.approve(ADDR.other, 2n);
    await listItem(h);

    const [first, second] = await Promise.allSettled([
      h.marketplace.buy(ADDR.buyer, 1),
      h.marketplace.buy(ADDR.other, 1),
    ]);

    assert.equal(first.status, "fulfilled");
    assert.equal(second.status, "rejected");
    if (second.status === "rejected") {
      hasCode("INVALID_LISTING")(second.reason);
    }
    assert.equal(h.registry.ownerOfNow("7"), ADDR.buyer);
  });
});

test("admin settings are restricted to the admin and apply to later purchases", async () => {
  await withHarness(async (h) => {
    h.prepareSale("7", 2n);
    await listItem(h);

    await assert.rejects(h.marketplace.changeFeePercent(ADDR.other, 500), hasCode("NOT_ADMIN"));
    await assert.rejects(h.marketplace.changeFeePercent(ADDR.admin, 10001), hasCode("INVALID_FEE_PERCENT"));
    await assert.rejects(h.marketplace.changeFeePercent(ADDR.admin, 1.5), hasCode("INVALID_FEE_PERCENT"));
    await assert.rejects(h.marketplace.setAdmin(ADDR.admin, ZeroAddress), hasCode("INVALID_ADDRESS"));

    const updated = await h.marketplace.changeFeePercent(ADDR.admin, 500);
    assert.equal(updated.feePercentBasisPoints, 500);
    assert.equal(h.marketplace.feePercent(), 500);

    await h.marketplace.setAdmin(ADDR.admin, ADDR.other);
    await assert.rejects(h.marketplace.changeMinimumFee(ADDR.admin, 5n), hasCode("NOT_ADMIN"));
    await h.marketplace.changeMinimumFee(ADDR.other, 5n);

    assert.equal(h.marketplace.minimumFee(), 5n);
    assert.deepEqual(h.marketplace.fees(), { feePercentBasisPoints: 500, minimumFee: "5" });
    assert.equal(h.marketplace.adminConfig().admin, ADDR.other);

    await assert.rejects(
      h.marketplace.buy(ADDR.buyer, 1),
      hasCode("INVALID_PRICE", { listingId: 1, required: "5" }),
    );

    const adminEvents = h.marketplace.listEvents().filter((event) => event.type !== "LISTING_CREATED");
    assert.deepEqual(
      adminEvents.map((event) => [event.type, event.details]),
      [
        ["FEE_PERCENT_CHANGED", { from: 300, to: 500 }],
        ["ADMIN_CHANGED", { from: ADDR.admin, to: ADDR.other }],
        ["MINIMUM_FEE_CHANGED", { from: "1", to: "5" }],
      ],
    );
  });
});

test("fees use the configured percentage with the minimum as a floor", async () => {
  await withHarness(
    async (h) => {
      h.prepareSale("7", 2000n);
      await listItem(h, "7", 2000n);

      const order = await h.marketplace.buy(ADDR.buyer, 1);
      assert.equal(order.platformFee, "1000");
      assert.equal(order.sellerAmount, "1000");
    },
    { minimumFee: 1000n },
  );
});
