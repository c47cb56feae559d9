const idParameter = (name: string) => ({
  in: "path",
  name,
  required: true,
  schema: { type: "integer", minimum: 1 },
});

const callerHeader = {
  in: "header",
  name: "x-caller-address",
  required: true,
  schema: { type: "string" },
};

export function buildOpenApiSpec(serviceBaseUrl: string) {
  return {
    openapi: "3.0.3",
    info: {
      title: "Itemex Marketplace Service API",
      version: "0.1.0",
      description:
        "List items held in an external registry, buy them with a fungible balance, and settle through the ledger callback.",
    },
    servers: [{ url: serviceBaseUrl }],
    paths: {
      "/health": {
        get: {
          summary: "Health check",
          responses: { "200": { description: "Service healthy" } },
        },
      },
      "/listings": {
        post: {
          summary: "List an item for sale (owner or approved caller)",
          parameters: [callerHeader],
          responses: {
            "201": { description: "Listing created" },
            "400": { description: "Invalid request, registry or price" },
            "403": { description: "Caller is not the owner or approved" },
            "404": { description: "Item not found in the registry" },
            "409": { description: "Idempotency key reused or still in progress" },
            "502": { description: "Registry failure" },
          },
        },
        get: {
          summary: "Active listings, optionally by registry or recorded owner",
          responses: { "200": { description: "Listings" } },
        },
      },
      "/listings/{listingId}": {
        get: {
          summary: "Listing snapshot",
          parameters: [idParameter("listingId")],
          responses: {
            "200": { description: "Listing found" },
            "404": { description: "Listing not found" },
          },
        },
      },
      "/orders": {
        post: {
          summary: "Buy a listing; moves price and fee, item follows on settlement",
          parameters: [callerHeader],
          responses: {
            "201": { description: "Order placed" },
            "400": { description: "Invalid request, price or self-trade" },
            "404": { description: "Listing not found" },
            "409": { description: "Listing went stale, order invalid or idempotency key in progress" },
            "422": { description: "Insufficient balance or allowance" },
            "502": { description: "Ledger or registry failure" },
          },
        },
        get: {
          summary: "Orders, optionally by status or listing",
          responses: { "200": { description: "Orders" } },
        },
      },
      "/orders/{orderId}": {
        get: {
          summary: "Order with its status",
          parameters: [idParameter("orderId")],
          responses: {
            "200": { description: "Order found" },
            "404": { description: "Order not found" },
          },
        },
      },
      "/settlement/callback": {
        post: {
          summary: "Fee-leg callback, accepted from the configured ledger only",
          parameters: [callerHeader],
          responses: {
            "200": { description: "Settlement outcome" },
            "401": { description: "Caller is not the ledger" },
            "409": { description: "Order does not match the callback" },
          },
        },
      },
      "/fees": {
        get: {
          summary: "Current fee percent (basis points) and minimum fee",
          responses: { "200": { description: "Fee schedule" } },
        },
      },
      "/admin/config": {
        get: {
          summary: "Admin configuration record",
          responses: { "200": { description: "Admin configuration" } },
        },
      },
      "/admin/fee-percent": {
        post: {
          summary: "Change the fee percent",
          parameters: [callerHeader],
          responses: {
            "200": { description: "Updated" },
            "400": { description: "Out of range" },
            "403": { description: "Not the admin" },
          },
        },
      },
      "/admin/minimum-fee": {
        post: {
          summary: "Change the minimum fee",
          parameters: [callerHeader],
          responses: { "200": { description: "Updated" }, "403": { description: "Not the admin" } },
        },
      },
      "/admin/admin": {
        post: {
          summary: "Hand the admin role to another address",
          parameters: [callerHeader],
          responses: {
            "200": { description: "Updated" },
            "400": { description: "Zero address" },
            "403": { description: "Not the admin" },
          },
        },
      },
      "/events": {
        get: {
          summary: "Committed marketplace events in commit order",
          responses: { "200": { description: "Events" } },
        },
      },
    },
  };
}
