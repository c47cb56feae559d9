export * from "./crypto/request-hash.js";
export * from "./auth/headers.js";
export * from "./types/listing.js";
export * from "./types/order.js";
export * from "./types/events.js";
export * from "./types/errors.js";
export * from "./types/api.js";
