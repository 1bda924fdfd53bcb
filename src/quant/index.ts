/**
 * Leverage Engine — barrel export
 */

export * from "./leverage.js";
export * from "./expiration.js";
