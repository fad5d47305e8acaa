/**
 * Shared contracts, time helpers, logging and configuration. Every other
 * package depends on these primitives.
 */
export * from "./types";
export * from "./config";
export { loadEnvFiles } from "./env";
export * from "./utils/logger";
