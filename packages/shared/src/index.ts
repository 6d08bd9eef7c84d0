/**
 * @credvault/shared - Shared types and constants
 */

// Export all types
export * from "./types/index.js";

// Export constants
export * from "./constants.js";
