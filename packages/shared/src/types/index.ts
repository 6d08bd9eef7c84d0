export * from "./account.js";
export * from "./api.js";
export * from "./config.js";
export * from "./session.js";
