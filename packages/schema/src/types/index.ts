export * from "./card.js";
export * from "./config.js";
export * from "./results.js";
