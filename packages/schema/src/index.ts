// ─── @math-high-low/schema ─────────────────────────────────────────
// Canonical card, result and configuration types, plus the Zod
// schema for the game configuration.

export * from "./types/index.js";
export * from "./schema/index.js";
