// ─── Game Config Schema ────────────────────────────────────────────
// Zod schema for the game configuration. This is the parse boundary:
// raw objects enter, a fully-defaulted GameConfig exits.

import { z } from "zod";
import type { GameConfig } from "../types/index.js";

const OperatorKindSchema = z.enum(["add", "subtract", "multiply", "divide"]);

export const GameConfigSchema = z
  .object({
    numberCopiesPerValue: z.number().int().min(1).default(4),
    multiplyCardsPerRound: z.number().int().min(0).default(2),
    squareRootCardsPerRound: z.number().int().min(0).default(2),
    initialCardCount: z.number().int().min(1).default(3),
    numberCardsPerHand: z.number().int().min(1).default(3),
    baseOperators: z
      .array(OperatorKindSchema)
      .min(1)
      .default(["add", "subtract", "divide"]),
    minBet: z.number().int().min(1).default(1),
    maxBet: z.number().int().min(1).default(5),
    targetValues: z.array(z.number().int()).min(1).default([1, 20]),
  })
  .refine((c) => c.minBet <= c.maxBet, {
    message: "minBet must be <= maxBet",
    path: ["minBet"],
  });

/** Output type of GameConfigSchema; assignable to GameConfig. */
export type ParsedGameConfig = z.infer<typeof GameConfigSchema>;

/** Minimal shape of a Zod issue (path + message). */
interface ConfigIssue {
  readonly path: readonly (string | number)[];
  readonly message: string;
}

/**
 * Renders issues as `path: message` joined by "; ".
 * Root-level issues use `(root)` as the path label.
 *
 * @example
 * formatConfigIssues([{ path: ["maxBet"], message: "Required" }])
 * // => "Invalid game config: maxBet: Required"
 */
export function formatConfigIssues(issues: readonly ConfigIssue[]): string {
  const details = issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
  return `Invalid game config: ${details.join("; ")}`;
}

/** Thrown by parseGameConfig when the raw config fails validation. */
export class GameConfigError extends Error {
  readonly issues: readonly ConfigIssue[];

  constructor(issues: readonly ConfigIssue[]) {
    super(formatConfigIssues(issues));
    this.name = "GameConfigError";
    this.issues = issues;
  }
}

/**
 * Parses a raw object into a GameConfig, filling defaults.
 *
 * @throws {GameConfigError} listing every issue found.
 */
export function parseGameConfig(raw: unknown): GameConfig {
  const result = GameConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new GameConfigError(result.error.issues);
  }
  return result.data;
}

/**
 * Like parseGameConfig, but returns the zod result instead of throwing.
 */
export function safeParseGameConfig(
  raw: unknown
): z.SafeParseReturnType<unknown, ParsedGameConfig> {
  return GameConfigSchema.safeParse(raw);
}

// ─── Presets ───────────────────────────────────────────────────────

export function defaultGameConfig(): GameConfig {
  return parseGameConfig({});
}

export function easyGameConfig(): GameConfig {
  return parseGameConfig({ targetValues: [5, 10] });
}

export function hardGameConfig(): GameConfig {
  return parseGameConfig({ minBet: 2, maxBet: 10, targetValues: [1, 50, 100] });
}

/** Clamps a requested bet into [minBet, maxBet], rounding to an integer. */
export function clampBet(bet: number, config: GameConfig): number {
  const rounded = Math.round(bet);
  return Math.min(config.maxBet, Math.max(config.minBet, rounded));
}
