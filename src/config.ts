import type { SeatConfig } from "./ai/aiTypes.ts";
import type { VariantId } from "./variants/variantTypes.ts";
import { DEFAULT_VARIANT_ID, getVariantById, isVariantId } from "./variants/variantRegistry.ts";
import { EngineError } from "./game/engineError.ts";

export interface GameConfig {
  variantId: VariantId;
  /** One seat per seated color, in the layout's turn order. */
  seats: SeatConfig[];
  maxPlies: number;
  /** A position recurring this many times ends the game as a stalemate; 0 disables. */
  repetitionLimit: number;
  /** Consecutive rejected human answers before the turn is passed. */
  maxRejections: number;
  debug: boolean;
}

export interface ServerConfig {
  port: number;
  gamesDir?: string;
}

export const DEFAULT_SEAT: SeatConfig = { kind: "minimax", depth: 2 };
export const DEFAULT_MAX_PLIES = 600;
export const DEFAULT_REPETITION_LIMIT = 3;
export const DEFAULT_MAX_REJECTIONS = 3;
export const DEFAULT_PORT = 8790;

type Env = Record<string, string | undefined>;

function invalid(message: string): never {
  throw new EngineError("INVALID_CONFIGURATION", message);
}

function parseIntStrict(raw: string, what: string): number {
  const n = Number(raw);
  if (!Number.isInteger(n)) invalid(`${what} must be an integer, got "${raw}"`);
  return n;
}

/**
 * Parses one seat token: `human`, `greedy`, `minimax`, `minimax:<depth>` or
 * `minimax:<depth>:<beam>`.
 */
export function parseSeat(token: string): SeatConfig {
  const [kind, depthRaw, beamRaw] = token.trim().toLowerCase().split(":");
  if (kind === "human" || kind === "greedy") {
    if (depthRaw !== undefined) invalid(`Seat "${token}" takes no parameters`);
    return { kind };
  }
  if (kind === "minimax") {
    const depth = depthRaw ? parseIntStrict(depthRaw, "Search depth") : 2;
    const seat: Extract<SeatConfig, { kind: "minimax" }> = { kind: "minimax", depth };
    if (beamRaw) seat.beamWidth = parseIntStrict(beamRaw, "Beam width");
    return seat;
  }
  return invalid(`Unknown seat "${token}" (expected human, greedy or minimax[:depth[:beam]])`);
}

export function parseSeats(raw: string): SeatConfig[] {
  return raw
    .split(",")
    .map((t) => t.trim())
    .filter(Boolean)
    .map(parseSeat);
}

/**
 * Rejects unsupported layouts and seat settings before any game state exists.
 */
export function validateGameConfig(config: GameConfig): GameConfig {
  if (!isVariantId(config.variantId)) invalid(`Unknown variant "${config.variantId}"`);
  const variant = getVariantById(config.variantId);

  if (config.seats.length !== variant.colors.length) {
    invalid(`${variant.displayName} needs ${variant.colors.length} seats, got ${config.seats.length}`);
  }
  for (const seat of config.seats) {
    if (seat.kind !== "minimax") continue;
    if (!Number.isInteger(seat.depth) || seat.depth < 1) invalid(`Search depth must be >= 1, got ${seat.depth}`);
    if (seat.beamWidth != null && (!Number.isInteger(seat.beamWidth) || seat.beamWidth < 1)) {
      invalid(`Beam width must be >= 1, got ${seat.beamWidth}`);
    }
  }
  if (!Number.isInteger(config.maxPlies) || config.maxPlies < 1) invalid(`maxPlies must be >= 1, got ${config.maxPlies}`);
  if (!Number.isInteger(config.repetitionLimit) || config.repetitionLimit < 0) {
    invalid(`repetitionLimit must be >= 0, got ${config.repetitionLimit}`);
  }
  if (!Number.isInteger(config.maxRejections) || config.maxRejections < 1) {
    invalid(`maxRejections must be >= 1, got ${config.maxRejections}`);
  }
  return config;
}

export function createGameConfig(partial: Partial<GameConfig> = {}): GameConfig {
  const variantId = partial.variantId ?? DEFAULT_VARIANT_ID;
  if (!isVariantId(variantId)) invalid(`Unknown variant "${variantId}"`);
  const seatCount = getVariantById(variantId).colors.length;
  return validateGameConfig({
    variantId,
    seats: partial.seats ?? Array.from({ length: seatCount }, () => ({ ...DEFAULT_SEAT })),
    maxPlies: partial.maxPlies ?? DEFAULT_MAX_PLIES,
    repetitionLimit: partial.repetitionLimit ?? DEFAULT_REPETITION_LIMIT,
    maxRejections: partial.maxRejections ?? DEFAULT_MAX_REJECTIONS,
    debug: partial.debug ?? false,
  });
}

export function loadGameConfig(env: Env = process.env): GameConfig {
  const variantRaw = env.STAR_VARIANT?.trim() || DEFAULT_VARIANT_ID;
  if (!isVariantId(variantRaw)) invalid(`Unknown STAR_VARIANT "${variantRaw}"`);

  return createGameConfig({
    variantId: variantRaw,
    seats: env.STAR_SEATS ? parseSeats(env.STAR_SEATS) : undefined,
    maxPlies: env.STAR_MAX_PLIES ? parseIntStrict(env.STAR_MAX_PLIES, "STAR_MAX_PLIES") : undefined,
    repetitionLimit: env.STAR_REPETITION_LIMIT
      ? parseIntStrict(env.STAR_REPETITION_LIMIT, "STAR_REPETITION_LIMIT")
      : undefined,
    debug: env.STAR_DEBUG === "1" || env.STAR_DEBUG === "true",
  });
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  const port = env.PORT ? parseIntStrict(env.PORT, "PORT") : DEFAULT_PORT;
  return { port, gamesDir: env.STAR_GAMES_DIR || undefined };
}
