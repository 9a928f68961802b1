import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

import type { Color } from "../../src/types.ts";
import type { GameConfig } from "../../src/config.ts";
import type { Move } from "../../src/game/moveTypes.ts";
import type { GameResult, GameStatus } from "../../src/controller/turnController.ts";
import type { WireGameState } from "../../src/shared/wireState.ts";

export type GameId = string;

export type PersistedEventBase = {
  ts: string;
  gameId: GameId;
  /** Position in the log; also the game's state version. */
  seq: number;
};

export type GameCreatedEvent = PersistedEventBase & {
  type: "GAME_CREATED";
  config: GameConfig;
  state: WireGameState;
};

export type MoveAppliedEvent = PersistedEventBase & {
  type: "MOVE_APPLIED";
  color: Color;
  move: Move;
  notation: string;
  state: WireGameState;
};

export type TurnPassedEvent = PersistedEventBase & {
  type: "TURN_PASSED";
  color: Color;
  action: "pass" | "resign";
  state: WireGameState;
};

export type GameOverEvent = PersistedEventBase & {
  type: "GAME_OVER";
  result: GameResult;
  winner: Color | null;
  reason: string | null;
};

export type PersistedEvent = GameCreatedEvent | MoveAppliedEvent | TurnPassedEvent | GameOverEvent;

const EVENT_TYPES: ReadonlySet<string> = new Set(["GAME_CREATED", "MOVE_APPLIED", "TURN_PASSED", "GAME_OVER"]);

export function nowIso(): string {
  return new Date().toISOString();
}

export function resolveDefaultGamesDir(): string {
  // Default to <repo>/server/data/games
  const here = fileURLToPath(new URL(import.meta.url));
  return path.resolve(path.dirname(here), "..", "data", "games");
}

export function resolveGamesDir(explicitDir?: string | undefined): string {
  if (explicitDir && explicitDir.trim()) return path.resolve(explicitDir);
  if (process.env.STAR_GAMES_DIR && process.env.STAR_GAMES_DIR.trim()) return path.resolve(process.env.STAR_GAMES_DIR);
  return resolveDefaultGamesDir();
}

export async function ensureGamesDir(gamesDir: string): Promise<void> {
  await fs.mkdir(gamesDir, { recursive: true });
}

export function eventsPath(gamesDir: string, gameId: GameId): string {
  return path.join(gamesDir, `${gameId}.events.jsonl`);
}

export async function appendEvent(gamesDir: string, ev: PersistedEvent): Promise<void> {
  await ensureGamesDir(gamesDir);
  await fs.appendFile(eventsPath(gamesDir, ev.gameId), `${JSON.stringify(ev)}\n`, "utf8");
}

function isPersistedEvent(raw: unknown): raw is PersistedEvent {
  if (typeof raw !== "object" || raw === null) return false;
  if (!("type" in raw) || !("gameId" in raw) || !("seq" in raw)) return false;
  return (
    typeof raw.type === "string" &&
    EVENT_TYPES.has(raw.type) &&
    typeof raw.gameId === "string" &&
    typeof raw.seq === "number"
  );
}

/**
 * Reads a game's event log in order. Returns null when the game has no log.
 */
export async function readEvents(gamesDir: string, gameId: GameId): Promise<PersistedEvent[] | null> {
  let raw: string;
  try {
    raw = await fs.readFile(eventsPath(gamesDir, gameId), "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }

  const events: PersistedEvent[] = [];
  const lines = raw.split("\n").map((l) => l.trim()).filter(Boolean);
  for (const [i, line] of lines.entries()) {
    const parsed: unknown = JSON.parse(line);
    if (!isPersistedEvent(parsed)) {
      throw new Error(`Corrupt event log for game ${gameId} at line ${i + 1}`);
    }
    events.push(parsed);
  }
  return events;
}

/** Latest persisted position and the configuration the game was created with. */
export type LoadedGame = {
  config: GameConfig;
  state: WireGameState;
  /** Set once the log holds a GAME_OVER. */
  status: GameStatus | null;
  seq: number;
};

export function replayEvents(events: readonly PersistedEvent[]): LoadedGame | null {
  let config: GameConfig | null = null;
  let state: WireGameState | null = null;
  let status: GameStatus | null = null;
  let seq = -1;

  for (const ev of events) {
    if (ev.type === "GAME_CREATED") {
      config = ev.config;
      state = ev.state;
    } else if (ev.type === "MOVE_APPLIED" || ev.type === "TURN_PASSED") {
      state = ev.state;
    } else if (ev.type === "GAME_OVER") {
      // A repetition stalemate cannot be recomputed from the last position alone.
      status = { result: ev.result, winner: ev.winner, reason: ev.reason };
    }
    seq = Math.max(seq, ev.seq);
  }

  if (!config || !state) return null;
  return { config, state, status, seq };
}
