import express from "express";
import cors from "cors";
import { createServer, type Server } from "node:http";
import { randomBytes } from "node:crypto";

import type { SeatConfig } from "../../src/ai/aiTypes.ts";
import type { GameConfig } from "../../src/config.ts";
import { createGameConfig, parseSeat } from "../../src/config.ts";
import type { GameStatus, TurnEvent, TurnRecord } from "../../src/controller/turnController.ts";
import { TurnController } from "../../src/controller/turnController.ts";
import type { Move } from "../../src/game/moveTypes.ts";
import type { NodeId } from "../../src/game/state.ts";
import { formatMove, labelToNodeId } from "../../src/game/coordFormat.ts";
import { EngineError, isEngineError } from "../../src/game/engineError.ts";
import { renderBoardText } from "../../src/render/renderBoardText.ts";
import type { WireGameState } from "../../src/shared/wireState.ts";
import { deserializeWireGameState, serializeWireGameState } from "../../src/shared/wireState.ts";
import { isVariantId } from "../../src/variants/variantRegistry.ts";
import type { GameId, PersistedEvent } from "./persistence.ts";
import { appendEvent, ensureGamesDir, nowIso, readEvents, replayEvents, resolveGamesDir } from "./persistence.ts";

type GameSession = {
  gameId: GameId;
  config: GameConfig;
  controller: TurnController;
  /** Sequence number of the last event written for this game. */
  seq: number;
  actionChain: Promise<void>;
  persistChain: Promise<void>;
};

export type GameSnapshot = {
  gameId: GameId;
  stateVersion: number;
  state: WireGameState;
  status: GameStatus;
  seats: SeatConfig[];
  awaitingInput: boolean;
  board: string;
};

export type MoveView = Move & { notation: string };

export type TurnsResponse = { snapshot: GameSnapshot; turns: TurnRecord[] };

export type ErrorResponse = { error: string; code: string };

const GAME_ID_RE = /^[0-9a-f]{16}$/;

class RequestError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = "RequestError";
    this.code = code;
  }
}

function errorCode(err: unknown): string {
  if (isEngineError(err) || err instanceof RequestError) return err.code;
  return "REQUEST_FAILED";
}

function readBody(raw: unknown): Record<string, unknown> {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) return {};
  return Object.fromEntries(Object.entries(raw));
}

function readCell(raw: unknown, what: string): NodeId {
  const id = typeof raw === "string" ? labelToNodeId(raw) : null;
  if (!id) throw new EngineError("INVALID_MOVE", `Unknown ${what} cell: ${String(raw)}`);
  return id;
}

function readOptionalInt(raw: unknown, what: string): number | undefined {
  if (raw === undefined || raw === null) return undefined;
  if (typeof raw !== "number" || !Number.isInteger(raw)) {
    throw new EngineError("INVALID_CONFIGURATION", `${what} must be an integer`);
  }
  return raw;
}

/**
 * Reads a create request: `{ variantId?, seats?: string[], maxPlies?, repetitionLimit? }`.
 */
function parseCreateRequest(body: Record<string, unknown>): GameConfig {
  const partial: Partial<GameConfig> = {};

  if (body.variantId !== undefined) {
    if (typeof body.variantId !== "string" || !isVariantId(body.variantId)) {
      throw new EngineError("INVALID_CONFIGURATION", `Unknown variant "${String(body.variantId)}"`);
    }
    partial.variantId = body.variantId;
  }

  if (body.seats !== undefined) {
    if (!Array.isArray(body.seats)) throw new EngineError("INVALID_CONFIGURATION", "seats must be an array");
    partial.seats = body.seats.map((s: unknown) => {
      if (typeof s !== "string") throw new EngineError("INVALID_CONFIGURATION", "seats must be strings");
      return parseSeat(s);
    });
  }

  partial.maxPlies = readOptionalInt(body.maxPlies, "maxPlies");
  partial.repetitionLimit = readOptionalInt(body.repetitionLimit, "repetitionLimit");

  return createGameConfig({
    variantId: partial.variantId,
    seats: partial.seats,
    maxPlies: partial.maxPlies,
    repetitionLimit: partial.repetitionLimit,
  });
}

export function createEngineApp(args: { gamesDir?: string } = {}) {
  const gamesDir = resolveGamesDir(args.gamesDir);
  const games = new Map<GameId, GameSession>();
  let isShuttingDown = false;

  const newGameId = (): GameId => randomBytes(8).toString("hex");

  function queueGameAction<T>(game: GameSession, fn: () => Promise<T>): Promise<T> {
    if (isShuttingDown) return Promise.reject(new Error("Server shutting down"));

    // Chain actions so at most one runs at a time per game.
    const prev = game.actionChain;
    let resolveNext: (() => void) | null = null;
    game.actionChain = new Promise<void>((resolve) => {
      resolveNext = resolve;
    });

    return prev
      .catch(() => undefined)
      .then(fn)
      .finally(() => {
        resolveNext?.();
      });
  }

  function queuePersist(game: GameSession, ev: PersistedEvent): void {
    game.persistChain = game.persistChain
      .then(() => appendEvent(gamesDir, ev))
      .catch((err) => {
        // eslint-disable-next-line no-console
        console.error(`[engine-server] [persist] game=${game.gameId} seq=${ev.seq} failed`, err);
      });
  }

  function eventFor(game: GameSession, ev: TurnEvent): PersistedEvent | null {
    if (ev.type === "rejected") return null;
    const base = { ts: nowIso(), gameId: game.gameId, seq: game.seq + 1 };

    if (ev.type === "gameOver") {
      return { ...base, type: "GAME_OVER", result: ev.status.result, winner: ev.status.winner, reason: ev.status.reason };
    }

    const { record } = ev;
    const state = serializeWireGameState(ev.state);
    if (record.action === "move" && record.move) {
      return { ...base, type: "MOVE_APPLIED", color: record.color, move: record.move, notation: record.notation, state };
    }
    return { ...base, type: "TURN_PASSED", color: record.color, action: record.action === "resign" ? "resign" : "pass", state };
  }

  function openSession(gameId: GameId, config: GameConfig, controller: TurnController, seq: number): GameSession {
    const game: GameSession = {
      gameId,
      config,
      controller,
      seq,
      actionChain: Promise.resolve(),
      persistChain: Promise.resolve(),
    };
    controller.addTurnListener((ev) => {
      const persisted = eventFor(game, ev);
      if (!persisted) return;
      game.seq = persisted.seq;
      queuePersist(game, persisted);
    });
    games.set(gameId, game);
    return game;
  }

  async function requireGame(gameId: string): Promise<GameSession> {
    const existing = games.get(gameId);
    if (existing) return existing;

    if (!GAME_ID_RE.test(gameId)) throw new RequestError("GAME_NOT_FOUND", "Game not found");
    const events = await readEvents(gamesDir, gameId);
    const loaded = events ? replayEvents(events) : null;
    if (!loaded) throw new RequestError("GAME_NOT_FOUND", "Game not found");

    // Another request may have loaded it while we were reading.
    const raced = games.get(gameId);
    if (raced) return raced;

    const controller = TurnController.fromConfig(loaded.config, undefined, {
      state: deserializeWireGameState(loaded.state),
      status: loaded.status ?? undefined,
    });
    if (process.env.STAR_PERSIST_LOG === "1") {
      // eslint-disable-next-line no-console
      console.log(`[engine-server] [persist] loaded game ${gameId} from disk (seq=${loaded.seq})`);
    }
    return openSession(gameId, loaded.config, controller, loaded.seq);
  }

  function snapshotFor(game: GameSession): GameSnapshot {
    const state = game.controller.getState();
    return {
      gameId: game.gameId,
      stateVersion: game.seq,
      state: serializeWireGameState(state),
      status: game.controller.getStatus(),
      seats: game.config.seats,
      awaitingInput: game.controller.awaitsExternalInput(),
      board: renderBoardText(state),
    };
  }

  /** Runs `fn` in the game's action queue and answers once its events are on disk. */
  async function runTurns(game: GameSession, fn: () => Promise<TurnRecord[]>): Promise<TurnsResponse> {
    return queueGameAction(game, async () => {
      const turns = await fn();
      await game.persistChain;
      return { snapshot: snapshotFor(game), turns };
    });
  }

  function sendError(res: express.Response, err: unknown, label: string): void {
    const msg = err instanceof Error ? err.message : `${label} failed`;
    // eslint-disable-next-line no-console
    console.error(`[engine-server] ${label} error`, msg);
    const response: ErrorResponse = { error: msg, code: errorCode(err) };
    res.status(400).json(response);
  }

  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  app.use((req, _res, next) => {
    // eslint-disable-next-line no-console
    console.log(`[engine-server] ${req.method} ${req.path}`);
    next();
  });

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.post("/api/create", async (req, res) => {
    try {
      const config = parseCreateRequest(readBody(req.body));
      const controller = TurnController.fromConfig(config);
      const gameId = newGameId();
      const game = openSession(gameId, config, controller, 0);

      queuePersist(game, {
        type: "GAME_CREATED",
        ts: nowIso(),
        gameId,
        seq: 0,
        config,
        state: serializeWireGameState(controller.getState()),
      });
      await game.persistChain;

      res.json(snapshotFor(game));
    } catch (err) {
      sendError(res, err, "create");
    }
  });

  app.get("/api/game/:gameId", async (req, res) => {
    try {
      const game = await requireGame(req.params.gameId);
      res.json(snapshotFor(game));
    } catch (err) {
      sendError(res, err, "get");
    }
  });

  app.get("/api/game/:gameId/moves", async (req, res) => {
    try {
      const game = await requireGame(req.params.gameId);
      const from = typeof req.query.from === "string" ? readCell(req.query.from, "origin") : undefined;
      const moves: MoveView[] = game.controller.legalMoves(from).map((m) => ({ ...m, notation: formatMove(m) }));
      res.json({ moves });
    } catch (err) {
      sendError(res, err, "moves");
    }
  });

  app.post("/api/game/:gameId/move", async (req, res) => {
    try {
      const game = await requireGame(req.params.gameId);
      const body = readBody(req.body);
      const from = readCell(body.from, "origin");
      const to = readCell(body.to, "destination");
      const response = await runTurns(game, async () => [game.controller.submitMove({ from, to })]);
      res.json(response);
    } catch (err) {
      sendError(res, err, "move");
    }
  });

  app.post("/api/game/:gameId/pass", async (req, res) => {
    try {
      const game = await requireGame(req.params.gameId);
      const response = await runTurns(game, async () => [game.controller.pass()]);
      res.json(response);
    } catch (err) {
      sendError(res, err, "pass");
    }
  });

  app.post("/api/game/:gameId/resign", async (req, res) => {
    try {
      const game = await requireGame(req.params.gameId);
      const response = await runTurns(game, async () => [game.controller.resign()]);
      res.json(response);
    } catch (err) {
      sendError(res, err, "resign");
    }
  });

  app.post("/api/game/:gameId/advance", async (req, res) => {
    try {
      const game = await requireGame(req.params.gameId);
      const maxTurns = readOptionalInt(readBody(req.body).maxTurns, "maxTurns");
      if (maxTurns !== undefined && maxTurns < 1) {
        throw new EngineError("INVALID_CONFIGURATION", "maxTurns must be >= 1");
      }
      const response = await runTurns(game, () => game.controller.advance(maxTurns));
      res.json(response);
    } catch (err) {
      sendError(res, err, "advance");
    }
  });

  app.get("/api/game/:gameId/replay", async (req, res) => {
    try {
      const game = await requireGame(req.params.gameId);
      await game.persistChain;
      const events = (await readEvents(gamesDir, game.gameId)) ?? [];
      res.json({ gameId: game.gameId, events });
    } catch (err) {
      sendError(res, err, "replay");
    }
  });

  async function shutdown(): Promise<void> {
    isShuttingDown = true;
    await Promise.all(Array.from(games.values()).map((g) => g.persistChain));
  }

  return { app, games, gamesDir, shutdown };
}

export async function startEngineServer(args: { port?: number; gamesDir?: string } = {}): Promise<{
  app: express.Express;
  server: Server;
  url: string;
  gamesDir: string;
  close: () => Promise<void>;
}> {
  const { app, gamesDir, shutdown } = createEngineApp({ gamesDir: args.gamesDir });
  await ensureGamesDir(gamesDir);

  const port = args.port !== undefined && Number.isFinite(args.port) ? args.port : 8790;

  const server = createServer(app);
  server.listen(port);

  await new Promise<void>((resolve, reject) => {
    server.once("listening", () => resolve());
    server.once("error", reject);
  });

  const address = server.address();
  const actualPort = typeof address === "object" && address ? address.port : port;

  const close = async (): Promise<void> => {
    await shutdown();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  };

  return { app, server, url: `http://localhost:${actualPort}`, gamesDir, close };
}
