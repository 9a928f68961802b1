import type { Color } from "../types.ts";
import type { GameState, NodeId } from "../game/state.ts";
import type { Move } from "../game/moveTypes.ts";
import type { GamePlayer, HumanInputSource, PlayerDecision, SeatConfig } from "../ai/aiTypes.ts";
import type { GameConfig } from "../config.ts";
import { validateGameConfig } from "../config.ts";
import { assertOccupancyInvariant, cloneState, createInitialGameState } from "../game/state.ts";
import { applyMove, passTurn, validateMove } from "../game/applyMove.ts";
import { endTurn } from "../game/endTurn.ts";
import { generateLegalMoves, generateMovesFrom, hasAnyLegalMove } from "../game/movegen.ts";
import { getWinner, isStalemate } from "../game/gameOver.ts";
import { RepetitionTracker } from "../game/repetition.ts";
import { formatMove } from "../game/coordFormat.ts";
import { EngineError, isEngineError } from "../game/engineError.ts";
import { createPlayer } from "./players.ts";

export type GameResult = "in_progress" | "win" | "stalemate";

export interface GameStatus {
  result: GameResult;
  winner: Color | null;
  reason: string | null;
}

export interface TurnRecord {
  ply: number;
  color: Color;
  action: "move" | "pass" | "resign";
  move?: Move;
  notation: string;
}

export type TurnEvent =
  | { type: "turn"; record: TurnRecord; state: GameState }
  | { type: "rejected"; color: Color; reason: string }
  | { type: "gameOver"; status: GameStatus };

export type TurnListener = (event: TurnEvent) => void;

export interface TurnControllerOptions {
  /** Seat per color; colors without a seat can only be driven through submitMove/pass/resign. */
  seats?: Partial<Record<Color, SeatConfig>>;
  humanInput?: HumanInputSource;
  maxPlies?: number;
  repetitionLimit?: number;
  maxRejections?: number;
  debug?: boolean;
  /** Result of a game that already ended, restored from a saved log. */
  status?: GameStatus;
}

export interface ResumePoint {
  state: GameState;
  status?: GameStatus;
}

const IN_PROGRESS: GameStatus = { result: "in_progress", winner: null, reason: null };

export class TurnController {
  private state: GameState;
  private seats: Partial<Record<Color, SeatConfig>>;
  private players: Map<Color, GamePlayer> = new Map();
  private status: GameStatus = IN_PROGRESS;
  private record: TurnRecord[] = [];
  private repetitions: RepetitionTracker = new RepetitionTracker();
  private listeners: TurnListener[] = [];
  private readonly maxPlies: number;
  private readonly repetitionLimit: number;
  private readonly maxRejections: number;
  private readonly debug: boolean;

  constructor(state: GameState, opts: TurnControllerOptions = {}) {
    assertOccupancyInvariant(state);
    this.state = cloneState(state);
    this.seats = { ...(opts.seats ?? {}) };
    this.maxPlies = opts.maxPlies ?? Number.POSITIVE_INFINITY;
    this.repetitionLimit = opts.repetitionLimit ?? 0;
    this.maxRejections = opts.maxRejections ?? 3;
    this.debug = opts.debug ?? false;

    for (const color of state.colors) {
      const seat = this.seats[color];
      if (!seat) continue;
      // Human seats without an input source are driven externally.
      if (seat.kind === "human" && !opts.humanInput) continue;
      this.players.set(color, createPlayer(seat, { humanInput: opts.humanInput, debug: this.debug }));
    }

    this.repetitions.record(this.state);
    if (opts.status && opts.status.result !== "in_progress") this.status = { ...opts.status };
    this.refreshStatus();
  }

  /**
   * Builds a controller from a validated configuration, for a fresh game or
   * resuming from a saved position (and its final status, if it had ended).
   */
  static fromConfig(config: GameConfig, humanInput?: HumanInputSource, resume?: ResumePoint): TurnController {
    validateGameConfig(config);
    const initial = resume?.state ?? createInitialGameState(config.variantId);
    const seats: Partial<Record<Color, SeatConfig>> = {};
    initial.colors.forEach((color, i) => {
      seats[color] = config.seats[i];
    });
    return new TurnController(initial, {
      seats,
      humanInput,
      maxPlies: config.maxPlies,
      repetitionLimit: config.repetitionLimit,
      maxRejections: config.maxRejections,
      debug: config.debug,
      status: resume?.status,
    });
  }

  getState(): GameState {
    return cloneState(this.state);
  }

  getStatus(): GameStatus {
    return { ...this.status };
  }

  getRecord(): TurnRecord[] {
    return this.record.map((r) => ({ ...r }));
  }

  isOver(): boolean {
    return this.status.result !== "in_progress";
  }

  /** True when the side to move has to be driven from outside (human or unseated). */
  awaitsExternalInput(): boolean {
    if (this.isOver()) return false;
    const seat = this.seats[this.state.toMove];
    return !seat || (seat.kind === "human" && !this.players.has(this.state.toMove));
  }

  addTurnListener(listener: TurnListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  /** Legal moves of the side to move, optionally restricted to one origin cell. */
  legalMoves(from?: NodeId): Move[] {
    if (this.isOver()) return [];
    if (from === undefined) return generateLegalMoves(this.state);
    if (this.state.board.get(from) !== this.state.toMove) return [];
    return generateMovesFrom(this.state, from);
  }

  /**
   * Applies an externally chosen move for the side to move. The move is
   * checked against the generated legal set first; a rejected move leaves the
   * state untouched and throws INVALID_MOVE.
   */
  submitMove(move: Pick<Move, "from" | "to">): TurnRecord {
    this.ensureInProgress();
    let legal: Move;
    try {
      legal = validateMove(this.state, move);
    } catch (err) {
      if (isEngineError(err)) this.emit({ type: "rejected", color: this.state.toMove, reason: err.message });
      throw err;
    }
    return this.commitMove(legal);
  }

  pass(): TurnRecord {
    this.ensureInProgress();
    return this.commitPass();
  }

  resign(): TurnRecord {
    this.ensureInProgress();
    const color = this.state.toMove;
    const resigned = [...(this.state.resigned ?? []), color];
    this.state = endTurn({ ...this.state, resigned });
    return this.finishTurn({ ply: this.state.ply, color, action: "resign", notation: "resign" });
  }

  /**
   * Asks the seat of the side to move for a decision and applies it.
   * Returns null once the game is over.
   */
  async playTurn(): Promise<TurnRecord | null> {
    if (this.isOver()) return null;

    const color = this.state.toMove;
    if (!hasAnyLegalMove(this.state, color)) return this.commitPass();

    const player = this.players.get(color);
    if (!player) {
      throw new Error(`[controller] ${color} has no seat that can choose a move; drive it with submitMove()`);
    }

    let rejection: string | undefined;
    for (let attempt = 0; attempt < this.maxRejections; attempt++) {
      let decision: PlayerDecision;
      try {
        decision = await player.chooseMove(this.getState(), color, rejection);
      } catch (err) {
        if (isEngineError(err) && err.code === "NO_LEGAL_MOVE") return this.commitPass();
        throw err;
      }

      if (decision.kind === "pass") return this.commitPass();
      if (decision.kind === "resign") return this.resign();

      try {
        return this.commitMove(validateMove(this.state, decision.move));
      } catch (err) {
        if (!isEngineError(err) || player.kind !== "human") {
          // Engine seats only ever return generated moves.
          throw err;
        }
        rejection = err.message;
        this.emit({ type: "rejected", color, reason: rejection });
      }
    }

    if (this.debug) {
      // eslint-disable-next-line no-console
      console.warn(`[controller] ${color} exhausted ${this.maxRejections} attempts; passing`);
    }
    return this.commitPass();
  }

  /** Plays engine seats until the game ends, an external seat is to move or `maxTurns` turns were played. */
  async advance(maxTurns: number = Number.POSITIVE_INFINITY): Promise<TurnRecord[]> {
    const played: TurnRecord[] = [];
    while (!this.isOver() && !this.awaitsExternalInput() && played.length < maxTurns) {
      const rec = await this.playTurn();
      if (rec) played.push(rec);
    }
    return played;
  }

  /** Plays to the end. Every side to move must have a seat able to choose. */
  async run(): Promise<GameStatus> {
    while (!this.isOver()) {
      await this.playTurn();
    }
    return this.getStatus();
  }

  private ensureInProgress(): void {
    if (this.isOver()) {
      throw new EngineError("INVALID_MOVE", `Game over: ${this.status.reason ?? this.status.result}`);
    }
  }

  private commitMove(move: Move): TurnRecord {
    const color = this.state.toMove;
    this.state = applyMove(this.state, move);
    assertOccupancyInvariant(this.state);
    if (this.debug) {
      // eslint-disable-next-line no-console
      console.log("[controller] apply", color, formatMove(move));
    }
    return this.finishTurn({ ply: this.state.ply, color, action: "move", move, notation: formatMove(move) });
  }

  private commitPass(): TurnRecord {
    const color = this.state.toMove;
    this.state = passTurn(this.state);
    if (this.debug) {
      // eslint-disable-next-line no-console
      console.log("[controller] pass", color);
    }
    return this.finishTurn({ ply: this.state.ply, color, action: "pass", notation: "pass" });
  }

  private finishTurn(rec: TurnRecord): TurnRecord {
    this.record.push(rec);
    const occurrences = this.repetitions.record(this.state);
    this.emit({ type: "turn", record: { ...rec }, state: this.getState() });

    this.refreshStatus(occurrences);
    if (!this.isOver()) this.skipStuckColors();
    return rec;
  }

  /** Colors without a legal move lose their turn (NO_LEGAL_MOVE is not fatal). */
  private skipStuckColors(): void {
    while (!this.isOver() && !hasAnyLegalMove(this.state, this.state.toMove)) {
      this.commitPass();
    }
  }

  private refreshStatus(occurrences: number = 1): void {
    if (this.isOver()) return;

    const { winner, reason } = getWinner(this.state);
    if (winner) {
      this.setOver({ result: "win", winner, reason });
      return;
    }
    if (isStalemate(this.state)) {
      this.setOver({ result: "stalemate", winner: null, reason: "Stalemate: no color can move" });
      return;
    }
    if (this.repetitionLimit > 0 && occurrences >= this.repetitionLimit) {
      this.setOver({
        result: "stalemate",
        winner: null,
        reason: `Stalemate: position repeated ${occurrences} times`,
      });
      return;
    }
    if (this.state.ply >= this.maxPlies) {
      this.setOver({ result: "stalemate", winner: null, reason: `Stalemate: move limit of ${this.maxPlies} plies reached` });
    }
  }

  private setOver(status: GameStatus): void {
    this.status = status;
    if (this.debug) {
      // eslint-disable-next-line no-console
      console.log("[controller] game over", status.reason);
    }
    this.emit({ type: "gameOver", status: { ...status } });
  }

  private emit(event: TurnEvent): void {
    for (const cb of this.listeners) {
      try {
        cb(event);
      } catch (err) {
        // eslint-disable-next-line no-console
        console.error("[controller] turn listener error", err);
      }
    }
  }
}
