import type { GameState } from "../game/state.ts";
import type { Color } from "../types.ts";
import type { GamePlayer, HumanInputContext, HumanInputSource, PlayerDecision, SeatConfig } from "../ai/aiTypes.ts";
import { describeSeat } from "../ai/aiTypes.ts";
import { chooseGreedyMove, chooseSearchMove } from "../ai/search.ts";
import { generateLegalMoves } from "../game/movegen.ts";
import { formatMove } from "../game/coordFormat.ts";
import { EngineError } from "../game/engineError.ts";

export type PlayerOptions = {
  /** Required for human seats. */
  humanInput?: HumanInputSource;
  debug?: boolean;
};

function noMove(color: Color): never {
  throw new EngineError("NO_LEGAL_MOVE", `${color} has no legal move`);
}

function logChoice(tag: string, color: Color, decision: PlayerDecision, extra: Record<string, number> = {}): void {
  const parts = [
    `[ai:${tag}]`,
    color,
    decision.kind === "move" ? formatMove(decision.move) : decision.kind,
    ...Object.entries(extra).map(([k, v]) => `${k}=${v}`),
  ];
  // eslint-disable-next-line no-console
  console.log(parts.join(" "));
}

export function createGreedyPlayer(opts: PlayerOptions = {}): GamePlayer {
  return {
    kind: "greedy",
    async chooseMove(state: GameState, color: Color): Promise<PlayerDecision> {
      const move = chooseGreedyMove(state, color);
      if (!move) return noMove(color);
      const decision: PlayerDecision = { kind: "move", move };
      if (opts.debug) logChoice("greedy", color, decision);
      return decision;
    },
  };
}

export function createMinimaxPlayer(depth: number, beamWidth: number | null = null, opts: PlayerOptions = {}): GamePlayer {
  return {
    kind: "minimax",
    async chooseMove(state: GameState, color: Color): Promise<PlayerDecision> {
      const start = performance.now();
      const res = chooseSearchMove(state, color, { depth, beamWidth });
      if (!res.bestMove) return noMove(color);
      const decision: PlayerDecision = { kind: "move", move: res.bestMove };
      if (opts.debug) {
        const ms = Math.round(performance.now() - start);
        logChoice("minimax", color, decision, { eval: res.score, d: res.depthReached, n: res.nodes, ms });
      }
      return decision;
    },
  };
}

export function createHumanPlayer(input: HumanInputSource): GamePlayer {
  return {
    kind: "human",
    async chooseMove(state: GameState, color: Color, rejection?: string): Promise<PlayerDecision> {
      const ctx: HumanInputContext = { state, color, legalMoves: generateLegalMoves(state, color), rejection };
      return input(ctx);
    },
  };
}

export function createPlayer(seat: SeatConfig, opts: PlayerOptions = {}): GamePlayer {
  switch (seat.kind) {
    case "human":
      if (!opts.humanInput) {
        throw new EngineError("INVALID_CONFIGURATION", "Human seat needs an input source");
      }
      return createHumanPlayer(opts.humanInput);
    case "greedy":
      return createGreedyPlayer(opts);
    case "minimax":
      if (!Number.isInteger(seat.depth) || seat.depth < 1) {
        throw new EngineError("INVALID_CONFIGURATION", `Invalid seat ${describeSeat(seat)}: depth must be >= 1`);
      }
      return createMinimaxPlayer(seat.depth, seat.beamWidth ?? null, opts);
  }
}
