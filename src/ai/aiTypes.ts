import type { Color } from "../types.ts";
import type { Move } from "../game/moveTypes.ts";
import type { GameState } from "../game/state.ts";

export type SeatKind = "human" | "greedy" | "minimax";

export type SeatConfig =
  | { kind: "human" }
  | { kind: "greedy" }
  | { kind: "minimax"; depth: number; beamWidth?: number | null };

export type PlayerDecision =
  | { kind: "move"; move: Move }
  | { kind: "pass" }
  | { kind: "resign" };

/**
 * A seat's move-choosing capability. Implementations never mutate `state`.
 */
export interface GamePlayer {
  readonly kind: SeatKind;
  /** `rejection` explains why the previous answer for this turn was refused. */
  chooseMove(state: GameState, color: Color, rejection?: string): Promise<PlayerDecision>;
}

export type HumanInputContext = {
  state: GameState;
  color: Color;
  legalMoves: Move[];
  /** Set when the previous answer was rejected. */
  rejection?: string;
};

/** UI boundary: resolves with whatever the human entered for this turn. */
export type HumanInputSource = (ctx: HumanInputContext) => Promise<PlayerDecision>;

export function describeSeat(seat: SeatConfig): string {
  if (seat.kind === "minimax") {
    return seat.beamWidth ? `minimax(d=${seat.depth}, beam=${seat.beamWidth})` : `minimax(d=${seat.depth})`;
  }
  return seat.kind;
}
