import type { Color } from "../types.ts";
import type { GameState } from "./state.ts";
import { isResigned } from "./state.ts";

/**
 * Next seated color clockwise from `state.toMove`, skipping resigned colors.
 * Returns `state.toMove` when nobody else is left.
 */
export function nextToMove(state: GameState): Color {
  const n = state.colors.length;
  const start = state.colors.indexOf(state.toMove);
  for (let i = 1; i <= n; i++) {
    const candidate = state.colors[(start + i) % n];
    if (!isResigned(state, candidate)) return candidate;
  }
  return state.toMove;
}

/**
 * End a turn: hand the move to the next color and count the ply.
 */
export function endTurn(state: GameState): GameState {
  return { ...state, toMove: nextToMove(state), ply: state.ply + 1 };
}
