import type { Color } from "../types.ts";
import type { GameState } from "./state.ts";
import { isResigned, piecesOf } from "./state.ts";
import { hasAnyLegalMove } from "./movegen.ts";
import { STAR_BOARD, regionOf, type Board } from "./board.ts";
import { targetCorner } from "../types.ts";

function colorName(color: Color): string {
  return color.charAt(0).toUpperCase() + color.slice(1);
}

/**
 * True once every peg of `color` rests in its target corner.
 */
export function hasWon(state: GameState, color: Color, board: Board = STAR_BOARD): boolean {
  const pegs = piecesOf(state, color);
  if (pegs.length === 0) return false;
  const target = targetCorner(color);
  return pegs.every((id) => regionOf(id, board) === target);
}

export function getWinner(state: GameState, board: Board = STAR_BOARD): { winner: Color | null; reason: string | null } {
  for (const color of state.colors) {
    if (hasWon(state, color, board)) {
      return { winner: color, reason: `${colorName(color)} wins: every peg reached the target corner` };
    }
  }

  const remaining = state.colors.filter((c) => !isResigned(state, c));
  if (remaining.length === 1 && state.colors.length > 1) {
    const [last] = remaining;
    return { winner: last, reason: `${colorName(last)} wins: every other color resigned` };
  }

  return { winner: null, reason: null };
}

/**
 * No color still in play has a legal move anywhere on the board.
 */
export function isStalemate(state: GameState, board: Board = STAR_BOARD): boolean {
  return state.colors.every((c) => isResigned(state, c) || !hasAnyLegalMove(state, c, board));
}
