import type { GameState } from "../game/state.ts";
import type { Color } from "../types.ts";
import { homeCorner, targetCorner } from "../types.ts";
import { STAR_BOARD, type Board } from "../game/board.ts";

// Distance from a home apex to the opposite apex.
export const MAX_TRAVEL = 16;

export const WEIGHTS = {
  targetBonus: 4,
  homePenalty: 3,
  winBonus: 1000,
} as const;

/**
 * Positional score of `color`'s pegs: how far each has travelled toward the
 * tip of its target corner, with a bonus for pegs already home in the target
 * and a penalty for pegs still in the starting corner.
 */
export function evaluateState(state: GameState, color: Color, board: Board = STAR_BOARD): number {
  const target = targetCorner(color);
  const home = homeCorner(color);
  const toApex = board.apexDistance.get(target);
  if (!toApex) throw new Error(`evaluateState: no distance table for ${target}`);

  let score = 0;
  let pegs = 0;
  let inTarget = 0;

  for (const [id, owner] of state.board.entries()) {
    if (owner !== color) continue;
    pegs++;
    score += MAX_TRAVEL - (toApex.get(id) ?? MAX_TRAVEL);

    const region = board.regions.get(id);
    if (region === target) {
      inTarget++;
      score += WEIGHTS.targetBonus;
    } else if (region === home) {
      score -= WEIGHTS.homePenalty;
    }
  }

  if (pegs > 0 && inTarget === pegs) score += WEIGHTS.winBonus;
  return score;
}

/**
 * `color`'s score minus the best score among the other seated colors.
 * With two colors this is the usual zero-sum difference.
 */
export function evaluateMargin(state: GameState, color: Color, board: Board = STAR_BOARD): number {
  let bestOther = -Infinity;
  for (const other of state.colors) {
    if (other === color) continue;
    const s = evaluateState(state, other, board);
    if (s > bestOther) bestOther = s;
  }
  const own = evaluateState(state, color, board);
  return bestOther === -Infinity ? own : own - bestOther;
}
