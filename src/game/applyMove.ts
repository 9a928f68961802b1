import type { GameState } from "./state.ts";
import type { Move } from "./moveTypes.ts";
import { sameMove } from "./moveTypes.ts";
import { EngineError } from "./engineError.ts";
import { endTurn } from "./endTurn.ts";
import { iterateMovesFrom, type MovegenRules, DEFAULT_RULES } from "./movegen.ts";
import { STAR_BOARD, isValidCell, type Board } from "./board.ts";

/**
 * Returns the state after `move`. The input state is never mutated.
 * Only the cheap occupancy checks run here; use `validateMove` for moves
 * that did not come from the move generator.
 */
export function applyMove(state: GameState, move: Move): GameState {
  const mover = state.board.get(move.from);
  if (mover !== state.toMove) {
    throw new EngineError("INVALID_MOVE", `applyMove: ${move.from} does not hold a ${state.toMove} peg`);
  }
  if (state.board.has(move.to)) {
    throw new EngineError("INVALID_MOVE", `applyMove: destination ${move.to} is not empty`);
  }

  const nextBoard = new Map(state.board);
  nextBoard.delete(move.from);
  nextBoard.set(move.to, mover);

  return endTurn({ ...state, board: nextBoard });
}

/**
 * Checks an externally supplied move against the generated legal set for the
 * side to move and returns the generated (canonical) move.
 */
export function validateMove(
  state: GameState,
  move: Pick<Move, "from" | "to">,
  board: Board = STAR_BOARD,
  rules: MovegenRules = DEFAULT_RULES
): Move {
  if (!isValidCell(move.from, board) || !isValidCell(move.to, board)) {
    throw new EngineError("INVALID_MOVE", `Not a board cell: ${move.from} -> ${move.to}`);
  }
  const owner = state.board.get(move.from);
  if (owner !== state.toMove) {
    throw new EngineError("INVALID_MOVE", `${move.from} is not a ${state.toMove} peg`);
  }
  if (state.board.has(move.to)) {
    throw new EngineError("INVALID_MOVE", `Destination ${move.to} is not empty`);
  }

  for (const legal of iterateMovesFrom(state, move.from, board, rules)) {
    if (sameMove(legal, move)) return legal;
  }
  throw new EngineError("INVALID_MOVE", `${move.from} -> ${move.to} is not a legal move`);
}

export function passTurn(state: GameState): GameState {
  return endTurn(state);
}
