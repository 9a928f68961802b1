import type { Color } from "../types.ts";
import { homeCorner, targetCorner } from "../types.ts";
import type { GameState, NodeId } from "./state.ts";
import type { JumpMove, Move, StepMove } from "./moveTypes.ts";
import { STAR_BOARD, jumpTargets, neighbors, regionOf, type Board } from "./board.ts";

export interface MovegenRules {
  /** When false (standard), a move may only end in the center, the mover's home or its target corner. */
  allowForeignCornerStops: boolean;
}

export const DEFAULT_RULES: MovegenRules = { allowForeignCornerStops: false };

function canStopAt(id: NodeId, color: Color, board: Board, rules: MovegenRules): boolean {
  if (rules.allowForeignCornerStops) return true;
  const region = regionOf(id, board);
  return region === "center" || region === homeCorner(color) || region === targetCorner(color);
}

/**
 * Lazily enumerates every legal destination of the peg at `origin`.
 *
 * Steps come first, then a breadth-first walk over jump landings. Each landing
 * cell is reported once, with the shortest chain that reaches it; every prefix
 * of a chain is itself a move.
 */
export function* iterateMovesFrom(
  state: GameState,
  origin: NodeId,
  board: Board = STAR_BOARD,
  rules: MovegenRules = DEFAULT_RULES
): Generator<Move, void, undefined> {
  const color = state.board.get(origin);
  if (!color) return;

  // The moving peg has left its origin.
  const isEmpty = (id: NodeId) => id === origin || !state.board.has(id);

  for (const to of neighbors(origin, board)) {
    if (!isEmpty(to) || !canStopAt(to, color, board, rules)) continue;
    const step: StepMove = { kind: "step", from: origin, to };
    yield step;
  }

  const visited = new Set<NodeId>([origin]);
  const queue: Array<{ at: NodeId; via: NodeId[] }> = [{ at: origin, via: [] }];

  for (let head = 0; head < queue.length; head++) {
    const { at, via } = queue[head];
    for (const { over, land } of jumpTargets(at, board)) {
      if (isEmpty(over)) continue;
      if (!isEmpty(land) || visited.has(land)) continue;
      visited.add(land);
      const path = at === origin ? [] : [...via, at];
      queue.push({ at: land, via: path });
      if (!canStopAt(land, color, board, rules)) continue;
      const jump: JumpMove = { kind: "jump", from: origin, via: [...path], to: land };
      yield jump;
    }
  }
}

export function generateMovesFrom(
  state: GameState,
  origin: NodeId,
  board: Board = STAR_BOARD,
  rules: MovegenRules = DEFAULT_RULES
): Move[] {
  return Array.from(iterateMovesFrom(state, origin, board, rules));
}

export function* iterateLegalMoves(
  state: GameState,
  color: Color = state.toMove,
  board: Board = STAR_BOARD,
  rules: MovegenRules = DEFAULT_RULES
): Generator<Move, void, undefined> {
  for (const [id, owner] of state.board.entries()) {
    if (owner !== color) continue;
    yield* iterateMovesFrom(state, id, board, rules);
  }
}

export function generateLegalMoves(
  state: GameState,
  color: Color = state.toMove,
  board: Board = STAR_BOARD,
  rules: MovegenRules = DEFAULT_RULES
): Move[] {
  return Array.from(iterateLegalMoves(state, color, board, rules));
}

export function hasAnyLegalMove(
  state: GameState,
  color: Color = state.toMove,
  board: Board = STAR_BOARD,
  rules: MovegenRules = DEFAULT_RULES
): boolean {
  return !iterateLegalMoves(state, color, board, rules).next().done;
}
