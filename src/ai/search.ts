import type { GameState } from "../game/state.ts";
import type { Move } from "../game/moveTypes.ts";
import type { Color } from "../types.ts";
import { iterateLegalMoves, type MovegenRules, DEFAULT_RULES } from "../game/movegen.ts";
import { applyMove, passTurn } from "../game/applyMove.ts";
import { getWinner, isStalemate } from "../game/gameOver.ts";
import { STAR_BOARD, type Board } from "../game/board.ts";
import { evaluateMargin, evaluateState } from "./evaluate.ts";

export type SearchOptions = {
  depth: number;
  /** Keep only the first N ordered moves at every node. Unset searches full width. */
  beamWidth?: number | null;
  board?: Board;
  rules?: MovegenRules;
};

export type SearchResult = {
  score: number;
  bestMove: Move | null;
  nodes: number;
  depthReached: number;
};

type SearchContext = {
  perspective: Color;
  beamWidth: number | null;
  board: Board;
  rules: MovegenRules;
};

type Child = { move: Move; state: GameState; key: number };

const INF = 1_000_000_000;

function withSideToMove(state: GameState, color: Color): GameState {
  return state.toMove === color ? state : { ...state, toMove: color };
}

/**
 * Applies every legal move of the side to move and orders the results by the
 * perspective's margin: best first on maximizing layers, worst first on
 * minimizing layers. The sort is stable, so ties keep generation order.
 */
function expand(state: GameState, maximizing: boolean, ctx: SearchContext): Child[] {
  const children: Child[] = [];
  for (const move of iterateLegalMoves(state, state.toMove, ctx.board, ctx.rules)) {
    const next = applyMove(state, move);
    children.push({ move, state: next, key: evaluateMargin(next, ctx.perspective, ctx.board) });
  }

  children.sort((a, b) => (maximizing ? b.key - a.key : a.key - b.key));

  if (ctx.beamWidth !== null && children.length > ctx.beamWidth) {
    return children.slice(0, ctx.beamWidth);
  }
  return children;
}

function alphabeta(
  state: GameState,
  depth: number,
  alpha: number,
  beta: number,
  ctx: SearchContext,
  stats: { nodes: number }
): number {
  stats.nodes++;

  const { winner } = getWinner(state, ctx.board);
  if (winner !== null) {
    // Prefer wins found with more depth left, i.e. sooner.
    const base = evaluateMargin(state, ctx.perspective, ctx.board);
    return winner === ctx.perspective ? base + depth : base - depth;
  }

  if (depth <= 0) return evaluateMargin(state, ctx.perspective, ctx.board);

  const maximizing = state.toMove === ctx.perspective;
  const children = expand(state, maximizing, ctx);

  if (children.length === 0) {
    if (isStalemate(state, ctx.board)) return evaluateMargin(state, ctx.perspective, ctx.board);
    // Stuck side passes; the pass still costs a ply.
    return alphabeta(passTurn(state), depth - 1, alpha, beta, ctx, stats);
  }

  let best = maximizing ? -INF : +INF;

  for (const child of children) {
    let val: number;
    if (depth === 1) {
      // Leaf: the ordering key already is the static value.
      stats.nodes++;
      val = child.key;
    } else {
      val = alphabeta(child.state, depth - 1, alpha, beta, ctx, stats);
    }

    if (maximizing) {
      if (val > best) best = val;
      if (best > alpha) alpha = best;
    } else {
      if (val < best) best = val;
      if (best < beta) beta = best;
    }
    if (alpha >= beta) break;
  }

  return best;
}

/**
 * One-ply lookahead: the move whose resulting position scores best for
 * `color`. Ties keep the first move generated. Null when `color` cannot move.
 */
export function chooseGreedyMove(
  state: GameState,
  color: Color,
  board: Board = STAR_BOARD,
  rules: MovegenRules = DEFAULT_RULES
): Move | null {
  const root = withSideToMove(state, color);

  let best: Move | null = null;
  let bestScore = -INF;

  for (const move of iterateLegalMoves(root, color, board, rules)) {
    const s = evaluateState(applyMove(root, move), color, board);
    if (s > bestScore) {
      bestScore = s;
      best = move;
    }
  }

  return best;
}

/**
 * Depth-limited alpha-beta from `color`'s point of view. Layers where `color`
 * moves maximize its margin; every other color's layer minimizes it.
 */
export function chooseSearchMove(state: GameState, color: Color, options: SearchOptions): SearchResult {
  const board = options.board ?? STAR_BOARD;
  const rules = options.rules ?? DEFAULT_RULES;
  const root = withSideToMove(state, color);

  if (options.depth <= 0) {
    const move = chooseGreedyMove(root, color, board, rules);
    const score = move ? evaluateMargin(applyMove(root, move), color, board) : 0;
    return { score, bestMove: move, nodes: move ? 1 : 0, depthReached: move ? 1 : 0 };
  }

  const ctx: SearchContext = {
    perspective: color,
    beamWidth: options.beamWidth && options.beamWidth > 0 ? Math.floor(options.beamWidth) : null,
    board,
    rules,
  };

  const children = expand(root, true, ctx);
  if (children.length === 0) {
    return { score: 0, bestMove: null, nodes: 0, depthReached: 0 };
  }

  const stats = { nodes: 0 };
  let bestMove: Move | null = null;
  let bestScore = -INF;
  let alpha = -INF;

  for (const child of children) {
    let val: number;
    if (options.depth === 1) {
      stats.nodes++;
      val = child.key;
    } else {
      val = alphabeta(child.state, options.depth - 1, alpha, +INF, ctx, stats);
    }

    if (val > bestScore) {
      bestScore = val;
      bestMove = child.move;
    }
    if (bestScore > alpha) alpha = bestScore;
  }

  return { score: bestScore, bestMove, nodes: stats.nodes, depthReached: options.depth };
}
