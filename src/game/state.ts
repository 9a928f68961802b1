import type { Color } from "../types.ts";
import { PEGS_PER_COLOR } from "../types.ts";
import type { GameMeta, VariantId } from "../variants/variantTypes.ts";
import { DEFAULT_VARIANT_ID, getVariantById } from "../variants/variantRegistry.ts";
import { STAR_BOARD, homeRegion, isValidCell, type Board } from "./board.ts";

export type NodeId = string;
export type BoardState = Map<NodeId, Color>;

export interface GameState {
  board: BoardState;
  toMove: Color;
  /** Seated colors in turn order. */
  colors: readonly Color[];
  ply: number;
  resigned?: readonly Color[];
  meta?: GameMeta;
}

export function createInitialGameState(variantId: VariantId = DEFAULT_VARIANT_ID, board: Board = STAR_BOARD): GameState {
  const variant = getVariantById(variantId);
  const occupancy: BoardState = new Map();

  for (const color of variant.colors) {
    for (const id of homeRegion(color, board)) {
      occupancy.set(id, color);
    }
  }

  return {
    board: occupancy,
    toMove: variant.colors[0],
    colors: [...variant.colors],
    ply: 0,
    meta: { variantId },
  };
}

export function cloneState(state: GameState): GameState {
  return { ...state, board: new Map(state.board) };
}

export function piecesOf(state: GameState, color: Color): NodeId[] {
  const res: NodeId[] = [];
  for (const [id, owner] of state.board.entries()) {
    if (owner === color) res.push(id);
  }
  return res;
}

export function countPieces(state: GameState): Map<Color, number> {
  const counts = new Map<Color, number>();
  for (const owner of state.board.values()) {
    counts.set(owner, (counts.get(owner) ?? 0) + 1);
  }
  return counts;
}

export function isResigned(state: GameState, color: Color): boolean {
  return state.resigned?.includes(color) ?? false;
}

/**
 * Throws when the occupancy no longer matches the seating: every seated color
 * keeps exactly PEGS_PER_COLOR pegs on valid cells and nobody else is on the board.
 */
export function assertOccupancyInvariant(state: GameState, board: Board = STAR_BOARD): void {
  for (const id of state.board.keys()) {
    if (!isValidCell(id, board)) throw new Error(`Occupancy invariant: ${id} is not a board cell`);
  }

  const counts = countPieces(state);
  for (const [color, n] of counts) {
    if (!state.colors.includes(color)) throw new Error(`Occupancy invariant: unseated color ${color} on board`);
    if (n !== PEGS_PER_COLOR) throw new Error(`Occupancy invariant: ${color} has ${n} pegs`);
  }
  for (const color of state.colors) {
    if (!counts.has(color)) throw new Error(`Occupancy invariant: ${color} has no pegs`);
  }

  if (state.board.size !== state.colors.length * PEGS_PER_COLOR) {
    throw new Error(`Occupancy invariant: ${state.board.size} pegs for ${state.colors.length} colors`);
  }
}
