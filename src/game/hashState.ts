import type { GameState } from "./state.ts";

/**
 * Create a hash string representing the game state for repetition detection.
 * Two states with the same hash are considered identical positions.
 */
export function hashGameState(state: GameState): string {
  const nodeIds = Array.from(state.board.keys()).sort();

  const parts: string[] = [];
  for (const nodeId of nodeIds) {
    parts.push(`${nodeId}=${state.board.get(nodeId) ?? ""}`);
  }

  // Same position with a different side to move is a different position.
  parts.push(`toMove:${state.toMove}`);

  return parts.join("|");
}
