import type { GameState } from "../game/state.ts";
import { STAR_BOARD, type Board } from "../game/board.ts";
import { COLS, ROWS, makeNodeId } from "../game/coords.ts";
import { colorInitial } from "../types.ts";

/**
 * Plain-text picture of the star: one line per row, pegs as their color's
 * initial, empty cells as ".". Trailing spaces are trimmed.
 */
export function renderBoardText(state: GameState, board: Board = STAR_BOARD): string {
  const lines: string[] = [];
  for (let r = 0; r < ROWS; r++) {
    let line = "";
    for (let c = 0; c < COLS; c++) {
      const id = makeNodeId(r, c);
      if (!board.regions.has(id)) {
        line += " ";
        continue;
      }
      const owner = state.board.get(id);
      line += owner ? colorInitial(owner) : ".";
    }
    lines.push(line.trimEnd());
  }
  return lines.join("\n");
}

export function renderStatusLine(state: GameState): string {
  return `ply ${state.ply} · ${state.toMove} to move`;
}
