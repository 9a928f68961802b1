import type { NodeId } from "./state.ts";
import type { Color, Corner, Region } from "../types.ts";
import { CORNERS, homeCorner, targetCorner } from "../types.ts";
import {
  CENTER_COL,
  COLS,
  DIRECTIONS,
  ROWS,
  hexDistance,
  inLowerTriangle,
  inUpperTriangle,
  isOnStar,
  makeNodeId,
  parseNodeId,
} from "./coords.ts";

export const STAR_CELL_COUNT = 121;
export const CENTER_CELL_COUNT = 61;
export const CORNER_CELL_COUNT = 10;

export type JumpTarget = { over: NodeId; land: NodeId };

/**
 * Static star topology. Built once, frozen, and shared by every game state.
 */
export interface Board {
  readonly cells: readonly NodeId[];
  readonly adjacency: ReadonlyMap<NodeId, readonly NodeId[]>;
  readonly jumps: ReadonlyMap<NodeId, readonly JumpTarget[]>;
  readonly regions: ReadonlyMap<NodeId, Region>;
  readonly corners: ReadonlyMap<Corner, readonly NodeId[]>;
  readonly apexes: ReadonlyMap<Corner, NodeId>;
  /** Lattice distance from every cell to each corner's apex. */
  readonly apexDistance: ReadonlyMap<Corner, ReadonlyMap<NodeId, number>>;
}

function classify(r: number, c: number): Region {
  if (r <= 3) return "N";
  if (r >= 13) return "S";
  const up = inUpperTriangle(r, c);
  const down = inLowerTriangle(r, c);
  if (up && down) return "center";
  if (down) return c < CENTER_COL ? "NW" : "NE";
  return c < CENTER_COL ? "SW" : "SE";
}

const APEX_CELLS: Record<Corner, NodeId> = {
  N: makeNodeId(0, CENTER_COL),
  NE: makeNodeId(4, COLS - 1),
  SE: makeNodeId(12, COLS - 1),
  S: makeNodeId(ROWS - 1, CENTER_COL),
  SW: makeNodeId(12, 0),
  NW: makeNodeId(4, 0),
};

function validateTopology(board: Board): void {
  if (board.cells.length !== STAR_CELL_COUNT) {
    throw new Error(`Star board must have ${STAR_CELL_COUNT} cells, got ${board.cells.length}`);
  }

  for (const [id, ns] of board.adjacency.entries()) {
    if (ns.length > DIRECTIONS.length) throw new Error(`Cell ${id} has ${ns.length} neighbors`);
    for (const n of ns) {
      if (!(board.adjacency.get(n) ?? []).includes(id)) {
        throw new Error(`Asymmetric adjacency: ${id} -> ${n}`);
      }
    }
  }

  let center = 0;
  for (const region of board.regions.values()) if (region === "center") center++;
  if (center !== CENTER_CELL_COUNT) throw new Error(`Center must have ${CENTER_CELL_COUNT} cells, got ${center}`);

  for (const corner of CORNERS) {
    const cells = board.corners.get(corner) ?? [];
    if (cells.length !== CORNER_CELL_COUNT) {
      throw new Error(`Corner ${corner} must have ${CORNER_CELL_COUNT} cells, got ${cells.length}`);
    }
    const apex = board.apexes.get(corner);
    if (!apex || !cells.includes(apex)) throw new Error(`Apex of ${corner} is not inside its corner`);
  }
}

export function createStarBoard(): Board {
  const cells: NodeId[] = [];
  for (let r = 0; r < ROWS; r++) {
    for (let c = 0; c < COLS; c++) {
      if (isOnStar(r, c)) cells.push(makeNodeId(r, c));
    }
  }

  const adjacency = new Map<NodeId, readonly NodeId[]>();
  const jumps = new Map<NodeId, readonly JumpTarget[]>();
  const regions = new Map<NodeId, Region>();
  const cornerCells = new Map<Corner, NodeId[]>(CORNERS.map((k) => [k, []]));

  for (const id of cells) {
    const { r, c } = parseNodeId(id);
    const ns: NodeId[] = [];
    const js: JumpTarget[] = [];
    for (const { dr, dc } of DIRECTIONS) {
      if (!isOnStar(r + dr, c + dc)) continue;
      ns.push(makeNodeId(r + dr, c + dc));
      if (isOnStar(r + 2 * dr, c + 2 * dc)) {
        js.push({ over: makeNodeId(r + dr, c + dc), land: makeNodeId(r + 2 * dr, c + 2 * dc) });
      }
    }
    adjacency.set(id, Object.freeze(ns));
    jumps.set(id, Object.freeze(js));

    const region = classify(r, c);
    regions.set(id, region);
    if (region !== "center") cornerCells.get(region)?.push(id);
  }

  const corners = new Map<Corner, readonly NodeId[]>();
  for (const [k, v] of cornerCells) corners.set(k, Object.freeze(v));

  const apexes = new Map<Corner, NodeId>();
  const apexDistance = new Map<Corner, ReadonlyMap<NodeId, number>>();
  for (const corner of CORNERS) {
    const apex = APEX_CELLS[corner];
    apexes.set(corner, apex);
    apexDistance.set(corner, new Map(cells.map((id) => [id, hexDistance(id, apex)])));
  }

  const board: Board = {
    cells: Object.freeze(cells),
    adjacency,
    jumps,
    regions,
    corners,
    apexes,
    apexDistance,
  };
  validateTopology(board);
  return Object.freeze(board);
}

export const STAR_BOARD: Board = createStarBoard();

export function isValidCell(id: NodeId, board: Board = STAR_BOARD): boolean {
  return board.regions.has(id);
}

export function neighbors(id: NodeId, board: Board = STAR_BOARD): readonly NodeId[] {
  return board.adjacency.get(id) ?? [];
}

export function jumpTargets(id: NodeId, board: Board = STAR_BOARD): readonly JumpTarget[] {
  return board.jumps.get(id) ?? [];
}

export function regionOf(id: NodeId, board: Board = STAR_BOARD): Region | null {
  return board.regions.get(id) ?? null;
}

export function homeRegion(color: Color, board: Board = STAR_BOARD): readonly NodeId[] {
  return board.corners.get(homeCorner(color)) ?? [];
}

export function targetRegion(color: Color, board: Board = STAR_BOARD): readonly NodeId[] {
  return board.corners.get(targetCorner(color)) ?? [];
}

export function targetApex(color: Color, board: Board = STAR_BOARD): NodeId {
  const apex = board.apexes.get(targetCorner(color));
  if (!apex) throw new Error(`No apex for ${color}'s target`);
  return apex;
}
