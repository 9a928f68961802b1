import type { NodeId } from "./state.ts";

// The star spans 17 rows; columns are doubled so that every lattice neighbor
// is a small integer offset away.
export const ROWS = 17;
export const COLS = 25;
export const CENTER_COL = 12;

export type Direction = { dr: number; dc: number };

export const DIRECTIONS: readonly Direction[] = [
  { dr: 0, dc: +2 },
  { dr: +1, dc: +1 },
  { dr: +1, dc: -1 },
  { dr: 0, dc: -2 },
  { dr: -1, dc: -1 },
  { dr: -1, dc: +1 },
];

export function parseNodeId(id: string): { r: number; c: number } {
  const m = /^r(\d+)c(\d+)$/.exec(id);
  if (!m) throw new Error(`Invalid node id: ${id}`);
  const r = Number(m[1]);
  const c = Number(m[2]);
  if (!Number.isInteger(r) || !Number.isInteger(c)) throw new Error(`Invalid node coordinates in id: ${id}`);
  return { r, c };
}

export function makeNodeId(r: number, c: number): NodeId {
  return `r${r}c${c}`;
}

export function inBounds(r: number, c: number): boolean {
  return r >= 0 && r < ROWS && c >= 0 && c < COLS;
}

export function inUpperTriangle(r: number, c: number): boolean {
  return r >= 0 && r <= 12 && Math.abs(c - CENTER_COL) <= r;
}

export function inLowerTriangle(r: number, c: number): boolean {
  return r >= 4 && r < ROWS && Math.abs(c - CENTER_COL) <= ROWS - 1 - r;
}

export function isOnStar(r: number, c: number): boolean {
  if (!inBounds(r, c)) return false;
  if ((r + c) % 2 !== 0) return false;
  return inUpperTriangle(r, c) || inLowerTriangle(r, c);
}

export function hexDistance(a: NodeId, b: NodeId): number {
  const pa = parseNodeId(a);
  const pb = parseNodeId(b);
  const dr = Math.abs(pa.r - pb.r);
  const dc = Math.abs(pa.c - pb.c);
  return dc > dr ? dr + (dc - dr) / 2 : dr;
}
