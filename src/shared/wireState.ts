import type { Color } from "../types.ts";
import { isColor } from "../types.ts";
import type { GameState, NodeId } from "../game/state.ts";
import type { GameMeta } from "../variants/variantTypes.ts";
import { isVariantId } from "../variants/variantRegistry.ts";
import { isValidCell } from "../game/board.ts";

export type WireGameState = {
  board: [NodeId, Color][];
  toMove: Color;
  colors: Color[];
  ply: number;
  resigned?: Color[];
  meta?: GameMeta;
};

export function serializeWireGameState(state: GameState): WireGameState {
  return {
    board: Array.from(state.board.entries()),
    toMove: state.toMove,
    colors: [...state.colors],
    ply: state.ply,
    resigned: state.resigned && state.resigned.length > 0 ? [...state.resigned] : undefined,
    meta: state.meta,
  };
}

function fail(message: string): never {
  throw new Error(`Invalid wire state: ${message}`);
}

function isRecord(raw: unknown): raw is Record<string, unknown> {
  return typeof raw === "object" && raw !== null && !Array.isArray(raw);
}

function readColor(raw: unknown, what: string): Color {
  if (!isColor(raw)) fail(`${what} is not a color (${String(raw)})`);
  return raw;
}

/**
 * Rebuilds a GameState from untrusted JSON, checking every field on the way.
 */
export function deserializeWireGameState(wire: unknown): GameState {
  if (!isRecord(wire)) fail("not an object");
  const w = wire;

  if (!Array.isArray(w.board)) fail("board must be an array");
  const board = new Map<NodeId, Color>();
  for (const entry of w.board) {
    if (!Array.isArray(entry) || entry.length !== 2) fail("board entries must be [nodeId, color] pairs");
    const [id, owner]: unknown[] = entry;
    if (typeof id !== "string" || !isValidCell(id)) fail(`unknown cell ${String(id)}`);
    if (board.has(id)) fail(`cell ${id} listed twice`);
    board.set(id, readColor(owner, `owner of ${id}`));
  }

  if (!Array.isArray(w.colors) || w.colors.length === 0) fail("colors must be a non-empty array");
  const colors = w.colors.map((c, i) => readColor(c, `colors[${i}]`));
  const toMove = readColor(w.toMove, "toMove");
  if (!colors.includes(toMove)) fail(`toMove ${toMove} is not seated`);

  const ply = w.ply;
  if (typeof ply !== "number" || !Number.isInteger(ply) || ply < 0) fail("ply must be a non-negative integer");

  const state: GameState = { board, toMove, colors, ply };

  if (w.resigned !== undefined) {
    if (!Array.isArray(w.resigned)) fail("resigned must be an array");
    state.resigned = w.resigned.map((c, i) => readColor(c, `resigned[${i}]`));
  }

  if (w.meta !== undefined) {
    const variantId = isRecord(w.meta) ? w.meta.variantId : undefined;
    if (typeof variantId !== "string" || !isVariantId(variantId)) fail("meta.variantId is unknown");
    state.meta = { variantId };
  }

  return state;
}
