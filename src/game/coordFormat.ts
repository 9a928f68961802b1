import type { NodeId } from "./state.ts";
import type { Move } from "./moveTypes.ts";
import { movePath } from "./moveTypes.ts";
import { STAR_BOARD } from "./board.ts";
import { parseNodeId } from "./coords.ts";

// Rows are lettered A (north tip) to Q (south tip); cells within a row are
// numbered 1.. from west to east.
const LABEL_BY_ID = new Map<NodeId, string>();
const ID_BY_LABEL = new Map<string, NodeId>();

{
  const byRow = new Map<number, Array<{ id: NodeId; c: number }>>();
  for (const id of STAR_BOARD.cells) {
    const { r, c } = parseNodeId(id);
    const row = byRow.get(r) ?? [];
    row.push({ id, c });
    byRow.set(r, row);
  }
  for (const [r, row] of byRow) {
    row.sort((a, b) => a.c - b.c);
    const letter = String.fromCharCode("A".charCodeAt(0) + r);
    row.forEach(({ id }, i) => {
      const label = `${letter}${i + 1}`;
      LABEL_BY_ID.set(id, label);
      ID_BY_LABEL.set(label, id);
    });
  }
}

export function nodeIdToLabel(nodeId: NodeId): string {
  return LABEL_BY_ID.get(nodeId) ?? nodeId;
}

/** Accepts either a label (`E7`, case-insensitive) or a raw node id (`r4c12`). */
export function labelToNodeId(raw: string): NodeId | null {
  const text = raw.trim();
  if (STAR_BOARD.regions.has(text)) return text;
  return ID_BY_LABEL.get(text.toUpperCase()) ?? null;
}

export function formatMove(move: Move): string {
  const sep = move.kind === "jump" ? "x" : "-";
  return movePath(move).map(nodeIdToLabel).join(sep);
}
