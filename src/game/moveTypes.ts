import type { NodeId } from "./state.ts";

export interface StepMove {
  kind: "step";
  from: NodeId;
  to: NodeId;
}

export interface JumpMove {
  kind: "jump";
  from: NodeId;
  /** Intermediate landing cells of a chain, in order. Empty for a single jump. */
  via: NodeId[];
  to: NodeId;
}

export type Move = StepMove | JumpMove;

export function movePath(move: Move): NodeId[] {
  return move.kind === "jump" ? [move.from, ...move.via, move.to] : [move.from, move.to];
}

export function sameMove(a: Pick<Move, "from" | "to">, b: Pick<Move, "from" | "to">): boolean {
  return a.from === b.from && a.to === b.to;
}
