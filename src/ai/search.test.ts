import { describe, it, expect } from "vitest";
import type { Color } from "../types.ts";
import type { GameState, NodeId } from "../game/state.ts";
import { createInitialGameState } from "../game/state.ts";
import { targetRegion } from "../game/board.ts";
import { generateLegalMoves } from "../game/movegen.ts";
import { chooseGreedyMove, chooseSearchMove } from "./search.ts";

function stateWith(pegs: Array<[NodeId, Color]>, toMove: Color = "red"): GameState {
  return { board: new Map(pegs), toMove, colors: ["red", "green"], ply: 0 };
}

// Red needs one step (r12c8 -> r13c9) to fill its target corner.
function oneStepFromWinning(): GameState {
  const reds: Array<[NodeId, Color]> = targetRegion("red")
    .filter((id) => id !== "r13c9")
    .map((id) => [id, "red"]);
  return stateWith([...reds, ["r12c8", "red"], ["r8c12", "green"]]);
}

const OPENING_JUMP = { kind: "jump", from: "r2c10", via: [], to: "r4c12" };

describe("chooseGreedyMove", () => {
  it("takes the first of the best-scoring opening jumps", () => {
    expect(chooseGreedyMove(createInitialGameState("star_2p"), "red")).toEqual(OPENING_JUMP);
  });

  it("returns null when the color cannot move", () => {
    const s = stateWith([
      ["r4c0", "red"],
      ["r8c12", "green"],
    ]);
    expect(chooseGreedyMove(s, "red")).toBeNull();
  });

  it("finishes the game when it can", () => {
    expect(chooseGreedyMove(oneStepFromWinning(), "red")).toEqual({ kind: "step", from: "r12c8", to: "r13c9" });
  });
});

describe("chooseSearchMove", () => {
  it("agrees with the greedy player at depth 1", () => {
    const s = createInitialGameState("star_2p");
    const res = chooseSearchMove(s, "red", { depth: 1 });
    expect(res.bestMove).toEqual(OPENING_JUMP);
    expect(res.score).toBe(5);
    expect(res.depthReached).toBe(1);
  });

  it("falls back to the greedy choice at depth 0", () => {
    const res = chooseSearchMove(createInitialGameState("star_2p"), "red", { depth: 0 });
    expect(res).toEqual({ score: 5, bestMove: OPENING_JUMP, nodes: 1, depthReached: 1 });
  });

  it("is deterministic", () => {
    const s = createInitialGameState("star_2p");
    const a = chooseSearchMove(s, "red", { depth: 2 });
    const b = chooseSearchMove(s, "red", { depth: 2 });
    expect(a).toEqual(b);
    expect(generateLegalMoves(s)).toContainEqual(a.bestMove);
  });

  it("does not mutate the searched state", () => {
    const s = createInitialGameState("star_2p");
    const before = [...s.board.entries()];
    chooseSearchMove(s, "red", { depth: 2 });
    expect([...s.board.entries()]).toEqual(before);
    expect(s.toMove).toBe("red");
    expect(s.ply).toBe(0);
  });

  it("returns no move when the color is stuck", () => {
    const s = stateWith([
      ["r4c0", "red"],
      ["r8c12", "green"],
    ]);
    expect(chooseSearchMove(s, "red", { depth: 2 })).toEqual({ score: 0, bestMove: null, nodes: 0, depthReached: 0 });
  });

  it("lets a stuck opponent pass and keeps searching", () => {
    const s = stateWith([
      ["r8c12", "red"],
      ["r4c24", "green"],
    ]);
    const deep = chooseSearchMove(s, "red", { depth: 2 });
    const shallow = chooseSearchMove(s, "red", { depth: 1 });
    expect(deep.bestMove).toEqual({ kind: "step", from: "r8c12", to: "r9c13" });
    expect(deep.bestMove).toEqual(chooseGreedyMove(s, "red"));
    expect(deep.score).toBe(shallow.score);
  });

  it("plays the winning move", () => {
    const res = chooseSearchMove(oneStepFromWinning(), "red", { depth: 2 });
    expect(res.bestMove).toEqual({ kind: "step", from: "r12c8", to: "r13c9" });
  });

  it("keeps only the best-ordered move with a beam of one", () => {
    const res = chooseSearchMove(createInitialGameState("star_2p"), "red", { depth: 2, beamWidth: 1 });
    expect(res.bestMove).toEqual(OPENING_JUMP);
  });

  it("searches for the side it is asked about with three colors", () => {
    const s = createInitialGameState("star_3p");
    const res = chooseSearchMove(s, "red", { depth: 2, beamWidth: 6 });
    expect(res.bestMove).not.toBeNull();
    expect(s.board.get(res.bestMove?.from ?? "")).toBe("red");
  });
});
