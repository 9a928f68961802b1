import { describe, it, expect, vi } from "vitest";
import { createGreedyPlayer, createHumanPlayer, createMinimaxPlayer, createPlayer } from "./players.ts";
import { createInitialGameState } from "../game/state.ts";
import type { GameState, NodeId } from "../game/state.ts";
import type { Color } from "../types.ts";
import { isEngineError } from "../game/engineError.ts";

const OPENING_JUMP = { kind: "jump", from: "r2c10", via: [], to: "r4c12" };

function stuckRed(): GameState {
  const pegs: Array<[NodeId, Color]> = [
    ["r4c0", "red"],
    ["r8c12", "green"],
  ];
  return {
    board: new Map(pegs),
    toMove: "red",
    colors: ["red", "green"],
    ply: 0,
  };
}

describe("players", () => {
  it("builds each seat kind", () => {
    expect(createPlayer({ kind: "greedy" }).kind).toBe("greedy");
    expect(createPlayer({ kind: "minimax", depth: 2 }).kind).toBe("minimax");
    expect(createPlayer({ kind: "human" }, { humanInput: async () => ({ kind: "pass" }) }).kind).toBe("human");
  });

  it("needs an input source for a human seat", () => {
    let caught: unknown = null;
    try {
      createPlayer({ kind: "human" });
    } catch (err) {
      caught = err;
    }
    expect(isEngineError(caught) && caught.code).toBe("INVALID_CONFIGURATION");
  });

  it("lets engine seats pick a move", async () => {
    const s = createInitialGameState("star_2p");
    expect(await createGreedyPlayer().chooseMove(s, "red")).toEqual({ kind: "move", move: OPENING_JUMP });
    expect(await createMinimaxPlayer(1).chooseMove(s, "red")).toEqual({ kind: "move", move: OPENING_JUMP });
  });

  it("logs the search summary in debug mode", async () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    await createMinimaxPlayer(1, null, { debug: true }).chooseMove(createInitialGameState("star_2p"), "red");
    expect(logSpy).toHaveBeenCalledWith(expect.stringMatching(/^\[ai:minimax\] red C1xE7 eval=5 d=1 n=14 ms=\d+$/));
    logSpy.mockRestore();
  });

  it("reports a stuck color as having no legal move", async () => {
    await expect(createGreedyPlayer().chooseMove(stuckRed(), "red")).rejects.toThrow("red has no legal move");
  });

  it("hands humans the legal moves and any rejection", async () => {
    const seen: Array<{ count: number; rejection?: string }> = [];
    const player = createHumanPlayer(async (ctx) => {
      seen.push({ count: ctx.legalMoves.length, rejection: ctx.rejection });
      return { kind: "resign" };
    });
    expect(await player.chooseMove(createInitialGameState("star_2p"), "red", "try again")).toEqual({ kind: "resign" });
    expect(seen).toEqual([{ count: 14, rejection: "try again" }]);
  });
});
