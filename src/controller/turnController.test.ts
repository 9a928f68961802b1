import { describe, it, expect, vi } from "vitest";
import type { Color } from "../types.ts";
import type { GameState, NodeId } from "../game/state.ts";
import type { HumanInputContext, HumanInputSource, PlayerDecision } from "../ai/aiTypes.ts";
import type { TurnEvent } from "./turnController.ts";
import { TurnController } from "./turnController.ts";
import { assertOccupancyInvariant, createInitialGameState } from "../game/state.ts";
import { targetRegion } from "../game/board.ts";
import { createGameConfig } from "../config.ts";
import { isEngineError } from "../game/engineError.ts";

// Red is one step (r12c8 -> r13c9) from filling its target; green sits in the center.
function oneStepFromWinning(): GameState {
  const pegs: Array<[NodeId, Color]> = targetRegion("red")
    .filter((id) => id !== "r13c9")
    .map((id) => [id, "red"]);
  pegs.push(["r12c8", "red"]);
  for (const c of [4, 6, 8, 10, 12, 14, 16, 18, 20]) pegs.push([`r8c${c}`, "green"]);
  pegs.push(["r9c5", "green"]);
  return { board: new Map(pegs), toMove: "red", colors: ["red", "green"], ply: 0, meta: { variantId: "star_2p" } };
}

// Yellow fills the NE corner; red and blue hold every center cell a yellow peg
// could step or jump to, so yellow has no move while red and blue do.
function yellowBoxedIn(): GameState {
  const pegs: Array<[NodeId, Color]> = [];
  for (const id of ["r4c18", "r4c20", "r4c22", "r4c24", "r5c19", "r5c21", "r5c23", "r6c20", "r6c22", "r7c21"]) {
    pegs.push([id, "yellow"]);
  }
  for (const id of ["r0c12", "r4c16", "r5c17", "r6c18", "r7c19", "r8c20", "r4c14", "r6c16", "r5c15", "r7c17"]) {
    pegs.push([id, "red"]);
  }
  for (const id of ["r8c18", "r9c19", "r10c2", "r10c4", "r11c1", "r11c3", "r11c5", "r12c0", "r12c2", "r12c4"]) {
    pegs.push([id, "blue"]);
  }
  return {
    board: new Map(pegs),
    toMove: "red",
    colors: ["red", "yellow", "blue"],
    ply: 0,
    meta: { variantId: "star_3p" },
  };
}

function scripted(answers: PlayerDecision[], seen: HumanInputContext[] = []): HumanInputSource {
  let i = 0;
  return async (ctx) => {
    seen.push(ctx);
    const answer = answers[Math.min(i, answers.length - 1)];
    i++;
    return answer;
  };
}

describe("TurnController", () => {
  it("stops as soon as a color wins", async () => {
    const events: TurnEvent[] = [];
    const c = new TurnController(oneStepFromWinning(), { seats: { red: { kind: "greedy" }, green: { kind: "greedy" } } });
    c.addTurnListener((ev) => events.push(ev));

    const status = await c.run();

    expect(status).toEqual({ result: "win", winner: "red", reason: "Red wins: every peg reached the target corner" });
    expect(c.getRecord()).toEqual([
      { ply: 1, color: "red", action: "move", move: { kind: "step", from: "r12c8", to: "r13c9" }, notation: "M5-N1" },
    ]);
    expect(events.map((e) => e.type)).toEqual(["turn", "gameOver"]);
    expect(await c.playTurn()).toBeNull();
  });

  it("refuses moves after the game is over", async () => {
    const c = new TurnController(oneStepFromWinning(), { seats: { red: { kind: "greedy" }, green: { kind: "greedy" } } });
    await c.run();
    expect(() => c.pass()).toThrow("Game over: Red wins: every peg reached the target corner");
  });

  it("re-asks a human after an illegal move and leaves the state untouched", async () => {
    const seen: HumanInputContext[] = [];
    const input = scripted(
      [
        { kind: "move", move: { kind: "step", from: "r3c9", to: "r5c9" } },
        { kind: "move", move: { kind: "step", from: "r3c9", to: "r4c10" } },
      ],
      seen
    );
    const c = new TurnController(createInitialGameState("star_2p"), {
      seats: { red: { kind: "human" }, green: { kind: "greedy" } },
      humanInput: input,
    });
    const rejections: string[] = [];
    c.addTurnListener((ev) => {
      if (ev.type === "rejected") rejections.push(ev.reason);
    });

    const rec = await c.playTurn();

    expect(rejections).toEqual(["r3c9 -> r5c9 is not a legal move"]);
    expect(seen.map((ctx) => ctx.rejection)).toEqual([undefined, "r3c9 -> r5c9 is not a legal move"]);
    expect(seen[0].legalMoves).toHaveLength(14);
    expect(rec).toEqual({
      ply: 1,
      color: "red",
      action: "move",
      move: { kind: "step", from: "r3c9", to: "r4c10" },
      notation: "D1-E6",
    });
    expect(c.getState().toMove).toBe("green");
  });

  it("passes the turn after too many rejected answers", async () => {
    const c = new TurnController(createInitialGameState("star_2p"), {
      seats: { red: { kind: "human" }, green: { kind: "greedy" } },
      humanInput: scripted([{ kind: "move", move: { kind: "step", from: "r3c9", to: "r5c9" } }]),
      maxRejections: 2,
    });
    const rec = await c.playTurn();
    expect(rec?.action).toBe("pass");
    expect(c.getState().board.get("r3c9")).toBe("red");
    expect(c.getState().toMove).toBe("green");
  });

  it("accepts pass and resign from a human", async () => {
    const c = new TurnController(createInitialGameState("star_2p"), {
      seats: { red: { kind: "human" }, green: { kind: "human" } },
      humanInput: scripted([{ kind: "pass" }, { kind: "resign" }]),
    });
    expect((await c.playTurn())?.notation).toBe("pass");
    expect((await c.playTurn())?.notation).toBe("resign");
    expect(c.getStatus()).toEqual({ result: "win", winner: "red", reason: "Red wins: every other color resigned" });
  });

  it("is driven externally when a seat has no input source", async () => {
    const c = new TurnController(createInitialGameState("star_2p"), {
      seats: { red: { kind: "human" }, green: { kind: "greedy" } },
    });
    expect(c.awaitsExternalInput()).toBe(true);
    expect(await c.advance()).toEqual([]);

    const rec = c.submitMove({ from: "r3c9", to: "r4c10" });
    expect(rec.notation).toBe("D1-E6");
    expect(c.awaitsExternalInput()).toBe(false);

    const played = await c.advance();
    expect(played).toHaveLength(1);
    expect(played[0].color).toBe("green");
    expect(c.awaitsExternalInput()).toBe(true);
  });

  it("rejects an external move without touching the state", () => {
    const c = new TurnController(createInitialGameState("star_2p"));
    let caught: unknown = null;
    try {
      c.submitMove({ from: "r13c9", to: "r12c8" });
    } catch (err) {
      caught = err;
    }
    expect(isEngineError(caught) && caught.code).toBe("INVALID_MOVE");
    expect(c.getState().ply).toBe(0);
    expect(c.getRecord()).toEqual([]);
  });

  it("lists legal moves of the side to move", () => {
    const c = new TurnController(createInitialGameState("star_2p"));
    expect(c.legalMoves()).toHaveLength(14);
    expect(c.legalMoves("r3c9").map((m) => m.to)).toEqual(["r4c10", "r4c8"]);
    expect(c.legalMoves("r13c9")).toEqual([]);
  });

  it("ends in a stalemate when the move limit is reached", async () => {
    const c = new TurnController(createInitialGameState("star_2p"), {
      seats: { red: { kind: "greedy" }, green: { kind: "greedy" } },
      maxPlies: 6,
    });
    const status = await c.run();
    expect(status).toEqual({ result: "stalemate", winner: null, reason: "Stalemate: move limit of 6 plies reached" });
    expect(c.getRecord()).toHaveLength(6);
  });

  it("ends in a stalemate on a repeated position", async () => {
    const c = new TurnController(createInitialGameState("star_2p"), { repetitionLimit: 2 });
    c.submitMove({ from: "r3c9", to: "r4c10" });
    c.submitMove({ from: "r13c9", to: "r12c10" });
    c.submitMove({ from: "r4c10", to: "r3c9" });
    c.submitMove({ from: "r12c10", to: "r13c9" });
    expect(c.getStatus()).toEqual({ result: "stalemate", winner: null, reason: "Stalemate: position repeated 2 times" });
  });

  it("keeps listeners from breaking the game", () => {
    const c = new TurnController(createInitialGameState("star_2p"));
    c.addTurnListener(() => {
      throw new Error("listener failed");
    });
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);

    expect(c.pass().action).toBe("pass");
    expect(c.getState().toMove).toBe("green");
    expect(errorSpy).toHaveBeenCalledTimes(1);
    errorSpy.mockRestore();
  });

  it("plays a full self-play game between depth-2 searchers", async () => {
    const config = createGameConfig({
      variantId: "star_2p",
      seats: [
        { kind: "minimax", depth: 2 },
        { kind: "minimax", depth: 2 },
      ],
      maxPlies: 120,
    });
    const c = TurnController.fromConfig(config);
    c.addTurnListener((ev) => {
      if (ev.type === "turn") assertOccupancyInvariant(ev.state);
    });

    const status = await c.run();

    expect(status.result).not.toBe("in_progress");
    expect(c.getState().ply).toBe(c.getRecord().length);
    expect(c.getRecord().length).toBeLessThanOrEqual(120);
    expect(c.getRecord().filter((r) => r.action === "move").length).toBeGreaterThan(0);
  });

  it("rotates through three colors", async () => {
    const c = TurnController.fromConfig(
      createGameConfig({ variantId: "star_3p", seats: [{ kind: "greedy" }, { kind: "greedy" }, { kind: "greedy" }], maxPlies: 6 })
    );
    await c.run();
    expect(c.getRecord().map((r) => r.color)).toEqual(["red", "yellow", "blue", "red", "yellow", "blue"]);
  });

  it("passes for a color that has no legal move and plays on", () => {
    const c = new TurnController(yellowBoxedIn());
    c.submitMove({ from: "r0c12", to: "r1c11" });

    expect(c.getRecord()).toEqual([
      { ply: 1, color: "red", action: "move", move: { kind: "step", from: "r0c12", to: "r1c11" }, notation: "A1-B1" },
      { ply: 2, color: "yellow", action: "pass", notation: "pass" },
    ]);
    expect(c.getState().toMove).toBe("blue");
    expect(c.getStatus()).toEqual({ result: "in_progress", winner: null, reason: null });

    c.submitMove({ from: "r12c4", to: "r12c6" });
    expect(c.getState().toMove).toBe("red");
    expect(c.getRecord().map((r) => r.color)).toEqual(["red", "yellow", "blue"]);
  });

  it("passes a stuck side to move when its seat is asked to play", async () => {
    const start: GameState = { ...yellowBoxedIn(), toMove: "yellow" };
    const c = new TurnController(start, {
      seats: { red: { kind: "greedy" }, yellow: { kind: "greedy" }, blue: { kind: "greedy" } },
    });

    const played = await c.advance(2);

    expect(played.map((r) => [r.color, r.action])).toEqual([
      ["yellow", "pass"],
      ["blue", "move"],
    ]);
    expect(c.getStatus().result).toBe("in_progress");
  });

  it("keeps a recorded final status when resuming a finished game", () => {
    const config = createGameConfig({
      variantId: "star_2p",
      seats: [{ kind: "greedy" }, { kind: "greedy" }],
      repetitionLimit: 2,
    });
    const first = TurnController.fromConfig(config);
    first.submitMove({ from: "r3c9", to: "r4c10" });
    first.submitMove({ from: "r13c9", to: "r12c10" });
    first.submitMove({ from: "r4c10", to: "r3c9" });
    first.submitMove({ from: "r12c10", to: "r13c9" });
    const ended = first.getStatus();
    expect(ended.reason).toBe("Stalemate: position repeated 2 times");

    // The position alone does not show the repetition.
    expect(TurnController.fromConfig(config, undefined, { state: first.getState() }).isOver()).toBe(false);

    const resumed = TurnController.fromConfig(config, undefined, { state: first.getState(), status: ended });
    expect(resumed.getStatus()).toEqual(ended);
    expect(resumed.legalMoves()).toEqual([]);
    expect(() => resumed.pass()).toThrow("Game over: Stalemate: position repeated 2 times");
  });
});
