import { describe, it, expect } from "vitest";
import { parseHumanCommand } from "./humanCommand.ts";
import { createInitialGameState } from "../game/state.ts";
import { generateLegalMoves } from "../game/movegen.ts";

const legal = generateLegalMoves(createInitialGameState("star_2p"));

describe("parseHumanCommand", () => {
  it("reads keywords", () => {
    expect(parseHumanCommand("pass", legal)).toEqual({ kind: "pass" });
    expect(parseHumanCommand(" Resign ", legal)).toEqual({ kind: "resign" });
    expect(parseHumanCommand("moves", legal)).toEqual({ kind: "list" });
  });

  it("resolves a typed move to the generated one", () => {
    expect(parseHumanCommand("C1 E7", legal)).toEqual({
      kind: "move",
      move: { kind: "jump", from: "r2c10", via: [], to: "r4c12" },
    });
    expect(parseHumanCommand("d1-e6", legal)).toEqual({
      kind: "move",
      move: { kind: "step", from: "r3c9", to: "r4c10" },
    });
    expect(parseHumanCommand("r3c9 r4c10", legal)).toEqual({
      kind: "move",
      move: { kind: "step", from: "r3c9", to: "r4c10" },
    });
  });

  it("takes the ends of a typed chain", () => {
    expect(parseHumanCommand("C1xE7", legal)).toEqual({
      kind: "move",
      move: { kind: "jump", from: "r2c10", via: [], to: "r4c12" },
    });
  });

  it("passes an illegal move on for the controller to reject", () => {
    expect(parseHumanCommand("D1 F5", legal)).toEqual({
      kind: "move",
      move: { kind: "step", from: "r3c9", to: "r5c9" },
    });
  });

  it("explains what it could not read", () => {
    expect(parseHumanCommand("E7", legal)).toEqual({
      kind: "invalid",
      message: 'Expected "<from> <to>", pass or resign; got "E7"',
    });
    expect(parseHumanCommand("Z1 E7", legal)).toEqual({ kind: "invalid", message: 'Unknown cell "z1"' });
  });
});
