import { describe, it, expect } from "vitest";
import { endTurn, nextToMove } from "./endTurn.ts";
import { createInitialGameState } from "./state.ts";

describe("endTurn", () => {
  it("goes clockwise through the seated colors", () => {
    let s = createInitialGameState("star_3p");
    const order: string[] = [];
    for (let i = 0; i < 4; i++) {
      order.push(s.toMove);
      s = endTurn(s);
    }
    expect(order).toEqual(["red", "yellow", "blue", "red"]);
    expect(s.ply).toBe(4);
  });

  it("skips resigned colors", () => {
    const s = { ...createInitialGameState("star_3p"), resigned: ["yellow" as const] };
    expect(nextToMove(s)).toBe("blue");
  });

  it("stays put when every other color resigned", () => {
    const s = { ...createInitialGameState("star_2p"), resigned: ["green" as const] };
    expect(nextToMove(s)).toBe("red");
  });
});
