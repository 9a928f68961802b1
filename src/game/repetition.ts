import type { GameState } from "./state.ts";
import { hashGameState } from "./hashState.ts";

/**
 * Counts how often each position has occurred in a game.
 */
export class RepetitionTracker {
  private counts: Map<string, number> = new Map();

  /** Records `state` and returns how many times it has now occurred. */
  record(state: GameState): number {
    const key = hashGameState(state);
    const next = (this.counts.get(key) ?? 0) + 1;
    this.counts.set(key, next);
    return next;
  }
}
