import type { PlayerDecision } from "../ai/aiTypes.ts";
import type { Move } from "../game/moveTypes.ts";
import { sameMove } from "../game/moveTypes.ts";
import { labelToNodeId } from "../game/coordFormat.ts";

export type HumanCommand = PlayerDecision | { kind: "list" } | { kind: "invalid"; message: string };

/**
 * Reads one line typed by a human: `pass`, `resign`, `moves`, or a move as
 * two cells (`M5 K5`, `M5-K5`, or a whole chain `M5xK5xI5`, of which only
 * the first and last cell count). Cells are labels or raw node ids.
 *
 * A move that names real cells is returned even when it is not legal, so the
 * controller can reject it with a reason.
 */
export function parseHumanCommand(text: string, legalMoves: readonly Move[]): HumanCommand {
  const raw = text.trim().toLowerCase();
  if (raw === "pass") return { kind: "pass" };
  if (raw === "resign") return { kind: "resign" };
  if (raw === "moves" || raw === "help" || raw === "?") return { kind: "list" };

  const tokens = raw.split(/[\s,>-]+|x/).filter(Boolean);
  if (tokens.length < 2) {
    return { kind: "invalid", message: `Expected "<from> <to>", pass or resign; got "${text.trim()}"` };
  }

  const fromToken = tokens[0];
  const toToken = tokens[tokens.length - 1];
  const from = labelToNodeId(fromToken);
  if (!from) return { kind: "invalid", message: `Unknown cell "${fromToken}"` };
  const to = labelToNodeId(toToken);
  if (!to) return { kind: "invalid", message: `Unknown cell "${toToken}"` };

  const legal = legalMoves.find((m) => sameMove(m, { from, to }));
  return { kind: "move", move: legal ?? { kind: "step", from, to } };
}
