import { createInterface } from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";

import type { HumanInputSource, PlayerDecision } from "./ai/aiTypes.ts";
import { describeSeat } from "./ai/aiTypes.ts";
import { loadGameConfig } from "./config.ts";
import { TurnController } from "./controller/turnController.ts";
import { parseHumanCommand } from "./controller/humanCommand.ts";
import { formatMove } from "./game/coordFormat.ts";
import { renderBoardText, renderStatusLine } from "./render/renderBoardText.ts";
import { getVariantById } from "./variants/variantRegistry.ts";

/* eslint-disable no-console */

async function main(): Promise<void> {
  const config = loadGameConfig();
  const variant = getVariantById(config.variantId);

  const rl = createInterface({ input, output });

  const humanInput: HumanInputSource = async ({ color, legalMoves, rejection }) => {
    if (rejection) console.log(`  rejected: ${rejection}`);
    for (;;) {
      const answer = await rl.question(`${color} (from to | pass | resign | moves)> `);
      const cmd = parseHumanCommand(answer, legalMoves);
      if (cmd.kind === "list") {
        console.log(legalMoves.map((m) => formatMove(m)).join("  "));
        continue;
      }
      if (cmd.kind === "invalid") {
        console.log(`  ${cmd.message}`);
        continue;
      }
      const decision: PlayerDecision = cmd;
      return decision;
    }
  };

  try {
    const controller = TurnController.fromConfig(config, humanInput);

    console.log(`${variant.displayName}: ${variant.colors.map((c, i) => `${c}=${describeSeat(config.seats[i])}`).join(", ")}`);
    console.log(renderBoardText(controller.getState()));

    controller.addTurnListener((ev) => {
      if (ev.type !== "turn") return;
      console.log(`\n${ev.record.ply}. ${ev.record.color} ${ev.record.notation}`);
      console.log(renderBoardText(ev.state));
      console.log(renderStatusLine(ev.state));
    });

    const status = await controller.run();
    console.log(`\n${status.reason ?? status.result}`);
  } finally {
    rl.close();
  }
}

main().catch((err) => {
  console.error("[cli] failed:", err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
