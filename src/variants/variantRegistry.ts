import type { VariantId, VariantSpec } from "./variantTypes.ts";
import { EngineError } from "../game/engineError.ts";

export const VARIANTS: readonly VariantSpec[] = [
  {
    variantId: "star_2p",
    displayName: "Two Players",
    subtitle: "Red (north) vs Green (south)",
    playerCount: 2,
    colors: ["red", "green"],
  },
  {
    variantId: "star_3p",
    displayName: "Three Players",
    subtitle: "Red, Yellow and Blue race into empty corners",
    playerCount: 3,
    colors: ["red", "yellow", "blue"],
  },
  {
    variantId: "star_4p",
    displayName: "Four Players",
    subtitle: "Two opposed pairs; north and south stay empty",
    playerCount: 4,
    colors: ["orange", "yellow", "blue", "purple"],
  },
  {
    variantId: "star_6p",
    displayName: "Six Players",
    subtitle: "Every corner seated",
    playerCount: 6,
    colors: ["red", "orange", "yellow", "green", "blue", "purple"],
  },
] as const;

export const DEFAULT_VARIANT_ID: VariantId = "star_2p";

export function isVariantId(id: string): id is VariantId {
  return VARIANTS.some((v) => v.variantId === id);
}

export function getVariantById(id: VariantId): VariantSpec {
  const found = VARIANTS.find((v) => v.variantId === id);
  if (!found) throw new EngineError("INVALID_CONFIGURATION", `Unknown variantId: ${id}`);
  return found;
}

export function variantForPlayerCount(count: number): VariantSpec {
  const found = VARIANTS.find((v) => v.playerCount === count);
  if (!found) {
    const supported = VARIANTS.map((v) => v.playerCount).join(", ");
    throw new EngineError("INVALID_CONFIGURATION", `Unsupported player count ${count} (supported: ${supported})`);
  }
  return found;
}
