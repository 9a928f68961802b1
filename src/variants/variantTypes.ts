import type { Color } from "../types.ts";

export type VariantId = "star_2p" | "star_3p" | "star_4p" | "star_6p";

export interface GameMeta {
  variantId: VariantId;
}

export interface VariantSpec {
  variantId: VariantId;
  displayName: string;
  subtitle: string;
  playerCount: 2 | 3 | 4 | 6;
  /** Seated colors in clockwise turn order. */
  colors: readonly Color[];
}
