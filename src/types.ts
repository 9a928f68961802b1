export type Color = "red" | "orange" | "yellow" | "green" | "blue" | "purple";

/** Star corners, clockwise from the top. */
export type Corner = "N" | "NE" | "SE" | "S" | "SW" | "NW";
export type Region = Corner | "center";

// Clockwise seating order; index i sits on CORNERS[i].
export const COLORS: readonly Color[] = ["red", "orange", "yellow", "green", "blue", "purple"];
export const CORNERS: readonly Corner[] = ["N", "NE", "SE", "S", "SW", "NW"];

export const PEGS_PER_COLOR = 10;

export function isColor(raw: unknown): raw is Color {
  return typeof raw === "string" && COLORS.some((c) => c === raw);
}

export function homeCorner(color: Color): Corner {
  return CORNERS[COLORS.indexOf(color)];
}

export function targetCorner(color: Color): Corner {
  return CORNERS[(COLORS.indexOf(color) + 3) % CORNERS.length];
}

export function colorInitial(color: Color): string {
  return color.charAt(0).toUpperCase();
}
