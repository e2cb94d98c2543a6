/** 8-bit RGB triple */
export type Rgb = readonly [r: number, g: number, b: number];

export const BROAD_COLOR_NAMES = [
  "Red",
  "Orange",
  "Yellow",
  "Green",
  "Blue",
  "White",
  "Black",
] as const;

export type BroadColor = (typeof BROAD_COLOR_NAMES)[number];

export type EmotionLabel =
  | "Energetic & Passionate"
  | "Warm & Friendly"
  | "Cool & Professional"
  | "Calm & Trustworthy"
  | "Balanced & Neutral";

export interface ColorCount {
  color: BroadColor;
  count: number;
}
