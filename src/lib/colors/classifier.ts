import chroma from "chroma-js";
import type { BroadColor, ColorCount, EmotionLabel, Rgb } from "./types";

/**
 * Coarse classification palette. Order matters: on equal distance the
 * earlier entry wins.
 */
export const BROAD_COLORS: ReadonlyArray<{ name: BroadColor; rgb: Rgb }> = [
  { name: "Red", rgb: [220, 20, 60] },
  { name: "Orange", rgb: [255, 165, 0] },
  { name: "Yellow", rgb: [255, 255, 0] },
  { name: "Green", rgb: [34, 139, 34] },
  { name: "Blue", rgb: [30, 144, 255] },
  { name: "White", rgb: [255, 255, 255] },
  { name: "Black", rgb: [0, 0, 0] },
];

/** Signed warmth of each broad color; drives the emotion label. */
export const COLOR_WARMTH: Readonly<Record<BroadColor, number>> = {
  Red: 1,
  Orange: 1,
  Yellow: 1,
  Green: -1,
  Blue: -1,
  White: 0,
  Black: 0,
};

/** Most frequent buckets considered by the classifiers */
const TOP_BUCKETS = 8;

/** Max distinct buckets for a logo to count as minimalist */
const MINIMALIST_MAX_BUCKETS = 2;

/**
 * Nearest broad color by Euclidean RGB distance.
 */
export function closestBroadColor(rgb: Rgb): BroadColor {
  const target = chroma(rgb[0], rgb[1], rgb[2]);
  let closest = BROAD_COLORS[0].name;
  let minDistance = Infinity;

  for (const { name, rgb: reference } of BROAD_COLORS) {
    const distance = chroma.distance(target, chroma(reference[0], reference[1], reference[2]), "rgb");
    if (distance < minDistance) {
      minDistance = distance;
      closest = name;
    }
  }
  return closest;
}

/**
 * Broad-color buckets of `colors`, most frequent first (ties keep first
 * appearance), capped at the top 8.
 */
export function countBroadColors(colors: readonly Rgb[]): ColorCount[] {
  const counts = new Map<BroadColor, number>();
  for (const rgb of colors) {
    const bucket = closestBroadColor(rgb);
    counts.set(bucket, (counts.get(bucket) ?? 0) + 1);
  }

  // Array.prototype.sort is stable, so equal counts keep insertion order
  return Array.from(counts, ([color, count]) => ({ color, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, TOP_BUCKETS);
}

/** True when the colors fall into at most two broad-color buckets. */
export function classifyMinimalism(colors: readonly Rgb[]): boolean {
  return countBroadColors(colors).length <= MINIMALIST_MAX_BUCKETS;
}

/**
 * Warmth score: Σ warmth × count over the buckets, divided by the number of
 * distinct buckets. 0 when there are no colors.
 */
export function warmthScore(colors: readonly Rgb[]): number {
  const groups = countBroadColors(colors);
  if (groups.length === 0) return 0;

  const total = groups.reduce((sum, { color, count }) => sum + COLOR_WARMTH[color] * count, 0);
  return total / groups.length;
}

export function classifyEmotion(colors: readonly Rgb[]): EmotionLabel {
  const score = warmthScore(colors);

  if (score > 0.5) return "Energetic & Passionate";
  if (score > 0) return "Warm & Friendly";
  if (score < -0.5) return "Cool & Professional";
  if (score < 0) return "Calm & Trustworthy";
  return "Balanced & Neutral";
}
