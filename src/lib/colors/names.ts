import fs from "fs";
import chroma from "chroma-js";
import { z } from "zod";
import type { Rgb } from "./types";

const NAMES_FILE = new URL("../../../data/css-color-names.json", import.meta.url);

const NamedColorsSchema = z.record(z.string().regex(/^#[0-9a-f]{6}$/i));

interface NamedColor {
  name: string;
  rgb: Rgb;
}

let namedColors: NamedColor[] | null = null;

/** CSS3 named colors in alphabetical order, loaded once. */
export function getNamedColors(): readonly NamedColor[] {
  if (!namedColors) {
    const raw: unknown = JSON.parse(fs.readFileSync(NAMES_FILE, "utf-8"));
    const parsed = NamedColorsSchema.parse(raw);
    namedColors = Object.entries(parsed)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([name, hex]) => {
        const [r, g, b] = chroma(hex).rgb();
        return { name, rgb: [r, g, b] as const };
      });
  }
  return namedColors;
}

/**
 * Nearest CSS3 named color by squared RGB distance. Ties keep the
 * alphabetically first name (so "aqua" over "cyan", "darkgray" over
 * "darkgrey").
 */
export function closestColorName(rgb: Rgb): string {
  let closest = "";
  let minDistance = Infinity;

  for (const { name, rgb: c } of getNamedColors()) {
    const distance = (c[0] - rgb[0]) ** 2 + (c[1] - rgb[1]) ** 2 + (c[2] - rgb[2]) ** 2;
    if (distance < minDistance) {
      minDistance = distance;
      closest = name;
    }
  }
  return closest;
}
