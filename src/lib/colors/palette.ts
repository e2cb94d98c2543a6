import fs from "fs/promises";
import path from "path";
import chroma from "chroma-js";
import sharp from "sharp";
import { DecodeError } from "@/lib/errors";
import { readImageHeader } from "@/lib/images/processor";
import { mainColors } from "./extractor";
import type { Rgb } from "./types";

/** Palette strip height as a fraction of the source height */
const PALETTE_HEIGHT_RATIO = 6;

export const DEFAULT_PALETTE_SIZE = 5;

/**
 * Sort key that walks colors in a visually smooth order: hue band first,
 * then perceived luminance, then value, each quantised into `repetitions`
 * steps.
 */
export function paletteSortKey(rgb: Rgb, repetitions = 8): [number, number, number] {
  const [r, g, b] = rgb;
  const lum = Math.sqrt(0.241 * r + 0.691 * g + 0.068 * b);
  const [hue, , value] = chroma(r, g, b).hsv();
  // chroma reports NaN hue for greys
  const h = Number.isNaN(hue) ? 0 : hue / 360;

  return [
    Math.floor(h * repetitions),
    Math.floor(lum * repetitions),
    Math.floor(value * repetitions),
  ];
}

function compareKeys(a: readonly number[], b: readonly number[]): number {
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return a[i] - b[i];
  }
  return 0;
}

export function sortPaletteColors(colors: readonly Rgb[], repetitions = 8): Rgb[] {
  return colors
    .map((rgb) => ({ rgb, key: paletteSortKey(rgb, repetitions) }))
    .sort((a, b) => compareKeys(a.key, b.key))
    .map(({ rgb }) => rgb);
}

export interface PaletteStrip {
  /** Interleaved RGB */
  data: Buffer;
  width: number;
  height: number;
}

/**
 * Lay `colors` out left to right as blocks of ⌊width / slots⌋ pixels on a
 * white strip. Unused slots and the rounding remainder stay white.
 */
export function renderPalette(
  colors: readonly Rgb[],
  width: number,
  height: number,
  slots: number = colors.length
): PaletteStrip {
  const blockWidth = Math.floor(width / Math.max(1, slots));
  if (width <= 0 || height <= 0 || blockWidth <= 0) {
    throw new DecodeError(`Palette too small to render (${width}×${height}, ${slots} colors)`);
  }

  const data = Buffer.alloc(width * height * 3, 255);
  colors.slice(0, slots).forEach(([r, g, b], index) => {
    const x0 = index * blockWidth;
    for (let y = 0; y < height; y++) {
      for (let x = x0; x < x0 + blockWidth; x++) {
        const offset = (y * width + x) * 3;
        data[offset] = r;
        data[offset + 1] = g;
        data[offset + 2] = b;
      }
    }
  });

  return { data, width, height };
}

/**
 * Write a palette strip for the image at `inputPath`: its `k` main colors,
 * sorted, as equal-width blocks, as wide as the source and one sixth of its
 * height. The output format follows `outputPath`'s extension.
 */
export async function buildPalette(
  inputPath: string,
  outputPath: string,
  k: number = DEFAULT_PALETTE_SIZE
): Promise<string> {
  const colors = sortPaletteColors(await mainColors(inputPath, k));
  const { width, height } = await readImageHeader(inputPath);

  const strip = renderPalette(colors, width, Math.floor(height / PALETTE_HEIGHT_RATIO), k);

  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await sharp(strip.data, {
    raw: { width: strip.width, height: strip.height, channels: 3 },
  }).toFile(outputPath);

  return outputPath;
}
