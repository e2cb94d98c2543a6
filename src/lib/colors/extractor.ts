import { kmeans } from "ml-kmeans";
import { loadRgbPixels, loadRgbaPixels } from "@/lib/images/processor";
import type { Rgb } from "./types";

/** Pixels with alpha below this are ignored by dominantColor */
const MIN_ALPHA = 125;

/** Pixels with every channel above this count as background white */
const WHITE_CUTOFF = 250;

/** Quantisation step for dominant-color buckets */
const BUCKET_STEP = 16;

const KMEANS_SEED = 42;

/**
 * Dominant color of an image by bucket counting.
 *
 * Every `quality`-th pixel is sampled (1 = every pixel, higher = faster
 * and coarser). Transparent and near-white pixels are skipped, the rest
 * are quantised to 16-step buckets and the mean of the most populous
 * bucket is returned. Null when no pixel qualifies (blank or all-white
 * logos).
 */
export async function dominantColor(input: string | Buffer, quality = 6): Promise<Rgb | null> {
  const { data } = await loadRgbaPixels(input);
  const stride = Math.max(1, Math.floor(quality)) * 4;
  const buckets = new Map<string, { r: number; g: number; b: number; count: number }>();

  for (let i = 0; i + 3 < data.length; i += stride) {
    const r = data[i];
    const g = data[i + 1];
    const b = data[i + 2];
    if (data[i + 3] < MIN_ALPHA) continue;
    if (r > WHITE_CUTOFF && g > WHITE_CUTOFF && b > WHITE_CUTOFF) continue;

    const key = [r, g, b].map((c) => Math.round(c / BUCKET_STEP) * BUCKET_STEP).join(",");
    const existing = buckets.get(key);
    if (existing) {
      existing.r += r;
      existing.g += g;
      existing.b += b;
      existing.count++;
    } else {
      buckets.set(key, { r, g, b, count: 1 });
    }
  }

  let best: { r: number; g: number; b: number; count: number } | null = null;
  for (const bucket of buckets.values()) {
    if (!best || bucket.count > best.count) {
      best = bucket;
    }
  }
  if (!best) return null;

  return [
    Math.round(best.r / best.count),
    Math.round(best.g / best.count),
    Math.round(best.b / best.count),
  ];
}

/**
 * Main colors of an image: k-means centroids over all of its pixels (seeded, so
 * repeated runs agree), truncated to integers. Images with no more than
 * `k` distinct colors return those colors as-is, in first-seen order.
 */
export async function mainColors(input: string | Buffer, k = 5): Promise<Rgb[]> {
  const { data } = await loadRgbPixels(input);

  const points: number[][] = [];
  const distinct = new Map<string, Rgb>();
  for (let i = 0; i + 2 < data.length; i += 3) {
    const rgb: Rgb = [data[i], data[i + 1], data[i + 2]];
    points.push([rgb[0], rgb[1], rgb[2]]);
    const key = rgb.join(",");
    if (!distinct.has(key)) distinct.set(key, rgb);
  }

  if (distinct.size <= k) {
    return [...distinct.values()];
  }

  const { centroids } = kmeans(points, k, { seed: KMEANS_SEED, initialization: "kmeans++" });
  return centroids.map((centroid) => {
    const [r, g, b] = centroid.map((c) => Math.min(255, Math.max(0, Math.trunc(c))));
    return [r, g, b] as const;
  });
}
