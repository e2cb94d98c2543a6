import { loadRgbPixels } from "./processor";

/** Bins per channel: hue, saturation, value */
export const HSV_BINS = [50, 60, 60] as const;

/** Channel ranges, upper bound exclusive */
export const HSV_RANGES = [180, 256, 256] as const;

const BIN_COUNT = HSV_BINS[0] * HSV_BINS[1] * HSV_BINS[2];

/**
 * 8-bit RGB → HSV with hue halved into [0, 180) and saturation/value
 * scaled to [0, 255].
 */
export function rgbToHsv8(r: number, g: number, b: number): [number, number, number] {
  const v = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  const diff = v - min;
  const s = v === 0 ? 0 : Math.round((diff * 255) / v);

  let h = 0;
  if (diff !== 0) {
    if (v === r) h = (60 * (g - b)) / diff;
    else if (v === g) h = 120 + (60 * (b - r)) / diff;
    else h = 240 + (60 * (r - g)) / diff;
    if (h < 0) h += 360;
  }

  let hue = Math.round(h / 2);
  if (hue >= HSV_RANGES[0]) hue -= HSV_RANGES[0];
  return [hue, s, v];
}

/** Flat index of the (h, s, v) bin, hue-major. */
function binIndex(h: number, s: number, v: number): number {
  const hb = Math.floor((h * HSV_BINS[0]) / HSV_RANGES[0]);
  const sb = Math.floor((s * HSV_BINS[1]) / HSV_RANGES[1]);
  const vb = Math.floor((v * HSV_BINS[2]) / HSV_RANGES[2]);
  return (hb * HSV_BINS[1] + sb) * HSV_BINS[2] + vb;
}

/** 3-D HSV histogram of an image, flattened, raw pixel counts. */
export async function computeHsvHistogram(input: string | Buffer): Promise<Float64Array> {
  const { data } = await loadRgbPixels(input);
  const hist = new Float64Array(BIN_COUNT);

  for (let i = 0; i + 2 < data.length; i += 3) {
    const [h, s, v] = rgbToHsv8(data[i], data[i + 1], data[i + 2]);
    hist[binIndex(h, s, v)]++;
  }
  return hist;
}

/**
 * Min-max normalise in place to [lo, hi]. A flat histogram (max == min)
 * becomes all `lo`.
 */
export function normalizeMinMax(hist: Float64Array, lo = 0, hi = 255): Float64Array {
  let min = Infinity;
  let max = -Infinity;
  for (const value of hist) {
    if (value < min) min = value;
    if (value > max) max = value;
  }

  const range = max - min;
  const scale = range > Number.EPSILON ? (hi - lo) / range : 0;
  for (let i = 0; i < hist.length; i++) {
    hist[i] = lo + (hist[i] - min) * scale;
  }
  return hist;
}

/**
 * Pearson correlation of two equal-length histograms, in [-1, 1].
 * When either histogram has no variance the result is 1.
 */
export function correlate(a: Float64Array, b: Float64Array): number {
  if (a.length !== b.length) {
    throw new Error("Histogram lengths must match");
  }
  const n = a.length;

  let sumA = 0;
  let sumB = 0;
  for (let i = 0; i < n; i++) {
    sumA += a[i];
    sumB += b[i];
  }
  const meanA = sumA / n;
  const meanB = sumB / n;

  let num = 0;
  let varA = 0;
  let varB = 0;
  for (let i = 0; i < n; i++) {
    const da = a[i] - meanA;
    const db = b[i] - meanB;
    num += da * db;
    varA += da * da;
    varB += db * db;
  }

  const denom = varA * varB;
  return Math.abs(denom) > Number.EPSILON ? num / Math.sqrt(denom) : 1;
}

/** Map a correlation in [-1, 1] to a percentage in [0, 100]. */
export function correlationToScore(correlation: number): number {
  return ((correlation + 1) / 2) * 100;
}

/**
 * Histogram similarity of two image files, 0–100 (higher = more alike).
 * Throws DecodeError when either file cannot be decoded and RaceError when
 * one has disappeared.
 */
export async function compareHistograms(pathA: string, pathB: string): Promise<number> {
  const [histA, histB] = await Promise.all([
    computeHsvHistogram(pathA),
    computeHsvHistogram(pathB),
  ]);
  normalizeMinMax(histA);
  normalizeMinMax(histB);
  return correlationToScore(correlate(histA, histB));
}
