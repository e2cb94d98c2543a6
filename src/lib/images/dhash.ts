import sharp from "sharp";
import { toImageError } from "./processor";

export const DEFAULT_HASH_SIZE = 8;

/**
 * Difference hash (dHash).
 *
 * The image is reduced to greyscale and resized to (N+1)×N with the
 * Lanczos-3 kernel, aspect ratio ignored. Each row then yields N bits, one
 * per horizontal neighbour pair: "1" when the left pixel is brighter.
 * Rows are concatenated top to bottom, giving an N²-character string of
 * "0"/"1". Equal strings are treated as the same logo.
 */
export async function computeDhash(
  input: string | Buffer,
  hashSize: number = DEFAULT_HASH_SIZE
): Promise<string> {
  const width = hashSize + 1;
  const height = hashSize;

  let data: Buffer;
  let channels: number;
  try {
    const result = await sharp(input)
      .removeAlpha()
      .greyscale()
      .resize(width, height, { fit: "fill", kernel: "lanczos3" })
      .raw()
      .toBuffer({ resolveWithObject: true });
    data = result.data;
    channels = result.info.channels;
  } catch (error) {
    throw toImageError(input, error);
  }

  let bits = "";
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < hashSize; x++) {
      const left = data[(y * width + x) * channels];
      const right = data[(y * width + x + 1) * channels];
      bits += left > right ? "1" : "0";
    }
  }
  return bits;
}

