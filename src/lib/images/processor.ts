import sharp from "sharp";
import { DecodeError, NetworkError, RaceError, errorMessage, isMissingFileError } from "@/lib/errors";
import { expectStatus200 } from "@/lib/utils/http";

export interface FetchImageOptions {
  timeoutMs: number;
  userAgent: string;
}

/**
 * Fetch image from URL and return as buffer
 */
export async function fetchImageBuffer(url: string, options: FetchImageOptions): Promise<Buffer> {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: { "User-Agent": options.userAgent },
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (error) {
    throw new NetworkError(`Failed to fetch image ${url}: ${errorMessage(error)}`, null, { cause: error });
  }

  await expectStatus200(response, `Failed to fetch image ${url}`);

  return Buffer.from(await response.arrayBuffer());
}

/** ICO magic bytes: 00 00 01 00 (reserved=0, type=1) */
export function isIco(buffer: Buffer): boolean {
  return (
    buffer.length > 6 &&
    buffer[0] === 0 &&
    buffer[1] === 0 &&
    buffer[2] === 1 &&
    buffer[3] === 0
  );
}

/**
 * Extract the largest embedded PNG from an ICO file buffer.
 *
 * ICO format: 6-byte header + 16-byte directory entries.
 * Each entry points to image data that may be PNG (magic 89 50 4E 47)
 * or BMP. Only PNG frames are taken because sharp cannot read the BMP ones.
 *
 * Returns the PNG buffer of the largest frame, or null if none found.
 */
export function extractLargestPngFromIco(ico: Buffer): Buffer | null {
  const count = ico.readUInt16LE(4);
  let bestPng: Buffer | null = null;
  let bestSize = 0; // pixel dimension (width), 256 is max

  for (let i = 0; i < count; i++) {
    const dirOffset = 6 + i * 16;
    if (dirOffset + 16 > ico.length) break;

    const w = ico[dirOffset] || 256; // 0 encodes 256
    const dataSize = ico.readUInt32LE(dirOffset + 8);
    const dataOffset = ico.readUInt32LE(dirOffset + 12);

    if (dataOffset + dataSize > ico.length) continue;

    if (
      ico[dataOffset] === 0x89 &&
      ico[dataOffset + 1] === 0x50 &&
      ico[dataOffset + 2] === 0x4e &&
      ico[dataOffset + 3] === 0x47
    ) {
      if (w > bestSize) {
        bestSize = w;
        bestPng = ico.subarray(dataOffset, dataOffset + dataSize);
      }
    }
  }

  return bestPng;
}

/**
 * Bytes to store for a downloaded logo. ICO payloads are swapped for their
 * largest PNG frame; ICOs with only BMP frames are kept as-is and fall out
 * later as undecodable.
 */
export function normalizeLogoBytes(buffer: Buffer): Buffer {
  if (!isIco(buffer)) return buffer;
  return extractLargestPngFromIco(buffer) ?? buffer;
}

/**
 * Map a sharp failure on `input` to the pipeline taxonomy: a file that is
 * gone is a race, anything else is a decode failure.
 */
export function toImageError(input: string | Buffer, error: unknown): Error {
  const label = typeof input === "string" ? input : "<buffer>";
  if (isMissingFileError(error) || /input file is missing|no such file/i.test(errorMessage(error))) {
    return new RaceError(`Image vanished: ${label}`, { cause: error });
  }
  return new DecodeError(`Could not load image ${label}: ${errorMessage(error)}`, { cause: error });
}

export interface ImageSize {
  width: number;
  height: number;
  format: string | undefined;
}

/** Read the image header only. Throws DecodeError / RaceError. */
export async function readImageHeader(input: string | Buffer): Promise<ImageSize> {
  try {
    const meta = await sharp(input).metadata();
    if (!meta.width || !meta.height) {
      throw new Error("no dimensions in header");
    }
    return { width: meta.width, height: meta.height, format: meta.format };
  } catch (error) {
    throw toImageError(input, error);
  }
}

export interface RgbPixels {
  /** Interleaved RGB, 3 bytes per pixel */
  data: Buffer;
  width: number;
  height: number;
}

/**
 * Decode an image to 8-bit RGB with the alpha channel dropped.
 * Greyscale sources are expanded to three channels.
 */
export async function loadRgbPixels(input: string | Buffer): Promise<RgbPixels> {
  try {
    const { data, info } = await sharp(input)
      .removeAlpha()
      .toColourspace("srgb")
      .raw()
      .toBuffer({ resolveWithObject: true });
    return { data: toRgb(data, info.channels), width: info.width, height: info.height };
  } catch (error) {
    throw toImageError(input, error);
  }
}

export interface RgbaPixels {
  /** Interleaved RGBA, 4 bytes per pixel */
  data: Buffer;
  width: number;
  height: number;
}

/** Decode an image to 8-bit RGBA (opaque sources get alpha 255). */
export async function loadRgbaPixels(input: string | Buffer): Promise<RgbaPixels> {
  try {
    const { data, info } = await sharp(input)
      .toColourspace("srgb")
      .ensureAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });
    return { data, width: info.width, height: info.height };
  } catch (error) {
    throw toImageError(input, error);
  }
}

function toRgb(data: Buffer, channels: number): Buffer {
  if (channels === 3) return data;

  const pixelCount = Math.floor(data.length / channels);
  const rgb = Buffer.alloc(pixelCount * 3);
  for (let p = 0; p < pixelCount; p++) {
    const src = p * channels;
    const grey = channels < 3;
    rgb[p * 3] = data[src];
    rgb[p * 3 + 1] = grey ? data[src] : data[src + 1];
    rgb[p * 3 + 2] = grey ? data[src] : data[src + 2];
  }
  return rgb;
}
