import path from "path";
import sharp from "sharp";
import { afterEach, describe, expect, it, vi } from "vitest";
import { DecodeError, NetworkError, RaceError } from "@/lib/errors";
import { buildIco, makeTempDir, solidPng } from "@/test/images";
import {
  extractLargestPngFromIco,
  fetchImageBuffer,
  isIco,
  loadRgbPixels,
  loadRgbaPixels,
  normalizeLogoBytes,
  readImageHeader,
} from "./processor";

const fetchOptions = { timeoutMs: 1_000, userAgent: "test-agent" };

afterEach(() => {
  vi.restoreAllMocks();
});

describe("fetchImageBuffer", () => {
  it("returns the response body", async () => {
    const png = await solidPng([10, 20, 30], 4);
    vi.spyOn(globalThis, "fetch").mockResolvedValue(new Response(new Uint8Array(png)));

    const buffer = await fetchImageBuffer("https://example.com/logo.png", fetchOptions);
    expect(buffer.equals(png)).toBe(true);
  });

  it("throws NetworkError with the status for non-2xx responses", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(new Response("missing", { status: 404 }));

    await expect(fetchImageBuffer("https://example.com/logo.png", fetchOptions)).rejects.toMatchObject({
      kind: "network",
      status: 404,
    });
  });

  it("rejects a 204 response", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(new Response(null, { status: 204 }));

    await expect(fetchImageBuffer("https://example.com/logo.png", fetchOptions)).rejects.toMatchObject({
      kind: "network",
      status: 204,
    });
  });

  it("throws NetworkError when the request fails", async () => {
    vi.spyOn(globalThis, "fetch").mockRejectedValue(new TypeError("fetch failed"));

    await expect(fetchImageBuffer("https://example.com/logo.png", fetchOptions)).rejects.toBeInstanceOf(
      NetworkError
    );
  });
});

describe("ICO handling", () => {
  it("recognises the ICO header", async () => {
    expect(isIco(buildIco([{ width: 16, data: await solidPng([0, 0, 0], 16) }]))).toBe(true);
    expect(isIco(await solidPng([0, 0, 0], 16))).toBe(false);
  });

  it("picks the widest PNG frame", async () => {
    const small = await solidPng([255, 0, 0], 16);
    const large = await solidPng([0, 0, 255], 32);
    const ico = buildIco([
      { width: 16, data: small },
      { width: 32, data: large },
    ]);

    expect(extractLargestPngFromIco(ico)?.equals(large)).toBe(true);
    expect(normalizeLogoBytes(ico).equals(large)).toBe(true);
  });

  it("keeps ICOs that hold only BMP frames", () => {
    const ico = buildIco([{ width: 16, data: Buffer.alloc(64, 1) }]);

    expect(extractLargestPngFromIco(ico)).toBeNull();
    expect(normalizeLogoBytes(ico)).toBe(ico);
  });

  it("passes other formats through", async () => {
    const png = await solidPng([1, 2, 3], 8);
    expect(normalizeLogoBytes(png)).toBe(png);
  });
});

describe("readImageHeader", () => {
  it("reads dimensions and format", async () => {
    expect(await readImageHeader(await solidPng([0, 0, 0], 12, 7))).toEqual({
      width: 12,
      height: 7,
      format: "png",
    });
  });

  it("throws DecodeError for garbage", async () => {
    await expect(readImageHeader(Buffer.from("<html></html>"))).rejects.toBeInstanceOf(DecodeError);
  });

  it("throws RaceError for a missing file", async () => {
    const dir = await makeTempDir();
    await expect(readImageHeader(path.join(dir, "gone.png"))).rejects.toBeInstanceOf(RaceError);
  });
});

describe("pixel loading", () => {
  it("drops alpha and keeps three channels", async () => {
    const rgba = await sharp({
      create: { width: 2, height: 1, channels: 4, background: { r: 10, g: 20, b: 30, alpha: 0.5 } },
    })
      .png()
      .toBuffer();

    const pixels = await loadRgbPixels(rgba);
    expect(pixels.width).toBe(2);
    expect(pixels.data).toHaveLength(6);
  });

  it("keeps the full resolution", async () => {
    const image = await solidPng([0, 0, 0], 400, 20);

    const pixels = await loadRgbPixels(image);
    expect(pixels).toMatchObject({ width: 400, height: 20 });
    expect(pixels.data).toHaveLength(400 * 20 * 3);
  });

  it("adds an opaque alpha channel", async () => {
    const { data } = await loadRgbaPixels(await solidPng([10, 20, 30], 1));
    expect(Array.from(data)).toEqual([10, 20, 30, 255]);
  });
});
