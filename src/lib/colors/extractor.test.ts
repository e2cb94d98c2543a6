import sharp from "sharp";
import { describe, expect, it } from "vitest";
import { pixelPng, solidPng } from "@/test/images";
import { dominantColor, mainColors } from "./extractor";
import type { Rgb } from "./types";

describe("dominantColor", () => {
  it("returns the color of a solid logo", async () => {
    expect(await dominantColor(await solidPng([200, 30, 30], 24))).toEqual([200, 30, 30]);
  });

  it("picks the most common color", async () => {
    const image = await pixelPng(10, 1, (x) => (x < 7 ? [200, 30, 30] : [20, 40, 220]));
    expect(await dominantColor(image, 1)).toEqual([200, 30, 30]);
  });

  it("ignores white background", async () => {
    const image = await pixelPng(10, 1, (x) => (x < 8 ? [255, 255, 255] : [20, 40, 220]));
    expect(await dominantColor(image, 1)).toEqual([20, 40, 220]);
  });

  it("returns null for all-white or transparent logos", async () => {
    expect(await dominantColor(await solidPng([255, 255, 255], 12))).toBeNull();

    const transparent = await sharp({
      create: { width: 12, height: 12, channels: 4, background: { r: 200, g: 0, b: 0, alpha: 0 } },
    })
      .png()
      .toBuffer();
    expect(await dominantColor(transparent)).toBeNull();
  });
});

describe("mainColors", () => {
  it("returns the distinct colors of a simple logo in order of appearance", async () => {
    const image = await pixelPng(20, 20, (x) => (x < 10 ? [255, 255, 255] : [0, 0, 128]));
    expect(await mainColors(image)).toEqual([
      [255, 255, 255],
      [0, 0, 128],
    ]);
  });

  it("reads every pixel of large logos", async () => {
    // one-pixel stripes would blend into extra shades if the image were shrunk
    const image = await pixelPng(600, 2, (x) => (x % 2 === 0 ? [255, 0, 0] : [0, 0, 255]));
    expect(await mainColors(image)).toEqual([
      [255, 0, 0],
      [0, 0, 255],
    ]);
  });

  it("clusters busier logos into k integer colors", async () => {
    const stripes: Rgb[] = [
      [255, 0, 0],
      [0, 255, 0],
      [0, 0, 255],
      [255, 255, 0],
      [0, 255, 255],
      [255, 0, 255],
      [0, 0, 0],
    ];
    const image = await pixelPng(14, 4, (x) => stripes[Math.floor(x / 2)]);

    const colors = await mainColors(image, 5);

    expect(colors).toHaveLength(5);
    for (const color of colors) {
      for (const channel of color) {
        expect(Number.isInteger(channel)).toBe(true);
        expect(channel).toBeGreaterThanOrEqual(0);
        expect(channel).toBeLessThanOrEqual(255);
      }
    }
    expect(await mainColors(image, 5)).toEqual(colors);
  });
});
