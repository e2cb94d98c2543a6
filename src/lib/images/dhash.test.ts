import sharp from "sharp";
import { describe, expect, it } from "vitest";
import { DecodeError } from "@/lib/errors";
import { pixelPng, rampPng } from "@/test/images";
import { computeDhash } from "./dhash";

describe("computeDhash", () => {
  it("sets no bits when every row gets brighter to the right", async () => {
    const image = await pixelPng(9, 8, (x) => [x * 30, x * 30, x * 30]);
    expect(await computeDhash(image)).toBe("0".repeat(64));
  });

  it("sets every bit when every row gets darker to the right", async () => {
    const image = await pixelPng(9, 8, (x) => [240 - x * 30, 240 - x * 30, 240 - x * 30]);
    expect(await computeDhash(image)).toBe("1".repeat(64));
  });

  it("reads rows top to bottom", async () => {
    // first row darkens, the rest brighten
    const image = await pixelPng(9, 8, (x, y) => {
      const v = y === 0 ? 240 - x * 30 : x * 30;
      return [v, v, v];
    });
    expect(await computeDhash(image)).toBe("1".repeat(8) + "0".repeat(56));
  });

  it("has hashSize² bits", async () => {
    const image = await rampPng(40, 30, "up");
    expect(await computeDhash(image, 4)).toHaveLength(16);
  });

  it("is deterministic", async () => {
    const image = await rampPng(90, 80, "down");
    expect(await computeDhash(image)).toBe(await computeDhash(Buffer.from(image)));
  });

  it("collides for a lossy re-save of the same image", async () => {
    const png = await rampPng(90, 80, "up");
    const jpeg = await sharp(png).jpeg({ quality: 60 }).toBuffer();

    expect(await computeDhash(jpeg)).toBe(await computeDhash(png));
  });

  it("throws DecodeError for bytes that are not an image", async () => {
    await expect(computeDhash(Buffer.from("not an image"))).rejects.toBeInstanceOf(DecodeError);
  });
});
