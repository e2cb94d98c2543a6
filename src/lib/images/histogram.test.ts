import fs from "fs/promises";
import path from "path";
import { describe, expect, it } from "vitest";
import { RaceError } from "@/lib/errors";
import { makeTempDir, solidPng } from "@/test/images";
import {
  compareHistograms,
  correlate,
  correlationToScore,
  normalizeMinMax,
  rgbToHsv8,
} from "./histogram";

describe("rgbToHsv8", () => {
  it("halves the hue and scales saturation and value to 255", () => {
    expect(rgbToHsv8(255, 0, 0)).toEqual([0, 255, 255]);
    expect(rgbToHsv8(0, 255, 0)).toEqual([60, 255, 255]);
    expect(rgbToHsv8(0, 0, 255)).toEqual([120, 255, 255]);
    expect(rgbToHsv8(255, 0, 128)).toEqual([165, 255, 255]);
  });

  it("gives greys no hue or saturation", () => {
    expect(rgbToHsv8(0, 0, 0)).toEqual([0, 0, 0]);
    expect(rgbToHsv8(128, 128, 128)).toEqual([0, 0, 128]);
  });
});

describe("normalizeMinMax", () => {
  it("stretches values to 0..255", () => {
    expect(Array.from(normalizeMinMax(Float64Array.from([0, 5, 10])))).toEqual([0, 127.5, 255]);
  });

  it("zeroes a flat histogram", () => {
    expect(Array.from(normalizeMinMax(Float64Array.from([3, 3, 3])))).toEqual([0, 0, 0]);
  });
});

describe("correlate", () => {
  it("is 1 for identical and -1 for mirrored histograms", () => {
    expect(correlate(Float64Array.from([1, 2, 3]), Float64Array.from([1, 2, 3]))).toBeCloseTo(1, 10);
    expect(correlate(Float64Array.from([1, 2, 3]), Float64Array.from([3, 2, 1]))).toBeCloseTo(-1, 10);
  });

  it("is 1 when a histogram has no variance", () => {
    expect(correlate(Float64Array.from([0, 0, 0]), Float64Array.from([1, 5, 2]))).toBe(1);
  });

  it("rejects histograms of different lengths", () => {
    expect(() => correlate(new Float64Array(2), new Float64Array(3))).toThrow("Histogram lengths must match");
  });
});

describe("correlationToScore", () => {
  it("maps [-1, 1] onto [0, 100]", () => {
    expect(correlationToScore(-1)).toBe(0);
    expect(correlationToScore(0)).toBe(50);
    expect(correlationToScore(1)).toBe(100);
  });
});

describe("compareHistograms", () => {
  it("scores an image against itself as 100", async () => {
    const dir = await makeTempDir();
    const file = path.join(dir, "red.png");
    await fs.writeFile(file, await solidPng([220, 20, 60]));

    expect(await compareHistograms(file, file)).toBeCloseTo(100, 6);
  });

  it("scores two different solid colors just under 50", async () => {
    const dir = await makeTempDir();
    const red = path.join(dir, "red.png");
    const blue = path.join(dir, "blue.png");
    await fs.writeFile(red, await solidPng([255, 0, 0]));
    await fs.writeFile(blue, await solidPng([0, 0, 255]));

    const score = await compareHistograms(red, blue);
    expect(score).toBeLessThan(50);
    expect(score).toBeCloseTo(50, 3);
  });

  it("throws RaceError when a file is gone", async () => {
    const dir = await makeTempDir();
    const red = path.join(dir, "red.png");
    await fs.writeFile(red, await solidPng([255, 0, 0]));

    await expect(compareHistograms(red, path.join(dir, "missing.png"))).rejects.toBeInstanceOf(RaceError);
  });
});
