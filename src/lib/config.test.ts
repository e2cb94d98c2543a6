import path from "path";
import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";

const cwd = path.resolve("/work");

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    const config = loadConfig({}, cwd);

    expect(config.logosDir).toBe(path.join(cwd, "logos"));
    expect(config.duplicatesDir).toBe(path.join(cwd, "duplicates"));
    expect(config.reportsDir).toBe(cwd);
    expect(config.inputFile).toBe(path.join(cwd, "logos.snappy.parquet"));
    expect(config.fetchConcurrency).toBe(10);
    expect(config.compareConcurrency).toBe(5);
    expect(config.pageTimeoutMs).toBe(20_000);
    expect(config.imageTimeoutMs).toBe(5_000);
    expect(config.similarityThreshold).toBe(49);
    expect(config.brandPrefixLength).toBe(3);
  });

  it("reads overrides and ignores empty values", () => {
    const config = loadConfig(
      { FETCH_CONCURRENCY: "3", LOGOS_DIR: "out/logos", SIMILARITY_THRESHOLD: "" },
      cwd
    );

    expect(config.fetchConcurrency).toBe(3);
    expect(config.logosDir).toBe(path.join(cwd, "out", "logos"));
    expect(config.similarityThreshold).toBe(49);
  });

  it("rejects invalid numbers", () => {
    expect(() => loadConfig({ FETCH_CONCURRENCY: "many" }, cwd)).toThrow();
    expect(() => loadConfig({ SIMILARITY_THRESHOLD: "150" }, cwd)).toThrow();
  });
});
