import fs from "fs/promises";
import path from "path";
import { describe, expect, it } from "vitest";
import { makeTempDir } from "@/test/images";
import { listFiles } from "./files";

describe("listFiles", () => {
  it("lists regular files sorted by name", async () => {
    const dir = await makeTempDir();
    await fs.writeFile(path.join(dir, "b.png"), "b");
    await fs.writeFile(path.join(dir, "a.png"), "a");
    await fs.mkdir(path.join(dir, "nested"));

    expect(await listFiles(dir)).toEqual(["a.png", "b.png"]);
  });
});
