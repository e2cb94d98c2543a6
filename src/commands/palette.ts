import fs from "fs/promises";
import path from "path";
import { buildPalette } from "@/lib/colors/palette";
import type { AppConfig } from "@/lib/config";
import { type ItemFailure, toItemFailure } from "@/lib/errors";
import { readImageHeader } from "@/lib/images/processor";
import { listFiles } from "@/lib/utils/files";
import { formatFailureCounts } from "./summary";

export interface PaletteResult {
  created: string[];
  failures: ItemFailure[];
}

/**
 * Palette mode: render a palette strip for every logo into the palettes
 * directory, under the logo's own file name.
 */
export async function runPalette(config: AppConfig): Promise<PaletteResult> {
  console.log("[palette] Starting color palette creation...");
  await fs.mkdir(config.logosDir, { recursive: true });
  await fs.mkdir(config.palettesDir, { recursive: true });

  const created: string[] = [];
  const failures: ItemFailure[] = [];

  for (const file of await listFiles(config.logosDir)) {
    const filePath = path.join(config.logosDir, file);
    try {
      await readImageHeader(filePath);
      created.push(await buildPalette(filePath, path.join(config.palettesDir, file)));
    } catch (error) {
      const failure = toItemFailure(file, error);
      failures.push(failure);
      console.warn(`[palette] Skipped ${file} (${failure.kind}): ${failure.message}`);
    }
  }

  console.log(
    `[palette] Finished color palette creation: ${created.length} palettes in ${config.palettesDir}, ` +
      `failures: ${formatFailureCounts(failures)}`
  );
  return { created, failures };
}
