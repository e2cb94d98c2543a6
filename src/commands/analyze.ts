import fs from "fs/promises";
import path from "path";
import { classifyEmotion, classifyMinimalism } from "@/lib/colors/classifier";
import { dominantColor, mainColors } from "@/lib/colors/extractor";
import { closestColorName } from "@/lib/colors/names";
import type { AppConfig } from "@/lib/config";
import { DecodeError, type ItemFailure, toItemFailure } from "@/lib/errors";
import { readImageHeader } from "@/lib/images/processor";
import { writeColorAnalysis } from "@/lib/reports/color-analysis";
import { type CsvCell, formatRgbTuple, writeCsv } from "@/lib/reports/csv";
import { listFiles } from "@/lib/utils/files";
import type { AnalysisType } from "@/types/cli";
import { formatFailureCounts } from "./summary";

export const REPORT_COLUMNS: Record<AnalysisType, readonly string[]> = {
  color: ["Logo", "Main_Color_RGB", "Color_Group"],
  minimalism: ["Logo", "Minimalist?"],
  emotion: ["Logo", "Emotion"],
};

export interface AnalyzeResult {
  type: AnalysisType;
  reportPath: string;
  /** Markdown grouping, color analysis only */
  markdownPath: string | null;
  rows: CsvCell[][];
  failures: ItemFailure[];
}

export function reportPathFor(config: AppConfig, type: AnalysisType): string {
  return path.join(config.reportsDir, `analysis_${type}.csv`);
}

async function analyzeFile(filePath: string, type: AnalysisType): Promise<CsvCell[]> {
  const logo = path.basename(filePath);

  switch (type) {
    case "color": {
      const rgb = await dominantColor(filePath);
      if (!rgb) {
        throw new DecodeError(`No dominant color in ${logo}`);
      }
      return [logo, formatRgbTuple(rgb), closestColorName(rgb)];
    }
    case "minimalism":
      return [logo, classifyMinimalism(await mainColors(filePath))];
    case "emotion":
      return [logo, classifyEmotion(await mainColors(filePath))];
  }
}

/**
 * Analyze mode: classify every logo in the logos directory and write
 * `analysis_<type>.csv`. Color analysis also writes `color_analysis.md`.
 * Logos that cannot be analysed are left out of the report.
 */
export async function runAnalyze(config: AppConfig, type: AnalysisType): Promise<AnalyzeResult> {
  console.log(`[analyze] Starting analysis on ${type} criteria...`);
  await fs.mkdir(config.logosDir, { recursive: true });

  const rows: CsvCell[][] = [];
  const failures: ItemFailure[] = [];

  for (const file of await listFiles(config.logosDir)) {
    const filePath = path.join(config.logosDir, file);
    try {
      await readImageHeader(filePath);
      rows.push(await analyzeFile(filePath, type));
    } catch (error) {
      const failure = toItemFailure(file, error);
      failures.push(failure);
      console.warn(`[analyze] Skipped ${file} (${failure.kind}): ${failure.message}`);
    }
  }

  const reportPath = await writeCsv(reportPathFor(config, type), REPORT_COLUMNS[type], rows);
  const markdownPath =
    type === "color"
      ? await writeColorAnalysis(reportPath, path.join(config.reportsDir, "color_analysis.md"))
      : null;

  console.log(
    `[analyze] Analysis completed. ${rows.length} logos saved to ${reportPath}, ` +
      `failures: ${formatFailureCounts(failures)}`
  );
  return { type, reportPath, markdownPath, rows, failures };
}
