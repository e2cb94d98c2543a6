import fs from "fs/promises";
import { closestBroadColor } from "@/lib/colors/classifier";
import { BROAD_COLOR_NAMES, type BroadColor } from "@/lib/colors/types";
import { parseRgbTuple, readCsv } from "./csv";

export interface ColorAnalysisRow {
  logo: string;
  rgbText: string;
}

/**
 * Group logos under their broad color. Rows whose color cannot be parsed
 * are left out.
 */
export function groupByBroadColor(rows: readonly ColorAnalysisRow[]): Map<BroadColor, string[]> {
  const groups = new Map<BroadColor, string[]>(BROAD_COLOR_NAMES.map((color) => [color, []]));

  for (const { logo, rgbText } of rows) {
    const rgb = parseRgbTuple(rgbText);
    if (!rgb) {
      console.warn(`[report] Skipping ${logo}: unreadable color "${rgbText}"`);
      continue;
    }
    groups.get(closestBroadColor(rgb))?.push(logo);
  }
  return groups;
}

export function renderColorAnalysis(groups: Map<BroadColor, string[]>): string {
  let md = "# Logo Main Color Analysis\n\n";
  md += "This document groups logos by their closest broad color category.\n\n";

  for (const color of BROAD_COLOR_NAMES) {
    const logos = groups.get(color) ?? [];
    md += `## ${color} Logos\n\n`;
    if (logos.length > 0) {
      for (const logo of logos) {
        md += `- **${logo}**\n`;
      }
    } else {
      md += "_No logos in this category._\n";
    }
    md += "\n---\n\n";
  }
  return md;
}

/**
 * Read `analysis_color.csv` (Logo, Main_Color_RGB, …) and write the
 * grouped Markdown report.
 */
export async function writeColorAnalysis(csvPath: string, outputPath: string): Promise<string> {
  const records = await readCsv(csvPath);
  const rows = records.map((record) => ({
    logo: record["Logo"] ?? "",
    rgbText: record["Main_Color_RGB"] ?? "",
  }));

  await fs.writeFile(outputPath, renderColorAnalysis(groupByBroadColor(rows)), "utf-8");
  console.log(`[report] Color analysis saved to \`${outputPath}\``);
  return outputPath;
}
