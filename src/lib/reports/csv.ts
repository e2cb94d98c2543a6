import fs from "fs/promises";
import path from "path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import type { Rgb } from "@/lib/colors/types";

export type CsvCell = string | number | boolean;

/** Write a header row plus records. Booleans are written as True/False. */
export async function writeCsv(
  filePath: string,
  columns: readonly string[],
  rows: ReadonlyArray<readonly CsvCell[]>
): Promise<string> {
  const content = stringify(
    rows.map((row) => row.map((cell) => (typeof cell === "boolean" ? (cell ? "True" : "False") : cell))),
    { header: true, columns: [...columns] }
  );
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, "utf-8");
  return filePath;
}

/** Read a CSV with a header row into records keyed by column name. */
export async function readCsv(filePath: string): Promise<Record<string, string>[]> {
  const content = await fs.readFile(filePath, "utf-8");
  return parse(content, { columns: true, skip_empty_lines: true, bom: true });
}

/** "(r, g, b)" */
export function formatRgbTuple(rgb: Rgb): string {
  return `(${rgb[0]}, ${rgb[1]}, ${rgb[2]})`;
}

/** Parse "(r, g, b)" back to a triple; null for anything else. */
export function parseRgbTuple(value: string): Rgb | null {
  const match = value.trim().match(/^\(\s*(\d{1,3})\s*,\s*(\d{1,3})\s*,\s*(\d{1,3})\s*\)$/);
  if (!match) return null;

  const [r, g, b] = [match[1], match[2], match[3]].map(Number);
  if ([r, g, b].some((c) => c > 255)) return null;
  return [r, g, b];
}
