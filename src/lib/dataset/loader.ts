import fs from "fs/promises";
import path from "path";
import { parse } from "csv-parse/sync";
import { asyncBufferFromFile, parquetMetadataAsync, parquetReadObjects } from "hyparquet";
import { compressors } from "hyparquet-compressors";

export const DOMAIN_COLUMN = "domain";

/**
 * Read the `domain` column of a dataset. `.parquet` files (Snappy and the
 * other common codecs) are read as Parquet, anything else as CSV with a
 * header row. Null and blank domains are dropped, as are exact repeats
 * (first occurrence kept).
 */
export async function loadDomains(filePath: string): Promise<string[]> {
  if (path.extname(filePath).toLowerCase() === ".parquet") {
    return loadParquetDomains(filePath);
  }
  const content = await fs.readFile(filePath, "utf-8");
  return parseDomains(content, filePath);
}

export async function loadParquetDomains(filePath: string): Promise<string[]> {
  const file = await asyncBufferFromFile(filePath);
  const metadata = await parquetMetadataAsync(file);

  if (!metadata.schema.some((element) => element.name === DOMAIN_COLUMN)) {
    throw new Error(`${filePath} has no "${DOMAIN_COLUMN}" column`);
  }

  const rows = await parquetReadObjects({ file, metadata, columns: [DOMAIN_COLUMN], compressors });
  return collectDomains(rows.map((row) => row[DOMAIN_COLUMN]));
}

export function parseDomains(content: string, source = "dataset"): string[] {
  const records: Record<string, string>[] = parse(content, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    bom: true,
  });

  if (records.length > 0 && !(DOMAIN_COLUMN in records[0])) {
    throw new Error(`${source} has no "${DOMAIN_COLUMN}" column`);
  }

  return collectDomains(records.map((record) => record[DOMAIN_COLUMN]));
}

function collectDomains(values: readonly unknown[]): string[] {
  const seen = new Set<string>();
  const domains: string[] = [];
  for (const value of values) {
    if (typeof value !== "string") continue;
    const domain = value.trim();
    if (!domain || seen.has(domain)) continue;
    seen.add(domain);
    domains.push(domain);
  }
  return domains;
}
