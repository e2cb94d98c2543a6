import fs from "fs/promises";
import path from "path";
import { type ItemFailure, errorMessage, isMissingFileError, toItemFailure } from "@/lib/errors";
import { readImageHeader } from "@/lib/images/processor";
import { listFiles } from "@/lib/utils/files";
import { mapLimit } from "@/lib/utils/pool";
import { HashRegistry } from "./hash-registry";
import type {
  DeduplicationReport,
  DownloadDeps,
  DownloadReport,
  NearDedupDeps,
  NearDedupReport,
  NearDuplicateMove,
  SweepReport,
} from "./types";

/**
 * First `length` characters of a file name. Used as a cheap brand match
 * before two logos are compared; it both collides ("abc-news" vs
 * "abcam") and misses ("ab.png" vs "ab-group.png" when length > 2).
 */
export function brandPrefix(fileName: string, length = 3): string {
  return fileName.slice(0, length);
}

async function removeFile(filePath: string): Promise<void> {
  await fs.rm(filePath, { force: true });
}

/** rename, falling back to copy + delete across devices */
async function moveFile(from: string, to: string): Promise<void> {
  try {
    await fs.rename(from, to);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "EXDEV") {
      await fs.copyFile(from, to);
      await fs.rm(from);
      return;
    }
    throw error;
  }
}

// ─── Phase 1: download + exact duplicates ───────────────────────────────────

/**
 * Download every domain's logo with a bounded pool and drop exact
 * duplicates by perceptual hash. A fresh HashRegistry is created for the
 * run; the first file to claim a hash keeps it, later holders of the same
 * hash are deleted. Undecodable downloads are deleted too.
 *
 * Never rejects because of a single domain: every failure is logged and
 * recorded in the report.
 */
export async function downloadAndDedupe(
  domains: readonly string[],
  outputDir: string,
  deps: DownloadDeps
): Promise<DownloadReport> {
  await fs.mkdir(outputDir, { recursive: true });

  const registry = new HashRegistry();
  const kept: string[] = [];
  const exactDuplicates: string[] = [];
  const failures: ItemFailure[] = [];

  const record = (item: string, error: unknown): void => {
    const failure = toItemFailure(item, error);
    failures.push(failure);
    console.warn(`[download] Skipped ${item} (${failure.kind}): ${failure.message}`);
  };

  await mapLimit(domains, deps.concurrency, async (domain) => {
    let filePath: string;
    try {
      filePath = await deps.fetcher(domain, outputDir);
    } catch (error) {
      record(domain, error);
      return;
    }

    let hash: string;
    try {
      hash = await deps.hasher(filePath);
    } catch (error) {
      record(domain, error);
      try {
        await removeFile(filePath);
      } catch (removeError) {
        record(filePath, removeError);
      }
      return;
    }

    const claim = registry.claim(hash, filePath);
    if (claim.claimed || claim.holder === filePath) {
      kept.push(filePath);
      return;
    }

    try {
      await removeFile(filePath);
      exactDuplicates.push(filePath);
      console.log(
        `[download] Exact duplicate: ${path.basename(filePath)} matches ${path.basename(claim.holder)}, removed`
      );
    } catch (error) {
      record(filePath, error);
    }
  });

  console.log(`[download] ${registry.size} distinct hashes registered`);
  return { requested: domains.length, kept, exactDuplicates, failures };
}

// ─── Phase 2: near duplicates ───────────────────────────────────────────────

/**
 * Compare every unordered pair of files in `outputDir` (sorted listing,
 * taken once) and move the second file of each near-duplicate pair into
 * `duplicatesDir`.
 *
 * A pair is a near-duplicate when both names share their brand prefix and
 * the comparator scores it above the threshold. Moves happen while other
 * comparisons are in flight and the listing is not refreshed, so a moved
 * file can still come up in a later pair; that pair fails with a race and
 * is skipped.
 */
export async function moveSimilarLogos(
  outputDir: string,
  duplicatesDir: string,
  deps: NearDedupDeps
): Promise<NearDedupReport> {
  await fs.mkdir(duplicatesDir, { recursive: true });
  const files = await listFiles(outputDir);

  const pairs: Array<[string, string]> = [];
  for (let i = 0; i < files.length; i++) {
    for (let j = i + 1; j < files.length; j++) {
      pairs.push([files[i], files[j]]);
    }
  }

  const moves: NearDuplicateMove[] = [];
  const failures: ItemFailure[] = [];
  let prefixMismatches = 0;
  let compared = 0;

  await mapLimit(pairs, deps.concurrency, async ([first, second]) => {
    if (brandPrefix(first, deps.prefixLength) !== brandPrefix(second, deps.prefixLength)) {
      prefixMismatches++;
      return;
    }

    const label = `${first} <-> ${second}`;
    const source = path.join(outputDir, second);

    try {
      const score = await deps.comparator(path.join(outputDir, first), source);
      compared++;
      if (score <= deps.threshold) return;

      await moveFile(source, path.join(duplicatesDir, second));
      moves.push({ kept: first, moved: second, score });
      console.log(
        `[near-dedup] Duplicate detected: ${second} (${score.toFixed(2)}%) -> Moving to ${duplicatesDir}`
      );
    } catch (error) {
      const failure = toItemFailure(label, error);
      failures.push(failure);
      if (failure.kind === "race") {
        console.warn(`[near-dedup] Skipped ${label}: file no longer present`);
      } else {
        console.warn(`[near-dedup] Skipped ${label} (${failure.kind}): ${failure.message}`);
      }
    }
  });

  return {
    files: files.length,
    pairs: pairs.length,
    prefixMismatches,
    compared,
    moves,
    failures,
  };
}

// ─── Phase 3: corrupted files ───────────────────────────────────────────────

/** Delete every file in `outputDir` whose image header cannot be read. */
export async function deleteCorruptedImages(outputDir: string): Promise<SweepReport> {
  const files = await listFiles(outputDir);
  const deleted: string[] = [];
  const failures: ItemFailure[] = [];

  for (const file of files) {
    const filePath = path.join(outputDir, file);
    try {
      await readImageHeader(filePath);
    } catch (error) {
      const failure = toItemFailure(file, error);
      if (failure.kind === "race") continue;

      try {
        await removeFile(filePath);
        deleted.push(file);
        console.warn(`[sweep] Removed unreadable image ${file}: ${failure.message}`);
      } catch (removeError) {
        if (!isMissingFileError(removeError)) {
          failures.push(toItemFailure(file, removeError));
          console.error(`[sweep] Could not remove ${file}: ${errorMessage(removeError)}`);
        }
      }
    }
  }

  return { checked: files.length, deleted, failures };
}

/** Near-duplicate pass followed by the corruption sweep. */
export async function runDeduplication(
  outputDir: string,
  duplicatesDir: string,
  deps: NearDedupDeps
): Promise<DeduplicationReport> {
  const nearDuplicates = await moveSimilarLogos(outputDir, duplicatesDir, deps);
  const sweep = await deleteCorruptedImages(outputDir);
  return { nearDuplicates, sweep };
}
