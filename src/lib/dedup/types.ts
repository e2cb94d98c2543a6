import type { ItemFailure } from "@/lib/errors";
import type { LogoFetcher } from "@/lib/scraper/types";

export type ImageHasher = (filePath: string) => Promise<string>;

/** Similarity score 0–100 between two image files. */
export type SimilarityComparator = (pathA: string, pathB: string) => Promise<number>;

export interface DownloadDeps {
  fetcher: LogoFetcher;
  hasher: ImageHasher;
  /** Parallel download tasks */
  concurrency: number;
}

export interface NearDedupDeps {
  comparator: SimilarityComparator;
  /** Parallel comparison tasks */
  concurrency: number;
  /** A pair is a near-duplicate when its score is strictly above this */
  threshold: number;
  /** Characters of the file name that must match for a pair to count */
  prefixLength: number;
}

export interface DownloadReport {
  requested: number;
  /** Files kept in the logos directory */
  kept: string[];
  /** New files deleted because their hash was already registered */
  exactDuplicates: string[];
  failures: ItemFailure[];
}

export interface NearDuplicateMove {
  kept: string;
  moved: string;
  score: number;
}

export interface NearDedupReport {
  files: number;
  pairs: number;
  /** Pairs skipped because their brand prefixes differ */
  prefixMismatches: number;
  compared: number;
  moves: NearDuplicateMove[];
  failures: ItemFailure[];
}

export interface SweepReport {
  checked: number;
  deleted: string[];
  failures: ItemFailure[];
}

export interface DeduplicationReport {
  nearDuplicates: NearDedupReport;
  sweep: SweepReport;
}
