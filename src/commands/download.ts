import type { AppConfig } from "@/lib/config";
import { loadDomains } from "@/lib/dataset/loader";
import { selectDomainsByBrand } from "@/lib/dataset/brands";
import { downloadAndDedupe, runDeduplication } from "@/lib/dedup/engine";
import type { DeduplicationReport, DownloadReport, ImageHasher, SimilarityComparator } from "@/lib/dedup/types";
import { computeDhash } from "@/lib/images/dhash";
import { compareHistograms } from "@/lib/images/histogram";
import { createLogoFetcher } from "@/lib/scraper";
import type { LogoFetcher } from "@/lib/scraper/types";
import { formatFailureCounts } from "./summary";

export interface DownloadOverrides {
  /** Dataset path instead of the configured INPUT_FILE */
  input?: string;
  fetcher?: LogoFetcher;
  hasher?: ImageHasher;
  comparator?: SimilarityComparator;
}

export interface DownloadResult {
  domains: string[];
  download: DownloadReport;
  dedup: DeduplicationReport;
}

/**
 * Download mode: load the dataset, keep one domain per brand, fetch logos
 * with exact-duplicate removal, then move near-duplicates aside and sweep
 * unreadable files.
 */
export async function runDownload(
  config: AppConfig,
  overrides: DownloadOverrides = {}
): Promise<DownloadResult> {
  const allDomains = await loadDomains(overrides.input ?? config.inputFile);
  const domains = selectDomainsByBrand(allDomains);
  console.log(`[download] ${allDomains.length} domains, ${domains.length} distinct brands`);
  console.log("[download] Starting logo download...");

  const download = await downloadAndDedupe(domains, config.logosDir, {
    fetcher:
      overrides.fetcher ??
      createLogoFetcher({
        pageTimeoutMs: config.pageTimeoutMs,
        imageTimeoutMs: config.imageTimeoutMs,
        userAgent: config.userAgent,
      }),
    hasher: overrides.hasher ?? ((filePath) => computeDhash(filePath)),
    concurrency: config.fetchConcurrency,
  });

  console.log(
    `[download] Finished logo download: ${download.kept.length} kept, ` +
      `${download.exactDuplicates.length} exact duplicates removed, ` +
      `failures: ${formatFailureCounts(download.failures)}`
  );
  console.log("[download] Checking for duplicates...");

  const dedup = await runDeduplication(config.logosDir, config.duplicatesDir, {
    comparator: overrides.comparator ?? compareHistograms,
    concurrency: config.compareConcurrency,
    threshold: config.similarityThreshold,
    prefixLength: config.brandPrefixLength,
  });

  const { nearDuplicates, sweep } = dedup;
  console.log(
    `[download] Duplicate check completed: ${nearDuplicates.compared}/${nearDuplicates.pairs} pairs compared, ` +
      `${nearDuplicates.moves.length} moved to ${config.duplicatesDir}, ` +
      `${sweep.deleted.length} unreadable removed, ` +
      `failures: ${formatFailureCounts([...nearDuplicates.failures, ...sweep.failures])}`
  );

  return { domains, download, dedup };
}
