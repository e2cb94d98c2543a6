import fs from "fs/promises";
import path from "path";
import { LookupError, NetworkError, errorMessage } from "@/lib/errors";
import { fetchImageBuffer, normalizeLogoBytes } from "@/lib/images/processor";
import { expectStatus200 } from "@/lib/utils/http";
import { domainStem, parseInput } from "@/lib/utils/url";
import { extractLogoUrl } from "./extractors";
import type { LogoCandidate, LogoFetcher, ScrapeOptions } from "./types";

/**
 * GET the domain's home page and pick its logo URL.
 * Throws NetworkError for unreachable hosts, non-200 statuses or timeouts and
 * LookupError when the page has no logo-like asset.
 */
export async function findLogoUrl(domain: string, options: ScrapeOptions): Promise<LogoCandidate> {
  const pageUrl = parseInput(domain);

  let response: Response;
  try {
    response = await fetch(pageUrl, {
      headers: { "User-Agent": options.userAgent },
      signal: AbortSignal.timeout(options.pageTimeoutMs),
    });
  } catch (error) {
    throw new NetworkError(`Failed to load ${pageUrl}: ${errorMessage(error)}`, null, { cause: error });
  }

  await expectStatus200(response, `Failed to load ${pageUrl}`);

  // Redirects change the base for relative logo paths
  const baseUrl = response.url || pageUrl;
  const candidate = extractLogoUrl(await response.text(), baseUrl);
  if (!candidate) {
    throw new LookupError(`No logo found on ${pageUrl}`);
  }
  return candidate;
}

/** Path a domain's logo is stored under: `<dir>/<domain stem>.png`. */
export function logoPathFor(domain: string, outputDir: string): string {
  return path.join(outputDir, `${domainStem(domain)}.png`);
}

/**
 * Find and download a domain's logo into `outputDir`.
 * The file is always named `<stem>.png` whatever the actual format.
 */
export async function downloadLogo(
  domain: string,
  outputDir: string,
  options: ScrapeOptions
): Promise<string> {
  const candidate = await findLogoUrl(domain, options);
  const bytes = await fetchImageBuffer(candidate.url, {
    timeoutMs: options.imageTimeoutMs,
    userAgent: options.userAgent,
  });

  await fs.mkdir(outputDir, { recursive: true });
  const filePath = logoPathFor(domain, outputDir);
  await fs.writeFile(filePath, normalizeLogoBytes(bytes));

  console.log(`[scraper] Downloaded ${domain} (${candidate.source}) → ${filePath}`);
  return filePath;
}

export function createLogoFetcher(options: ScrapeOptions): LogoFetcher {
  return (domain, outputDir) => downloadLogo(domain, outputDir, options);
}

export { extractLogoUrl };
export type { LogoCandidate, LogoFetcher, ScrapeOptions };
