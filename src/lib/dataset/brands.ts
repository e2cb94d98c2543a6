import { domainStem } from "@/lib/utils/url";

/**
 * Canonical brand of a domain: the stem before the first dot, cut at the
 * first dash or underscore.
 *
 *   foo-bar.com  → "foo"
 *   foobaz.net   → "foobaz"
 *   acme_eu.de   → "acme"
 */
export function extractBrand(domain: string): string {
  return domainStem(domain).split(/[-_]/)[0];
}

/**
 * Keep one domain per brand, first seen wins. Empty values and repeated
 * domains are dropped first. Output follows first-seen brand order.
 */
export function selectDomainsByBrand(domains: Iterable<string | null | undefined>): string[] {
  const byBrand = new Map<string, string>();
  const seen = new Set<string>();

  for (const raw of domains) {
    const domain = raw?.trim();
    if (!domain || seen.has(domain)) continue;
    seen.add(domain);

    const brand = extractBrand(domain);
    if (!byBrand.has(brand)) {
      byBrand.set(brand, domain);
    }
  }

  return [...byBrand.values()];
}
