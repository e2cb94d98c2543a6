/**
 * Turn a dataset value into a fetchable URL. Bare domains get https://,
 * full URLs pass through.
 */
export function parseInput(input: string): string {
  const trimmed = input.trim();

  if (trimmed.startsWith("http://") || trimmed.startsWith("https://")) {
    return trimmed;
  }

  return `https://${trimmed}`;
}

/**
 * Text before the first dot of a domain ("foo-bar.com" → "foo-bar").
 * Downloaded logos are stored under this name.
 */
export function domainStem(domain: string): string {
  return domain.trim().split(".")[0];
}

/** Resolve `href` against `baseUrl`; null for malformed values. */
export function resolveUrl(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, baseUrl).href;
  } catch {
    return null;
  }
}
