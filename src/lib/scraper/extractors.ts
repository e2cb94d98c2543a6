import { JSDOM } from "jsdom";
import { resolveUrl } from "@/lib/utils/url";
import type { LogoCandidate } from "./types";

/**
 * Pick the logo URL from a page's HTML.
 *
 * 1. First <img> whose src contains "logo" (case-insensitive)
 * 2. Otherwise the first <link rel="icon"> (also matches "shortcut icon")
 *
 * Relative URLs are resolved against `pageUrl`. Returns null when neither
 * is present.
 */
export function extractLogoUrl(html: string, pageUrl: string): LogoCandidate | null {
  const { document } = new JSDOM(html).window;

  for (const img of Array.from(document.querySelectorAll("img"))) {
    const src = img.getAttribute("src") ?? "";
    if (!src.toLowerCase().includes("logo")) continue;

    const url = resolveUrl(src, pageUrl);
    if (url) return { url, source: "img" };
  }

  const icon = document.querySelector('link[rel~="icon"]');
  const href = icon?.getAttribute("href");
  if (href) {
    const url = resolveUrl(href, pageUrl);
    if (url) return { url, source: "icon" };
  }

  return null;
}
