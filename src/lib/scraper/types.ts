export type LogoSource = "img" | "icon";

export interface LogoCandidate {
  url: string;
  source: LogoSource;
}

export interface ScrapeOptions {
  /** Timeout for the home page request */
  pageTimeoutMs: number;
  /** Timeout for the logo bytes request */
  imageTimeoutMs: number;
  userAgent: string;
}

/** Downloads one domain's logo into a directory and returns the file path. */
export type LogoFetcher = (domain: string, outputDir: string) => Promise<string>;
