/**
 * Failure taxonomy for the logo pipeline.
 *
 * Every per-item failure (one domain, one file, one pair) is thrown as one of
 * these, caught at the smallest scope and turned into an `ItemFailure`
 * record so that a batch never aborts.
 */

export type FailureKind = "network" | "decode" | "lookup" | "race" | "io";

export interface ItemFailure {
  /** Domain, file name or "a <-> b" pair label */
  item: string;
  kind: FailureKind;
  message: string;
}

export class LogoLensError extends Error {
  readonly kind: FailureKind;

  constructor(kind: FailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** Unreachable host, non-2xx status or timeout */
export class NetworkError extends LogoLensError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super("network", message, options);
    this.status = status;
  }
}

/** Corrupt or unsupported image bytes */
export class DecodeError extends LogoLensError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("decode", message, options);
  }
}

/** No logo-like asset on the page */
export class LookupError extends LogoLensError {
  constructor(message: string) {
    super("lookup", message);
  }
}

/** File deleted or moved between enumeration and access */
export class RaceError extends LogoLensError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("race", message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export function toItemFailure(item: string, error: unknown): ItemFailure {
  if (error instanceof LogoLensError) {
    return { item, kind: error.kind, message: error.message };
  }
  if (isMissingFileError(error)) {
    return { item, kind: "race", message: errorMessage(error) };
  }
  return { item, kind: "io", message: errorMessage(error) };
}

/** Count failures per kind, for end-of-run summaries. */
export function countFailures(failures: readonly ItemFailure[]): Record<FailureKind, number> {
  const counts: Record<FailureKind, number> = {
    network: 0,
    decode: 0,
    lookup: 0,
    race: 0,
    io: 0,
  };
  for (const failure of failures) {
    counts[failure.kind]++;
  }
  return counts;
}
