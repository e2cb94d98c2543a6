import { type ItemFailure, countFailures } from "@/lib/errors";

/** One-line count of failures per kind, e.g. "network=3, decode=1". */
export function formatFailureCounts(failures: readonly ItemFailure[]): string {
  const counts = countFailures(failures);
  const parts = Object.entries(counts)
    .filter(([, count]) => count > 0)
    .map(([kind, count]) => `${kind}=${count}`);
  return parts.length > 0 ? parts.join(", ") : "none";
}
