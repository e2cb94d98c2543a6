import { NetworkError } from "@/lib/errors";

/**
 * Accept a response only when its status is exactly 200. Anything else has
 * its body cancelled, which lets undici release the socket, and fails with
 * a NetworkError carrying the status.
 */
export async function expectStatus200(response: Response, label: string): Promise<void> {
  if (response.status === 200) return;

  await response.body?.cancel();
  throw new NetworkError(`${label}: ${response.status}`, response.status);
}
