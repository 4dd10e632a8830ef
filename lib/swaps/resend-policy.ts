/**
 * Whether a requester may send the same skill pair to the same recipient again.
 */

import type { SwapRequestRecord, SwapResendPolicy } from "@/lib/schemas";

/** Returns the refusal message, or null when the new request may be created. */
export function findResendConflict(
  policy: SwapResendPolicy,
  earlier: Array<Pick<SwapRequestRecord, "status">>
): string | null {
  if (policy === "allow") return null;

  if (earlier.some((r) => r.status === "pending")) {
    return "You already have a pending request for these skills with this user";
  }
  if (policy === "block_after_rejection" && earlier.some((r) => r.status === "rejected")) {
    return "This user already rejected a request for these skills";
  }
  return null;
}
