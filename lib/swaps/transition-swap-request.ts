/**
 * Applies a status transition with check-then-write inside one transaction.
 */

import type { DbAdapter } from "@/lib/db/adapter";
import { getSwapRequestById, updateSwapRequestStatus } from "@/lib/db/queries";
import type { ActorIdentity } from "@/lib/auth";
import { failure } from "@/lib/api/error-types";
import type { SwapStatus } from "@/lib/schemas";
import type { SwapRequestResult } from "./create-swap-request";
import { checkTransition } from "./state-machine";
import { toSwapRequestView } from "./swap-request-view";

/**
 * The write is a compare-and-swap on the status read in this transaction, so
 * when two conflicting transitions race, the second fails with invalid_transition.
 *
 * The recipient's reply is stored on accept or reject; a cancel drops it.
 */
export async function transitionSwapRequest(
  db: DbAdapter,
  actor: ActorIdentity,
  requestId: string,
  next: SwapStatus,
  reply?: string | null
): Promise<SwapRequestResult> {
  return db.transaction<SwapRequestResult>(async (tx) => {
    const current = await getSwapRequestById(tx, requestId);
    if (!current) return failure("not_found", "Swap request not found");

    const check = checkTransition(current, actor.userId, next);
    if (!check.allowed) return failure(check.error, check.message);

    const updatedAt = new Date().toISOString();
    const acceptanceMessage = next === "accepted" || next === "rejected" ? reply || null : null;
    const written = await updateSwapRequestStatus(
      tx,
      current.id,
      current.status,
      next,
      updatedAt,
      acceptanceMessage
    );
    if (!written) {
      return failure("invalid_transition", "The swap request was already updated");
    }

    return {
      success: true,
      swap_request: await toSwapRequestView(tx, actor, {
        ...current,
        status: next,
        acceptance_message: acceptanceMessage,
        updated_at: updatedAt,
      }),
    };
  });
}
