/**
 * Requester-only removal of a swap request.
 */

import type { DbAdapter } from "@/lib/db/adapter";
import { deleteSwapRequest as deleteSwapRequestRow, getSwapRequestById } from "@/lib/db/queries";
import type { ActorIdentity } from "@/lib/auth";
import { canDeleteSwapRequest } from "@/lib/access";
import { failure, type OperationResult } from "@/lib/api/error-types";

export async function deleteSwapRequest(
  db: DbAdapter,
  actor: ActorIdentity,
  requestId: string
): Promise<OperationResult<{ id: string }>> {
  return db.transaction<OperationResult<{ id: string }>>(async (tx) => {
    const request = await getSwapRequestById(tx, requestId);
    if (!request) return failure("not_found", "Swap request not found");
    if (!canDeleteSwapRequest(actor, request)) {
      return failure("forbidden", "Only the requester can delete the request");
    }
    if (!(await deleteSwapRequestRow(tx, request.id))) {
      return failure("not_found", "Swap request not found");
    }
    return { success: true, id: request.id };
  });
}
