/**
 * Swap request reads. Only participants ever see a request.
 */

import type { DbAdapter } from "@/lib/db/adapter";
import {
  getSwapRequestById,
  listSwapRequestsByRecipient,
  listSwapRequestsByRequester,
} from "@/lib/db/queries";
import type { ActorIdentity } from "@/lib/auth";
import { canViewSwapRequest } from "@/lib/access";
import { failure } from "@/lib/api/error-types";
import type { SwapRequestView, SwapStatus } from "@/lib/schemas";
import type { SwapRequestResult } from "./create-swap-request";
import { toSwapRequestView, toSwapRequestViews } from "./swap-request-view";

/** Requests the actor sent, newest first. */
export async function listMySwapRequests(
  db: DbAdapter,
  actor: ActorIdentity,
  status?: SwapStatus
): Promise<SwapRequestView[]> {
  return toSwapRequestViews(db, actor, await listSwapRequestsByRequester(db, actor.userId, status));
}

/** Requests addressed to the actor, newest first. */
export async function listReceivedSwapRequests(
  db: DbAdapter,
  actor: ActorIdentity,
  status?: SwapStatus
): Promise<SwapRequestView[]> {
  return toSwapRequestViews(db, actor, await listSwapRequestsByRecipient(db, actor.userId, status));
}

export async function getSwapRequest(
  db: DbAdapter,
  actor: ActorIdentity,
  requestId: string
): Promise<SwapRequestResult> {
  const request = await getSwapRequestById(db, requestId);
  if (!request) return failure("not_found", "Swap request not found");
  if (!canViewSwapRequest(actor, request)) {
    return failure("forbidden", "You are not authorized to view this request");
  }
  return { success: true, swap_request: await toSwapRequestView(db, actor, request) };
}
