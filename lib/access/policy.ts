/**
 * Access-control decisions. Pure: callers load the records, these only compare ids.
 */

import type { ActorIdentity } from "@/lib/auth";
import type { SwapRequestRecord, SwapStatus, UserRecord } from "@/lib/schemas";
import { checkTransition, participantRole } from "@/lib/swaps/state-machine";

type Participants = Pick<SwapRequestRecord, "requester_id" | "recipient_id">;

export function canViewUser(
  actor: ActorIdentity,
  user: Pick<UserRecord, "id" | "is_public">
): boolean {
  return user.id === actor.userId || user.is_public;
}

export function canMutateUser(actor: ActorIdentity, user: Pick<UserRecord, "id">): boolean {
  return user.id === actor.userId;
}

export function canViewSwapRequest(actor: ActorIdentity, request: Participants): boolean {
  return participantRole(request, actor.userId) !== null;
}

export function canMutateSwapRequest(
  actor: ActorIdentity,
  request: Participants & Pick<SwapRequestRecord, "status">,
  next: SwapStatus
): boolean {
  return checkTransition(request, actor.userId, next).allowed;
}

export function canDeleteSwapRequest(actor: ActorIdentity, request: Participants): boolean {
  return request.requester_id === actor.userId;
}
