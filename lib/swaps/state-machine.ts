/**
 * Swap request status transitions.
 * pending is the only non-terminal state; each terminal state is reachable
 * from pending by exactly one participant role.
 */

import type { SwapRequestRecord, SwapStatus } from "@/lib/schemas";

export type ParticipantRole = "requester" | "recipient";

type TerminalStatus = Exclude<SwapStatus, "pending">;

export const SWAP_TRANSITIONS: Record<TerminalStatus, ParticipantRole> = {
  accepted: "recipient",
  rejected: "recipient",
  cancelled: "requester",
};

export type TransitionCheck =
  | { allowed: true }
  | { allowed: false; error: "forbidden" | "invalid_transition"; message: string };

type TransitionSubject = Pick<SwapRequestRecord, "requester_id" | "recipient_id" | "status">;

export function isTerminalStatus(status: SwapStatus): status is TerminalStatus {
  return status !== "pending";
}

export function participantRole(
  request: Pick<SwapRequestRecord, "requester_id" | "recipient_id">,
  userId: string
): ParticipantRole | null {
  if (request.requester_id === userId) return "requester";
  if (request.recipient_id === userId) return "recipient";
  return null;
}

/**
 * Decides whether actorId may move the request to next.
 * Checked in order: participant, target state, role for target, current state.
 */
export function checkTransition(
  request: TransitionSubject,
  actorId: string,
  next: SwapStatus
): TransitionCheck {
  const role = participantRole(request, actorId);
  if (!role) {
    return {
      allowed: false,
      error: "forbidden",
      message: "You are not a participant in this swap request",
    };
  }

  if (!isTerminalStatus(next)) {
    return {
      allowed: false,
      error: "invalid_transition",
      message: "A swap request cannot be moved back to pending",
    };
  }

  const requiredRole = SWAP_TRANSITIONS[next];
  if (role !== requiredRole) {
    return {
      allowed: false,
      error: "forbidden",
      message:
        requiredRole === "recipient"
          ? "Only the recipient can accept or reject a swap request"
          : "Only the requester can cancel a swap request",
    };
  }

  if (isTerminalStatus(request.status)) {
    return {
      allowed: false,
      error: "invalid_transition",
      message: `Cannot update a swap request with status: ${request.status}`,
    };
  }

  return { allowed: true };
}
