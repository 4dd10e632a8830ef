/**
 * Swap request creation.
 */

import { v4 as uuidv4 } from "uuid";
import type { DbAdapter } from "@/lib/db/adapter";
import type { AppConfig } from "@/lib/config/app-config";
import { findSwapRequestsBetween, getUserById, insertSwapRequest } from "@/lib/db/queries";
import type { ActorIdentity } from "@/lib/auth";
import { failure, type OperationResult } from "@/lib/api/error-types";
import type { SwapRequestRecord, SwapRequestView } from "@/lib/schemas";
import type { CreateSwapRequestInput } from "@/lib/validation/request-schema";
import { findResendConflict } from "./resend-policy";
import { toSwapRequestView } from "./swap-request-view";

export type SwapRequestResult = OperationResult<{ swap_request: SwapRequestView }>;

export async function createSwapRequest(
  db: DbAdapter,
  config: AppConfig,
  actor: ActorIdentity,
  input: CreateSwapRequestInput
): Promise<SwapRequestResult> {
  if (input.recipient_id === actor.userId) {
    return failure("validation_failed", "You cannot send a swap request to yourself");
  }

  return db.transaction<SwapRequestResult>(async (tx) => {
    const requester = await getUserById(tx, actor.userId);
    if (!requester) return failure("not_found", "User not found");
    const recipient = await getUserById(tx, input.recipient_id);
    if (!recipient) return failure("not_found", "Recipient not found");

    const earlier = await findSwapRequestsBetween(tx, {
      requesterId: requester.id,
      recipientId: recipient.id,
      offeredSkill: input.offered_skill,
      wantedSkill: input.wanted_skill,
    });
    const conflict = findResendConflict(config.swaps.resendPolicy, earlier);
    if (conflict) return failure("validation_failed", conflict);

    const now = new Date().toISOString();
    const request: SwapRequestRecord = {
      id: uuidv4(),
      requester_id: requester.id,
      recipient_id: recipient.id,
      offered_skill: input.offered_skill,
      wanted_skill: input.wanted_skill,
      message: input.message || null,
      acceptance_message: null,
      status: "pending",
      created_at: now,
      updated_at: now,
    };
    await insertSwapRequest(tx, request);
    return { success: true, swap_request: await toSwapRequestView(tx, actor, request) };
  });
}
