/**
 * Swap request query helpers.
 */
import type { DbAdapter } from "@/lib/db/adapter";
import {
  swapRequestRecordSchema,
  type SwapRequestRecord,
  type SwapStatus,
} from "@/lib/schemas";

export async function getSwapRequestById(
  db: DbAdapter,
  requestId: string
): Promise<SwapRequestRecord | null> {
  const row = await db.getSwapRequest(requestId);
  return row ? swapRequestRecordSchema.parse(row) : null;
}

export async function listSwapRequestsByRequester(
  db: DbAdapter,
  userId: string,
  status?: SwapStatus
): Promise<SwapRequestRecord[]> {
  const rows = await db.listSwapRequestsByRequester(userId, status);
  return rows.map((r) => swapRequestRecordSchema.parse(r));
}

export async function listSwapRequestsByRecipient(
  db: DbAdapter,
  userId: string,
  status?: SwapStatus
): Promise<SwapRequestRecord[]> {
  const rows = await db.listSwapRequestsByRecipient(userId, status);
  return rows.map((r) => swapRequestRecordSchema.parse(r));
}

export async function findSwapRequestsBetween(
  db: DbAdapter,
  pair: {
    requesterId: string;
    recipientId: string;
    offeredSkill: string;
    wantedSkill: string;
  }
): Promise<SwapRequestRecord[]> {
  const rows = await db.findSwapRequestsBetween(
    pair.requesterId,
    pair.recipientId,
    pair.offeredSkill,
    pair.wantedSkill
  );
  return rows.map((r) => swapRequestRecordSchema.parse(r));
}

export async function insertSwapRequest(
  db: DbAdapter,
  request: SwapRequestRecord
): Promise<void> {
  await db.insertSwapRequest({ ...request });
}

/** Compare-and-swap on status; false when the stored status was no longer expectedStatus. */
export async function updateSwapRequestStatus(
  db: DbAdapter,
  requestId: string,
  expectedStatus: SwapStatus,
  nextStatus: SwapStatus,
  updatedAt: string,
  acceptanceMessage: string | null = null
): Promise<boolean> {
  return db.updateSwapRequestStatus(
    requestId,
    expectedStatus,
    nextStatus,
    updatedAt,
    acceptanceMessage
  );
}

export async function deleteSwapRequest(db: DbAdapter, requestId: string): Promise<boolean> {
  return db.deleteSwapRequest(requestId);
}
