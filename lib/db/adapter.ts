/**
 * Database adapter interface.
 * Single seam between business logic and storage.
 * SQLite (better-sqlite3) is the only implementation.
 */

import type { SwapStatus } from "@/lib/schemas";

/** Row types - generic records from DB */
export type DbRow = Record<string, unknown>;

/**
 * Run multiple operations in a transaction.
 * On success: commit. On error/throw: rollback.
 */
export type TransactionFn<T> = (adapter: DbAdapter) => Promise<T>;

export interface UserListFilters {
  /** Exact skill name, case-insensitive, offered or wanted */
  skill?: string;
  /** Case-insensitive substring of the name */
  search?: string;
}

export interface DbAdapter {
  /** Run operations in a transaction. Rolls back on error. */
  transaction<T>(fn: TransactionFn<T>): Promise<T>;

  /** Cheap connectivity probe for the status endpoint. */
  ping(): Promise<boolean>;

  // --- Users ---
  getUserById(userId: string): Promise<DbRow | null>;
  getUserByEmail(email: string): Promise<DbRow | null>;
  /** Public profiles plus the viewer's own, oldest first. */
  listViewableUsers(viewerId: string, filters?: UserListFilters): Promise<DbRow[]>;
  /** Batch: users by id. Avoids N+1 when embedding participants. */
  getUsersByIds(userIds: string[]): Promise<DbRow[]>;
  insertUser(row: DbRow): Promise<void>;
  updateUser(userId: string, updates: DbRow): Promise<void>;

  // --- Swap requests ---
  getSwapRequest(requestId: string): Promise<DbRow | null>;
  listSwapRequestsByRequester(userId: string, status?: SwapStatus): Promise<DbRow[]>;
  listSwapRequestsByRecipient(userId: string, status?: SwapStatus): Promise<DbRow[]>;
  /** Requests with the same participants and skill pair (case-insensitive), any status. */
  findSwapRequestsBetween(
    requesterId: string,
    recipientId: string,
    offeredSkill: string,
    wantedSkill: string
  ): Promise<DbRow[]>;
  insertSwapRequest(row: DbRow): Promise<void>;
  /**
   * Compare-and-swap status update, writing the recipient's reply alongside.
   * Only writes when the stored status still equals expectedStatus. Returns
   * false when no row changed.
   */
  updateSwapRequestStatus(
    requestId: string,
    expectedStatus: SwapStatus,
    nextStatus: SwapStatus,
    updatedAt: string,
    acceptanceMessage: string | null
  ): Promise<boolean>;
  deleteSwapRequest(requestId: string): Promise<boolean>;
}
