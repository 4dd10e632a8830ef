/**
 * User query helpers.
 * Plain records parsed through the domain schema; no lazy relationship loading.
 */
import type { DbAdapter, UserListFilters } from "@/lib/db/adapter";
import { userRecordSchema, type UserRecord } from "@/lib/schemas";

export async function getUserById(
  db: DbAdapter,
  userId: string
): Promise<UserRecord | null> {
  const row = await db.getUserById(userId);
  return row ? userRecordSchema.parse(row) : null;
}

export async function getUserByEmail(
  db: DbAdapter,
  email: string
): Promise<UserRecord | null> {
  const row = await db.getUserByEmail(email);
  return row ? userRecordSchema.parse(row) : null;
}

export async function listViewableUsers(
  db: DbAdapter,
  viewerId: string,
  filters?: UserListFilters
): Promise<UserRecord[]> {
  const rows = await db.listViewableUsers(viewerId, filters);
  return rows.map((r) => userRecordSchema.parse(r));
}

/** Keyed by id for embedding swap-request participants. */
export async function getUsersByIds(
  db: DbAdapter,
  userIds: string[]
): Promise<Map<string, UserRecord>> {
  const unique = [...new Set(userIds)];
  const rows = await db.getUsersByIds(unique);
  const byId = new Map<string, UserRecord>();
  for (const row of rows) {
    const user = userRecordSchema.parse(row);
    byId.set(user.id, user);
  }
  return byId;
}

export async function insertUser(db: DbAdapter, user: UserRecord): Promise<void> {
  await db.insertUser({ ...user });
}

export type UserUpdate = Partial<Omit<UserRecord, "id" | "created_at">>;

export async function updateUser(
  db: DbAdapter,
  userId: string,
  updates: UserUpdate
): Promise<void> {
  await db.updateUser(userId, { ...updates });
}
