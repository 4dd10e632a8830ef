/**
 * Own-profile read and owner-only partial update.
 */

import type { DbAdapter } from "@/lib/db/adapter";
import { getUserById, getUserByEmail, updateUser, type UserUpdate } from "@/lib/db/queries";
import { isUniqueViolation } from "@/lib/db/errors";
import type { ActorIdentity } from "@/lib/auth";
import { canMutateUser } from "@/lib/access";
import { failure, type OperationResult } from "@/lib/api/error-types";
import type { OwnProfile } from "@/lib/schemas";
import type { UpdateProfileInput } from "@/lib/validation/request-schema";
import { toOwnProfile } from "./profile-view";

export type ProfileResult = OperationResult<{ user: OwnProfile }>;

export async function getOwnProfile(
  db: DbAdapter,
  actor: ActorIdentity
): Promise<ProfileResult> {
  const user = await getUserById(db, actor.userId);
  if (!user) return failure("not_found", "User not found");
  return { success: true, user: toOwnProfile(user) };
}

function buildUpdate(patch: UpdateProfileInput): UserUpdate {
  const updates: UserUpdate = {};
  if (patch.name !== undefined) updates.name = patch.name;
  if (patch.email !== undefined) updates.email = patch.email;
  if (patch.location !== undefined) updates.location = patch.location || null;
  if (patch.availability !== undefined) updates.availability = patch.availability || null;
  if (patch.profile_photo !== undefined) updates.profile_photo = patch.profile_photo || null;
  if (patch.skills_offered !== undefined) updates.skills_offered = patch.skills_offered;
  if (patch.skills_wanted !== undefined) updates.skills_wanted = patch.skills_wanted;
  if (patch.is_public !== undefined) updates.is_public = patch.is_public;
  return updates;
}

/**
 * Applies only the supplied fields. An empty patch changes nothing,
 * not even updated_at.
 */
export async function updateProfile(
  db: DbAdapter,
  actor: ActorIdentity,
  targetUserId: string,
  patch: UpdateProfileInput
): Promise<ProfileResult> {
  if (!canMutateUser(actor, { id: targetUserId })) {
    return failure("forbidden", "You can only update your own profile");
  }

  return db.transaction<ProfileResult>(async (tx) => {
    const existing = await getUserById(tx, targetUserId);
    if (!existing) return failure("not_found", "User not found");

    const updates = buildUpdate(patch);
    if (Object.keys(updates).length === 0) {
      return { success: true, user: toOwnProfile(existing) };
    }

    if (updates.email !== undefined && updates.email !== existing.email) {
      const holder = await getUserByEmail(tx, updates.email);
      if (holder && holder.id !== existing.id) {
        return failure("duplicate_email", "Email is already taken");
      }
    }

    updates.updated_at = new Date().toISOString();
    try {
      await updateUser(tx, existing.id, updates);
    } catch (err) {
      if (isUniqueViolation(err)) return failure("duplicate_email", "Email is already taken");
      throw err;
    }
    return { success: true, user: toOwnProfile({ ...existing, ...updates }) };
  });
}
