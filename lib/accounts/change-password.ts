/**
 * Credential rotation. The current password must verify first.
 */

import type { DbAdapter } from "@/lib/db/adapter";
import type { AppConfig } from "@/lib/config/app-config";
import { getUserById, updateUser } from "@/lib/db/queries";
import { hashPassword, verifyPassword, type ActorIdentity } from "@/lib/auth";
import { failure, type OperationResult } from "@/lib/api/error-types";
import type { ChangePasswordInput } from "@/lib/validation/request-schema";

export type ChangePasswordResult = OperationResult<{ updated_at: string }>;

export async function changePassword(
  db: DbAdapter,
  config: AppConfig,
  actor: ActorIdentity,
  input: ChangePasswordInput
): Promise<ChangePasswordResult> {
  const user = await getUserById(db, actor.userId);
  if (!user) return failure("not_found", "User not found");

  if (!(await verifyPassword(input.current_password, user.password_hash))) {
    return failure("invalid_credentials", "Current password is incorrect");
  }

  const passwordHash = await hashPassword(input.new_password, config.auth.passwordHashCost);
  const updatedAt = new Date().toISOString();

  return db.transaction<ChangePasswordResult>(async (tx) => {
    // Re-read inside the transaction: a concurrent change must not be silently overwritten.
    const current = await getUserById(tx, actor.userId);
    if (!current) return failure("not_found", "User not found");
    if (current.password_hash !== user.password_hash) {
      return failure("invalid_credentials", "Current password is incorrect");
    }
    await updateUser(tx, current.id, { password_hash: passwordHash, updated_at: updatedAt });
    return { success: true, updated_at: updatedAt };
  });
}
