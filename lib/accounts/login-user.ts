/**
 * Credential check and token issue.
 */

import type { DbAdapter } from "@/lib/db/adapter";
import type { AppConfig } from "@/lib/config/app-config";
import { getUserByEmail } from "@/lib/db/queries";
import { issueToken, verifyPassword } from "@/lib/auth";
import { failure } from "@/lib/api/error-types";
import type { LoginInput } from "@/lib/validation/request-schema";
import type { AuthenticatedUserResult } from "./register-user";
import { toOwnProfile } from "./profile-view";

export async function loginUser(
  db: DbAdapter,
  config: AppConfig,
  input: LoginInput
): Promise<AuthenticatedUserResult> {
  const user = await getUserByEmail(db, input.email);
  // Same answer for unknown email and wrong password
  if (!user || !(await verifyPassword(input.password, user.password_hash))) {
    return failure("invalid_credentials", "Invalid email or password");
  }
  return {
    success: true,
    user: toOwnProfile(user),
    token: issueToken(user.id, config.auth),
  };
}
