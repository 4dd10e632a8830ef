/**
 * Account registration.
 */

import { v4 as uuidv4 } from "uuid";
import type { DbAdapter } from "@/lib/db/adapter";
import type { AppConfig } from "@/lib/config/app-config";
import { getUserByEmail, insertUser } from "@/lib/db/queries";
import { isUniqueViolation } from "@/lib/db/errors";
import { hashPassword, issueToken } from "@/lib/auth";
import { failure, type OperationResult } from "@/lib/api/error-types";
import type { OwnProfile, UserRecord } from "@/lib/schemas";
import type { RegisterInput } from "@/lib/validation/request-schema";
import { toOwnProfile } from "./profile-view";

export type AuthenticatedUserResult = OperationResult<{ user: OwnProfile; token: string }>;

const DUPLICATE_EMAIL_MESSAGE = "A user already exists with this email";

/**
 * Creates a user with a hashed password and returns it with a fresh token.
 * Email uniqueness is checked inside the transaction; the UNIQUE index
 * catches a concurrent registration that slips past the check.
 */
export async function registerUser(
  db: DbAdapter,
  config: AppConfig,
  input: RegisterInput
): Promise<AuthenticatedUserResult> {
  const passwordHash = await hashPassword(input.password, config.auth.passwordHashCost);
  const now = new Date().toISOString();
  const user: UserRecord = {
    id: uuidv4(),
    email: input.email,
    password_hash: passwordHash,
    name: input.name,
    location: input.location ?? null,
    availability: input.availability ?? null,
    profile_photo: input.profile_photo || null,
    skills_offered: input.skills_offered,
    skills_wanted: input.skills_wanted,
    is_public: input.is_public ?? true,
    created_at: now,
    updated_at: now,
  };

  return db.transaction<AuthenticatedUserResult>(async (tx) => {
    if (await getUserByEmail(tx, user.email)) {
      return failure("duplicate_email", DUPLICATE_EMAIL_MESSAGE);
    }
    try {
      await insertUser(tx, user);
    } catch (err) {
      if (isUniqueViolation(err)) return failure("duplicate_email", DUPLICATE_EMAIL_MESSAGE);
      throw err;
    }
    return {
      success: true,
      user: toOwnProfile(user),
      token: issueToken(user.id, config.auth),
    };
  });
}
