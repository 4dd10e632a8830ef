/**
 * Browsing other users: list, single profile, skill catalogue.
 */

import type { DbAdapter } from "@/lib/db/adapter";
import { getUserById, listViewableUsers } from "@/lib/db/queries";
import type { ActorIdentity } from "@/lib/auth";
import { canViewUser } from "@/lib/access";
import { failure, type OperationResult } from "@/lib/api/error-types";
import type { OwnProfile, PublicProfile } from "@/lib/schemas";
import type { ListUsersQuery } from "@/lib/validation/request-schema";
import { toOwnProfile, toPublicProfile } from "./profile-view";

/** Public profiles plus the actor's own, optionally filtered by skill or name. */
export async function listUsers(
  db: DbAdapter,
  actor: ActorIdentity,
  filters: ListUsersQuery = {}
): Promise<PublicProfile[]> {
  const users = await listViewableUsers(db, actor.userId, filters);
  return users.filter((u) => canViewUser(actor, u)).map(toPublicProfile);
}

export async function getUser(
  db: DbAdapter,
  actor: ActorIdentity,
  userId: string
): Promise<OperationResult<{ user: OwnProfile | PublicProfile }>> {
  const user = await getUserById(db, userId);
  if (!user) return failure("not_found", "User not found");
  if (!canViewUser(actor, user)) return failure("forbidden", "This profile is private");
  return {
    success: true,
    user: user.id === actor.userId ? toOwnProfile(user) : toPublicProfile(user),
  };
}

/** Distinct skills (offered or wanted) across the profiles the actor can see. */
export async function listSkills(db: DbAdapter, actor: ActorIdentity): Promise<string[]> {
  const users = await listViewableUsers(db, actor.userId);
  const skills = new Set<string>();
  for (const user of users) {
    for (const skill of [...user.skills_offered, ...user.skills_wanted]) skills.add(skill);
  }
  return [...skills].sort((a, b) => a.localeCompare(b));
}
