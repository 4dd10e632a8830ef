/**
 * Serialisation of user records. The password hash never leaves this module.
 */

import type { OwnProfile, PublicProfile, UserRecord } from "@/lib/schemas";

export function toOwnProfile(user: UserRecord): OwnProfile {
  return {
    id: user.id,
    email: user.email,
    name: user.name,
    location: user.location,
    availability: user.availability,
    skills_offered: user.skills_offered,
    skills_wanted: user.skills_wanted,
    is_public: user.is_public,
    profile_photo: user.profile_photo,
    created_at: user.created_at,
    updated_at: user.updated_at,
  };
}

export function toPublicProfile(user: UserRecord): PublicProfile {
  const { email: _email, ...profile } = toOwnProfile(user);
  return profile;
}
