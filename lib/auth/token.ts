/**
 * Bearer token issue/verify (HS256 JWT).
 * The subject claim carries the user id; nothing else is trusted from the token.
 */

import jwt from "jsonwebtoken";
import type { AppConfig } from "@/lib/config/app-config";

export interface ActorIdentity {
  userId: string;
}

type AuthConfig = AppConfig["auth"];

export function issueToken(userId: string, auth: AuthConfig): string {
  return jwt.sign({}, auth.secret, {
    algorithm: "HS256",
    subject: userId,
    expiresIn: auth.expiresIn,
  });
}

/** Null when the token is malformed, expired, or signed with another secret. */
export function verifyToken(token: string, auth: AuthConfig): ActorIdentity | null {
  try {
    const payload = jwt.verify(token, auth.secret, { algorithms: ["HS256"] });
    if (typeof payload === "string" || !payload.sub) return null;
    return { userId: payload.sub };
  } catch (err) {
    if (err instanceof jwt.JsonWebTokenError) return null;
    throw err;
  }
}
