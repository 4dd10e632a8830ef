/**
 * Request authentication boundary.
 * Turns the Authorization header into an ActorIdentity; business rules never see the token.
 */

import type { AppConfig } from "@/lib/config/app-config";
import { verifyToken, type ActorIdentity } from "./token";

const BEARER_PREFIX = /^Bearer\s+/i;

export function readBearerToken(request: Request): string | null {
  const header = request.headers.get("authorization");
  if (!header || !BEARER_PREFIX.test(header)) return null;
  const token = header.replace(BEARER_PREFIX, "").trim();
  return token || null;
}

export function authenticate(request: Request, config: AppConfig): ActorIdentity | null {
  const token = readBearerToken(request);
  if (!token) return null;
  return verifyToken(token, config.auth);
}

export type { ActorIdentity } from "./token";
