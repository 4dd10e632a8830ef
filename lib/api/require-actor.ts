/**
 * Route-level authentication gate.
 */

import { authenticate, type ActorIdentity } from "@/lib/auth";
import type { AppConfig } from "@/lib/config/app-config";
import { unauthenticatedError } from "./response-helpers";

export type ActorCheck =
  | { ok: true; actor: ActorIdentity }
  | { ok: false; response: Response };

export function requireActor(request: Request, config: AppConfig): ActorCheck {
  const actor = authenticate(request, config);
  if (!actor) return { ok: false, response: unauthenticatedError() };
  return { ok: true, actor };
}
