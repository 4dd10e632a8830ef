/**
 * Tokens are stateless; logging out is the client discarding its token.
 * The endpoint only confirms the token was valid.
 */

import { NextRequest } from "next/server";
import { getConfig } from "@/lib/config/app-config";
import { json } from "@/lib/api/response-helpers";
import { requireActor } from "@/lib/api/require-actor";

export async function POST(request: NextRequest) {
  const auth = requireActor(request, getConfig());
  if (!auth.ok) return auth.response;
  return json({ message: "Logout successful" });
}
