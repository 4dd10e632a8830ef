import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { getConfig } from "@/lib/config/app-config";
import { getOwnProfile, updateProfile } from "@/lib/accounts";
import { json, failureResponse, internalError } from "@/lib/api/response-helpers";
import { requireActor } from "@/lib/api/require-actor";
import { parseJsonBody } from "@/lib/validation/request-body";
import { updateProfileSchema } from "@/lib/validation/request-schema";

export async function GET(request: NextRequest) {
  try {
    const auth = requireActor(request, getConfig());
    if (!auth.ok) return auth.response;

    const result = await getOwnProfile(getDb(), auth.actor);
    if (!result.success) return failureResponse(result);

    return json({ user: result.user });
  } catch (err) {
    console.error("GET /api/auth/profile error:", err);
    return internalError();
  }
}

export async function PUT(request: NextRequest) {
  try {
    const auth = requireActor(request, getConfig());
    if (!auth.ok) return auth.response;

    const body = await parseJsonBody(request, updateProfileSchema);
    if (!body.ok) return body.response;

    const result = await updateProfile(getDb(), auth.actor, auth.actor.userId, body.data);
    if (!result.success) return failureResponse(result);

    return json({ user: result.user });
  } catch (err) {
    console.error("PUT /api/auth/profile error:", err);
    return internalError();
  }
}
