import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { getConfig } from "@/lib/config/app-config";
import { changePassword } from "@/lib/accounts";
import { json, failureResponse, internalError } from "@/lib/api/response-helpers";
import { requireActor } from "@/lib/api/require-actor";
import { parseJsonBody } from "@/lib/validation/request-body";
import { changePasswordSchema } from "@/lib/validation/request-schema";

export async function PUT(request: NextRequest) {
  try {
    const config = getConfig();
    const auth = requireActor(request, config);
    if (!auth.ok) return auth.response;

    const body = await parseJsonBody(request, changePasswordSchema);
    if (!body.ok) return body.response;

    const result = await changePassword(getDb(), config, auth.actor, body.data);
    if (!result.success) return failureResponse(result);

    return json({ message: "Password changed successfully", updated_at: result.updated_at });
  } catch (err) {
    console.error("PUT /api/auth/change-password error:", err);
    return internalError();
  }
}

// Older clients send POST
export const POST = PUT;
