import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { getConfig } from "@/lib/config/app-config";
import { createSwapRequest } from "@/lib/swaps";
import { json, failureResponse, internalError } from "@/lib/api/response-helpers";
import { requireActor } from "@/lib/api/require-actor";
import { parseJsonBody } from "@/lib/validation/request-body";
import { createSwapRequestSchema } from "@/lib/validation/request-schema";

export async function POST(request: NextRequest) {
  try {
    const config = getConfig();
    const auth = requireActor(request, config);
    if (!auth.ok) return auth.response;

    const body = await parseJsonBody(request, createSwapRequestSchema);
    if (!body.ok) return body.response;

    const result = await createSwapRequest(getDb(), config, auth.actor, body.data);
    if (!result.success) return failureResponse(result);

    return json({ swap_request: result.swap_request }, 201);
  } catch (err) {
    console.error("POST /api/swap-requests error:", err);
    return internalError();
  }
}
