import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { getConfig } from "@/lib/config/app-config";
import { listMySwapRequests } from "@/lib/swaps";
import { json, internalError } from "@/lib/api/response-helpers";
import { requireActor } from "@/lib/api/require-actor";
import { parseSearchParams } from "@/lib/validation/request-body";
import { listSwapRequestsQuerySchema } from "@/lib/validation/request-schema";

export async function GET(request: NextRequest) {
  try {
    const auth = requireActor(request, getConfig());
    if (!auth.ok) return auth.response;

    const query = parseSearchParams(request, listSwapRequestsQuerySchema);
    if (!query.ok) return query.response;

    const requests = await listMySwapRequests(getDb(), auth.actor, query.data.status);
    return json({ swap_requests: requests });
  } catch (err) {
    console.error("GET /api/swap-requests/my-requests error:", err);
    return internalError();
  }
}
