import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { getConfig } from "@/lib/config/app-config";
import { listUsers } from "@/lib/accounts";
import { json, internalError } from "@/lib/api/response-helpers";
import { requireActor } from "@/lib/api/require-actor";
import { parseSearchParams } from "@/lib/validation/request-body";
import { listUsersQuerySchema } from "@/lib/validation/request-schema";

export async function GET(request: NextRequest) {
  try {
    const auth = requireActor(request, getConfig());
    if (!auth.ok) return auth.response;

    const query = parseSearchParams(request, listUsersQuerySchema);
    if (!query.ok) return query.response;

    const users = await listUsers(getDb(), auth.actor, query.data);
    return json({ users });
  } catch (err) {
    console.error("GET /api/users error:", err);
    return internalError();
  }
}
