import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { getConfig } from "@/lib/config/app-config";
import { listSkills } from "@/lib/accounts";
import { json, internalError } from "@/lib/api/response-helpers";
import { requireActor } from "@/lib/api/require-actor";

export async function GET(request: NextRequest) {
  try {
    const auth = requireActor(request, getConfig());
    if (!auth.ok) return auth.response;

    return json({ skills: await listSkills(getDb(), auth.actor) });
  } catch (err) {
    console.error("GET /api/users/skills error:", err);
    return internalError();
  }
}
