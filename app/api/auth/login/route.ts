import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { getConfig } from "@/lib/config/app-config";
import { loginUser } from "@/lib/accounts";
import { json, failureResponse, internalError } from "@/lib/api/response-helpers";
import { parseJsonBody } from "@/lib/validation/request-body";
import { loginSchema } from "@/lib/validation/request-schema";

export async function POST(request: NextRequest) {
  try {
    const body = await parseJsonBody(request, loginSchema);
    if (!body.ok) return body.response;

    const result = await loginUser(getDb(), getConfig(), body.data);
    if (!result.success) return failureResponse(result);

    return json({ user: result.user, token: result.token });
  } catch (err) {
    console.error("POST /api/auth/login error:", err);
    return internalError();
  }
}
