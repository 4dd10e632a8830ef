import { NextResponse } from "next/server";
import type { NextRequest } from "next/server";
import { getConfig } from "@/lib/config/app-config";

export const config = {
  runtime: "nodejs",
  matcher: "/api/:path*",
};

const ALLOWED_METHODS = "GET, POST, PUT, DELETE, OPTIONS";
const ALLOWED_HEADERS = "Authorization, Content-Type";

function corsHeaders(origin: string | null): Headers {
  const headers = new Headers({ Vary: "Origin" });
  const allowed = getConfig().cors.allowedOrigin;
  if (origin === allowed) {
    headers.set("Access-Control-Allow-Origin", allowed);
    headers.set("Access-Control-Allow-Methods", ALLOWED_METHODS);
    headers.set("Access-Control-Allow-Headers", ALLOWED_HEADERS);
    headers.set("Access-Control-Allow-Credentials", "true");
  }
  return headers;
}

/** CORS for the API: only the configured frontend origin is allowed. */
export function middleware(request: NextRequest) {
  const headers = corsHeaders(request.headers.get("origin"));

  if (request.method === "OPTIONS") {
    return new NextResponse(null, { status: 204, headers });
  }

  const response = NextResponse.next();
  headers.forEach((value, key) => response.headers.set(key, value));
  return response;
}
