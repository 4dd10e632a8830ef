import { beforeEach, describe, it, expect } from "vitest";
import { NextRequest } from "next/server";
import { GET as status } from "@/app/api/route";
import { middleware } from "@/middleware";
import { resetApp } from "./route-helpers";

describe("GET /api", () => {
  beforeEach(() => {
    resetApp();
  });

  it("reports the service and database as up", async () => {
    const res = await status();
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      message: "Skill Swap API is running",
      version: "0.1.0",
      database: "connected",
    });
  });
});

describe("CORS middleware", () => {
  beforeEach(() => {
    resetApp({ FRONTEND_URL: "http://localhost:5173" });
  });

  function preflight(origin: string) {
    return new NextRequest("http://localhost/api/users", {
      method: "OPTIONS",
      headers: { origin, "access-control-request-method": "GET" },
    });
  }

  it("answers a preflight from the configured origin", () => {
    const res = middleware(preflight("http://localhost:5173"));
    expect(res.status).toBe(204);
    expect(res.headers.get("Access-Control-Allow-Origin")).toBe("http://localhost:5173");
    expect(res.headers.get("Access-Control-Allow-Headers")).toBe("Authorization, Content-Type");
  });

  it("grants nothing to other origins", () => {
    const res = middleware(preflight("http://evil.example"));
    expect(res.status).toBe(204);
    expect(res.headers.get("Access-Control-Allow-Origin")).toBeNull();
  });

  it("adds headers to regular API responses", () => {
    const res = middleware(
      new NextRequest("http://localhost/api/users", { headers: { origin: "http://localhost:5173" } })
    );
    expect(res.headers.get("Access-Control-Allow-Origin")).toBe("http://localhost:5173");
    expect(res.headers.get("Vary")).toBe("Origin");
  });
});
