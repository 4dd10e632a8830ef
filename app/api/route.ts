/**
 * Service status. No auth; reports whether the database answers.
 */

import { getDb } from "@/lib/db";
import { json } from "@/lib/api/response-helpers";

const SERVICE_NAME = "Skill Swap API";
const VERSION = "0.1.0";

export async function GET() {
  let database: "connected" | "disconnected" = "disconnected";
  try {
    if (await getDb().ping()) database = "connected";
  } catch (err) {
    console.error("GET /api database check failed:", err);
  }
  return json(
    { message: `${SERVICE_NAME} is running`, version: VERSION, database },
    database === "connected" ? 200 : 503
  );
}
