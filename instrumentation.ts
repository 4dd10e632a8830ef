/**
 * Next.js instrumentation hook. Runs once on server startup.
 * Fails fast on invalid configuration and applies migrations before the first request.
 */

export async function register() {
  if (process.env.NEXT_RUNTIME === "nodejs") {
    const { getConfig } = await import("@/lib/config/app-config");
    const { database } = getConfig();

    const { getDb } = await import("@/lib/db");
    getDb();
    console.log(`[skill-swap] database ready at ${database.path}`);
  }
}
