/**
 * Groups zod issue messages by field path for the `details` of a 400 body.
 * Issues about the payload as a whole land under "body".
 */

import type { ZodError } from "zod";

export function zodErrorDetails(error: ZodError): Record<string, string[]> {
  const details: Record<string, string[]> = {};
  for (const issue of error.issues) {
    const field = issue.path.join(".") || "body";
    const messages = details[field] ?? [];
    messages.push(issue.message);
    details[field] = messages;
  }
  return details;
}
