/**
 * Request parsing shared by route handlers.
 * Each parser yields the validated value or a ready 400 response.
 */

import type { ZodType, ZodTypeDef } from "zod";
import { validationError } from "@/lib/api/response-helpers";
import { idParamSchema } from "./request-schema";
import { zodErrorDetails } from "./zod-details";

export type Parsed<T> = { ok: true; data: T } | { ok: false; response: Response };

export async function parseJsonBody<T>(
  request: Request,
  schema: ZodType<T, ZodTypeDef, unknown>
): Promise<Parsed<T>> {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return { ok: false, response: validationError("Request body must be valid JSON") };
  }
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    return {
      ok: false,
      response: validationError("Invalid request body", zodErrorDetails(parsed.error)),
    };
  }
  return { ok: true, data: parsed.data };
}

export function parseSearchParams<T>(
  request: Request,
  schema: ZodType<T, ZodTypeDef, unknown>
): Parsed<T> {
  const params = Object.fromEntries(new URL(request.url).searchParams);
  const parsed = schema.safeParse(params);
  if (!parsed.success) {
    return {
      ok: false,
      response: validationError("Invalid query parameters", zodErrorDetails(parsed.error)),
    };
  }
  return { ok: true, data: parsed.data };
}

/** Path ids are UUIDs. */
export function parseId(value: string): Parsed<string> {
  const parsed = idParamSchema.safeParse(value);
  if (!parsed.success) {
    return { ok: false, response: validationError("Invalid id", zodErrorDetails(parsed.error)) };
  }
  return { ok: true, data: parsed.data };
}
