/**
 * Request body helpers shared by the routers
 */

import type { Context } from "hono";
import type { z } from "zod";
import { AppError } from "../middleware/error-handler.ts";

/**
 * Formats zod issues as `path: message; path: message`
 */
export function formatIssues(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("; ");
}

/**
 * Reads the JSON body and validates it
 *
 * @throws {AppError} INVALID_JSON if the body is not JSON, VALIDATION_ERROR if it does not match
 */
export async function readJsonBody<T>(
  c: Context,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new AppError("Invalid JSON body", 400, "INVALID_JSON");
  }

  const parseResult = schema.safeParse(body);
  if (!parseResult.success) {
    throw new AppError(
      `Validation failed: ${formatIssues(parseResult.error)}`,
      400,
      "VALIDATION_ERROR"
    );
  }
  return parseResult.data;
}
