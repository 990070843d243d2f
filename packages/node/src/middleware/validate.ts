/**
 * Zod request validation.
 *
 * Parses a JSON body or the query string against a schema and returns
 * the typed result. Failures throw a RequestError that the error handler
 * turns into 400 VALIDATION_ERROR with the issues listed.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { RequestError } from "../types/error.js";

type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

/**
 * Validate the JSON request body.
 *
 * @throws {RequestError} VALIDATION_ERROR
 */
export async function parseBody<T>(c: Context<AppEnv>, schema: Schema<T>): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch (err) {
    throw new RequestError("VALIDATION_ERROR", 400, "Invalid JSON in request body", {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  return check(schema, body, "Request body validation failed");
}

/**
 * Validate the query string.
 *
 * @throws {RequestError} VALIDATION_ERROR
 */
export function parseQuery<T>(c: Context<AppEnv>, schema: Schema<T>): T {
  return check(schema, c.req.query(), "Invalid query parameters");
}

function check<T>(schema: Schema<T>, value: unknown, message: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new RequestError("VALIDATION_ERROR", 400, message, {
      issues: formatZodErrors(result.error),
    });
  }
  return result.data;
}

function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
