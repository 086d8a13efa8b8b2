/**
 * Zod validation helpers.
 *
 * Parse request bodies, path parameters and query strings against a Zod
 * schema. Failures throw a ValidationError, which the error handler
 * renders as a 400 envelope.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { ValidationError } from "../types/error.js";

type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

/**
 * Validate the JSON request body.
 *
 * @throws ValidationError on malformed JSON or a schema mismatch
 */
export async function readBody<T>(c: Context<AppEnv>, schema: Schema<T>): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new ValidationError("Invalid JSON in request body");
  }
  return parseInput(schema, body, "Request body validation failed");
}

/** Validate a path parameter. */
export function readParam<T>(c: Context<AppEnv>, name: string, schema: Schema<T>): T {
  return parseInput(schema, c.req.param(name), `Invalid path parameter '${name}'`);
}

/** Validate the query string. */
export function readQuery<T>(c: Context<AppEnv>, schema: Schema<T>): T {
  return parseInput(schema, c.req.query(), "Invalid query parameters");
}

function parseInput<T>(schema: Schema<T>, input: unknown, message: string): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(message, formatZodErrors(result.error));
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
