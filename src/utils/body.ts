import type { Context } from "hono";
import type { z } from "zod";
import { ValidationError } from "@/lib/errors";
import { formatIssues } from "@/lib/schemas";

export async function parseJsonBody<Schema extends z.ZodTypeAny>(
  c: Context,
  schema: Schema
): Promise<z.output<Schema>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new ValidationError("Invalid JSON body");
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw new ValidationError("Invalid request body", formatIssues(result.error));
  }
  return result.data;
}
