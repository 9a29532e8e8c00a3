/**
 * Parsing of JSON answers from models
 */

import type { z } from "zod";

/**
 * Extract and validate a JSON object from model output. Local models often
 * wrap JSON in prose or code fences, so the outermost {...} is used.
 * Returns null when nothing valid is found.
 */
export function parseModelJson<T>(
  text: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T | null {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end <= start) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text.slice(start, end + 1));
  } catch {
    return null;
  }

  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}
