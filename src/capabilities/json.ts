/**
 * Structured output parsing
 * Pulls a JSON object out of model text and validates it with zod
 */

import type { ZodType, ZodTypeDef } from "zod";
import { ExtractionError } from "../core/errors.js";

/**
 * Find the JSON payload in model output: a fenced block if present,
 * otherwise the outermost {...} span
 */
export function extractJsonBlock(text: string): string | null {
  const fenced = text.match(/```(?:json)?\s*\n?([\s\S]*?)```/i);
  if (fenced && fenced[1].trim().startsWith("{")) {
    return fenced[1].trim();
  }

  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end <= start) {
    return null;
  }
  return text.slice(start, end + 1);
}

/**
 * Parse and validate model output against a schema
 */
export function parseStructured<T>(task: string, raw: string, schema: ZodType<T, ZodTypeDef, unknown>): T {
  const rawPreview = raw.slice(0, 200);
  const block = extractJsonBlock(raw);
  if (!block) {
    throw new ExtractionError(task, "no JSON object in response", { rawPreview });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(block);
  } catch (error) {
    throw new ExtractionError(task, "response is not valid JSON", {
      rawPreview,
      cause: error instanceof Error ? error : undefined,
    });
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ExtractionError(task, "response does not match schema", { issues, rawPreview });
  }

  return result.data;
}
