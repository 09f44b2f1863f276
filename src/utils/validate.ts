import type { z } from "zod";
import { ValidationError } from "../domain/errors";

/** Trimmed, non-empty text or a ValidationError naming the field. */
export function requireText(value: string | null | undefined, field: string): string {
  const v = (value ?? "").trim();
  if (!v) throw new ValidationError(`${field} is required`);
  return v;
}

export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError("Invalid input", parsed.error.flatten());
  }
  return parsed.data;
}
