import type { ZodIssue } from "zod";
import { BadResponseError } from "../errors.js";
import { CollectionEnvelopeSchema } from "./models.js";
import type { Collection, DatumSchema } from "./types.js";

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}

/** Validate `payload` against `schema`, raising `BadResponseError` on mismatch. */
export function decode<T>(schema: DatumSchema<T>, payload: unknown, context: string): T {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(formatIssue).join("; ");
    throw new BadResponseError(`Unexpected ${context} payload: ${detail}`, {
      cause: parsed.error,
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

export function decodeCollection<T>(
  schema: DatumSchema<T>,
  payload: unknown,
  context: string
): Collection<T> {
  const envelope = decode(CollectionEnvelopeSchema, payload, context);
  return {
    data: envelope.data.map((item, index) => decode(schema, item, `${context} data[${index}]`)),
    next_token: envelope.next_token ?? null,
  };
}
