import type { z } from "zod";
import { InvalidRecordError } from "./errors";

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Parse untrusted data against a schema, throwing InvalidRecordError with
 * every issue listed.
 */
export function parseRecord<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  recordType: string,
): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new InvalidRecordError(recordType, formatIssues(result.error));
  }
  return result.data;
}

export function isGameScore(value: number): value is 0 | 0.5 | 1 {
  return value === 0 || value === 0.5 || value === 1;
}
