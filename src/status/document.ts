import { err, ok, Result } from "neverthrow";
import type { z } from "zod";

export type DocumentErrorReason = "invalid-json" | "invalid-shape";

export type DocumentError = {
  reason: DocumentErrorReason;
  message: string;
};

const parseJson = Result.fromThrowable(
  (text: string): unknown => JSON.parse(text),
  (e): DocumentError => ({
    reason: "invalid-json",
    message: e instanceof Error ? e.message : String(e),
  }),
);

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Decode one live-resource document. A JSON `null` decodes like `{}`; any
 * other top-level value has to match the schema.
 */
export function decodeDocument<S extends z.ZodTypeAny>(
  schema: S,
  text: string,
): Result<z.output<S>, DocumentError> {
  return parseJson(text).andThen((raw) => {
    const parsed = schema.safeParse(raw === null ? {} : raw);
    if (!parsed.success) {
      return err({ reason: "invalid-shape" as const, message: describeIssues(parsed.error) });
    }
    return ok(parsed.data);
  });
}

// Entries of a decoded list, without the nulls the wire format allows.
export function present<T>(items: readonly (T | null)[] | null | undefined): T[] {
  return (items ?? []).filter((item): item is T => item !== null);
}
