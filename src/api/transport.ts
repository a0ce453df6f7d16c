import { errAsync, okAsync, ResultAsync } from "neverthrow";
import { z } from "zod";
import type { Server } from "../types/ocm";
import { type ApiError, toApiError } from "./api-errors";

const ErrorBodySchema = z.object({ reason: z.string().optional() });

async function readBody(res: Response): Promise<unknown> {
  const text = await res.text();
  if (!res.headers.get("content-type")?.includes("json") || !text) return text;
  try {
    return JSON.parse(text);
  } catch {
    // Left to the caller's schema check to reject.
    return text;
  }
}

function reasonOf(body: unknown): string | undefined {
  const parsed = ErrorBodySchema.safeParse(body);
  return parsed.success ? parsed.data.reason : undefined;
}

export function api(
  server: Server,
  path: string,
  init?: { signal?: AbortSignal },
): ResultAsync<unknown, ApiError> {
  const method = "GET";
  const request = ResultAsync.fromPromise(
    fetch(server.baseUrl + path, {
      method,
      headers: {
        Authorization: `Bearer ${server.token}`,
        Accept: "application/json",
      },
      signal: init?.signal,
    }),
    toApiError,
  );

  return request.andThen((res) =>
    ResultAsync.fromPromise(readBody(res), toApiError).andThen((body) => {
      if (!res.ok) {
        return errAsync<unknown, ApiError>({
          message: `${method} ${path} → ${res.status} ${res.statusText}`,
          status: res.status,
          reason: reasonOf(body),
        });
      }
      return okAsync<unknown, ApiError>(body);
    }),
  );
}

/**
 * GET a path and validate the JSON body against a schema.
 */
export function getJson<S extends z.ZodTypeAny>(
  server: Server,
  path: string,
  schema: S,
  init?: { signal?: AbortSignal },
): ResultAsync<z.output<S>, ApiError> {
  return api(server, path, init).andThen((body) => {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      return errAsync<z.output<S>, ApiError>({
        message: `unexpected response from ${path}: ${parsed.error.issues[0]?.message ?? "invalid body"}`,
      });
    }
    return okAsync<z.output<S>, ApiError>(parsed.data);
  });
}
