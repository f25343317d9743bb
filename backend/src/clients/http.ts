import type { z } from "zod";
import { BackendError } from "@/errors";

/**
 * A remote service answered with a non-2xx status
 */
export class HttpStatusError extends BackendError {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
  }
}

export async function fetchWithTimeout(
  url: string,
  options: RequestInit,
  timeoutMs: number,
): Promise<Response> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await fetch(url, { ...options, signal: controller.signal });
  } catch (error) {
    throw new BackendError(`Could not reach ${new URL(url).host}`, {}, {
      cause: error,
    });
  } finally {
    clearTimeout(timeout);
  }
}

/**
 * Throw an HttpStatusError for a non-2xx response, including the body when it is short.
 */
export async function ensureOk(
  response: Response,
  context: string,
): Promise<Response> {
  if (response.ok) {
    return response;
  }
  const body = await response.text().catch(() => "");
  const detail = body && body.length <= 500 ? `: ${body}` : "";
  throw new HttpStatusError(
    response.status,
    `${context} failed with HTTP ${response.status}${detail}`,
  );
}

/**
 * Read a JSON body and validate it against `schema`.
 */
export async function parseJsonResponse<T extends z.ZodType>(
  response: Response,
  schema: T,
  context: string,
): Promise<z.infer<T>> {
  await ensureOk(response, context);
  const parsed = schema.safeParse(await response.json());
  if (!parsed.success) {
    throw new BackendError(
      `${context} returned an unexpected response: ${parsed.error.message}`,
    );
  }
  return parsed.data;
}
