import { z } from "zod";
import { Result, success, failure } from "@core/types";
import { FetchError } from "@core/errors/FetchError";
import { FETCH_DEFAULT_TIMEOUT_MS } from "@core/constants/defaults";
import { isTimeoutError, toError } from "@utils/typeGuards";
import { formatZodIssues } from "@utils/validation";

export interface RequestOptions {
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  body?: string;

  /** Abort the request after this many ms */
  timeoutMs?: number;
}

/**
 * Perform a request and map every failure to a FetchError.
 * Non-2xx statuses are failures.
 *
 * @param source - Module name used in error messages
 */
export async function request(
  source: string,
  url: string,
  options: RequestOptions = {},
): Promise<Result<Response, FetchError>> {
  const timeoutMs = options.timeoutMs ?? FETCH_DEFAULT_TIMEOUT_MS;

  let response: Response;
  try {
    response = await fetch(url, {
      method: options.method ?? "GET",
      headers: options.headers,
      body: options.body,
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    if (isTimeoutError(error)) {
      return failure(FetchError.timeout(source, url, timeoutMs));
    }
    return failure(FetchError.networkError(source, url, toError(error)));
  }

  if (!response.ok) {
    return failure(
      FetchError.httpError(source, url, response.status, response.statusText),
    );
  }
  return success(response);
}

/**
 * Fetch JSON and validate it against a schema
 */
export async function fetchJson<T>(
  source: string,
  url: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: RequestOptions = {},
): Promise<Result<T, FetchError>> {
  const response = await request(source, url, {
    ...options,
    headers: { Accept: "application/json", ...options.headers },
  });
  if (!response.success) {
    return response;
  }

  let body: unknown;
  try {
    body = await response.data.json();
  } catch (error) {
    return failure(
      FetchError.parseError(source, `invalid JSON: ${toError(error).message}`),
    );
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    return failure(
      FetchError.parseError(source, formatZodIssues(parsed.error).join("; ")),
    );
  }
  return success(parsed.data);
}

/**
 * Fetch a text body (RSS, HTML)
 */
export async function fetchText(
  source: string,
  url: string,
  options: RequestOptions = {},
): Promise<Result<string, FetchError>> {
  const response = await request(source, url, options);
  if (!response.success) {
    return response;
  }

  try {
    return success(await response.data.text());
  } catch (error) {
    return failure(FetchError.networkError(source, url, toError(error)));
  }
}

/**
 * Fetch a binary body (images)
 */
export async function fetchBuffer(
  source: string,
  url: string,
  options: RequestOptions = {},
): Promise<Result<Buffer, FetchError>> {
  const response = await request(source, url, options);
  if (!response.success) {
    return response;
  }

  try {
    return success(Buffer.from(await response.data.arrayBuffer()));
  } catch (error) {
    return failure(FetchError.networkError(source, url, toError(error)));
  }
}
