import { z } from "zod";
import { AuthError, ConfigError, UpstreamError } from "../errors.js";

const ErrorEnvelopeSchema = z
  .object({
    error: z
      .union([z.string(), z.object({ message: z.string().optional() }).passthrough()])
      .optional(),
    message: z.string().optional()
  })
  .passthrough();

export function requestIdOf(response: Response): string | undefined {
  return response.headers.get("x-request-id") ?? response.headers.get("request-id") ?? undefined;
}

export async function readErrorPayload(response: Response): Promise<string> {
  let text: string;
  try {
    text = await response.text();
  } catch {
    return "Unknown error";
  }
  if (!text) return response.statusText || "Unknown error";

  try {
    const parsed = ErrorEnvelopeSchema.safeParse(JSON.parse(text));
    if (parsed.success) {
      const { error, message } = parsed.data;
      const fromError = typeof error === "string" ? error : error?.message;
      const found = fromError ?? message;
      if (typeof found === "string" && found.length > 0) return found;
    }
  } catch {
    // Not JSON, fall through to the raw text
  }
  return text;
}

export function parseRetryAfter(response: Response): number | undefined {
  const header = response.headers.get("retry-after");
  if (!header) {
    return undefined;
  }
  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return seconds;
  }
  const date = new Date(header);
  if (!Number.isNaN(date.getTime())) {
    const delta = (date.getTime() - Date.now()) / 1000;
    return delta > 0 ? delta : undefined;
  }
  return undefined;
}

export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || (status >= 500 && status <= 599);
}

/** Maps a non-2xx upstream response onto AuthError (401/403) or UpstreamError. */
export async function upstreamFailure(response: Response, provider: string, label: string): Promise<Error> {
  const message = await readErrorPayload(response);
  if (response.status === 401 || response.status === 403) {
    return new AuthError(`${label} rejected the credential: ${message}`, provider, response.status === 403 ? 403 : 401);
  }
  return new UpstreamError(
    `${label} error ${response.status}: ${message}`,
    provider,
    response.status,
    message,
    requestIdOf(response),
    isRetryableStatus(response.status),
    parseRetryAfter(response)
  );
}

/** Parses a JSON body with `schema`; malformed bodies become UpstreamError. */
export async function readJson<T extends z.ZodTypeAny>(
  response: Response,
  schema: T,
  provider: string,
  label: string
): Promise<z.output<T>> {
  const text = await response.text();
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    throw new UpstreamError(`${label} returned a non-JSON body`, provider, response.status, text.slice(0, 200));
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new UpstreamError(
      `${label} returned an unexpected payload: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
      provider,
      response.status,
      undefined,
      requestIdOf(response),
      false
    );
  }
  return parsed.data;
}

export function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

export function assertHttpUrl(url: string | undefined, label: string): string {
  if (!url) throw new ConfigError(`${label} base URL is required`);
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ConfigError(`${label} base URL is not a valid URL: ${url}`);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigError(`${label} base URL must use http or https: ${url}`);
  }
  return trimTrailingSlash(url);
}
