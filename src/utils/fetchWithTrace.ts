import type { Logger } from "./logger.js";

export function serializeError(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    const serialized: Record<string, unknown> = {
      name: err.name,
      message: err.message,
    };
    if (err.cause) {
      serialized.cause = serializeError(err.cause);
    }
    return serialized;
  }
  return { value: String(err) };
}

/**
 * `fetch` with one log line per request and response. Errors are logged and
 * rethrown untouched.
 */
export async function fetchWithTrace(
  logger: Logger,
  stage: string,
  url: string,
  options: RequestInit = {}
): Promise<Response> {
  const method = options.method ?? "GET";
  const parsedUrl = new URL(url);
  const target = `${parsedUrl.host}${parsedUrl.pathname}${parsedUrl.search}`;

  const startTime = Date.now();
  logger.debug(stage, `--> ${method} ${target}`);

  try {
    const response = await fetch(url, options);
    logger.debug(stage, `<-- ${method} ${target} ${response.status} (${Date.now() - startTime}ms)`);
    return response;
  } catch (err) {
    logger.error(stage, `<-- ${method} ${target} FAILED (${Date.now() - startTime}ms)`, serializeError(err));
    throw err;
  }
}

export async function readErrorBody(response: Response): Promise<string> {
  try {
    const body = await response.text();
    return body.length > 512 ? `${body.substring(0, 512)}... [truncated]` : body;
  } catch {
    return "[Could not read response body]";
  }
}
