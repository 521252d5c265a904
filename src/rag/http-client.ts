export interface PostJsonOptions {
  apiKey?: string;
  timeoutMs: number;
}

function describeFetchFailure(error: unknown, timeoutMs: number): string {
  if (error instanceof Error) {
    if (error.name === "TimeoutError" || error.name === "AbortError") {
      return `request timed out after ${timeoutMs}ms`;
    }
    return error.message;
  }
  return typeof error === "string" ? error : "Unknown request failure";
}

function describeErrorBody(payload: unknown): string | undefined {
  if (!payload || typeof payload !== "object" || !("error" in payload)) {
    return undefined;
  }
  const { error } = payload;
  if (typeof error === "string") return error;
  if (error && typeof error === "object" && "message" in error && typeof error.message === "string") {
    return error.message;
  }
  return undefined;
}

/**
 * POSTs a JSON body and returns the parsed JSON reply. Non-2xx replies,
 * timeouts and unparsable bodies throw plain Errors; callers wrap them in
 * their own error type.
 */
export async function postJson(url: string, body: unknown, options: PostJsonOptions): Promise<unknown> {
  const headers: Record<string, string> = { "Content-Type": "application/json" };
  if (options.apiKey) {
    headers["Authorization"] = `Bearer ${options.apiKey}`;
  }

  let res: Response;
  try {
    res = await fetch(url, {
      method: "POST",
      headers,
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (error) {
    throw new Error(describeFetchFailure(error, options.timeoutMs), { cause: error });
  }

  const payload: unknown = await res.json().catch(() => undefined);
  if (!res.ok) {
    const detail = describeErrorBody(payload) ?? res.statusText;
    throw new Error(`HTTP ${res.status}${detail ? `: ${detail}` : ""}`);
  }
  if (payload === undefined) {
    throw new Error(`HTTP ${res.status}: response body is not JSON`);
  }

  return payload;
}
