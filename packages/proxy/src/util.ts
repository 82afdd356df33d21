export function parseAuthHeader(
  headers: Record<string, string | string[] | undefined>,
): string | null {
  const authHeader = headers["authorization"];
  let authValue: string | undefined;
  if (Array.isArray(authHeader)) {
    authValue = authHeader[authHeader.length - 1];
  } else {
    authValue = authHeader;
  }

  if (authValue) {
    const parts = authValue.split(" ");
    if (parts.length !== 2 || parts[0].toLowerCase() !== "bearer") {
      return null;
    }
    return parts[1];
  }

  return null;
}

export function isObject(value: unknown): value is { [key: string]: unknown } {
  return value instanceof Object && !(value instanceof Array);
}

export function _urljoin(...parts: string[]): string {
  return parts
    .map((x, i) =>
      x.replace(/^\//, "").replace(i < parts.length - 1 ? /\/$/ : "", ""),
    )
    .filter((x) => x.trim() !== "")
    .join("/");
}

export const writeToReadable = (response: string) => {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new TextEncoder().encode(response));
      controller.close();
    },
  });
};

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

// Resolves after `ms`, or rejects with the signal's reason as soon as it aborts.
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export type ProxyErrorType =
  | "invalid_request_error"
  | "authentication_error"
  | "rate_limit_error"
  | "service_unavailable"
  | "timeout_error"
  | "internal_error";

export class ProxyError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly type: ProxyErrorType,
    public readonly code: string | null = null,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ProxyBadRequestError extends ProxyError {
  constructor(message: string, code: string | null = null) {
    super(message, 400, "invalid_request_error", code);
  }
}

export class ProxyUnauthorizedError extends ProxyError {
  constructor(message: string) {
    super(message, 401, "authentication_error", "invalid_api_key");
  }
}

export class ProxyRateLimitError extends ProxyError {
  constructor(
    message: string,
    public readonly tryAgainSeconds: number,
  ) {
    super(message, 429, "rate_limit_error", "rate_limit_exceeded");
  }
}

export class ProxyUnavailableError extends ProxyError {
  constructor(message: string) {
    super(message, 503, "service_unavailable", null);
  }
}

// The abort reason when a request runs out of time while its client is
// still connected.
export class ProxyTimeoutError extends ProxyError {
  constructor(public readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`, 504, "timeout_error");
  }
}

// A non-2xx answer from the backend.
export class UpstreamStatusError extends Error {
  constructor(
    public readonly status: number,
    public readonly body: string,
  ) {
    super(`backend returned status ${status}: ${body}`);
    this.name = "UpstreamStatusError";
  }
}

export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    super(`all ${attempts} attempts failed: ${errorMessage(lastError)}`);
    this.name = "RetryExhaustedError";
  }
}

export interface OpenAIErrorBody {
  error: {
    message: string;
    type: string;
    param: string | null;
    code: string | null;
  };
}

export function errorToResponseBody(e: unknown): {
  status: number;
  body: OpenAIErrorBody;
} {
  if (e instanceof ProxyError) {
    return {
      status: e.status,
      body: {
        error: { message: e.message, type: e.type, param: null, code: e.code },
      },
    };
  }
  return {
    status: 500,
    body: {
      error: {
        message: errorMessage(e),
        type: "internal_error",
        param: null,
        code: null,
      },
    },
  };
}
