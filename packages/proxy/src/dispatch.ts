import type { Meter } from "@opentelemetry/api";
import type { ChatRequest, ModelMapper } from "@schema";
import type { Identity } from "./identity";
import { METER_NAME, NOOP_METER_PROVIDER, linearBuckets } from "./metrics";
import { toBackendRequest } from "./providers/backend";
import type { Transport, UpstreamResponse } from "./transport";
import {
  RetryExhaustedError,
  UpstreamStatusError,
  errorMessage,
  sleep,
} from "./util";

export interface BackoffPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
  baseDelayMs: 500,
  maxDelayMs: 5000,
};

// Linear in the attempt index, capped. Used for both streaming and
// non-streaming requests.
export function backoffDelay(
  attemptIndex: number,
  policy: BackoffPolicy = DEFAULT_BACKOFF,
): number {
  return Math.min(policy.baseDelayMs * (attemptIndex + 1), policy.maxDelayMs);
}

export interface IdentitySource {
  next(): Identity;
}

export interface BackendTarget {
  url: string;
  headers: Record<string, string>;
  timezone: string;
}

export type RetryOutcome =
  | {
      type: "ok";
      response: UpstreamResponse;
      identity: Identity;
      attemptIndex: number;
    }
  | {
      type: "error";
      reason: "cancelled";
      error: unknown;
      identity?: Identity;
      attemptIndex: number;
    }
  | {
      type: "error";
      reason: "exhausted";
      error: RetryExhaustedError;
      identity?: Identity;
      attemptIndex: number;
    };

export interface DispatchOptions {
  identities: IdentitySource;
  transport: Transport;
  modelMapper: ModelMapper;
  backend: BackendTarget;
  attempts: number;
  signal: AbortSignal;
  backoff?: BackoffPolicy;
  meter?: Meter;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

const MAX_ERROR_BODY_LENGTH = 1024;

async function readErrorBody(response: UpstreamResponse): Promise<string> {
  try {
    return (await response.text()).slice(0, MAX_ERROR_BODY_LENGTH);
  } catch (e) {
    return `<unreadable body: ${errorMessage(e)}>`;
  }
}

export function normalizeAttempts(attempts: number): number {
  return Number.isFinite(attempts) && attempts >= 1 ? Math.floor(attempts) : 1;
}

export async function dispatchWithRetry(
  request: ChatRequest,
  {
    identities,
    transport,
    modelMapper,
    backend,
    attempts: requestedAttempts,
    signal,
    backoff = DEFAULT_BACKOFF,
    meter = NOOP_METER_PROVIDER.getMeter(METER_NAME),
    sleep: sleepFn = sleep,
  }: DispatchOptions,
): Promise<RetryOutcome> {
  const attempts = normalizeAttempts(requestedAttempts);

  const endpointCalls = meter.createCounter("endpoint_calls");
  const endpointFailures = meter.createCounter("endpoint_failures");
  const endpointRetryableErrors = meter.createCounter(
    "endpoint_retryable_errors",
  );
  const retriesPerCall = meter.createHistogram("retries_per_call", {
    advice: {
      explicitBucketBoundaries: linearBuckets(0, 1, 11),
    },
  });

  const backendModel = modelMapper.toBackendName(request.model);
  const loggableInfo = { model: request.model, backend_model: backendModel };

  let identity: Identity | undefined;
  let lastError: unknown = null;
  for (let i = 0; i < attempts; i++) {
    if (signal.aborted) {
      return {
        type: "error",
        reason: "cancelled",
        error: signal.reason,
        identity,
        attemptIndex: i,
      };
    }

    identity = identities.next();
    console.log(
      `Attempt ${i + 1}/${attempts}: caller ${identity.callerId}, conversation ${identity.conversationId}`,
    );
    endpointCalls.add(1, loggableInfo);

    try {
      const response = await transport.send(
        {
          url: backend.url,
          headers: backend.headers,
          body: JSON.stringify(
            toBackendRequest(request, identity, backendModel, backend.timezone),
          ),
        },
        signal,
      );
      if (response.ok) {
        retriesPerCall.record(i, loggableInfo);
        return { type: "ok", response, identity, attemptIndex: i };
      }
      lastError = new UpstreamStatusError(
        response.status,
        await readErrorBody(response),
      );
    } catch (e) {
      if (signal.aborted) {
        return {
          type: "error",
          reason: "cancelled",
          error: signal.reason,
          identity,
          attemptIndex: i,
        };
      }
      lastError = e;
    }

    console.warn(
      `Attempt ${i + 1}/${attempts} failed: caller ${identity.callerId}, conversation ${identity.conversationId}: ${errorMessage(lastError)}`,
    );
    endpointRetryableErrors.add(1, {
      ...loggableInfo,
      http_code:
        lastError instanceof UpstreamStatusError ? lastError.status : undefined,
    });

    if (i < attempts - 1) {
      try {
        await sleepFn(backoffDelay(i, backoff), signal);
      } catch (e) {
        return {
          type: "error",
          reason: "cancelled",
          error: signal.reason ?? e,
          identity,
          attemptIndex: i,
        };
      }
    }
  }

  endpointFailures.add(1, loggableInfo);
  retriesPerCall.record(attempts, loggableInfo);
  return {
    type: "error",
    reason: "exhausted",
    error: new RetryExhaustedError(attempts, lastError),
    identity,
    attemptIndex: attempts - 1,
  };
}
