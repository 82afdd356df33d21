import type { Meter, MeterProvider } from "@opentelemetry/api";
import {
  type ChatRequest,
  type ModelList,
  type ModelMapper,
  StaticModelMapper,
  chatRequestSchema,
  toModelList,
} from "@schema";
import { assembleCompletion } from "./assemble";
import { type Cache, NOOP_CACHE, ResponseCache } from "./cache";
import {
  type BackendTarget,
  type BackoffPolicy,
  DEFAULT_BACKOFF,
  dispatchWithRetry,
} from "./dispatch";
import {
  DEFAULT_CALLER_ID,
  type IdGenerator,
  IdentityRotator,
  cryptoIdGenerator,
  generateResponseId,
} from "./identity";
import { METER_NAME, NOOP_METER_PROVIDER, nowMs } from "./metrics";
import {
  DEFAULT_BACKEND_PATH,
  DEFAULT_TIMEZONE,
  backendHeaders,
} from "./providers/backend";
import { type RateLimiter, UNLIMITED_RATE_LIMITER } from "./rate-limiter";
import { runStreamSession } from "./stream";
import {
  DEFAULT_TOKEN_ESTIMATOR,
  TokenCounter,
  type TokenEstimatorConfig,
} from "./tokens";
import { FetchTransport, type Transport } from "./transport";
import {
  ProxyBadRequestError,
  ProxyRateLimitError,
  ProxyUnavailableError,
  _urljoin,
  errorMessage,
  errorToResponseBody,
  writeToReadable,
} from "./util";

export const CACHED_HEADER = "x-linegate-cached";

export interface ChatProxyOptions {
  backendBaseUrl: string;
  backendPath?: string;
  timezone?: string;
  // Client-facing model names accepted by chatCompletions.
  availableModels: readonly string[];
  callerIds?: readonly string[];
  fallbackCallerId?: string;
  attempts?: number;
  backoff?: BackoffPolicy;
  transport?: Transport;
  modelMapper?: ModelMapper;
  cache?: Cache;
  cacheTtlSeconds?: number;
  rateLimiter?: RateLimiter;
  meterProvider?: MeterProvider;
  ids?: IdGenerator;
  tokenEstimator?: TokenEstimatorConfig;
  heartbeatIntervalMs?: number;
  flushIntervalMs?: number;
  maxLineLength?: number;
}

export interface ChatCompletionsContext {
  body: string;
  setHeader: (name: string, value: string) => void;
  setStatusCode: (code: number) => void;
  res: WritableStream<Uint8Array>;
  signal: AbortSignal;
}

/**
 * The gateway pipeline. One instance serves every request; request-scoped
 * state (token counter, identity, response id) lives in `chatCompletions`.
 */
export class ChatProxy {
  private readonly backend: BackendTarget;
  private readonly identities: IdentityRotator;
  private readonly transport: Transport;
  private readonly modelMapper: ModelMapper;
  private readonly responses: ResponseCache;
  private readonly rateLimiter: RateLimiter;
  private readonly ids: IdGenerator;
  private readonly meter: Meter;
  private readonly acceptedModels: Set<string>;

  constructor(private readonly opts: ChatProxyOptions) {
    this.backend = {
      url: _urljoin(
        opts.backendBaseUrl,
        opts.backendPath ?? DEFAULT_BACKEND_PATH,
      ),
      headers: backendHeaders(opts.backendBaseUrl),
      timezone: opts.timezone ?? DEFAULT_TIMEZONE,
    };
    this.ids = opts.ids ?? cryptoIdGenerator;
    this.identities = new IdentityRotator(
      opts.callerIds ?? [],
      this.ids,
      opts.fallbackCallerId ?? DEFAULT_CALLER_ID,
    );
    this.transport = opts.transport ?? new FetchTransport();
    this.modelMapper = opts.modelMapper ?? new StaticModelMapper();
    this.responses = new ResponseCache(
      opts.cache ?? NOOP_CACHE,
      opts.cacheTtlSeconds,
    );
    this.rateLimiter = opts.rateLimiter ?? UNLIMITED_RATE_LIMITER;
    this.meter = (opts.meterProvider ?? NOOP_METER_PROVIDER).getMeter(
      METER_NAME,
    );
    // The configured list may name backend models; clients may use either name.
    this.acceptedModels = new Set(
      opts.availableModels.flatMap((m) => [
        m,
        this.modelMapper.toExternalName(m),
      ]),
    );
  }

  models(created: number = Math.floor(Date.now() / 1000)): ModelList {
    return toModelList(
      [
        ...new Set(
          this.opts.availableModels.map((m) =>
            this.modelMapper.toExternalName(m),
          ),
        ),
      ],
      created,
    );
  }

  // The name the response reports: the client's own name when it is a mapped
  // external name, otherwise the external name of the backend model it gave.
  private clientModelName(model: string): string {
    return this.modelMapper.toBackendName(model) !== model
      ? model
      : this.modelMapper.toExternalName(model);
  }

  private parseRequest(body: string): ChatRequest {
    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch (e) {
      throw new ProxyBadRequestError(`Invalid JSON body: ${errorMessage(e)}`);
    }
    const parsed = chatRequestSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
      throw new ProxyBadRequestError(`${path}${issue.message}`);
    }
    if (!this.acceptedModels.has(parsed.data.model)) {
      throw new ProxyBadRequestError(
        `model '${parsed.data.model}' is not supported. Available models: ${this.opts.availableModels.join(", ")}`,
        "model_not_found",
      );
    }
    return parsed.data;
  }

  async chatCompletions({
    body,
    setHeader,
    setStatusCode,
    res,
    signal,
  }: ChatCompletionsContext): Promise<void> {
    const meter = this.meter;
    const totalCalls = meter.createCounter("total_calls");
    const rateLimited = meter.createCounter("rate_limited");
    const cacheHits = meter.createCounter("results_cache_hits");
    const cacheMisses = meter.createCounter("results_cache_misses");
    const cacheSkips = meter.createCounter("results_cache_skips");
    const streamSessions = meter.createCounter("stream_sessions");
    // Keyed by HTTP status.
    const responses = meter.createCounter("responses");
    const requestDuration = meter.createHistogram("request_duration_ms");

    const start = nowMs();
    totalCalls.add(1);

    const respond = async (status: number, text: string) => {
      responses.add(1, { status });
      setStatusCode(status);
      setHeader("Content-Type", "application/json");
      try {
        await writeToReadable(text).pipeTo(res);
      } catch (e) {
        console.warn(`Failed to write the response: ${errorMessage(e)}`);
      }
    };
    const respondError = async (e: unknown) => {
      const { status, body } = errorToResponseBody(e);
      if (e instanceof ProxyRateLimitError) {
        setHeader("Retry-After", `${e.tryAgainSeconds}`);
      }
      await respond(status, JSON.stringify(body));
    };
    const release = async () => {
      try {
        await res.abort(signal.reason);
      } catch (e) {
        console.warn(`Failed to release the response: ${errorMessage(e)}`);
      }
    };

    try {
      const admission = await this.rateLimiter.wait(signal);
      if (admission.type === "exceeded") {
        rateLimited.add(1);
        if (signal.aborted) {
          await release();
          return;
        }
        throw new ProxyRateLimitError(
          `Too many requests, try again in ${admission.try_again_seconds} seconds`,
          admission.try_again_seconds,
        );
      }

      const request = this.parseRequest(body);
      const model = this.clientModelName(request.model);

      if (request.stream) {
        cacheSkips.add(1);
      } else {
        const cached = await this.responses.get(request);
        if (cached !== null) {
          cacheHits.add(1);
          setHeader(CACHED_HEADER, "HIT");
          await respond(200, cached);
          return;
        }
        cacheMisses.add(1);
      }

      const counter = new TokenCounter(
        this.opts.tokenEstimator ?? DEFAULT_TOKEN_ESTIMATOR,
      );
      counter.countInput(request.messages);

      const outcome = await dispatchWithRetry(request, {
        identities: this.identities,
        transport: this.transport,
        modelMapper: this.modelMapper,
        backend: this.backend,
        attempts: this.opts.attempts ?? 1,
        backoff: this.opts.backoff ?? DEFAULT_BACKOFF,
        signal,
        meter,
      });
      if (outcome.type === "error") {
        if (outcome.reason === "cancelled") {
          console.info("Client disconnected before the backend responded");
          await release();
          return;
        }
        console.error(outcome.error.message);
        throw new ProxyUnavailableError(
          `Service unavailable: ${outcome.error.message}`,
        );
      }

      const id = generateResponseId(this.ids);
      const created = Math.floor(this.ids.now().getTime() / 1000);

      if (request.stream) {
        responses.add(1, { status: 200 });
        setStatusCode(200);
        const result = await runStreamSession({
          upstream: outcome.response,
          res,
          setHeader,
          signal,
          counter,
          id,
          created,
          model,
          heartbeatIntervalMs: this.opts.heartbeatIntervalMs,
          flushIntervalMs: this.opts.flushIntervalMs,
          maxLineLength: this.opts.maxLineLength,
        });
        streamSessions.add(1, { state: result.state });
        if (result.state === "finished") {
          console.log(
            `Stream finished (${result.finishReason}), usage: ${JSON.stringify(result.usage)}`,
          );
        }
        return;
      }

      const assembled = await assembleCompletion({
        upstream: outcome.response,
        signal,
        counter,
        id,
        created,
        model,
        request,
        cache: this.responses,
      });
      if (assembled === null) {
        await release();
        return;
      }
      setHeader(CACHED_HEADER, "MISS");
      await respond(200, assembled.body);
    } catch (e) {
      if (signal.aborted) {
        await release();
        return;
      }
      if (!(e instanceof ProxyBadRequestError)) {
        console.error("Chat completion failed", e);
      }
      await respondError(e);
    } finally {
      requestDuration.record(nowMs() - start);
    }
  }
}
