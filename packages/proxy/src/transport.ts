import { Agent, type Dispatcher, ProxyAgent, fetch as undiciFetch } from "undici";
import { errorMessage } from "./util";

// The subset of a fetch Response the pipeline reads.
export interface UpstreamResponse {
  ok: boolean;
  status: number;
  body: ReadableStream<Uint8Array> | null;
  text(): Promise<string>;
}

export interface BackendCall {
  url: string;
  headers: Record<string, string>;
  body: string;
}

export interface Transport {
  send(call: BackendCall, signal: AbortSignal): Promise<UpstreamResponse>;
}

// Supplies an outbound proxy URL per call. Rejecting, or resolving to an empty
// string, means "connect directly".
export interface ProxyManager {
  getProxy(): Promise<string>;
}

export type FetchLike = (
  url: string,
  init: {
    method: "POST";
    headers: Record<string, string>;
    body: string;
    signal: AbortSignal;
    dispatcher?: Dispatcher;
  },
) => Promise<UpstreamResponse>;

export interface FetchTransportOptions {
  connections?: number;
  keepAliveTimeoutMs?: number;
  // Applies to both waiting for headers and gaps between body chunks.
  timeoutMs?: number;
  proxyManager?: ProxyManager;
  fetch?: FetchLike;
}

export class FetchTransport implements Transport {
  private readonly agent: Agent;
  private readonly proxyAgents = new Map<string, ProxyAgent>();
  private readonly fetchImpl: FetchLike;

  constructor(private readonly opts: FetchTransportOptions = {}) {
    this.agent = new Agent(this.agentOptions());
    this.fetchImpl = opts.fetch ?? undiciFetch;
  }

  private agentOptions(): Agent.Options {
    return {
      connections: this.opts.connections ?? 10,
      keepAliveTimeout: this.opts.keepAliveTimeoutMs ?? 90_000,
      headersTimeout: this.opts.timeoutMs ?? 300_000,
      bodyTimeout: this.opts.timeoutMs ?? 300_000,
    };
  }

  async send(call: BackendCall, signal: AbortSignal): Promise<UpstreamResponse> {
    return await this.fetchImpl(call.url, {
      method: "POST",
      headers: call.headers,
      body: call.body,
      signal,
      dispatcher: await this.dispatcher(),
    });
  }

  async dispatcher(): Promise<Dispatcher> {
    if (!this.opts.proxyManager) {
      return this.agent;
    }

    let proxyUrl: string;
    try {
      proxyUrl = await this.opts.proxyManager.getProxy();
    } catch (e) {
      console.warn(
        `Failed to get a proxy, connecting directly: ${errorMessage(e)}`,
      );
      return this.agent;
    }
    if (!proxyUrl) {
      return this.agent;
    }

    let proxyAgent = this.proxyAgents.get(proxyUrl);
    if (!proxyAgent) {
      try {
        proxyAgent = new ProxyAgent({ uri: proxyUrl, ...this.agentOptions() });
      } catch (e) {
        console.warn(
          `Invalid proxy ${proxyUrl}, connecting directly: ${errorMessage(e)}`,
        );
        return this.agent;
      }
      this.proxyAgents.set(proxyUrl, proxyAgent);
    }
    return proxyAgent;
  }

  async close(): Promise<void> {
    await Promise.all([
      this.agent.close(),
      ...[...this.proxyAgents.values()].map((a) => a.close()),
    ]);
    this.proxyAgents.clear();
  }
}
