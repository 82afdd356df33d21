import type { ProxyManager } from "@linegate/proxy";

// Bare host:port entries are taken to be HTTP proxies.
export function formatProxyAddress(address: string): string {
  const trimmed = address.trim();
  return trimmed.includes("://") ? trimmed : `http://${trimmed}`;
}

// Round-robin over a configured list of outbound proxies.
export class StaticProxyPool implements ProxyManager {
  private readonly proxies: string[];
  private index = -1;

  constructor(proxies: readonly string[]) {
    this.proxies = proxies
      .filter((p) => p.trim() !== "")
      .map(formatProxyAddress);
  }

  get size() {
    return this.proxies.length;
  }

  async getProxy(): Promise<string> {
    if (this.proxies.length === 0) {
      throw new Error("proxy pool is empty");
    }
    this.index = (this.index + 1) % this.proxies.length;
    return this.proxies[this.index];
  }
}
