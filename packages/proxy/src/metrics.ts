import { createNoopMeter, type MeterProvider } from "@opentelemetry/api";

export const NOOP_METER_PROVIDER: MeterProvider = {
  getMeter: () => createNoopMeter(),
};

export const METER_NAME = "linegate-proxy";

// These are copied from prom-client
// https://github.com/siimon/prom-client/blob/master/lib/bucketGenerators.js
export function linearBuckets(start: number, width: number, count: number) {
  if (count < 1) {
    throw new Error("Linear buckets needs a positive count");
  }

  const buckets = new Array<number>(count);
  buckets[0] = 0;
  for (let i = 1; i < count; i++) {
    buckets[i] = start + i * width;
  }
  return buckets;
}

export function nowMs() {
  return performance?.now ? performance.now() : Date.now();
}
