import dotenv from "dotenv";
import {
  ConsoleMetricExporter,
  MeterProvider,
  PeriodicExportingMetricReader,
} from "@opentelemetry/sdk-metrics";

import { getEnv, resetEnv } from "./env";
import { SnapshotMetricReader } from "./metrics";
import { makeChatProxy } from "./node-proxy";
import { makeApp } from "./server";

dotenv.config({ path: ".env.local" });
resetEnv();
const env = getEnv();

const metrics = new SnapshotMetricReader();
const meterProvider = new MeterProvider({
  readers: env.metricsExportIntervalMs
    ? [
        metrics,
        new PeriodicExportingMetricReader({
          exporter: new ConsoleMetricExporter(),
          exportIntervalMillis: env.metricsExportIntervalMs,
        }),
      ]
    : [metrics],
});

const app = makeApp({
  proxy: makeChatProxy(env, { meterProvider }),
  apiKey: env.apiKey,
  clientTimeoutMs: env.clientTimeoutMs,
  metrics,
});

const host = "localhost";

app.listen(env.port, () => {
  console.log(`[server]: Server is running at http://${host}:${env.port}`);
  console.log(
    `[server]: ${env.callerIds.length} caller ids, models: ${env.models.join(", ")}`,
  );
  if (!env.apiKey) {
    console.warn("[server]: API_KEY is not set, requests are not authenticated");
  }
});
