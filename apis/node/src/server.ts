import cors from "cors";
import express, {
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from "express";

import {
  type ChatProxy,
  ProxyError,
  ProxyTimeoutError,
  ProxyUnauthorizedError,
  errorToResponseBody,
  parseAuthHeader,
} from "@linegate/proxy";

import type { SnapshotMetricReader } from "./metrics";
import { nodeChatCompletions } from "./node-proxy";

export interface AppOptions {
  proxy: ChatProxy;
  // Bearer auth is enforced only when a key is configured.
  apiKey?: string;
  clientTimeoutMs?: number;
  // Served at /metrics; without it only process figures are reported.
  metrics?: SnapshotMetricReader;
}

function requireApiKey(apiKey: string | undefined) {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (!apiKey) {
      next();
      return;
    }
    if (!req.headers.authorization) {
      next(new ProxyUnauthorizedError("Missing Authorization header"));
      return;
    }
    if (parseAuthHeader(req.headers) !== apiKey) {
      next(new ProxyUnauthorizedError("Invalid API key"));
      return;
    }
    next();
  };
}

export function makeApp({
  proxy,
  apiKey,
  clientTimeoutMs = 300_000,
  metrics,
}: AppOptions): Express {
  const startedAt = new Date().toISOString();
  const app = express();
  app.use(express.text({ type: "*/*", limit: "50mb" }));
  app.use(cors());

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", uptime: process.uptime() });
  });

  app.get("/metrics", async (_req, res, next) => {
    try {
      res.json({
        uptime: process.uptime(),
        started_at: startedAt,
        memory: process.memoryUsage(),
        metrics: metrics ? await metrics.snapshot() : {},
      });
    } catch (e) {
      next(e);
    }
  });

  app.use("/v1", requireApiKey(apiKey));

  app.get("/v1/models", (_req, res) => {
    res.json(proxy.models());
  });

  app.post("/v1/chat/completions", async (req, res, next) => {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort(new ProxyTimeoutError(clientTimeoutMs));
    }, clientTimeoutMs);

    res.on("close", () => {
      clearTimeout(timer);
      if (!res.writableFinished) {
        controller.abort(new Error("client disconnected"));
      }
    });

    try {
      await nodeChatCompletions({
        proxy,
        body: typeof req.body === "string" ? req.body : "",
        setHeader: res.setHeader.bind(res),
        setStatusCode: res.status.bind(res),
        getRes: () => res,
        signal: controller.signal,
        onStreamError: (err) => {
          if (timedOut && !res.headersSent) {
            const { status, body } = errorToResponseBody(
              new ProxyTimeoutError(clientTimeoutMs),
            );
            res.status(status).json(body);
            return;
          }
          console.warn("Response stream ended early", err);
          res.destroy();
        },
      });
    } catch (e) {
      next(e);
    } finally {
      clearTimeout(timer);
    }
  });

  app.use((_req, _res, next) => {
    next(new ProxyError("Not found", 404, "invalid_request_error"));
  });

  // Express recognizes error handlers by their four parameters.
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (!(err instanceof ProxyError)) {
      console.error(err);
    }
    const { status, body } = errorToResponseBody(err);
    res.status(status).json(body);
  });

  return app;
}
