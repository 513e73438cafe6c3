/**
 * Express application: management API for webhooks and local status writes,
 * plus health and Prometheus endpoints. Listening is left to the caller so
 * tests can drive the app through supertest.
 */

import express, { NextFunction, Request, Response } from "express";
import helmet from "helmet";
import pinoHttp from "pino-http";
import { pinoLogger } from "../logger";
import { metricsRegistry } from "../metrics/metrics";
import { sendRouteError } from "./errors";
import { StatusRouterDeps, createStatusRouter } from "./routes/statusRoutes";
import { WebhooksRouterDeps, createWebhooksRouter } from "./routes/webhooksRoutes";

export type AppDeps = WebhooksRouterDeps & StatusRouterDeps;

const QUIET_PATHS = new Set(["/healthz", "/metrics"]);

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  app.disable("x-powered-by");
  app.use(helmet());
  app.use(express.json({ limit: "64kb" }));

  app.use(
    pinoHttp({
      logger: pinoLogger,
      autoLogging: {
        ignore: (req) => QUIET_PATHS.has(req.url?.split("?")[0] ?? ""),
      },
      serializers: {
        req: (req: Request) => ({
          id: req.id,
          method: req.method,
          url: req.url?.split("?")[0],
        }),
        res: (res: Response) => ({
          statusCode: res.statusCode,
        }),
      },
      customLogLevel: (_req, res, err) => {
        if (err || res.statusCode >= 500) return "error";
        if (res.statusCode >= 400) return "warn";
        return "info";
      },
    })
  );

  app.get("/healthz", (_req, res) => {
    res.status(200).json({ ok: true });
  });

  app.get("/metrics", async (_req, res) => {
    res.setHeader("Content-Type", metricsRegistry.contentType);
    res.end(await metricsRegistry.metrics());
  });

  app.use("/webhooks", createWebhooksRouter(deps));
  app.use("/statuses", createStatusRouter(deps));

  app.use((_req, res) => {
    res.status(404).json({ error: { code: "NOT_FOUND", message: "Route not found" } });
  });

  // Body parser failures arrive here
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: { code: "INVALID_JSON", message: "Malformed JSON body" } });
      return;
    }
    sendRouteError(res, err, "Unhandled request error");
  });

  return app;
}
