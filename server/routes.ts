import type { Express, NextFunction, Request, Response } from "express";
import { performance } from "perf_hooks";
import { validateCheckDocumentBody } from "./middleware/validateRequest";
import { ValidationError } from "./types/errors";
import type { Deduplicator } from "./utils/deduplication";
import { metrics } from "./metrics";
import { withSource } from "./logger";

export interface RouteDependencies {
  deduplicator: Deduplicator;
  metricsEnabled: boolean;
}

// Records latency and status once the response is sent, including error responses
function timed(endpoint: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = performance.now();
    res.on("finish", () => {
      metrics.observeApiRequest(endpoint, req.method, res.statusCode, performance.now() - start);
    });
    next();
  };
}

export function registerRoutes(app: Express, deps: RouteDependencies): void {
  const { deduplicator } = deps;
  const log = withSource("routes");

  // Prometheus metrics endpoint
  app.get("/metrics", async (_req, res) => {
    if (!deps.metricsEnabled) {
      return res.status(404).json({ error: "Not found" });
    }
    try {
      const content = await metrics.getMetricsContent();
      res.setHeader("Content-Type", metrics.register.contentType);
      return res.send(content);
    } catch (err) {
      log.error({ err }, "failed to collect metrics");
      return res.status(500).json({ error: "Metrics error" });
    }
  });

  // Health check endpoint
  app.get("/api/healthz", (_req, res) => {
    return res.json({ status: "ok", documents: deduplicator.size });
  });

  app.post("/api/documents/check", timed("/api/documents/check"), validateCheckDocumentBody, (req: Request, res: Response) => {
    const body = req.validated?.body;
    if (!body) {
      throw new ValidationError("Request body was not validated");
    }

    const result = deduplicator.check(body.content, body.id);
    res.json(result);
  });

  app.delete("/api/documents", timed("/api/documents"), (_req, res) => {
    deduplicator.clear();
    res.status(204).end();
  });

  app.get("/api/documents/stats", timed("/api/documents/stats"), (_req, res) => {
    res.json({
      ...deduplicator.getStats(),
      config: deduplicator.getConfig(),
    });
  });
}
