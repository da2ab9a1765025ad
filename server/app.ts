import express, { type Express, type Request, type Response, type NextFunction } from "express";
import { randomUUID } from "crypto";
import { registerRoutes, type RouteDependencies } from "./routes";
import { createErrorResponse, isDedupError, logError } from "./types/errors";
import { config } from "./config";
import { logger } from "./logger";

interface HttpError extends Error {
  status?: number;
  statusCode?: number;
}

function statusOf(err: HttpError): number {
  if (isDedupError(err)) return err.statusCode;
  return err.status ?? err.statusCode ?? 500;
}

export function createApp(deps: RouteDependencies): Express {
  const app = express();
  app.use(express.json({ limit: config.maxDocumentBytes }));

  // Attach a per-request ID early for structured logging and tracing
  app.use((_req, res, next) => {
    const id = randomUUID();
    res.locals.requestId = id;
    res.setHeader("X-Request-Id", id);
    next();
  });

  registerRoutes(app, deps);

  app.use((err: HttpError, req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    const requestId: unknown = res.locals.requestId;
    const id = typeof requestId === "string" ? requestId : undefined;

    logError(logger, err, {
      operation: `${req.method} ${req.path}`,
      requestId: id,
      status,
    });

    const body = createErrorResponse(err, id);
    // Body-parser errors carry a 4xx status and a safe message
    if (!isDedupError(err) && status < 500) {
      body.error.code = "BAD_REQUEST";
      body.error.message = err.message;
    }

    return res.status(status).json(body);
  });

  return app;
}
