import express, { type Express, type Request, type Response, type NextFunction } from "express";
import { createServer, type Server } from "http";
import multer from "multer";
import { ZodError } from "zod";
import { registerRoutes, type RouteDependencies } from "./routes.js";
import { log } from "./logger.js";
import { NotFoundError, isAppError } from "../shared/errors.js";
import type { ErrorResponse } from "../shared/schema.js";

function hasStatus(err: unknown): err is { status: number; message: string } {
  return err instanceof Error && "status" in err && typeof err.status === "number";
}

/** Maps anything thrown by a route onto `{ status, message }`. */
export function toErrorResponse(err: unknown): ErrorResponse {
  if (isAppError(err)) {
    return { status: err.status, message: err.message };
  }
  if (err instanceof ZodError) {
    return { status: 400, message: err.issues[0]?.message ?? "Invalid request" };
  }
  if (err instanceof multer.MulterError) {
    const message = err.code === "LIMIT_FILE_SIZE" ? "Photo file is too large" : err.message;
    return { status: 400, message };
  }
  // body-parser errors (malformed JSON, oversized body) carry their own 4xx status
  if (hasStatus(err) && err.status >= 400 && err.status < 500) {
    return { status: err.status, message: err.message };
  }
  return { status: 500, message: "Internal Server Error" };
}

export async function createApp(deps: RouteDependencies): Promise<{ app: Express; httpServer: Server }> {
  const app = express();
  const httpServer = createServer(app);

  app.use(express.json({ limit: "1mb" }));

  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      const duration = Date.now() - start;
      log(`${req.method} ${req.path} ${res.statusCode} in ${duration}ms`);
    });
    next();
  });

  await registerRoutes(httpServer, app, deps);

  app.use((req: Request, _res: Response, next: NextFunction) => {
    next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const body = toErrorResponse(err);
    if (body.status >= 500) {
      const detail = err instanceof Error ? err.stack ?? err.message : String(err);
      log(`${req.method} ${req.path} failed: ${detail}`, "error");
    }
    res.status(body.status).json(body);
  });

  return { app, httpServer };
}
