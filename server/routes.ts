import type { Express, Request, Response, NextFunction, RequestHandler } from "express";
import type { Server } from "http";
import { WebSocketServer } from "ws";
import multer from "multer";
import { z } from "zod";
import type { IStorage } from "./storage.js";
import type { PhotoStore } from "./photo-store.js";
import { ACCEPTED_PHOTO_TYPES } from "./photo-store.js";
import type { RateLimiter } from "./rate-limiter.js";
import {
  createAuthMiddleware,
  requireUserId,
  type AuthenticatedRequest,
  type SmsSender,
  type TokenService,
  type VerificationCodeStore,
} from "./auth.js";
import { log } from "./logger.js";
import {
  insertTimeRecordSchema,
  insertLocationRecordSchema,
  insertPhotoSchema,
  insertReportSchema,
  updateReportSchema,
  verifyCheckpointSchema,
  locationBatchSchema,
  requestCodeSchema,
  validateCodeSchema,
  dateRangeSchema,
  nearbyQuerySchema,
  type LocationBatchResponse,
  type VerifyCheckpointResponse,
  type ClockStatusResponse,
  type TokenResponse,
} from "../shared/schema.js";
import { DEFAULT_PAGE_SIZE, pageOffset, toPaginatedList, validatePage } from "../shared/pagination.js";
import { derivePatrolStatus } from "../shared/patrol-status.js";
import { distanceMeters, withinRadius } from "../shared/geo.js";
import {
  ForbiddenError,
  NotFoundError,
  UnauthorizedError,
  ValidationError,
} from "../shared/errors.js";

export interface RouteDependencies {
  storage: IStorage;
  tokens: TokenService;
  codes: VerificationCodeStore;
  sms: SmsSender;
  photoStore: PhotoStore;
  authLimiter?: RateLimiter;
  maxPhotoBytes: number;
  /** Null disables the distance check on verification. */
  proximityRadiusMeters: number | null;
}

type Handler = (req: AuthenticatedRequest, res: Response) => Promise<unknown>;

function handle(fn: Handler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}

export function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join(".") || undefined;
    throw new ValidationError(issue?.message ?? "Invalid request", field);
  }
  return result.data;
}

const pageQuerySchema = z.object({
  page: z.coerce.number().int().default(1),
  pageSize: z.coerce.number().int().default(DEFAULT_PAGE_SIZE),
});

function parsePage(query: unknown): { page: number; pageSize: number } {
  const { page, pageSize } = parseWith(pageQuerySchema, query);
  validatePage(page, pageSize);
  return { page, pageSize };
}

function parseRange(query: unknown): { from: string; to: string } {
  const range = parseWith(dateRangeSchema, query);
  if (Date.parse(range.from) > Date.parse(range.to)) {
    throw new ValidationError("Start date must be before end date", "from");
  }
  return range;
}

function assertOwner(ownerId: string, userId: string, what: string): void {
  if (ownerId !== userId) {
    throw new ForbiddenError(`${what} belongs to another user`);
  }
}

const photoMetadataSchema = z.string().transform((value, ctx) => {
  try {
    const parsed: unknown = JSON.parse(value);
    return parsed;
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Metadata must be JSON" });
    return z.NEVER;
  }
}).pipe(insertPhotoSchema);

export async function registerRoutes(httpServer: Server, app: Express, deps: RouteDependencies): Promise<Server> {
  const { storage, tokens, codes, sms, photoStore } = deps;

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: deps.maxPhotoBytes, files: 1 },
  });

  // ============================================================================
  // REALTIME CONNECTIVITY CHANNEL
  // ============================================================================

  const wss = new WebSocketServer({ server: httpServer, path: "/ws" });

  wss.on("connection", (ws, req) => {
    const url = new URL(req.url ?? "/ws", "http://localhost");
    const token = url.searchParams.get("token");
    try {
      if (!token) throw new UnauthorizedError("Token required");
      const claims = tokens.verify(token);
      ws.send(JSON.stringify({ type: "AUTH_OK", userId: claims.userId }));
    } catch (error) {
      const message = error instanceof Error ? error.message : "Authentication failed";
      ws.send(JSON.stringify({ type: "AUTH_FAIL", message }));
      ws.close();
    }

    ws.on("error", (err) => {
      log(`WebSocket error: ${err.message}`, "ws");
    });
  });

  httpServer.on("close", () => {
    wss.close();
  });

  // ============================================================================
  // PUBLIC ROUTES
  // ============================================================================

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", time: new Date().toISOString() });
  });

  const authLimit: RequestHandler[] = deps.authLimiter ? [deps.authLimiter.middleware()] : [];

  app.post("/auth/verify", ...authLimit, handle(async (req, res) => {
    const { phoneNumber } = parseWith(requestCodeSchema, req.body);
    const { verificationId, code } = codes.create(phoneNumber);
    await sms.send(phoneNumber, `Your patrol verification code is ${code}`);
    res.json({ verificationId });
  }));

  app.post("/auth/validate", ...authLimit, handle(async (req, res) => {
    const { phoneNumber, verificationId, code } = parseWith(validateCodeSchema, req.body);
    codes.consume(verificationId, phoneNumber, code);

    const user = await storage.createUser(phoneNumber);
    if (!user.isActive) {
      throw new ForbiddenError("User is inactive");
    }
    await storage.recordAuthentication(user.id, new Date().toISOString());

    const issued = tokens.issue({ userId: user.id, phoneNumber: user.phoneNumber });
    const body: TokenResponse = { ...issued, userId: user.id };
    res.json(body);
  }));

  const requireAuth = createAuthMiddleware(tokens);
  app.use(["/auth/refresh", "/time", "/location", "/photos", "/reports", "/patrol"], requireAuth);

  app.post("/auth/refresh", handle(async (req, res) => {
    const user = await storage.getUser(requireUserId(req));
    if (!user || !user.isActive) {
      throw new UnauthorizedError("User no longer active");
    }
    const issued = tokens.issue({ userId: user.id, phoneNumber: user.phoneNumber });
    const body: TokenResponse = { ...issued, userId: user.id };
    res.json(body);
  }));

  // ============================================================================
  // TIME
  // ============================================================================

  app.post("/time/clock", handle(async (req, res) => {
    const data = parseWith(insertTimeRecordSchema, req.body);
    const { record, created } = await storage.createTimeRecord(requireUserId(req), data);
    res.status(created ? 201 : 200).json(record);
  }));

  app.get("/time/status", handle(async (req, res) => {
    const latest = await storage.getLatestTimeRecord(requireUserId(req));
    const body: ClockStatusResponse = {
      isClockedIn: latest?.type === "ClockIn",
      lastRecord: latest ?? null,
    };
    res.json(body);
  }));

  app.get("/time/history", handle(async (req, res) => {
    const { page, pageSize } = parsePage(req.query);
    const result = await storage.getTimeRecords(requireUserId(req), pageOffset(page, pageSize), pageSize);
    res.json(toPaginatedList(result.items, result.total, page, pageSize));
  }));

  app.get("/time/range", handle(async (req, res) => {
    const { from, to } = parseRange(req.query);
    res.json(await storage.getTimeRecordsInRange(requireUserId(req), from, to));
  }));

  // ============================================================================
  // LOCATION
  // ============================================================================

  app.post("/location/batch", handle(async (req, res) => {
    const userId = requireUserId(req);
    const items = parseWith(locationBatchSchema, req.body);

    const body: LocationBatchResponse = { syncedIds: [], failedIds: [], remoteIds: {} };
    for (const item of items) {
      const parsed = insertLocationRecordSchema.safeParse(item);
      if (!parsed.success) {
        body.failedIds.push(item.id);
        continue;
      }
      const { record } = await storage.createLocationRecord(userId, {
        ...parsed.data,
        clientRef: parsed.data.clientRef ?? String(item.id),
      });
      body.syncedIds.push(item.id);
      body.remoteIds[String(item.id)] = record.id;
    }

    if (body.failedIds.length > 0) {
      log(`Location batch: ${body.syncedIds.length} stored, ${body.failedIds.length} rejected`, "location");
    }
    res.json(body);
  }));

  app.get("/location/current", handle(async (req, res) => {
    const latest = await storage.getLatestLocation(requireUserId(req));
    if (!latest) {
      throw new NotFoundError("No location recorded");
    }
    res.json(latest);
  }));

  app.get("/location/history", handle(async (req, res) => {
    const { from, to } = parseRange(req.query);
    res.json(await storage.getLocationHistory(requireUserId(req), from, to));
  }));

  // ============================================================================
  // PHOTOS
  // ============================================================================

  app.post("/photos/upload", upload.single("file"), handle(async (req, res) => {
    const userId = requireUserId(req);
    const metadata = parseWith(photoMetadataSchema, req.body?.metadata);
    const file = req.file;
    if (!file || file.size === 0) {
      throw new ValidationError("Photo file is required", "file");
    }
    if (!ACCEPTED_PHOTO_TYPES.includes(file.mimetype)) {
      throw new ValidationError(`Unsupported photo type ${file.mimetype}`, "file");
    }

    const fileName = await photoStore.save(file.buffer, file.mimetype);
    const { record, created } = await storage.createPhoto(userId, {
      ...metadata,
      filePath: fileName,
      contentType: file.mimetype,
      sizeBytes: file.size,
    });
    if (!created) {
      await photoStore.remove(fileName);
    }
    res.status(created ? 201 : 200).json(record);
  }));

  app.get("/photos/:id", handle(async (req, res) => {
    const photo = await storage.getPhoto(req.params.id);
    if (!photo) {
      throw new NotFoundError("Photo not found");
    }
    assertOwner(photo.userId, requireUserId(req), "Photo");
    res.json(photo);
  }));

  app.get("/photos/:id/file", handle(async (req, res) => {
    const photo = await storage.getPhoto(req.params.id);
    if (!photo) {
      throw new NotFoundError("Photo not found");
    }
    assertOwner(photo.userId, requireUserId(req), "Photo");
    const content = await photoStore.read(photo.filePath);
    res.type(photo.contentType).send(content);
  }));

  // ============================================================================
  // REPORTS
  // ============================================================================

  app.post("/reports", handle(async (req, res) => {
    const data = parseWith(insertReportSchema, req.body);
    const { record, created } = await storage.createReport(requireUserId(req), data);
    res.status(created ? 201 : 200).json(record);
  }));

  app.get("/reports", handle(async (req, res) => {
    const { page, pageSize } = parsePage(req.query);
    const result = await storage.getReports(requireUserId(req), pageOffset(page, pageSize), pageSize);
    res.json(toPaginatedList(result.items, result.total, page, pageSize));
  }));

  app.get("/reports/range", handle(async (req, res) => {
    const { from, to } = parseRange(req.query);
    res.json(await storage.getReportsInRange(requireUserId(req), from, to));
  }));

  app.get("/reports/:id", handle(async (req, res) => {
    const report = await storage.getReport(req.params.id);
    if (!report) {
      throw new NotFoundError("Report not found");
    }
    assertOwner(report.userId, requireUserId(req), "Report");
    res.json(report);
  }));

  app.put("/reports/:id", handle(async (req, res) => {
    const { text } = parseWith(updateReportSchema, req.body);
    const existing = await storage.getReport(req.params.id);
    if (!existing) {
      throw new NotFoundError("Report not found");
    }
    assertOwner(existing.userId, requireUserId(req), "Report");
    const updated = await storage.updateReport(existing.id, text);
    if (!updated) {
      throw new NotFoundError("Report not found");
    }
    res.json(updated);
  }));

  app.delete("/reports/:id", handle(async (req, res) => {
    const existing = await storage.getReport(req.params.id);
    if (!existing) {
      throw new NotFoundError("Report not found");
    }
    assertOwner(existing.userId, requireUserId(req), "Report");
    await storage.deleteReport(existing.id);
    res.status(204).end();
  }));

  // ============================================================================
  // PATROL
  // ============================================================================

  app.get("/patrol/locations", handle(async (_req, res) => {
    res.json(await storage.getPatrolLocations());
  }));

  app.get("/patrol/locations/:id", handle(async (req, res) => {
    const location = await storage.getPatrolLocation(req.params.id);
    if (!location) {
      throw new NotFoundError("Patrol location not found");
    }
    res.json(location);
  }));

  app.get("/patrol/locations/:id/checkpoints", handle(async (req, res) => {
    const location = await storage.getPatrolLocation(req.params.id);
    if (!location) {
      throw new NotFoundError("Patrol location not found");
    }
    res.json(await storage.getCheckpoints(location.id));
  }));

  app.get("/patrol/locations/:id/status", handle(async (req, res) => {
    const userId = requireUserId(req);
    const location = await storage.getPatrolLocation(req.params.id);
    if (!location) {
      throw new NotFoundError("Patrol location not found");
    }
    const locationCheckpoints = await storage.getCheckpoints(location.id);
    const verified = await storage.getVerificationsForLocation(userId, location.id);
    res.json(derivePatrolStatus(location.id, locationCheckpoints.length, verified.map(v => v.timestamp)));
  }));

  app.post("/patrol/verify", handle(async (req, res) => {
    const userId = requireUserId(req);
    const data = parseWith(verifyCheckpointSchema, req.body);

    const checkpoint = await storage.getCheckpoint(data.checkpointId);
    if (!checkpoint) {
      throw new NotFoundError("Checkpoint not found");
    }

    const existing = await storage.getVerification(userId, checkpoint.id);
    if (existing) {
      const body: VerifyCheckpointResponse = { verification: existing, status: "AlreadyVerified" };
      return res.json(body);
    }

    if (deps.proximityRadiusMeters !== null) {
      const distance = distanceMeters(data, checkpoint);
      if (distance > deps.proximityRadiusMeters) {
        throw new ValidationError(
          `Too far from checkpoint (${Math.round(distance)}m, limit ${deps.proximityRadiusMeters}m)`,
          "latitude"
        );
      }
    }

    const { record, created } = await storage.createVerification(userId, data);
    const body: VerifyCheckpointResponse = {
      verification: record,
      status: created ? "Verified" : "AlreadyVerified",
    };
    res.status(created ? 201 : 200).json(body);
  }));

  app.get("/patrol/verifications", handle(async (req, res) => {
    res.json(await storage.getVerifications(requireUserId(req)));
  }));

  app.get("/patrol/checkpoints/nearby", handle(async (req, res) => {
    const { latitude, longitude, radius } = parseWith(nearbyQuerySchema, req.query);
    const locations = await storage.getPatrolLocations();
    const all = (await Promise.all(locations.map(l => storage.getCheckpoints(l.id)))).flat();
    res.json(withinRadius({ latitude, longitude }, all, radius));
  }));

  app.get("/patrol/checkpoints/:id/verified", handle(async (req, res) => {
    const checkpoint = await storage.getCheckpoint(req.params.id);
    if (!checkpoint) {
      throw new NotFoundError("Checkpoint not found");
    }
    const verification = await storage.getVerification(requireUserId(req), checkpoint.id);
    res.json({ checkpointId: checkpoint.id, isVerified: verification !== undefined });
  }));

  return httpServer;
}
