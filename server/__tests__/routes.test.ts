import fs from "fs";
import os from "os";
import path from "path";
import type { Server } from "http";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { z } from "zod";
import { createApp } from "../app.js";
import { MemStorage } from "../memory-storage.js";
import { PhotoStore } from "../photo-store.js";
import { TokenService, VerificationCodeStore, type SmsSender } from "../auth.js";
import { RateLimiter, authRateLimitKey } from "../rate-limiter.js";
import { ConnectivityMonitor } from "../../patrol-client/src/sync/connectivity.js";
import { ApiClient } from "../../patrol-client/src/sync/api-client.js";
import { PatrolApi } from "../../patrol-client/src/sync/patrol-api.js";

class CapturingSmsSender implements SmsSender {
  messages: { phoneNumber: string; message: string }[] = [];

  async send(phoneNumber: string, message: string): Promise<void> {
    this.messages.push({ phoneNumber, message });
  }

  lastCode(): string {
    const last = this.messages[this.messages.length - 1];
    return /(\d{6})$/.exec(last?.message ?? "")?.[1] ?? "";
  }
}

const idSchema = z.object({ id: z.string() }).passthrough();
const tokenSchema = z.object({ token: z.string(), userId: z.string(), expiresAt: z.string() });

const GATE = { latitude: 40.7128, longitude: -74.006 };

interface CallResult {
  status: number;
  body: unknown;
}

describe("patrol backend routes", () => {
  let httpServer: Server;
  let baseUrl: string;
  let storage: MemStorage;
  let sms: CapturingSmsSender;
  let photoDir: string;
  let authLimiter: RateLimiter;

  beforeEach(async () => {
    photoDir = fs.mkdtempSync(path.join(os.tmpdir(), "patrol-photos-"));
    storage = new MemStorage();
    sms = new CapturingSmsSender();
    authLimiter = new RateLimiter({ windowMs: 60000, maxRequests: 3, burstAllowance: 0, keyOf: authRateLimitKey });
    const created = await createApp({
      storage,
      tokens: new TokenService("test-secret", 3600),
      codes: new VerificationCodeStore(300),
      sms,
      photoStore: new PhotoStore(photoDir),
      authLimiter,
      maxPhotoBytes: 1024,
      proximityRadiusMeters: 100,
    });
    httpServer = created.httpServer;
    await new Promise<void>(resolve => httpServer.listen(0, "127.0.0.1", resolve));
    const address = httpServer.address();
    if (!address || typeof address === "string") {
      throw new Error("Server did not bind a port");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    authLimiter.stop();
    httpServer.closeAllConnections();
    await new Promise<void>((resolve, reject) => httpServer.close(err => (err ? reject(err) : resolve())));
    fs.rmSync(photoDir, { recursive: true, force: true });
  });

  async function call(method: string, route: string, options: { token?: string; body?: unknown } = {}): Promise<CallResult> {
    const headers: Record<string, string> = {};
    if (options.token) headers.Authorization = `Bearer ${options.token}`;
    if (options.body !== undefined) headers["Content-Type"] = "application/json";
    const response = await fetch(`${baseUrl}${route}`, {
      method,
      headers,
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
    });
    const text = await response.text();
    const body: unknown = text ? JSON.parse(text) : undefined;
    return { status: response.status, body };
  }

  async function signIn(phoneNumber = "+15550100"): Promise<string> {
    const verify = await call("POST", "/auth/verify", { body: { phoneNumber } });
    const { verificationId } = z.object({ verificationId: z.string() }).parse(verify.body);
    const validate = await call("POST", "/auth/validate", {
      body: { phoneNumber, verificationId, code: sms.lastCode() },
    });
    return tokenSchema.parse(validate.body).token;
  }

  async function seedDepot() {
    const depot = await storage.createPatrolLocation({ name: "Depot", ...GATE });
    const gate = await storage.createCheckpoint({ locationId: depot.id, name: "Gate", ...GATE });
    const dock = await storage.createCheckpoint({
      locationId: depot.id,
      name: "Dock",
      latitude: 40.7138,
      longitude: -74.006,
    });
    return { depot, gate, dock };
  }

  function report(clientRef: string, text: string, timestamp: string) {
    return { clientRef, text, timestamp, ...GATE };
  }

  it("answers health checks without a token", async () => {
    const result = await call("GET", "/health");

    expect(result.status).toBe(200);
    expect(result.body).toMatchObject({ status: "ok" });
  });

  it("rejects protected routes without a valid token", async () => {
    await expect(call("POST", "/location/batch", { body: [] })).resolves.toEqual({
      status: 401,
      body: { status: 401, message: "Authentication required" },
    });
    await expect(call("GET", "/time/status", { token: "not-a-token" })).resolves.toEqual({
      status: 401,
      body: { status: 401, message: "Invalid token" },
    });
  });

  it("signs in with an SMS code", async () => {
    const token = await signIn();

    expect(sms.messages).toHaveLength(1);
    expect(sms.messages[0]?.phoneNumber).toBe("+15550100");
    expect(sms.messages[0]?.message).toMatch(/^Your patrol verification code is \d{6}$/);
    await expect(call("GET", "/time/status", { token })).resolves.toEqual({
      status: 200,
      body: { isClockedIn: false, lastRecord: null },
    });

    const refreshed = await call("POST", "/auth/refresh", { token });
    expect(refreshed.status).toBe(200);
    expect(tokenSchema.parse(refreshed.body).userId).toBe((await storage.getUserByPhoneNumber("+15550100"))?.id);
  });

  it("rejects a wrong code and a malformed phone number", async () => {
    const verify = await call("POST", "/auth/verify", { body: { phoneNumber: "+15550100" } });
    const { verificationId } = z.object({ verificationId: z.string() }).parse(verify.body);
    const wrong = sms.lastCode() === "000000" ? "111111" : "000000";

    await expect(
      call("POST", "/auth/validate", { body: { phoneNumber: "+15550100", verificationId, code: wrong } })
    ).resolves.toEqual({ status: 401, body: { status: 401, message: "Invalid verification code" } });
    await expect(call("POST", "/auth/verify", { body: { phoneNumber: "call me" } })).resolves.toEqual({
      status: 400,
      body: { status: 400, message: "Invalid phone number" },
    });
  });

  it("limits code requests per phone number", async () => {
    for (let i = 0; i < 3; i++) {
      expect((await call("POST", "/auth/verify", { body: { phoneNumber: "+15550100" } })).status).toBe(200);
    }

    await expect(call("POST", "/auth/verify", { body: { phoneNumber: "+15550100" } })).resolves.toEqual({
      status: 429,
      body: { status: 429, message: "Too many requests, try again later" },
    });
    expect((await call("POST", "/auth/verify", { body: { phoneNumber: "+15550101" } })).status).toBe(200);
    expect(sms.messages).toHaveLength(4);
  });

  it("stores clock events once per client reference", async () => {
    const token = await signIn();
    const body = { clientRef: "1", type: "ClockIn", timestamp: "2024-03-01T08:00:00.000Z", ...GATE };

    const first = await call("POST", "/time/clock", { token, body });
    const second = await call("POST", "/time/clock", { token, body });

    expect(first.status).toBe(201);
    expect(second.status).toBe(200);
    expect(idSchema.parse(second.body).id).toBe(idSchema.parse(first.body).id);
    const status = await call("GET", "/time/status", { token });
    expect(status.body).toMatchObject({ isClockedIn: true, lastRecord: { clientRef: "1", type: "ClockIn" } });
  });

  it("accepts the valid part of a location batch", async () => {
    const token = await signIn();

    const result = await call("POST", "/location/batch", {
      token,
      body: [
        { id: 1, clientRef: "1", timestamp: "2024-03-01T08:00:00.000Z", latitude: 40.7128, longitude: -74.006, accuracy: 5 },
        { id: 2, clientRef: "2", timestamp: "2024-03-01T08:01:00.000Z", latitude: 91, longitude: -74.006, accuracy: 5 },
      ],
    });

    expect(result.status).toBe(200);
    expect(result.body).toEqual({ syncedIds: [1], failedIds: [2], remoteIds: { "1": expect.any(String) } });
    const current = await call("GET", "/location/current", { token });
    expect(current.body).toMatchObject({ clientRef: "1", latitude: 40.7128, accuracy: 5 });
  });

  it("pages reports newest first", async () => {
    const token = await signIn();
    for (const [i, minute] of ["00", "10", "20"].entries()) {
      await call("POST", "/reports", {
        token,
        body: report(String(i + 1), `Round ${i + 1}`, `2024-03-01T08:${minute}:00.000Z`),
      });
    }

    const page = await call("GET", "/reports?page=1&pageSize=2", { token });

    expect(page.status).toBe(200);
    expect(page.body).toMatchObject({
      items: [{ text: "Round 3" }, { text: "Round 2" }],
      pageNumber: 1,
      pageSize: 2,
      totalCount: 3,
      totalPages: 2,
      hasPreviousPage: false,
      hasNextPage: true,
    });
    await expect(call("GET", "/reports?page=0", { token })).resolves.toEqual({
      status: 400,
      body: { status: 400, message: "Page number must be at least 1" },
    });
  });

  it("keeps reports private to their author", async () => {
    const owner = await signIn("+15550100");
    const other = await signIn("+15550101");
    const created = await call("POST", "/reports", {
      token: owner,
      body: report("1", "Fence cut near dock", "2024-03-01T08:00:00.000Z"),
    });
    const { id } = idSchema.parse(created.body);

    await expect(call("GET", `/reports/${id}`, { token: other })).resolves.toEqual({
      status: 403,
      body: { status: 403, message: "Report belongs to another user" },
    });
    expect((await call("PUT", `/reports/${id}`, { token: other, body: { text: "Nothing here" } })).status).toBe(403);

    const updated = await call("PUT", `/reports/${id}`, { token: owner, body: { text: "Fence repaired" } });
    expect(updated.body).toMatchObject({ id, text: "Fence repaired", updatedAt: expect.any(String) });

    expect((await call("DELETE", `/reports/${id}`, { token: owner })).status).toBe(204);
    await expect(call("GET", `/reports/${id}`, { token: owner })).resolves.toEqual({
      status: 404,
      body: { status: 404, message: "Report not found" },
    });
  });

  it("verifies a checkpoint once per user", async () => {
    const token = await signIn();
    const { depot, gate } = await seedDepot();
    const body = { checkpointId: gate.id, timestamp: "2024-03-01T08:00:00.000Z", ...GATE };

    const first = await call("POST", "/patrol/verify", { token, body });
    const second = await call("POST", "/patrol/verify", { token, body: { ...body, timestamp: "2024-03-01T09:00:00.000Z" } });

    expect(first.status).toBe(201);
    expect(first.body).toMatchObject({ status: "Verified", verification: { checkpointId: gate.id } });
    expect(second.status).toBe(200);
    expect(second.body).toMatchObject({
      status: "AlreadyVerified",
      verification: { timestamp: "2024-03-01T08:00:00.000Z" },
    });

    const status = await call("GET", `/patrol/locations/${depot.id}/status`, { token });
    expect(status.body).toEqual({
      locationId: depot.id,
      totalCheckpoints: 2,
      verifiedCheckpoints: 1,
      state: "InProgress",
      isComplete: false,
      lastVerificationTime: "2024-03-01T08:00:00.000Z",
    });
    await expect(call("GET", `/patrol/checkpoints/${gate.id}/verified`, { token })).resolves.toEqual({
      status: 200,
      body: { checkpointId: gate.id, isVerified: true },
    });
  });

  it("rejects verification from too far away", async () => {
    const token = await signIn();
    const { dock } = await seedDepot();

    await expect(
      call("POST", "/patrol/verify", {
        token,
        body: { checkpointId: dock.id, timestamp: "2024-03-01T08:00:00.000Z", ...GATE },
      })
    ).resolves.toEqual({
      status: 400,
      body: { status: 400, message: "Too far from checkpoint (111m, limit 100m)" },
    });
    expect((await call("POST", "/patrol/verify", {
      token,
      body: { checkpointId: "missing", timestamp: "2024-03-01T08:00:00.000Z", ...GATE },
    })).status).toBe(404);
  });

  it("lists nearby checkpoints", async () => {
    const token = await signIn();
    await seedDepot();

    const result = await call("GET", "/patrol/checkpoints/nearby?latitude=40.7128&longitude=-74.006&radius=50", { token });

    expect(result.status).toBe(200);
    expect(z.array(z.object({ name: z.string() }).passthrough()).parse(result.body).map(c => c.name)).toEqual(["Gate"]);
  });

  it("stores uploaded photos and serves them back", async () => {
    const token = await signIn();
    const form = new FormData();
    form.append("metadata", JSON.stringify({ clientRef: "photo-1", timestamp: "2024-03-01T08:00:00.000Z", ...GATE }));
    form.append("file", new Blob([new Uint8Array(Buffer.from("jpeg-bytes"))], { type: "image/jpeg" }), "photo-1.jpg");

    const upload = await fetch(`${baseUrl}/photos/upload`, {
      method: "POST",
      headers: { Authorization: `Bearer ${token}` },
      body: form,
    });
    expect(upload.status).toBe(201);
    const { id } = idSchema.parse(await upload.json());

    const file = await fetch(`${baseUrl}/photos/${id}/file`, { headers: { Authorization: `Bearer ${token}` } });
    expect(file.headers.get("content-type")).toBe("image/jpeg");
    expect(Buffer.from(await file.arrayBuffer()).toString()).toBe("jpeg-bytes");
  });

  it("rejects photos of other types", async () => {
    const token = await signIn();
    const form = new FormData();
    form.append("metadata", JSON.stringify({ clientRef: "photo-1", timestamp: "2024-03-01T08:00:00.000Z", ...GATE }));
    form.append("file", new Blob(["plain"], { type: "text/plain" }), "notes.txt");

    const upload = await fetch(`${baseUrl}/photos/upload`, {
      method: "POST",
      headers: { Authorization: `Bearer ${token}` },
      body: form,
    });

    expect(upload.status).toBe(400);
    expect(await upload.json()).toEqual({ status: 400, message: "Unsupported photo type text/plain" });
  });

  it("answers unknown routes with 404", async () => {
    await expect(call("GET", "/nope")).resolves.toEqual({
      status: 404,
      body: { status: 404, message: "Route GET /nope not found" },
    });
  });

  it("acknowledges authenticated realtime connections", async () => {
    const token = await signIn();
    const online = new ConnectivityMonitor(baseUrl, { isTokenValid: () => true, getToken: () => token });
    const rejected = new ConnectivityMonitor(baseUrl, { isTokenValid: () => true, getToken: () => "not-a-token" });

    try {
      await online.connect();
      expect(online.isOnline()).toBe(true);
      await expect(rejected.connect()).rejects.toThrow("Invalid token");
      expect(rejected.isOnline()).toBe(false);
    } finally {
      online.stop();
      rejected.stop();
    }
  });

  it("serves the client API end to end", async () => {
    const token = await signIn();
    await seedDepot();
    const api = new PatrolApi(new ApiClient(baseUrl, { isTokenValid: () => true, getToken: () => token }));
    const record = {
      id: 7,
      userId: "local-user",
      type: "ClockIn" as const,
      timestamp: "2024-03-01T08:00:00.000Z",
      ...GATE,
      isSynced: false,
      remoteId: null,
    };

    const first = await api.submitTimeRecord(record);
    const retried = await api.submitTimeRecord(record);
    const locations = await api.getPatrolLocations();
    const checkpoints = await api.getCheckpoints(locations[0]?.remoteId ?? "");

    expect(retried).toBe(first);
    expect(locations.map(l => l.name)).toEqual(["Depot"]);
    expect(checkpoints.map(c => c.name)).toEqual(["Dock", "Gate"]);
  });
});
