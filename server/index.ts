import path from "path";
import { loadServerConfig } from "./config.js";
import { createApp } from "./app.js";
import { createDatabase } from "./db.js";
import { DatabaseStorage, type IStorage } from "./storage.js";
import { MemStorage } from "./memory-storage.js";
import { LoggingSmsSender, TokenService, VerificationCodeStore } from "./auth.js";
import { RateLimiter, authRateLimitKey } from "./rate-limiter.js";
import { PhotoStore } from "./photo-store.js";
import { log } from "./logger.js";

async function main() {
  const config = loadServerConfig();

  let storage: IStorage;
  let closeDatabase = async () => {};
  if (config.databaseUrl) {
    const { pool, db } = createDatabase(config.databaseUrl);
    storage = new DatabaseStorage(db);
    closeDatabase = () => pool.end();
    log("Using PostgreSQL storage (tables come from `npm run db:push`)", "storage");
  } else {
    storage = new MemStorage();
    log("DATABASE_URL not set, using in-memory storage", "storage");
  }

  const authLimiter = new RateLimiter({ windowMs: 300000, maxRequests: 10, burstAllowance: 5, keyOf: authRateLimitKey });
  const { httpServer } = await createApp({
    storage,
    tokens: new TokenService(config.jwtSecret, config.tokenTtlSeconds),
    codes: new VerificationCodeStore(config.verificationCodeTtlSeconds),
    sms: new LoggingSmsSender(),
    photoStore: new PhotoStore(path.resolve(config.photoDir)),
    authLimiter,
    maxPhotoBytes: config.maxPhotoBytes,
    proximityRadiusMeters: config.proximityRadiusMeters,
  });

  httpServer.listen(config.port, "0.0.0.0", () => {
    log(`serving on port ${config.port}`);
  });

  const shutdown = () => {
    log("Shutting down...");
    authLimiter.stop();
    httpServer.close(() => {
      closeDatabase()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          log(`Failed to close database: ${err instanceof Error ? err.message : String(err)}`, "storage");
          process.exit(1);
        });
    });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((e) => {
  console.error("Failed to start server:", e);
  process.exit(1);
});
