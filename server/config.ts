/**
 * Backend configuration, read from the environment once at startup.
 */

import path from "path";
import { z } from "zod";

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  DATABASE_URL: z.string().url().optional(),
  JWT_SECRET: z.string().min(8, "JWT_SECRET must be at least 8 characters"),
  TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(12 * 60 * 60),
  PHOTO_DIR: z.string().min(1).default(path.join(process.cwd(), "uploads", "photos")),
  MAX_PHOTO_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  PROXIMITY_RADIUS_METERS: z.coerce.number().positive().optional(),
  VERIFICATION_CODE_TTL_SECONDS: z.coerce.number().int().positive().default(300),
});

export interface ServerConfig {
  port: number;
  /** Absent: data is kept in memory and lost on restart. */
  databaseUrl: string | null;
  jwtSecret: string;
  tokenTtlSeconds: number;
  photoDir: string;
  maxPhotoBytes: number;
  proximityRadiusMeters: number | null;
  verificationCodeTtlSeconds: number;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid server configuration: ${issues}`);
  }
  const parsed = result.data;
  return {
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL ?? null,
    jwtSecret: parsed.JWT_SECRET,
    tokenTtlSeconds: parsed.TOKEN_TTL_SECONDS,
    photoDir: parsed.PHOTO_DIR,
    maxPhotoBytes: parsed.MAX_PHOTO_BYTES,
    proximityRadiusMeters: parsed.PROXIMITY_RADIUS_METERS ?? null,
    verificationCodeTtlSeconds: parsed.VERIFICATION_CODE_TTL_SECONDS,
  };
}
