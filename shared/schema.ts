import { sql } from "drizzle-orm";
import {
  pgTable,
  text,
  varchar,
  integer,
  boolean,
  doublePrecision,
  timestamp,
  uniqueIndex,
  index,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// ============================================================================
// FIELD VALIDATORS
// ============================================================================

export const latitudeSchema = z.number().min(-90, "Latitude must be between -90 and 90").max(90, "Latitude must be between -90 and 90");
export const longitudeSchema = z.number().min(-180, "Longitude must be between -180 and 180").max(180, "Longitude must be between -180 and 180");
export const isoTimestampSchema = z.string().datetime({ offset: true });
export const reportTextSchema = z.string().trim().min(1, "Report text is required").max(500, "Report text must be 500 characters or fewer");
export const clockTypeSchema = z.enum(["ClockIn", "ClockOut"]);
export type ClockType = z.infer<typeof clockTypeSchema>;

// ============================================================================
// USERS
// ============================================================================

export const users = pgTable("users", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  phoneNumber: text("phone_number").notNull().unique(),
  isActive: boolean("is_active").notNull().default(true),
  lastAuthenticated: timestamp("last_authenticated", { mode: "string" }),
  createdAt: timestamp("created_at", { mode: "string" }).defaultNow(),
});

// ============================================================================
// TIME & LOCATION
// ============================================================================

export const timeRecords = pgTable("time_records", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  userId: varchar("user_id").notNull().references(() => users.id),
  clientRef: text("client_ref"),
  type: text("type").notNull(),
  timestamp: timestamp("timestamp", { mode: "string" }).notNull(),
  latitude: doublePrecision("latitude").notNull(),
  longitude: doublePrecision("longitude").notNull(),
}, (t) => ({
  userIdx: index("time_records_user_idx").on(t.userId, t.timestamp),
  clientRefIdx: uniqueIndex("time_records_client_ref_idx").on(t.userId, t.clientRef),
}));

export const locationRecords = pgTable("location_records", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  userId: varchar("user_id").notNull().references(() => users.id),
  clientRef: text("client_ref"),
  timestamp: timestamp("timestamp", { mode: "string" }).notNull(),
  latitude: doublePrecision("latitude").notNull(),
  longitude: doublePrecision("longitude").notNull(),
  accuracy: doublePrecision("accuracy"),
}, (t) => ({
  userIdx: index("location_records_user_idx").on(t.userId, t.timestamp),
  clientRefIdx: uniqueIndex("location_records_client_ref_idx").on(t.userId, t.clientRef),
}));

// ============================================================================
// PHOTOS & REPORTS
// ============================================================================

export const photos = pgTable("photos", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  userId: varchar("user_id").notNull().references(() => users.id),
  clientRef: text("client_ref"),
  timestamp: timestamp("timestamp", { mode: "string" }).notNull(),
  latitude: doublePrecision("latitude").notNull(),
  longitude: doublePrecision("longitude").notNull(),
  filePath: text("file_path").notNull(),
  contentType: text("content_type").notNull().default("image/jpeg"),
  sizeBytes: integer("size_bytes").notNull().default(0),
}, (t) => ({
  userIdx: index("photos_user_idx").on(t.userId),
  clientRefIdx: uniqueIndex("photos_client_ref_idx").on(t.userId, t.clientRef),
}));

export const reports = pgTable("reports", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  userId: varchar("user_id").notNull().references(() => users.id),
  clientRef: text("client_ref"),
  text: varchar("text", { length: 500 }).notNull(),
  timestamp: timestamp("timestamp", { mode: "string" }).notNull(),
  latitude: doublePrecision("latitude").notNull(),
  longitude: doublePrecision("longitude").notNull(),
  updatedAt: timestamp("updated_at", { mode: "string" }),
}, (t) => ({
  userIdx: index("reports_user_idx").on(t.userId, t.timestamp),
  clientRefIdx: uniqueIndex("reports_client_ref_idx").on(t.userId, t.clientRef),
}));

// ============================================================================
// PATROL REFERENCE DATA
// ============================================================================

export const patrolLocations = pgTable("patrol_locations", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  name: text("name").notNull(),
  latitude: doublePrecision("latitude").notNull(),
  longitude: doublePrecision("longitude").notNull(),
  lastUpdated: timestamp("last_updated", { mode: "string" }).defaultNow(),
});

export const checkpoints = pgTable("checkpoints", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  locationId: varchar("location_id").notNull().references(() => patrolLocations.id),
  name: text("name").notNull(),
  latitude: doublePrecision("latitude").notNull(),
  longitude: doublePrecision("longitude").notNull(),
  lastUpdated: timestamp("last_updated", { mode: "string" }).defaultNow(),
}, (t) => ({
  locationIdx: index("checkpoints_location_idx").on(t.locationId),
}));

export const checkpointVerifications = pgTable("checkpoint_verifications", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  userId: varchar("user_id").notNull().references(() => users.id),
  checkpointId: varchar("checkpoint_id").notNull().references(() => checkpoints.id),
  timestamp: timestamp("timestamp", { mode: "string" }).notNull(),
  latitude: doublePrecision("latitude").notNull(),
  longitude: doublePrecision("longitude").notNull(),
}, (t) => ({
  userCheckpointIdx: uniqueIndex("checkpoint_verifications_user_checkpoint_idx").on(t.userId, t.checkpointId),
}));

// ============================================================================
// INSERT SCHEMAS
// ============================================================================

const coordinateOverrides = {
  latitude: latitudeSchema,
  longitude: longitudeSchema,
  timestamp: isoTimestampSchema,
};

export const insertUserSchema = createInsertSchema(users).omit({ id: true, createdAt: true });
export const insertTimeRecordSchema = createInsertSchema(timeRecords, {
  ...coordinateOverrides,
  type: clockTypeSchema,
}).omit({ id: true, userId: true });
export const insertLocationRecordSchema = createInsertSchema(locationRecords, {
  ...coordinateOverrides,
  accuracy: z.number().nonnegative().nullable(),
}).omit({ id: true, userId: true });
export const insertPhotoSchema = createInsertSchema(photos, coordinateOverrides).omit({
  id: true,
  userId: true,
  filePath: true,
  contentType: true,
  sizeBytes: true,
});
export const insertReportSchema = createInsertSchema(reports, {
  ...coordinateOverrides,
  text: reportTextSchema,
}).omit({ id: true, userId: true, updatedAt: true });
export const insertPatrolLocationSchema = createInsertSchema(patrolLocations, {
  latitude: latitudeSchema,
  longitude: longitudeSchema,
}).omit({ id: true, lastUpdated: true });
export const insertCheckpointSchema = createInsertSchema(checkpoints, {
  latitude: latitudeSchema,
  longitude: longitudeSchema,
}).omit({ id: true, lastUpdated: true });

// ============================================================================
// REQUEST SCHEMAS
// ============================================================================

export const updateReportSchema = z.object({
  text: reportTextSchema,
});

export const verifyCheckpointSchema = z.object({
  checkpointId: z.string().min(1),
  timestamp: isoTimestampSchema,
  latitude: latitudeSchema,
  longitude: longitudeSchema,
});

export const locationBatchItemSchema = z.object({
  id: z.number().int().positive(),
}).passthrough();

export const locationBatchSchema = z.array(locationBatchItemSchema).min(1, "At least one location is required");

export const requestCodeSchema = z.object({
  phoneNumber: z.string().trim().regex(/^\+?[0-9]{7,15}$/, "Invalid phone number"),
});

export const validateCodeSchema = requestCodeSchema.extend({
  verificationId: z.string().min(1),
  code: z.string().regex(/^[0-9]{6}$/, "Code must be 6 digits"),
});

export const dateRangeSchema = z.object({
  from: isoTimestampSchema,
  to: isoTimestampSchema,
});

export const nearbyQuerySchema = z.object({
  latitude: z.coerce.number().pipe(latitudeSchema),
  longitude: z.coerce.number().pipe(longitudeSchema),
  radius: z.coerce.number().positive("Radius must be greater than 0"),
});

// ============================================================================
// TYPES
// ============================================================================

export type User = typeof users.$inferSelect;
export type InsertUser = z.infer<typeof insertUserSchema>;
export type TimeRecord = typeof timeRecords.$inferSelect;
export type InsertTimeRecord = z.infer<typeof insertTimeRecordSchema>;
export type LocationRecord = typeof locationRecords.$inferSelect;
export type InsertLocationRecord = z.infer<typeof insertLocationRecordSchema>;
export type Photo = typeof photos.$inferSelect;
export type InsertPhoto = z.infer<typeof insertPhotoSchema>;
export type Report = typeof reports.$inferSelect;
export type InsertReport = z.infer<typeof insertReportSchema>;
export type PatrolLocation = typeof patrolLocations.$inferSelect;
export type InsertPatrolLocation = z.infer<typeof insertPatrolLocationSchema>;
export type Checkpoint = typeof checkpoints.$inferSelect;
export type InsertCheckpoint = z.infer<typeof insertCheckpointSchema>;
export type CheckpointVerification = typeof checkpointVerifications.$inferSelect;
export type VerifyCheckpointRequest = z.infer<typeof verifyCheckpointSchema>;

// ============================================================================
// WIRE RESPONSES
// ============================================================================

export interface LocationBatchResponse {
  syncedIds: number[];
  failedIds: number[];
  /** Client id (as string) to stored backend id, for every synced id. */
  remoteIds: Record<string, string>;
}

export interface VerifyCheckpointResponse {
  verification: CheckpointVerification;
  status: "Verified" | "AlreadyVerified";
}

export interface ClockStatusResponse {
  isClockedIn: boolean;
  lastRecord: TimeRecord | null;
}

export interface TokenResponse {
  token: string;
  expiresAt: string;
  userId: string;
}

export interface ErrorResponse {
  status: number;
  message: string;
}
