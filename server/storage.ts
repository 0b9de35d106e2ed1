import { eq, and, desc, asc, gte, lte, sql, inArray } from "drizzle-orm";
import type { PatrolDatabase } from "./db.js";
import {
  users, timeRecords, locationRecords, photos, reports,
  patrolLocations, checkpoints, checkpointVerifications,
  type User,
  type TimeRecord, type InsertTimeRecord,
  type LocationRecord, type InsertLocationRecord,
  type Photo, type InsertPhoto,
  type Report, type InsertReport,
  type PatrolLocation, type InsertPatrolLocation,
  type Checkpoint, type InsertCheckpoint,
  type CheckpointVerification,
  type VerifyCheckpointRequest,
} from "../shared/schema.js";

export interface Page<T> {
  items: T[];
  total: number;
}

/** `created` is false when the client reference was already stored. */
export interface CreateResult<T> {
  record: T;
  created: boolean;
}

export type NewPhoto = InsertPhoto & {
  filePath: string;
  contentType: string;
  sizeBytes: number;
};

export interface IStorage {
  // Users
  getUser(id: string): Promise<User | undefined>;
  getUserByPhoneNumber(phoneNumber: string): Promise<User | undefined>;
  createUser(phoneNumber: string): Promise<User>;
  recordAuthentication(id: string, at: string): Promise<void>;

  // Time records
  createTimeRecord(userId: string, data: InsertTimeRecord): Promise<CreateResult<TimeRecord>>;
  getLatestTimeRecord(userId: string): Promise<TimeRecord | undefined>;
  getTimeRecords(userId: string, offset: number, limit: number): Promise<Page<TimeRecord>>;
  getTimeRecordsInRange(userId: string, from: string, to: string): Promise<TimeRecord[]>;

  // Locations
  createLocationRecord(userId: string, data: InsertLocationRecord): Promise<CreateResult<LocationRecord>>;
  getLatestLocation(userId: string): Promise<LocationRecord | undefined>;
  getLocationHistory(userId: string, from: string, to: string): Promise<LocationRecord[]>;

  // Photos
  createPhoto(userId: string, data: NewPhoto): Promise<CreateResult<Photo>>;
  getPhoto(id: string): Promise<Photo | undefined>;

  // Reports
  createReport(userId: string, data: InsertReport): Promise<CreateResult<Report>>;
  getReport(id: string): Promise<Report | undefined>;
  getReports(userId: string, offset: number, limit: number): Promise<Page<Report>>;
  getReportsInRange(userId: string, from: string, to: string): Promise<Report[]>;
  updateReport(id: string, text: string): Promise<Report | undefined>;
  deleteReport(id: string): Promise<boolean>;

  // Patrol reference data
  getPatrolLocations(): Promise<PatrolLocation[]>;
  getPatrolLocation(id: string): Promise<PatrolLocation | undefined>;
  createPatrolLocation(data: InsertPatrolLocation): Promise<PatrolLocation>;
  getCheckpoints(locationId: string): Promise<Checkpoint[]>;
  getCheckpoint(id: string): Promise<Checkpoint | undefined>;
  createCheckpoint(data: InsertCheckpoint): Promise<Checkpoint>;

  // Verifications
  getVerification(userId: string, checkpointId: string): Promise<CheckpointVerification | undefined>;
  createVerification(userId: string, data: VerifyCheckpointRequest): Promise<CreateResult<CheckpointVerification>>;
  getVerifications(userId: string): Promise<CheckpointVerification[]>;
  getVerificationsForLocation(userId: string, locationId: string): Promise<CheckpointVerification[]>;
}

export class DatabaseStorage implements IStorage {
  constructor(private readonly db: PatrolDatabase) {}

  // Users
  async getUser(id: string): Promise<User | undefined> {
    const [result] = await this.db.select().from(users).where(eq(users.id, id));
    return result;
  }

  async getUserByPhoneNumber(phoneNumber: string): Promise<User | undefined> {
    const [result] = await this.db.select().from(users).where(eq(users.phoneNumber, phoneNumber));
    return result;
  }

  async createUser(phoneNumber: string): Promise<User> {
    await this.db.insert(users).values({ phoneNumber }).onConflictDoNothing({ target: users.phoneNumber });
    const [result] = await this.db.select().from(users).where(eq(users.phoneNumber, phoneNumber));
    if (!result) {
      throw new Error(`User ${phoneNumber} could not be created`);
    }
    return result;
  }

  async recordAuthentication(id: string, at: string): Promise<void> {
    await this.db.update(users).set({ lastAuthenticated: at }).where(eq(users.id, id));
  }

  // Time records
  async createTimeRecord(userId: string, data: InsertTimeRecord): Promise<CreateResult<TimeRecord>> {
    const [inserted] = await this.db.insert(timeRecords)
      .values({ ...data, userId })
      .onConflictDoNothing({ target: [timeRecords.userId, timeRecords.clientRef] })
      .returning();
    if (inserted) return { record: inserted, created: true };

    const [existing] = await this.db.select().from(timeRecords)
      .where(and(eq(timeRecords.userId, userId), eq(timeRecords.clientRef, data.clientRef ?? "")));
    if (!existing) {
      throw new Error("Time record conflict without a stored row");
    }
    return { record: existing, created: false };
  }

  async getLatestTimeRecord(userId: string): Promise<TimeRecord | undefined> {
    const [result] = await this.db.select().from(timeRecords)
      .where(eq(timeRecords.userId, userId))
      .orderBy(desc(timeRecords.timestamp))
      .limit(1);
    return result;
  }

  async getTimeRecords(userId: string, offset: number, limit: number): Promise<Page<TimeRecord>> {
    const items = await this.db.select().from(timeRecords)
      .where(eq(timeRecords.userId, userId))
      .orderBy(desc(timeRecords.timestamp))
      .offset(offset)
      .limit(limit);
    const [count] = await this.db.select({ total: sql<number>`count(*)::int` }).from(timeRecords)
      .where(eq(timeRecords.userId, userId));
    return { items, total: count?.total ?? 0 };
  }

  async getTimeRecordsInRange(userId: string, from: string, to: string): Promise<TimeRecord[]> {
    return this.db.select().from(timeRecords)
      .where(and(eq(timeRecords.userId, userId), gte(timeRecords.timestamp, from), lte(timeRecords.timestamp, to)))
      .orderBy(asc(timeRecords.timestamp));
  }

  // Locations
  async createLocationRecord(userId: string, data: InsertLocationRecord): Promise<CreateResult<LocationRecord>> {
    const [inserted] = await this.db.insert(locationRecords)
      .values({ ...data, userId })
      .onConflictDoNothing({ target: [locationRecords.userId, locationRecords.clientRef] })
      .returning();
    if (inserted) return { record: inserted, created: true };

    const [existing] = await this.db.select().from(locationRecords)
      .where(and(eq(locationRecords.userId, userId), eq(locationRecords.clientRef, data.clientRef ?? "")));
    if (!existing) {
      throw new Error("Location record conflict without a stored row");
    }
    return { record: existing, created: false };
  }

  async getLatestLocation(userId: string): Promise<LocationRecord | undefined> {
    const [result] = await this.db.select().from(locationRecords)
      .where(eq(locationRecords.userId, userId))
      .orderBy(desc(locationRecords.timestamp))
      .limit(1);
    return result;
  }

  async getLocationHistory(userId: string, from: string, to: string): Promise<LocationRecord[]> {
    return this.db.select().from(locationRecords)
      .where(and(
        eq(locationRecords.userId, userId),
        gte(locationRecords.timestamp, from),
        lte(locationRecords.timestamp, to),
      ))
      .orderBy(asc(locationRecords.timestamp));
  }

  // Photos
  async createPhoto(userId: string, data: NewPhoto): Promise<CreateResult<Photo>> {
    const [inserted] = await this.db.insert(photos)
      .values({ ...data, userId })
      .onConflictDoNothing({ target: [photos.userId, photos.clientRef] })
      .returning();
    if (inserted) return { record: inserted, created: true };

    const [existing] = await this.db.select().from(photos)
      .where(and(eq(photos.userId, userId), eq(photos.clientRef, data.clientRef ?? "")));
    if (!existing) {
      throw new Error("Photo conflict without a stored row");
    }
    return { record: existing, created: false };
  }

  async getPhoto(id: string): Promise<Photo | undefined> {
    const [result] = await this.db.select().from(photos).where(eq(photos.id, id));
    return result;
  }

  // Reports
  async createReport(userId: string, data: InsertReport): Promise<CreateResult<Report>> {
    const [inserted] = await this.db.insert(reports)
      .values({ ...data, userId })
      .onConflictDoNothing({ target: [reports.userId, reports.clientRef] })
      .returning();
    if (inserted) return { record: inserted, created: true };

    const [existing] = await this.db.select().from(reports)
      .where(and(eq(reports.userId, userId), eq(reports.clientRef, data.clientRef ?? "")));
    if (!existing) {
      throw new Error("Report conflict without a stored row");
    }
    return { record: existing, created: false };
  }

  async getReport(id: string): Promise<Report | undefined> {
    const [result] = await this.db.select().from(reports).where(eq(reports.id, id));
    return result;
  }

  async getReports(userId: string, offset: number, limit: number): Promise<Page<Report>> {
    const items = await this.db.select().from(reports)
      .where(eq(reports.userId, userId))
      .orderBy(desc(reports.timestamp), desc(reports.id))
      .offset(offset)
      .limit(limit);
    const [count] = await this.db.select({ total: sql<number>`count(*)::int` }).from(reports)
      .where(eq(reports.userId, userId));
    return { items, total: count?.total ?? 0 };
  }

  async getReportsInRange(userId: string, from: string, to: string): Promise<Report[]> {
    return this.db.select().from(reports)
      .where(and(eq(reports.userId, userId), gte(reports.timestamp, from), lte(reports.timestamp, to)))
      .orderBy(desc(reports.timestamp));
  }

  async updateReport(id: string, text: string): Promise<Report | undefined> {
    const [result] = await this.db.update(reports)
      .set({ text, updatedAt: new Date().toISOString() })
      .where(eq(reports.id, id))
      .returning();
    return result;
  }

  async deleteReport(id: string): Promise<boolean> {
    const result = await this.db.delete(reports).where(eq(reports.id, id));
    return result.rowCount !== null && result.rowCount > 0;
  }

  // Patrol reference data
  async getPatrolLocations(): Promise<PatrolLocation[]> {
    return this.db.select().from(patrolLocations).orderBy(asc(patrolLocations.name));
  }

  async getPatrolLocation(id: string): Promise<PatrolLocation | undefined> {
    const [result] = await this.db.select().from(patrolLocations).where(eq(patrolLocations.id, id));
    return result;
  }

  async createPatrolLocation(data: InsertPatrolLocation): Promise<PatrolLocation> {
    const [result] = await this.db.insert(patrolLocations).values(data).returning();
    if (!result) {
      throw new Error("Patrol location insert returned no row");
    }
    return result;
  }

  async getCheckpoints(locationId: string): Promise<Checkpoint[]> {
    return this.db.select().from(checkpoints)
      .where(eq(checkpoints.locationId, locationId))
      .orderBy(asc(checkpoints.name));
  }

  async getCheckpoint(id: string): Promise<Checkpoint | undefined> {
    const [result] = await this.db.select().from(checkpoints).where(eq(checkpoints.id, id));
    return result;
  }

  async createCheckpoint(data: InsertCheckpoint): Promise<Checkpoint> {
    const [result] = await this.db.insert(checkpoints).values(data).returning();
    if (!result) {
      throw new Error("Checkpoint insert returned no row");
    }
    return result;
  }

  // Verifications
  async getVerification(userId: string, checkpointId: string): Promise<CheckpointVerification | undefined> {
    const [result] = await this.db.select().from(checkpointVerifications)
      .where(and(eq(checkpointVerifications.userId, userId), eq(checkpointVerifications.checkpointId, checkpointId)));
    return result;
  }

  async createVerification(
    userId: string,
    data: VerifyCheckpointRequest
  ): Promise<CreateResult<CheckpointVerification>> {
    const [inserted] = await this.db.insert(checkpointVerifications)
      .values({ ...data, userId })
      .onConflictDoNothing({ target: [checkpointVerifications.userId, checkpointVerifications.checkpointId] })
      .returning();
    if (inserted) return { record: inserted, created: true };

    const existing = await this.getVerification(userId, data.checkpointId);
    if (!existing) {
      throw new Error("Verification conflict without a stored row");
    }
    return { record: existing, created: false };
  }

  async getVerifications(userId: string): Promise<CheckpointVerification[]> {
    return this.db.select().from(checkpointVerifications)
      .where(eq(checkpointVerifications.userId, userId))
      .orderBy(desc(checkpointVerifications.timestamp));
  }

  async getVerificationsForLocation(userId: string, locationId: string): Promise<CheckpointVerification[]> {
    const locationCheckpoints = this.db.select({ id: checkpoints.id }).from(checkpoints)
      .where(eq(checkpoints.locationId, locationId));
    return this.db.select().from(checkpointVerifications)
      .where(and(
        eq(checkpointVerifications.userId, userId),
        inArray(checkpointVerifications.checkpointId, locationCheckpoints),
      ));
  }
}
