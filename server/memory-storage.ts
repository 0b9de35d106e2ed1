import { randomUUID } from "crypto";
import type { CreateResult, IStorage, NewPhoto, Page } from "./storage.js";
import type {
  User,
  TimeRecord, InsertTimeRecord,
  LocationRecord, InsertLocationRecord,
  Photo,
  Report, InsertReport,
  PatrolLocation, InsertPatrolLocation,
  Checkpoint, InsertCheckpoint,
  CheckpointVerification,
  VerifyCheckpointRequest,
} from "../shared/schema.js";

interface Stored<T> {
  seq: number;
  row: T;
}

/** Newest first; insertion order breaks timestamp ties. */
function newestFirst<T extends { timestamp: string }>(a: Stored<T>, b: Stored<T>): number {
  if (a.row.timestamp !== b.row.timestamp) return a.row.timestamp < b.row.timestamp ? 1 : -1;
  return b.seq - a.seq;
}

function oldestFirst<T extends { timestamp: string }>(a: Stored<T>, b: Stored<T>): number {
  return -newestFirst(a, b);
}

function inRange(timestamp: string, from: string, to: string): boolean {
  const t = Date.parse(timestamp);
  return t >= Date.parse(from) && t <= Date.parse(to);
}

/**
 * Process-local IStorage. Used when no DATABASE_URL is configured and by the
 * route tests. Mirrors the client-reference idempotency of DatabaseStorage.
 */
export class MemStorage implements IStorage {
  private seq = 0;
  private users = new Map<string, User>();
  private timeRecords = new Map<string, Stored<TimeRecord>>();
  private locationRecords = new Map<string, Stored<LocationRecord>>();
  private photos = new Map<string, Stored<Photo>>();
  private reports = new Map<string, Stored<Report>>();
  private patrolLocations = new Map<string, PatrolLocation>();
  private checkpoints = new Map<string, Checkpoint>();
  private verifications = new Map<string, Stored<CheckpointVerification>>();

  private wrap<T>(row: T): Stored<T> {
    return { seq: ++this.seq, row };
  }

  private findByClientRef<T extends { userId: string; clientRef: string | null }>(
    table: Map<string, Stored<T>>,
    userId: string,
    clientRef: string | null | undefined
  ): T | undefined {
    if (clientRef === null || clientRef === undefined) return undefined;
    for (const { row } of table.values()) {
      if (row.userId === userId && row.clientRef === clientRef) return row;
    }
    return undefined;
  }

  private forUser<T extends { userId: string }>(table: Map<string, Stored<T>>, userId: string): Stored<T>[] {
    return [...table.values()].filter(s => s.row.userId === userId);
  }

  // Users
  async getUser(id: string): Promise<User | undefined> {
    return this.users.get(id);
  }

  async getUserByPhoneNumber(phoneNumber: string): Promise<User | undefined> {
    return [...this.users.values()].find(u => u.phoneNumber === phoneNumber);
  }

  async createUser(phoneNumber: string): Promise<User> {
    const existing = await this.getUserByPhoneNumber(phoneNumber);
    if (existing) return existing;
    const user: User = {
      id: randomUUID(),
      phoneNumber,
      isActive: true,
      lastAuthenticated: null,
      createdAt: new Date().toISOString(),
    };
    this.users.set(user.id, user);
    return user;
  }

  async recordAuthentication(id: string, at: string): Promise<void> {
    const user = this.users.get(id);
    if (user) {
      this.users.set(id, { ...user, lastAuthenticated: at });
    }
  }

  // Time records
  async createTimeRecord(userId: string, data: InsertTimeRecord): Promise<CreateResult<TimeRecord>> {
    const existing = this.findByClientRef(this.timeRecords, userId, data.clientRef);
    if (existing) return { record: existing, created: false };
    const record: TimeRecord = {
      id: randomUUID(),
      userId,
      clientRef: data.clientRef ?? null,
      type: data.type,
      timestamp: data.timestamp,
      latitude: data.latitude,
      longitude: data.longitude,
    };
    this.timeRecords.set(record.id, this.wrap(record));
    return { record, created: true };
  }

  async getLatestTimeRecord(userId: string): Promise<TimeRecord | undefined> {
    return this.forUser(this.timeRecords, userId).sort(newestFirst)[0]?.row;
  }

  async getTimeRecords(userId: string, offset: number, limit: number): Promise<Page<TimeRecord>> {
    const all = this.forUser(this.timeRecords, userId).sort(newestFirst);
    return { items: all.slice(offset, offset + limit).map(s => s.row), total: all.length };
  }

  async getTimeRecordsInRange(userId: string, from: string, to: string): Promise<TimeRecord[]> {
    return this.forUser(this.timeRecords, userId)
      .filter(s => inRange(s.row.timestamp, from, to))
      .sort(oldestFirst)
      .map(s => s.row);
  }

  // Locations
  async createLocationRecord(userId: string, data: InsertLocationRecord): Promise<CreateResult<LocationRecord>> {
    const existing = this.findByClientRef(this.locationRecords, userId, data.clientRef);
    if (existing) return { record: existing, created: false };
    const record: LocationRecord = {
      id: randomUUID(),
      userId,
      clientRef: data.clientRef ?? null,
      timestamp: data.timestamp,
      latitude: data.latitude,
      longitude: data.longitude,
      accuracy: data.accuracy ?? null,
    };
    this.locationRecords.set(record.id, this.wrap(record));
    return { record, created: true };
  }

  async getLatestLocation(userId: string): Promise<LocationRecord | undefined> {
    return this.forUser(this.locationRecords, userId).sort(newestFirst)[0]?.row;
  }

  async getLocationHistory(userId: string, from: string, to: string): Promise<LocationRecord[]> {
    return this.forUser(this.locationRecords, userId)
      .filter(s => inRange(s.row.timestamp, from, to))
      .sort(oldestFirst)
      .map(s => s.row);
  }

  // Photos
  async createPhoto(userId: string, data: NewPhoto): Promise<CreateResult<Photo>> {
    const existing = this.findByClientRef(this.photos, userId, data.clientRef);
    if (existing) return { record: existing, created: false };
    const record: Photo = {
      id: randomUUID(),
      userId,
      clientRef: data.clientRef ?? null,
      timestamp: data.timestamp,
      latitude: data.latitude,
      longitude: data.longitude,
      filePath: data.filePath,
      contentType: data.contentType,
      sizeBytes: data.sizeBytes,
    };
    this.photos.set(record.id, this.wrap(record));
    return { record, created: true };
  }

  async getPhoto(id: string): Promise<Photo | undefined> {
    return this.photos.get(id)?.row;
  }

  // Reports
  async createReport(userId: string, data: InsertReport): Promise<CreateResult<Report>> {
    const existing = this.findByClientRef(this.reports, userId, data.clientRef);
    if (existing) return { record: existing, created: false };
    const record: Report = {
      id: randomUUID(),
      userId,
      clientRef: data.clientRef ?? null,
      text: data.text,
      timestamp: data.timestamp,
      latitude: data.latitude,
      longitude: data.longitude,
      updatedAt: null,
    };
    this.reports.set(record.id, this.wrap(record));
    return { record, created: true };
  }

  async getReport(id: string): Promise<Report | undefined> {
    return this.reports.get(id)?.row;
  }

  async getReports(userId: string, offset: number, limit: number): Promise<Page<Report>> {
    const all = this.forUser(this.reports, userId).sort(newestFirst);
    return { items: all.slice(offset, offset + limit).map(s => s.row), total: all.length };
  }

  async getReportsInRange(userId: string, from: string, to: string): Promise<Report[]> {
    return this.forUser(this.reports, userId)
      .filter(s => inRange(s.row.timestamp, from, to))
      .sort(newestFirst)
      .map(s => s.row);
  }

  async updateReport(id: string, text: string): Promise<Report | undefined> {
    const stored = this.reports.get(id);
    if (!stored) return undefined;
    const row: Report = { ...stored.row, text, updatedAt: new Date().toISOString() };
    this.reports.set(id, { seq: stored.seq, row });
    return row;
  }

  async deleteReport(id: string): Promise<boolean> {
    return this.reports.delete(id);
  }

  // Patrol reference data
  async getPatrolLocations(): Promise<PatrolLocation[]> {
    return [...this.patrolLocations.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  async getPatrolLocation(id: string): Promise<PatrolLocation | undefined> {
    return this.patrolLocations.get(id);
  }

  async createPatrolLocation(data: InsertPatrolLocation): Promise<PatrolLocation> {
    const location: PatrolLocation = {
      id: randomUUID(),
      name: data.name,
      latitude: data.latitude,
      longitude: data.longitude,
      lastUpdated: new Date().toISOString(),
    };
    this.patrolLocations.set(location.id, location);
    return location;
  }

  async getCheckpoints(locationId: string): Promise<Checkpoint[]> {
    return [...this.checkpoints.values()]
      .filter(c => c.locationId === locationId)
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async getCheckpoint(id: string): Promise<Checkpoint | undefined> {
    return this.checkpoints.get(id);
  }

  async createCheckpoint(data: InsertCheckpoint): Promise<Checkpoint> {
    const checkpoint: Checkpoint = {
      id: randomUUID(),
      locationId: data.locationId,
      name: data.name,
      latitude: data.latitude,
      longitude: data.longitude,
      lastUpdated: new Date().toISOString(),
    };
    this.checkpoints.set(checkpoint.id, checkpoint);
    return checkpoint;
  }

  // Verifications
  async getVerification(userId: string, checkpointId: string): Promise<CheckpointVerification | undefined> {
    for (const { row } of this.verifications.values()) {
      if (row.userId === userId && row.checkpointId === checkpointId) return row;
    }
    return undefined;
  }

  async createVerification(
    userId: string,
    data: VerifyCheckpointRequest
  ): Promise<CreateResult<CheckpointVerification>> {
    const existing = await this.getVerification(userId, data.checkpointId);
    if (existing) return { record: existing, created: false };
    const record: CheckpointVerification = {
      id: randomUUID(),
      userId,
      checkpointId: data.checkpointId,
      timestamp: data.timestamp,
      latitude: data.latitude,
      longitude: data.longitude,
    };
    this.verifications.set(record.id, this.wrap(record));
    return { record, created: true };
  }

  async getVerifications(userId: string): Promise<CheckpointVerification[]> {
    return this.forUser(this.verifications, userId).sort(newestFirst).map(s => s.row);
  }

  async getVerificationsForLocation(userId: string, locationId: string): Promise<CheckpointVerification[]> {
    const ids = new Set((await this.getCheckpoints(locationId)).map(c => c.id));
    return this.forUser(this.verifications, userId)
      .filter(s => ids.has(s.row.checkpointId))
      .sort(oldestFirst)
      .map(s => s.row);
  }
}
