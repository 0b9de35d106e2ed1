import { SyncableRepository, fromFlag, numericKey, toFlag } from './base-repository.js';
import type { ActivityReport } from '../models.js';
import {
  pageOffset,
  toPaginatedList,
  validatePage,
  type PaginatedList,
} from '../../../shared/pagination.js';

interface ActivityReportRow {
  Id: number;
  UserId: string;
  Text: string;
  Timestamp: string;
  Latitude: number;
  Longitude: number;
  IsSynced: number;
  RemoteId: string | null;
}

export interface ReportPageOptions {
  pendingOnly?: boolean;
}

export class ReportRepository extends SyncableRepository<ActivityReport, number, ActivityReportRow> {
  protected readonly table = 'ActivityReport';
  readonly entityType = 'ActivityReport';

  protected fromRow(row: ActivityReportRow): ActivityReport {
    return {
      id: row.Id,
      userId: row.UserId,
      text: row.Text,
      timestamp: row.Timestamp,
      latitude: row.Latitude,
      longitude: row.Longitude,
      isSynced: fromFlag(row.IsSynced),
      remoteId: row.RemoteId,
    };
  }

  protected insertRow(model: ActivityReport): number {
    const result = this.db.run(
      `INSERT INTO ActivityReport (UserId, Text, Timestamp, Latitude, Longitude, IsSynced, RemoteId)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [model.userId, model.text, model.timestamp, model.latitude, model.longitude, toFlag(model.isSynced), model.remoteId]
    );
    return Number(result.lastInsertRowid);
  }

  protected updateRow(model: ActivityReport): number {
    return this.db.run(
      `UPDATE ActivityReport SET UserId = ?, Text = ?, Timestamp = ?, Latitude = ?, Longitude = ?, IsSynced = 0
       WHERE Id = ?`,
      [model.userId, model.text, model.timestamp, model.latitude, model.longitude, model.id]
    ).changes;
  }

  keyFromQueue(entityId: string): number {
    return numericKey(entityId);
  }

  getPaginated(
    userId: string,
    pageNumber: number,
    pageSize: number,
    options: ReportPageOptions = {}
  ): PaginatedList<ActivityReport> {
    validatePage(pageNumber, pageSize);
    const filter = options.pendingOnly ? 'UserId = ? AND IsSynced = 0' : 'UserId = ?';

    return this.inTransaction('getPaginated', () => {
      const total = this.db.get<{ count: number }>(
        `SELECT COUNT(*) AS count FROM ActivityReport WHERE ${filter}`,
        [userId]
      );
      const items = this.query(
        `SELECT * FROM ActivityReport WHERE ${filter} ORDER BY Timestamp DESC, Id DESC LIMIT ? OFFSET ?`,
        [userId, pageSize, pageOffset(pageNumber, pageSize)]
      );
      return toPaginatedList(items, total?.count ?? 0, pageNumber, pageSize);
    });
  }

  getByRange(userId: string, from: string, to: string): ActivityReport[] {
    return this.inTransaction('getByRange', () =>
      this.query(
        'SELECT * FROM ActivityReport WHERE UserId = ? AND Timestamp >= ? AND Timestamp <= ? ORDER BY Timestamp DESC',
        [userId, from, to]
      )
    );
  }
}
