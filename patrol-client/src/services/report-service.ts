import type { ReportRepository } from '../repositories/report-repository.js';
import type { RemoteApi } from '../sync/remote-api.js';
import type { ActivityReport } from '../models.js';
import type { PaginatedList } from '../../../shared/pagination.js';
import { isValidCoordinate } from '../../../shared/geo.js';
import {
  NotFoundError,
  UnauthorizedError,
  ValidationError,
  toError,
} from '../../../shared/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger('ReportService');

export const MAX_REPORT_LENGTH = 500;

export function normalizeReportText(text: string): string {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    throw new ValidationError('Report text is required', 'text');
  }
  if (trimmed.length > MAX_REPORT_LENGTH) {
    throw new ValidationError(`Report text must be ${MAX_REPORT_LENGTH} characters or fewer`, 'text');
  }
  return trimmed;
}

export interface DeleteReportResult {
  deleted: boolean;
  remoteDeleted: boolean;
}

/** Activity reports, mutable by their owner only. */
export class ReportService {
  constructor(
    private readonly reports: ReportRepository,
    private readonly api: RemoteApi | null,
    private readonly clock: () => Date = () => new Date()
  ) {}

  createReport(userId: string, text: string, latitude: number, longitude: number): ActivityReport {
    if (!isValidCoordinate(latitude, longitude)) {
      throw new ValidationError('Invalid coordinates', 'latitude');
    }
    const report: ActivityReport = {
      id: 0,
      userId,
      text: normalizeReportText(text),
      timestamp: this.clock().toISOString(),
      latitude,
      longitude,
      isSynced: false,
      remoteId: null,
    };
    report.id = this.reports.save(report);
    logger.info('Report created', { userId, id: report.id });
    return report;
  }

  getReport(userId: string, id: number): ActivityReport {
    const report = this.reports.getById(id);
    if (!report) {
      throw new NotFoundError(`Report ${id} not found`);
    }
    if (report.userId !== userId) {
      throw new UnauthorizedError('Report belongs to another user');
    }
    return report;
  }

  updateReport(userId: string, id: number, text: string): ActivityReport {
    const existing = this.getReport(userId, id);
    const updated: ActivityReport = { ...existing, text: normalizeReportText(text), isSynced: false };
    this.reports.save(updated);
    return updated;
  }

  getReports(userId: string, pageNumber: number = 1, pageSize: number = 20): PaginatedList<ActivityReport> {
    return this.reports.getPaginated(userId, pageNumber, pageSize);
  }

  getPendingReports(userId: string, pageNumber: number = 1, pageSize: number = 20): PaginatedList<ActivityReport> {
    return this.reports.getPaginated(userId, pageNumber, pageSize, { pendingOnly: true });
  }

  getByRange(userId: string, from: Date, to: Date): ActivityReport[] {
    if (from > to) {
      throw new ValidationError('Start date must be before end date', 'from');
    }
    return this.reports.getByRange(userId, from.toISOString(), to.toISOString());
  }

  /**
   * Deletes the local copy first. A synced report is then deleted on the
   * backend when reachable; otherwise the remote copy is left in place and
   * reported.
   */
  async deleteReport(userId: string, id: number): Promise<DeleteReportResult> {
    const report = this.getReport(userId, id);
    const deleted = this.reports.delete(id) > 0;
    if (!report.remoteId || !this.api) {
      return { deleted, remoteDeleted: false };
    }

    try {
      await this.api.deleteReport(report.remoteId);
      return { deleted, remoteDeleted: true };
    } catch (error) {
      if (error instanceof NotFoundError) {
        return { deleted, remoteDeleted: true };
      }
      logger.warn('Remote report delete failed', { id, remoteId: report.remoteId, error: toError(error).message });
      return { deleted, remoteDeleted: false };
    }
  }
}
