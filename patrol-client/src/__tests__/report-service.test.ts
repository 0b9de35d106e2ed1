import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ReportService, normalizeReportText } from '../services/report-service.js';
import {
  BASE_TIME,
  USER_ID,
  createFakeApi,
  createTestStore,
  type FakeApi,
  type TestStore,
} from './test-helpers.js';
import { NotFoundError, TransientNetworkError, UnauthorizedError, ValidationError } from '../../../shared/errors.js';

describe('ReportService', () => {
  let store: TestStore;
  let api: FakeApi;
  let now: Date;
  let service: ReportService;

  beforeEach(() => {
    store = createTestStore();
    api = createFakeApi();
    now = new Date(BASE_TIME);
    service = new ReportService(store.repos.reports, api, () => now);
  });

  afterEach(() => {
    store.db.close();
  });

  const createAt = (minutes: number, text: string) => {
    now = new Date(BASE_TIME.getTime() + minutes * 60_000);
    return service.createReport(USER_ID, text, 40.7128, -74.006);
  };

  it('trims and stores the report text', () => {
    const report = service.createReport(USER_ID, '  Fence damaged near dock 4  ', 40.7128, -74.006);

    expect(report.text).toBe('Fence damaged near dock 4');
    expect(store.repos.reports.getById(report.id)?.text).toBe('Fence damaged near dock 4');
    expect(store.repos.syncQueue.getByEntity('ActivityReport', String(report.id))?.priority).toBe(70);
  });

  it('rejects empty and oversized text', () => {
    expect(() => service.createReport(USER_ID, '   ', 0, 0)).toThrow('Report text is required');
    expect(() => service.createReport(USER_ID, 'x'.repeat(501), 0, 0)).toThrow(ValidationError);
    expect(normalizeReportText('x'.repeat(500))).toHaveLength(500);
  });

  it('pages reports newest first', () => {
    for (let i = 0; i < 6; i++) {
      createAt(i, `Round ${i + 1}`);
    }

    const page = service.getReports(USER_ID, 1, 5);

    expect(page.items.map(r => r.text)).toEqual(['Round 6', 'Round 5', 'Round 4', 'Round 3', 'Round 2']);
    expect(page.totalCount).toBe(6);
    expect(page.totalPages).toBe(2);
    expect(page.hasPreviousPage).toBe(false);
    expect(page.hasNextPage).toBe(true);

    const second = service.getReports(USER_ID, 2, 5);
    expect(second.items.map(r => r.text)).toEqual(['Round 1']);
    expect(second.hasNextPage).toBe(false);
  });

  it('rejects invalid paging', () => {
    expect(() => service.getReports(USER_ID, 0, 5)).toThrow('Page number must be at least 1');
    expect(() => service.getReports(USER_ID, 1, 101)).toThrow('Page size must be between 1 and 100');
  });

  it('lists only unsynced reports as pending', () => {
    const synced = createAt(0, 'Synced');
    createAt(1, 'Pending');
    store.repos.reports.updateSyncStatus(synced.id, true, 'report-remote');

    expect(service.getPendingReports(USER_ID).items.map(r => r.text)).toEqual(['Pending']);
  });

  it('hides reports of other users', () => {
    const report = createAt(0, 'Mine');

    expect(() => service.getReport('user-2', report.id)).toThrow(UnauthorizedError);
    expect(() => service.getReport(USER_ID, 999)).toThrow(NotFoundError);
  });

  it('marks an edited report for sync again', () => {
    const report = createAt(0, 'Draft');
    store.repos.reports.updateSyncStatus(report.id, true, 'report-remote');
    const queue = store.repos.syncQueue;
    queue.removeByEntity('ActivityReport', String(report.id));

    service.updateReport(USER_ID, report.id, 'Final');

    const stored = store.repos.reports.getById(report.id);
    expect(stored?.text).toBe('Final');
    expect(stored?.isSynced).toBe(false);
    expect(stored?.remoteId).toBe('report-remote');
    expect(queue.getByEntity('ActivityReport', String(report.id))).toBeDefined();
  });

  it('deletes an unsynced report locally only', async () => {
    const report = createAt(0, 'Draft');

    await expect(service.deleteReport(USER_ID, report.id)).resolves.toEqual({ deleted: true, remoteDeleted: false });
    expect(api.deleteReport).not.toHaveBeenCalled();
    expect(store.repos.syncQueue.count()).toBe(0);
  });

  it('deletes a synced report on the backend too', async () => {
    const report = createAt(0, 'Done');
    store.repos.reports.updateSyncStatus(report.id, true, 'report-remote');

    let localRowDuringCall: unknown = 'unchecked';
    api.deleteReport.mockImplementationOnce(async () => {
      localRowDuringCall = store.repos.reports.getById(report.id);
    });

    await expect(service.deleteReport(USER_ID, report.id)).resolves.toEqual({ deleted: true, remoteDeleted: true });
    expect(api.deleteReport).toHaveBeenCalledWith('report-remote');
    expect(localRowDuringCall).toBeUndefined();
  });

  it('treats a report already gone from the backend as deleted', async () => {
    const report = createAt(0, 'Done');
    store.repos.reports.updateSyncStatus(report.id, true, 'report-remote');
    api.deleteReport.mockRejectedValueOnce(new NotFoundError('Report not found'));

    await expect(service.deleteReport(USER_ID, report.id)).resolves.toEqual({ deleted: true, remoteDeleted: true });
  });

  it('still deletes locally when the backend is unreachable', async () => {
    const report = createAt(0, 'Done');
    store.repos.reports.updateSyncStatus(report.id, true, 'report-remote');
    api.deleteReport.mockRejectedValueOnce(new TransientNetworkError('Service unavailable'));

    await expect(service.deleteReport(USER_ID, report.id)).resolves.toEqual({ deleted: true, remoteDeleted: false });
    expect(store.repos.reports.getById(report.id)).toBeUndefined();
  });

  it('returns reports in a time range', () => {
    createAt(0, 'Early');
    createAt(30, 'Middle');
    createAt(120, 'Late');

    const reports = service.getByRange(
      USER_ID,
      new Date(BASE_TIME.getTime() + 10 * 60_000),
      new Date(BASE_TIME.getTime() + 60 * 60_000)
    );

    expect(reports.map(r => r.text)).toEqual(['Middle']);
  });
});
