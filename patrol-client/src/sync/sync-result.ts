import type { EntityType } from '../models.js';

export interface SyncFailure {
  entityType: EntityType;
  entityId: string;
  message: string;
  /** Rejected by the backend; will not be retried until re-armed. */
  terminal: boolean;
}

export class SyncResult {
  successCount = 0;
  failureCount = 0;
  /** Queue rows still eligible for a later drain. */
  pendingCount = 0;
  authRequired = false;
  cancelled = false;
  readonly synced: Array<{ entityType: EntityType; entityId: string }> = [];
  readonly failures: SyncFailure[] = [];

  recordSuccess(entityType: EntityType, entityId: string): void {
    this.successCount++;
    this.synced.push({ entityType, entityId });
  }

  recordFailure(entityType: EntityType, entityId: string, message: string, terminal: boolean): void {
    this.failureCount++;
    this.failures.push({ entityType, entityId, message, terminal });
  }

  hasFailures(): boolean {
    return this.failureCount > 0;
  }

  getTotalCount(): number {
    return this.successCount + this.failureCount;
  }

  /** Percentage of attempted items that succeeded; 100 when nothing was attempted. */
  getSuccessRate(): number {
    const total = this.getTotalCount();
    if (total === 0) return 100;
    return (this.successCount / total) * 100;
  }

  merge(other: SyncResult): this {
    this.successCount += other.successCount;
    this.failureCount += other.failureCount;
    this.pendingCount += other.pendingCount;
    this.authRequired = this.authRequired || other.authRequired;
    this.cancelled = this.cancelled || other.cancelled;
    this.synced.push(...other.synced);
    this.failures.push(...other.failures);
    return this;
  }

  toJSON(): Record<string, unknown> {
    return {
      successCount: this.successCount,
      failureCount: this.failureCount,
      pendingCount: this.pendingCount,
      authRequired: this.authRequired,
      cancelled: this.cancelled,
      successRate: this.getSuccessRate(),
      failures: this.failures,
    };
  }
}
