/**
 * Patrol client
 *
 * Wires the local store, the services officers use while on patrol and the
 * background sync against the backend. Everything works offline; sync picks
 * up whatever is queued once the backend is reachable and a session exists.
 */

import fs from 'fs';
import path from 'path';
import type { PatrolClientConfig } from './config.js';
import { Database } from './db/database.js';
import { SyncQueueRepository, type QueuePolicy } from './repositories/sync-queue-repository.js';
import { UserRepository } from './repositories/user-repository.js';
import { TimeRecordRepository } from './repositories/time-record-repository.js';
import { LocationRepository } from './repositories/location-repository.js';
import { PhotoRepository } from './repositories/photo-repository.js';
import { ReportRepository } from './repositories/report-repository.js';
import { PatrolLocationRepository } from './repositories/patrol-location-repository.js';
import { CheckpointRepository } from './repositories/checkpoint-repository.js';
import { CheckpointVerificationRepository } from './repositories/checkpoint-verification-repository.js';
import { TimeTrackingService } from './services/time-tracking.js';
import { LocationTrackingService } from './services/location-tracking.js';
import { PhotoService } from './services/photo-service.js';
import { ReportService } from './services/report-service.js';
import { PatrolService } from './services/patrol-service.js';
import { ApiClient } from './sync/api-client.js';
import { PatrolApi } from './sync/patrol-api.js';
import type { RemoteApi } from './sync/remote-api.js';
import { AuthSession } from './sync/auth-session.js';
import { SyncEngine } from './sync/sync-engine.js';
import { SyncScheduler } from './sync/sync-scheduler.js';
import { ReferenceSync } from './sync/reference-sync.js';
import { ConnectivityMonitor } from './sync/connectivity.js';
import { getLogger } from './utils/logger.js';
import { toError } from '../../shared/errors.js';

const logger = getLogger('PatrolClient');

export interface PatrolClientOverrides {
  /** Database file; ':memory:' keeps everything in process. */
  dbPath?: string;
  /** Replaces the HTTP backend, e.g. with an in-process fake. */
  api?: RemoteApi;
  /** Disables the realtime connectivity channel. */
  realtime?: boolean;
}

export interface Repositories {
  users: UserRepository;
  timeRecords: TimeRecordRepository;
  locations: LocationRepository;
  photos: PhotoRepository;
  reports: ReportRepository;
  patrolLocations: PatrolLocationRepository;
  checkpoints: CheckpointRepository;
  verifications: CheckpointVerificationRepository;
  syncQueue: SyncQueueRepository;
}

export class PatrolClient {
  readonly db: Database;
  readonly repos: Repositories;
  readonly auth: AuthSession;
  readonly timeTracking: TimeTrackingService;
  readonly locationTracking: LocationTrackingService;
  readonly photos: PhotoService;
  readonly reports: ReportService;
  readonly patrol: PatrolService;
  readonly syncEngine: SyncEngine;
  readonly scheduler: SyncScheduler;
  readonly referenceSync: ReferenceSync;
  readonly connectivity: ConnectivityMonitor | null;
  private started = false;

  constructor(private readonly config: PatrolClientConfig, overrides: PatrolClientOverrides = {}) {
    const dbPath = overrides.dbPath ?? path.join(config.dataDir, 'patrol.db');
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);
    this.db.initialize();

    const syncQueue = new SyncQueueRepository(this.db);
    this.repos = {
      users: new UserRepository(this.db),
      timeRecords: new TimeRecordRepository(this.db, syncQueue),
      locations: new LocationRepository(this.db, syncQueue),
      photos: new PhotoRepository(this.db, syncQueue),
      reports: new ReportRepository(this.db, syncQueue),
      patrolLocations: new PatrolLocationRepository(this.db),
      checkpoints: new CheckpointRepository(this.db),
      verifications: new CheckpointVerificationRepository(this.db, syncQueue),
      syncQueue,
    };

    const apiClient = new ApiClient(config.apiUrl, null, config.requestTimeoutMs);
    const sessionFile = dbPath === ':memory:' ? null : path.join(config.dataDir, 'session.json');
    this.auth = new AuthSession(apiClient, this.repos.users, sessionFile);
    apiClient.setTokenProvider(this.auth);
    const api = overrides.api ?? new PatrolApi(apiClient);

    this.timeTracking = new TimeTrackingService(this.repos.timeRecords);
    this.locationTracking = new LocationTrackingService(this.repos.locations);
    this.photos = new PhotoService(this.repos.photos, path.join(config.dataDir, 'photos'));
    this.reports = new ReportService(this.repos.reports, api);
    this.patrol = new PatrolService(
      this.db,
      this.repos.patrolLocations,
      this.repos.checkpoints,
      this.repos.verifications,
      { proximityRadiusMeters: config.proximityRadiusMeters }
    );

    this.syncEngine = new SyncEngine(this.db, this.repos, api, {
      ...this.queuePolicy(),
      locationBatchSize: config.locationBatchSize,
    });
    this.referenceSync = new ReferenceSync(this.db, api, this.repos.patrolLocations, this.repos.checkpoints);

    this.connectivity = overrides.realtime === false ? null : new ConnectivityMonitor(config.apiUrl, this.auth);
    this.scheduler = new SyncScheduler(
      this.syncEngine,
      this.auth,
      {
        intervalMs: config.syncIntervalMs,
        onCycleComplete: (result, trigger) => {
          if (result.authRequired) {
            logger.warn('Sync needs a new sign-in', { trigger });
          }
        },
      },
      this.connectivity
    );
  }

  queuePolicy(): QueuePolicy {
    return {
      maxRetries: this.config.maxRetries,
      baseDelayMs: this.config.retryBaseDelayMs,
      maxDelayMs: this.config.retryMaxDelayMs,
    };
  }

  /** Restores the session, refreshes reference data when possible and starts background sync. */
  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;

    if (this.auth.restore()) {
      logger.info('Session restored', { userId: this.auth.getUserId() });
      try {
        await this.referenceSync.syncReferenceData();
      } catch (error) {
        logger.warn('Reference data unavailable, using cached copy', { error: toError(error).message });
      }
    }

    this.connectivity?.start();
    this.scheduler.start();
  }

  async stop(): Promise<void> {
    if (!this.started) {
      this.db.close();
      return;
    }
    this.started = false;
    this.connectivity?.stop();
    await this.scheduler.stop();
    this.db.close();
  }
}
