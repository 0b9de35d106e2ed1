import fs from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import type { PhotoRepository } from '../repositories/photo-repository.js';
import type { Photo } from '../models.js';
import { isValidCoordinate } from '../../../shared/geo.js';
import { NotFoundError, StorageError, ValidationError, toError } from '../../../shared/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger('PhotoService');

/**
 * Photo capture: the image file is written first, then the metadata row and
 * its queue entry. If the row cannot be stored the file is removed again.
 */
export class PhotoService {
  constructor(
    private readonly photos: PhotoRepository,
    private readonly photoDir: string,
    private readonly clock: () => Date = () => new Date()
  ) {}

  capturePhoto(userId: string, content: Buffer, latitude: number, longitude: number): Photo {
    if (content.length === 0) {
      throw new ValidationError('Photo content is empty', 'content');
    }
    if (!isValidCoordinate(latitude, longitude)) {
      throw new ValidationError('Invalid coordinates', 'latitude');
    }

    const filePath = path.join(this.photoDir, `${randomUUID()}.jpg`);
    try {
      fs.mkdirSync(this.photoDir, { recursive: true });
      fs.writeFileSync(filePath, content);
    } catch (error) {
      const cause = toError(error);
      throw new StorageError(`Failed to write photo file: ${cause.message}`, cause);
    }

    const photo: Photo = {
      id: '',
      userId,
      timestamp: this.clock().toISOString(),
      latitude,
      longitude,
      filePath,
      isSynced: false,
      syncProgress: 0,
      remoteId: null,
    };

    try {
      photo.id = this.photos.save(photo);
    } catch (error) {
      this.removeFile(filePath);
      throw error;
    }

    logger.info('Photo captured', { userId, id: photo.id, bytes: content.length });
    return photo;
  }

  getPhoto(id: string): Photo {
    const photo = this.photos.getById(id);
    if (!photo) {
      throw new NotFoundError(`Photo ${id} not found`);
    }
    return photo;
  }

  getPhotoContent(id: string): Buffer {
    const photo = this.getPhoto(id);
    try {
      return fs.readFileSync(photo.filePath);
    } catch (error) {
      const cause = toError(error);
      throw new StorageError(`Failed to read photo file: ${cause.message}`, cause);
    }
  }

  getPhotos(userId: string): Photo[] {
    return this.photos.getForUser(userId);
  }

  /** Removes the row (and its queue entry), then the file. */
  deletePhoto(id: string): boolean {
    const photo = this.photos.getById(id);
    if (!photo) return false;
    this.photos.delete(id);
    this.removeFile(photo.filePath);
    return true;
  }

  private removeFile(filePath: string): void {
    try {
      fs.rmSync(filePath, { force: true });
    } catch (error) {
      logger.warn('Failed to remove photo file', { filePath, error: toError(error).message });
    }
  }
}
