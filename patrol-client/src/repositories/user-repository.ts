import { randomUUID } from 'crypto';
import { BaseRepository, fromFlag, toFlag } from './base-repository.js';
import type { User } from '../models.js';
import { ValidationError } from '../../../shared/errors.js';

interface UserRow {
  Id: string;
  PhoneNumber: string;
  IsActive: number;
  LastAuthenticated: string | null;
}

export class UserRepository extends BaseRepository<User, string, UserRow> {
  protected readonly table = 'User';

  protected fromRow(row: UserRow): User {
    return {
      id: row.Id,
      phoneNumber: row.PhoneNumber,
      isActive: fromFlag(row.IsActive),
      lastAuthenticated: row.LastAuthenticated,
    };
  }

  protected insertRow(model: User): string {
    return this.insertAs(randomUUID(), model);
  }

  private insertAs(id: string, model: User): string {
    this.db.run(
      'INSERT INTO User (Id, PhoneNumber, IsActive, LastAuthenticated) VALUES (?, ?, ?, ?)',
      [id, model.phoneNumber, toFlag(model.isActive), model.lastAuthenticated]
    );
    return id;
  }

  /** Phone number is the identity and never changes after creation. */
  protected updateRow(model: User): number {
    return this.db.run(
      'UPDATE User SET IsActive = ?, LastAuthenticated = ? WHERE Id = ?',
      [toFlag(model.isActive), model.lastAuthenticated, model.id]
    ).changes;
  }

  getByPhoneNumber(phoneNumber: string): User | undefined {
    return this.inTransaction('getByPhoneNumber', () =>
      this.queryOne('SELECT * FROM User WHERE PhoneNumber = ?', [phoneNumber])
    );
  }

  /**
   * Returns the user for the phone number, creating an active one on first
   * sight. `preferredId` adopts the backend's user id so local rows reference
   * the same identity; a user already stored under the phone number keeps
   * its local id.
   */
  ensureUser(phoneNumber: string, preferredId?: string): User {
    const normalized = phoneNumber.trim();
    if (!normalized) {
      throw new ValidationError('Phone number is required', 'phoneNumber');
    }
    return this.inTransaction('ensureUser', () => {
      const existing = (preferredId ? this.getById(preferredId) : undefined) ?? this.getByPhoneNumber(normalized);
      if (existing) return existing;

      const user: User = { id: '', phoneNumber: normalized, isActive: true, lastAuthenticated: null };
      const id = preferredId ? this.insertAs(preferredId, user) : this.save(user);
      return { ...user, id };
    });
  }

  setActive(id: string, active: boolean): number {
    return this.inTransaction('setActive', () =>
      this.db.run('UPDATE User SET IsActive = ? WHERE Id = ?', [toFlag(active), id]).changes
    );
  }

  recordAuthentication(id: string, at: Date = new Date()): number {
    return this.inTransaction('recordAuthentication', () =>
      this.db.run('UPDATE User SET LastAuthenticated = ? WHERE Id = ?', [at.toISOString(), id]).changes
    );
  }
}
