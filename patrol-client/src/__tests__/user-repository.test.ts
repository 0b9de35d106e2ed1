import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createTestStore, type TestStore } from './test-helpers.js';
import { ValidationError } from '../../../shared/errors.js';

describe('UserRepository', () => {
  let store: TestStore;

  beforeEach(() => {
    store = createTestStore();
  });

  afterEach(() => {
    store.db.close();
  });

  describe('ensureUser', () => {
    it('creates an active user on first sight', () => {
      const user = store.repos.users.ensureUser('+15550100');

      expect(user).toEqual({ id: user.id, phoneNumber: '+15550100', isActive: true, lastAuthenticated: null });
      expect(user.id).not.toBe('');
      expect(store.repos.users.getById(user.id)).toEqual(user);
    });

    it('returns the same user on later calls', () => {
      const first = store.repos.users.ensureUser('+15550100');
      const second = store.repos.users.ensureUser('+15550100');

      expect(second).toEqual(first);
      expect(store.repos.users.getAll()).toHaveLength(1);
    });

    it('trims the phone number', () => {
      const user = store.repos.users.ensureUser('  +15550100 ');

      expect(user.phoneNumber).toBe('+15550100');
      expect(store.repos.users.ensureUser('+15550100').id).toBe(user.id);
    });

    it('rejects an empty phone number', () => {
      expect(() => store.repos.users.ensureUser('   ')).toThrow(ValidationError);
      expect(store.repos.users.getAll()).toEqual([]);
    });

    it('adopts a preferred id for a new user', () => {
      const user = store.repos.users.ensureUser('+15550100', 'server-user-1');

      expect(user.id).toBe('server-user-1');
      expect(store.repos.users.getByPhoneNumber('+15550100')?.id).toBe('server-user-1');
    });

    it('keeps the local id of a known phone number', () => {
      const local = store.repos.users.ensureUser('+15550100');

      expect(store.repos.users.ensureUser('+15550100', 'server-user-1').id).toBe(local.id);
      expect(store.repos.users.getAll()).toHaveLength(1);
    });
  });

  it('activates and deactivates a user', () => {
    const user = store.repos.users.ensureUser('+15550100');

    expect(store.repos.users.setActive(user.id, false)).toBe(1);
    expect(store.repos.users.getById(user.id)?.isActive).toBe(false);
    expect(store.repos.users.setActive('missing', true)).toBe(0);
  });

  it('records the last authentication time', () => {
    const user = store.repos.users.ensureUser('+15550100');

    store.repos.users.recordAuthentication(user.id, new Date('2024-03-01T08:00:00.000Z'));

    expect(store.repos.users.getById(user.id)?.lastAuthenticated).toBe('2024-03-01T08:00:00.000Z');
  });
});
