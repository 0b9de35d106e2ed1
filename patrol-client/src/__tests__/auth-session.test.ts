import fs from 'fs';
import os from 'os';
import path from 'path';
import jwt from 'jsonwebtoken';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ApiClient } from '../sync/api-client.js';
import { AuthSession, tokenExpiry } from '../sync/auth-session.js';
import { createTestStore, type TestStore } from './test-helpers.js';
import { UnauthorizedError, ValidationError } from '../../../shared/errors.js';

const PHONE = '+15550100';
const SERVER_USER_ID = 'server-user-1';

const mockFetch = vi.fn(async (_url: string, _init?: RequestInit): Promise<Response> => new Response(null, { status: 500 }));

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), { status: 200, headers: { 'Content-Type': 'application/json' } });
}

function signToken(expiresInSeconds: number): string {
  return jwt.sign(
    { phoneNumber: PHONE, exp: Math.floor(Date.now() / 1000) + expiresInSeconds },
    'test-secret',
    { subject: SERVER_USER_ID }
  );
}

describe('AuthSession', () => {
  let store: TestStore;
  let dir: string;
  let sessionFile: string;
  let client: ApiClient;
  let session: AuthSession;

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
    store = createTestStore();
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'patrol-session-'));
    sessionFile = path.join(dir, 'session.json');
    client = new ApiClient('http://patrol.test', null);
    session = new AuthSession(client, store.repos.users, sessionFile);
    client.setTokenProvider(session);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    store.db.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('rejects a malformed phone number before calling the backend', async () => {
    await expect(session.requestCode('call me')).rejects.toThrow(ValidationError);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('requests a code without a token', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ verificationId: 'verification-1' }));

    await expect(session.requestCode(PHONE)).resolves.toBe('verification-1');
    expect(mockFetch.mock.calls[0]?.[0]).toBe('http://patrol.test/auth/verify');
    expect(new Headers(mockFetch.mock.calls[0]?.[1]?.headers).has('Authorization')).toBe(false);
  });

  it('signs in with a valid code and adopts the backend user id', async () => {
    const token = signToken(3600);
    const expiresAt = new Date(Date.now() + 3600 * 1000).toISOString();
    mockFetch.mockResolvedValueOnce(jsonResponse({ token, expiresAt, userId: SERVER_USER_ID }));

    const user = await session.validateCode(PHONE, 'verification-1', '123456');

    expect(user.id).toBe(SERVER_USER_ID);
    expect(store.repos.users.getById(SERVER_USER_ID)?.lastAuthenticated).not.toBeNull();
    expect(session.isTokenValid()).toBe(true);
    expect(session.getToken()).toBe(token);
    expect(session.getUserId()).toBe(SERVER_USER_ID);
    expect(fs.existsSync(sessionFile)).toBe(true);
  });

  it('rejects a code that is not six digits', async () => {
    await expect(session.validateCode(PHONE, 'verification-1', '12ab')).rejects.toThrow('Code must be 6 digits');
  });

  it('restores a persisted session in a new process', async () => {
    const token = signToken(3600);
    mockFetch.mockResolvedValueOnce(jsonResponse({
      token,
      expiresAt: new Date(Date.now() + 3600 * 1000).toISOString(),
      userId: SERVER_USER_ID,
    }));
    await session.validateCode(PHONE, 'verification-1', '123456');

    const restored = new AuthSession(client, store.repos.users, sessionFile);

    expect(restored.restore()).toBe(true);
    expect(restored.getUserId()).toBe(SERVER_USER_ID);
    expect(restored.getToken()).toBe(token);
  });

  it('ignores an expired persisted session', () => {
    fs.writeFileSync(sessionFile, JSON.stringify({
      token: signToken(-60),
      expiresAt: new Date(Date.now() + 3600 * 1000).toISOString(),
      userId: SERVER_USER_ID,
      phoneNumber: PHONE,
    }));

    expect(session.restore()).toBe(false);
    expect(session.isTokenValid()).toBe(false);
  });

  it('ignores a malformed session file', () => {
    fs.writeFileSync(sessionFile, '{"token":');

    expect(session.restore()).toBe(false);
  });

  it('refuses to hand out a token when signed out', () => {
    expect(() => session.getToken()).toThrow(UnauthorizedError);
  });

  it('clears the session file on logout', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({
      token: signToken(3600),
      expiresAt: new Date(Date.now() + 3600 * 1000).toISOString(),
      userId: SERVER_USER_ID,
    }));
    await session.validateCode(PHONE, 'verification-1', '123456');

    session.logout();

    expect(session.isTokenValid()).toBe(false);
    expect(fs.existsSync(sessionFile)).toBe(false);
  });
});

describe('tokenExpiry', () => {
  it('reads exp from the token', () => {
    const exp = Math.floor(Date.now() / 1000) + 600;
    const token = jwt.sign({ exp }, 'test-secret');

    expect(tokenExpiry(token)?.getTime()).toBe(exp * 1000);
  });

  it('returns null for tokens it cannot read', () => {
    expect(tokenExpiry('not-a-token')).toBeNull();
  });
});
