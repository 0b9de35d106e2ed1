/**
 * Phone-number session for the patrol client
 *
 * Login is two steps: request a one-time code, then validate it for a JWT.
 * The token is kept in memory and, when a session file is configured,
 * persisted so a restarted client stays signed in until it expires.
 */

import fs from 'fs';
import path from 'path';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import type { ApiClient, TokenProvider } from './api-client.js';
import type { UserRepository } from '../repositories/user-repository.js';
import type { User } from '../models.js';
import { requestCodeSchema, validateCodeSchema, type TokenResponse } from '../../../shared/schema.js';
import { UnauthorizedError, ValidationError, toError } from '../../../shared/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger('AuthSession');

/** Tokens this close to expiry are treated as expired. */
const EXPIRY_SKEW_MS = 30_000;

const tokenResponseSchema = z.object({
  token: z.string().min(1),
  expiresAt: isoString(),
  userId: z.string().min(1),
});

const verificationResponseSchema = z.object({ verificationId: z.string().min(1) });

const storedSessionSchema = tokenResponseSchema.extend({
  phoneNumber: z.string(),
});

type StoredSession = z.infer<typeof storedSessionSchema>;

function isoString() {
  return z.string().refine(value => !Number.isNaN(Date.parse(value)), 'Invalid timestamp');
}

/** Reads `exp` from a token without verifying it; the backend verifies. */
export function tokenExpiry(token: string): Date | null {
  const payload = jwt.decode(token);
  if (payload === null || typeof payload === 'string' || typeof payload.exp !== 'number') {
    return null;
  }
  return new Date(payload.exp * 1000);
}

export class AuthSession implements TokenProvider {
  private session: StoredSession | null = null;

  constructor(
    private readonly client: ApiClient,
    private readonly users: UserRepository,
    private readonly sessionFile: string | null = null,
    private readonly clock: () => Date = () => new Date()
  ) {}

  isTokenValid(): boolean {
    if (!this.session) return false;
    return Date.parse(this.session.expiresAt) - EXPIRY_SKEW_MS > this.clock().getTime();
  }

  getToken(): string {
    if (!this.session || !this.isTokenValid()) {
      throw new UnauthorizedError('Not signed in');
    }
    return this.session.token;
  }

  getUserId(): string | null {
    return this.session?.userId ?? null;
  }

  getExpiresAt(): string | null {
    return this.session?.expiresAt ?? null;
  }

  async requestCode(phoneNumber: string): Promise<string> {
    const parsed = requestCodeSchema.safeParse({ phoneNumber });
    if (!parsed.success) {
      throw new ValidationError(parsed.error.issues[0]?.message ?? 'Invalid phone number', 'phoneNumber');
    }
    const result = await this.client.post('/auth/verify', parsed.data, verificationResponseSchema, {
      authenticated: false,
    });
    logger.info('Verification code requested');
    return result.verificationId;
  }

  /** Exchanges a one-time code for a token and records the local user. */
  async validateCode(phoneNumber: string, verificationId: string, code: string): Promise<User> {
    const parsed = validateCodeSchema.safeParse({ phoneNumber, verificationId, code });
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(issue?.message ?? 'Invalid code', issue?.path.join('.'));
    }

    const response = await this.client.post('/auth/validate', parsed.data, tokenResponseSchema, {
      authenticated: false,
    });

    const user = this.users.ensureUser(parsed.data.phoneNumber, response.userId);
    this.users.recordAuthentication(user.id, this.clock());
    this.setSession({ ...response, userId: user.id, phoneNumber: parsed.data.phoneNumber });

    logger.info('Signed in', { userId: user.id, expiresAt: response.expiresAt });
    return user;
  }

  async refresh(): Promise<TokenResponse> {
    const current = this.session;
    if (!current || !this.isTokenValid()) {
      throw new UnauthorizedError('Session expired, sign in again');
    }
    const response = await this.client.post('/auth/refresh', {}, tokenResponseSchema);
    this.setSession({ ...current, token: response.token, expiresAt: response.expiresAt });
    logger.debug('Token refreshed', { expiresAt: response.expiresAt });
    return { token: response.token, expiresAt: response.expiresAt, userId: current.userId };
  }

  /** Loads a persisted session; returns false when none is usable. */
  restore(): boolean {
    if (!this.sessionFile || !fs.existsSync(this.sessionFile)) return false;

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.sessionFile, 'utf-8'));
    } catch (error) {
      logger.warn('Ignoring unreadable session file', { file: this.sessionFile, error: toError(error).message });
      return false;
    }

    const parsed = storedSessionSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn('Ignoring malformed session file', { file: this.sessionFile });
      return false;
    }

    const expiry = tokenExpiry(parsed.data.token);
    const expiresAt = expiry ? expiry.toISOString() : parsed.data.expiresAt;
    this.session = { ...parsed.data, expiresAt };
    if (!this.isTokenValid()) {
      this.session = null;
      return false;
    }
    this.users.ensureUser(parsed.data.phoneNumber, parsed.data.userId);
    return true;
  }

  logout(): void {
    this.session = null;
    if (this.sessionFile) {
      fs.rmSync(this.sessionFile, { force: true });
    }
  }

  private setSession(session: StoredSession): void {
    this.session = session;
    if (!this.sessionFile) return;
    fs.mkdirSync(path.dirname(this.sessionFile), { recursive: true });
    fs.writeFileSync(this.sessionFile, JSON.stringify(session), { mode: 0o600 });
  }
}
