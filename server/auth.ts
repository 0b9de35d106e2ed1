/**
 * Phone-number authentication
 *
 * POST /auth/verify issues a six-digit code through an SmsSender and returns
 * a verification id; POST /auth/validate exchanges id + code for a JWT.
 * Protected routes go through the auth middleware, which rejects before any
 * handler runs.
 */

import { randomInt, randomUUID } from "crypto";
import jwt, { type JwtPayload } from "jsonwebtoken";
import type { Request, Response, NextFunction } from "express";
import { UnauthorizedError } from "../shared/errors.js";
import { log } from "./logger.js";

export interface AuthenticatedRequest extends Request {
  userId?: string;
}

export interface TokenClaims {
  userId: string;
  phoneNumber: string;
}

export interface IssuedToken {
  token: string;
  expiresAt: string;
}

export class TokenService {
  constructor(
    private readonly secret: string,
    private readonly ttlSeconds: number,
    private readonly now: () => number = Date.now
  ) {}

  issue(claims: TokenClaims): IssuedToken {
    const issuedAt = Math.floor(this.now() / 1000);
    const exp = issuedAt + this.ttlSeconds;
    const token = jwt.sign(
      { phoneNumber: claims.phoneNumber, iat: issuedAt, exp },
      this.secret,
      { algorithm: "HS256", subject: claims.userId }
    );
    return { token, expiresAt: new Date(exp * 1000).toISOString() };
  }

  verify(token: string): TokenClaims {
    let payload: string | JwtPayload;
    try {
      payload = jwt.verify(token, this.secret, {
        algorithms: ["HS256"],
        clockTimestamp: Math.floor(this.now() / 1000),
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new UnauthorizedError("Token expired");
      }
      throw new UnauthorizedError("Invalid token");
    }
    if (typeof payload === "string" || !payload.sub || typeof payload.phoneNumber !== "string") {
      throw new UnauthorizedError("Invalid token");
    }
    return { userId: payload.sub, phoneNumber: payload.phoneNumber };
  }
}

export interface SmsSender {
  send(phoneNumber: string, message: string): Promise<void>;
}

/** Writes codes to the server log. Stands in for an SMS gateway outside production. */
export class LoggingSmsSender implements SmsSender {
  async send(phoneNumber: string, message: string): Promise<void> {
    log(`SMS to ${phoneNumber}: ${message}`, "sms");
  }
}

interface PendingVerification {
  phoneNumber: string;
  code: string;
  expiresAt: number;
  attempts: number;
}

const MAX_CODE_ATTEMPTS = 5;

export class VerificationCodeStore {
  private pending = new Map<string, PendingVerification>();

  constructor(
    private readonly ttlSeconds: number,
    private readonly now: () => number = Date.now
  ) {}

  create(phoneNumber: string): { verificationId: string; code: string } {
    this.prune();
    const verificationId = randomUUID();
    const code = String(randomInt(0, 1_000_000)).padStart(6, "0");
    this.pending.set(verificationId, {
      phoneNumber,
      code,
      expiresAt: this.now() + this.ttlSeconds * 1000,
      attempts: 0,
    });
    return { verificationId, code };
  }

  /** Single use: a matching code consumes the verification. */
  consume(verificationId: string, phoneNumber: string, code: string): void {
    const entry = this.pending.get(verificationId);
    if (!entry || entry.phoneNumber !== phoneNumber) {
      throw new UnauthorizedError("Unknown verification");
    }
    if (entry.expiresAt <= this.now()) {
      this.pending.delete(verificationId);
      throw new UnauthorizedError("Verification code expired");
    }
    if (entry.code !== code) {
      entry.attempts++;
      if (entry.attempts >= MAX_CODE_ATTEMPTS) {
        this.pending.delete(verificationId);
      }
      throw new UnauthorizedError("Invalid verification code");
    }
    this.pending.delete(verificationId);
  }

  private prune(): void {
    const now = this.now();
    for (const [id, entry] of this.pending) {
      if (entry.expiresAt <= now) this.pending.delete(id);
    }
  }
}

export function extractBearerToken(header: string | undefined): string | null {
  if (!header?.startsWith("Bearer ")) return null;
  const token = header.substring(7).trim();
  return token || null;
}

export function createAuthMiddleware(tokens: TokenService) {
  return (req: AuthenticatedRequest, _res: Response, next: NextFunction) => {
    const token = extractBearerToken(req.headers.authorization);
    if (!token) {
      return next(new UnauthorizedError("Authentication required"));
    }
    try {
      req.userId = tokens.verify(token).userId;
      next();
    } catch (error) {
      next(error);
    }
  };
}

export function requireUserId(req: AuthenticatedRequest): string {
  if (!req.userId) {
    throw new UnauthorizedError("Authentication required");
  }
  return req.userId;
}
