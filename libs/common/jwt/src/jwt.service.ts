/**
 * Cloud Media JWT Service
 * Session tokens signed with the server secret (HS256 by default)
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService as NestJwtService } from '@nestjs/jwt';
import { Clock } from '@cloudmedia/common/clock';
import type { AppConfig, JwtAlgorithm } from '@cloudmedia/common/config';
import { ERRORS, describeError } from '@cloudmedia/common/errors';
import { SessionClaims, TokenSubject } from './jwt.types';

@Injectable()
export class JwtService {
  private readonly logger = new Logger(JwtService.name);
  private readonly algorithm: JwtAlgorithm;
  private readonly ttlSeconds: number;

  constructor(
    private nestJwtService: NestJwtService,
    configService: ConfigService<AppConfig, true>,
    private clock: Clock,
  ) {
    this.algorithm = configService.get('jwtAlgorithm', { infer: true });
    this.ttlSeconds = configService.get('jwtExpireMinutes', { infer: true }) * 60;
  }

  /**
   * Issue a session token for a user; expiry is JWT_EXPIRE_MINUTES from now
   */
  issueToken(subject: TokenSubject): string {
    const now = this.nowSeconds();
    const claims: SessionClaims = {
      sub: subject.subjectId,
      email: subject.email,
      iat: now,
      exp: now + this.ttlSeconds,
    };

    return this.nestJwtService.sign(claims, { algorithm: this.algorithm });
  }

  /**
   * Verify signature, algorithm and expiry.
   * Throws TokenExpired past `exp`, TokenInvalid for anything else.
   */
  verifyToken(token: string): SessionClaims {
    let payload: unknown;
    try {
      payload = this.nestJwtService.verify<object>(token, {
        algorithms: [this.algorithm],
        clockTimestamp: this.nowSeconds(),
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'TokenExpiredError') {
        throw ERRORS.TokenExpired(error);
      }
      this.logger.warn(`JWT verification failed: ${describeError(error)}`);
      throw ERRORS.TokenInvalid(error);
    }

    if (!isSessionClaims(payload)) {
      this.logger.warn('JWT payload validation failed: invalid structure');
      throw ERRORS.TokenInvalid();
    }

    return payload;
  }

  get expiresInSeconds(): number {
    return this.ttlSeconds;
  }

  private nowSeconds(): number {
    return Math.floor(this.clock.now().getTime() / 1000);
  }
}

function isSessionClaims(payload: unknown): payload is SessionClaims {
  if (typeof payload !== 'object' || payload === null) {
    return false;
  }

  return (
    'sub' in payload &&
    typeof payload.sub === 'string' &&
    payload.sub.length > 0 &&
    'email' in payload &&
    typeof payload.email === 'string' &&
    'iat' in payload &&
    typeof payload.iat === 'number' &&
    'exp' in payload &&
    typeof payload.exp === 'number'
  );
}
