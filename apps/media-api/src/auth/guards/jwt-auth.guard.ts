/**
 * JWT Auth Guard
 * Requires `Authorization: Bearer <token>` and attaches the token subject to the request
 */

import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Request } from 'express';
import { ERRORS } from '@cloudmedia/common/errors';
import { JwtService, TokenSubject } from '@cloudmedia/common/jwt';

@Injectable()
export class JwtAuthGuard implements CanActivate {
  constructor(private jwtService: JwtService) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request & { user?: TokenSubject }>();

    const token = this.extractTokenFromHeader(request);
    if (!token) {
      throw ERRORS.TokenMissing();
    }

    // Throws TokenExpired / TokenInvalid
    const claims = this.jwtService.verifyToken(token);
    request.user = { subjectId: claims.sub, email: claims.email };

    return true;
  }

  /**
   * Extract Bearer token from Authorization header
   */
  private extractTokenFromHeader(request: Request): string | null {
    const authHeader = request.headers.authorization;
    if (!authHeader) {
      return null;
    }

    const [type, token] = authHeader.split(' ');
    if (type !== 'Bearer' || !token) {
      return null;
    }

    return token;
  }
}
