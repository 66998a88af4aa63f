import { ConfigService } from '@nestjs/config';
import { JwtService as NestJwtService } from '@nestjs/jwt';
import { FixedClock } from '@cloudmedia/common/clock';
import { AppConfig, loadConfig } from '@cloudmedia/common/config';
import { ErrorCode } from '@cloudmedia/common/errors';
import { JwtService } from './jwt.service';

describe('JwtService', () => {
  let clock: FixedClock;
  let service: JwtService;

  function createService(secret: string): JwtService {
    const config = new ConfigService<AppConfig, true>(
      loadConfig({ JWT_SECRET: secret, JWT_EXPIRE_MINUTES: '60' }),
    );
    return new JwtService(new NestJwtService({ secret }), config, clock);
  }

  beforeEach(() => {
    clock = new FixedClock('2026-03-01T10:00:00Z');
    service = createService('test-secret');
  });

  it('should issue tokens whose claims round-trip', () => {
    const token = service.issueToken({ subjectId: 'user-1', email: 'a@x.com' });

    expect(service.verifyToken(token)).toEqual({
      sub: 'user-1',
      email: 'a@x.com',
      iat: 1772359200,
      exp: 1772359200 + 3600,
    });
    expect(service.expiresInSeconds).toBe(3600);
  });

  it('should reject a token once the clock passes exp', () => {
    const token = service.issueToken({ subjectId: 'user-1', email: 'a@x.com' });
    clock.advance(3601 * 1000);

    expect(() => service.verifyToken(token)).toThrow(
      expect.objectContaining({ code: ErrorCode.TokenExpired, httpStatusCode: 401 }),
    );
  });

  it('should reject a token signed with another secret', () => {
    const token = createService('other-secret').issueToken({ subjectId: 'user-1', email: 'a@x.com' });

    expect(() => service.verifyToken(token)).toThrow(expect.objectContaining({ code: ErrorCode.TokenInvalid }));
  });

  it('should reject a tampered payload', () => {
    const [header, , signature] = service.issueToken({ subjectId: 'user-1', email: 'a@x.com' }).split('.');
    const forged = Buffer.from(JSON.stringify({ sub: 'user-2', email: 'b@x.com', iat: 1, exp: 9999999999 })).toString(
      'base64url',
    );

    expect(() => service.verifyToken(`${header}.${forged}.${signature}`)).toThrow(
      expect.objectContaining({ code: ErrorCode.TokenInvalid }),
    );
  });

  it('should reject garbage and tokens without the session claims', () => {
    const nest = new NestJwtService({ secret: 'test-secret' });
    const noEmail = nest.sign({ sub: 'user-1', iat: 1772359200, exp: 1772362800 });

    expect(() => service.verifyToken('not-a-jwt')).toThrow(expect.objectContaining({ code: ErrorCode.TokenInvalid }));
    expect(() => service.verifyToken(noEmail)).toThrow(expect.objectContaining({ code: ErrorCode.TokenInvalid }));
  });
});
