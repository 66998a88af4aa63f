/**
 * Cloud Media JWT Types
 */

export interface SessionClaims {
  sub: string; // user UUID
  email: string;
  iat: number; // issued at (seconds)
  exp: number; // expiration (seconds)
}

export interface TokenSubject {
  subjectId: string;
  email: string;
}
