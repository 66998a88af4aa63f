/**
 * Cloud Media URL Signer
 * HMAC-SHA256 signatures for time-limited object URLs
 */

import { Injectable } from '@nestjs/common';
import * as crypto from 'crypto';

@Injectable()
export class UrlSignerService {
  /**
   * Sign `<resource>:<expiresAt>` with the given secret (hex digest)
   */
  sign(secret: string, resource: string, expiresAt: number): string {
    return crypto
      .createHmac('sha256', secret)
      .update(`${resource}:${expiresAt}`)
      .digest('hex');
  }

  /**
   * Check a signature in constant time
   */
  verify(secret: string, resource: string, expiresAt: number, signature: string): boolean {
    if (!/^[0-9a-f]{64}$/.test(signature)) {
      return false;
    }

    const expected = Buffer.from(this.sign(secret, resource, expiresAt), 'hex');
    const actual = Buffer.from(signature, 'hex');

    return crypto.timingSafeEqual(expected, actual);
  }
}
