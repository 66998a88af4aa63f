import { UrlSignerService } from './url-signer.service';

describe('UrlSignerService', () => {
  const signer = new UrlSignerService();
  const expiresAt = 1772362800;

  it('should produce the HMAC-SHA256 of resource and expiry', () => {
    expect(signer.sign('test-secret', 'media-files/owner-a/20260301100000_abcd1234.jpg', expiresAt)).toBe(
      'a9c558244851a95d7d3320f70116e2d3669d26867c4c2bb5d69fbe76dff9fb3d',
    );
  });

  it('should verify its own signatures', () => {
    const signature = signer.sign('test-secret', 'media-files/a.jpg', expiresAt);

    expect(signer.verify('test-secret', 'media-files/a.jpg', expiresAt, signature)).toBe(true);
  });

  it('should refuse a changed resource, expiry or secret', () => {
    const signature = signer.sign('test-secret', 'media-files/a.jpg', expiresAt);

    expect(signer.verify('test-secret', 'media-files/b.jpg', expiresAt, signature)).toBe(false);
    expect(signer.verify('test-secret', 'media-files/a.jpg', expiresAt + 1, signature)).toBe(false);
    expect(signer.verify('other-secret', 'media-files/a.jpg', expiresAt, signature)).toBe(false);
  });

  it('should refuse signatures that are not 64 hex characters', () => {
    expect(signer.verify('test-secret', 'media-files/a.jpg', expiresAt, 'abc')).toBe(false);
    expect(signer.verify('test-secret', 'media-files/a.jpg', expiresAt, 'Z'.repeat(64))).toBe(false);
  });
});
