import { ConfigService } from '@nestjs/config';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import { FixedClock } from '@cloudmedia/common/clock';
import { AppConfig, loadConfig } from '@cloudmedia/common/config';
import { UrlSignerService } from '@cloudmedia/common/crypto';
import { ErrorCode } from '@cloudmedia/common/errors';
import { DiskObjectStore } from './disk-object-store';

const NOW_SECONDS = 1772359200; // 2026-03-01T10:00:00Z

async function readAll(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('utf8');
}

describe('DiskObjectStore', () => {
  let basePath: string;
  let clock: FixedClock;
  let store: DiskObjectStore;

  beforeEach(async () => {
    basePath = await fs.mkdtemp(path.join(os.tmpdir(), 'disk-object-store-'));
    clock = new FixedClock('2026-03-01T10:00:00Z');
    const config = new ConfigService<AppConfig, true>(
      loadConfig({
        STORAGE_BASE_PATH: basePath,
        STORAGE_SIGNING_SECRET: 'test-secret',
        PUBLIC_BASE_URL: 'http://media.test/',
        SIGNED_URL_TTL_SECONDS: '3600',
      }),
    );
    store = new DiskObjectStore(config, new UrlSignerService(), clock);
  });

  afterEach(async () => {
    await fs.rm(basePath, { recursive: true, force: true });
  });

  it('should require a signing secret', () => {
    const config = new ConfigService<AppConfig, true>(loadConfig({ STORAGE_BASE_PATH: basePath }));

    expect(() => new DiskObjectStore(config, new UrlSignerService(), clock)).toThrow(
      'STORAGE_SIGNING_SECRET is required for the disk object store',
    );
  });

  describe('upload', () => {
    it('should write under the container and return a generated name with a signed URL', async () => {
      const result = await store.upload(Readable.from([Buffer.from('hello')]), 'owner-a', 'cat.png', 'image/png', 5);

      expect(result.storedName).toMatch(/^owner-a\/20260301100000_[0-9a-f]{8}\.png$/);
      expect(result.url).toMatch(
        new RegExp(`^http://media\\.test/api/files/${result.storedName}\\?expires=${NOW_SECONDS + 3600}&signature=[0-9a-f]{64}$`),
      );
      const written = await fs.readFile(path.join(basePath, 'media-files', result.storedName), 'utf8');
      expect(written).toBe('hello');
    });
  });

  describe('signUrl', () => {
    it('should sign container/name with the expiry', async () => {
      const url = await store.signUrl('owner-a/20260301100000_abcd1234.jpg');

      expect(url).toBe(
        'http://media.test/api/files/owner-a/20260301100000_abcd1234.jpg' +
          '?expires=1772362800&signature=a9c558244851a95d7d3320f70116e2d3669d26867c4c2bb5d69fbe76dff9fb3d',
      );
    });

    it('should give equal URLs for equal inputs at the same instant', async () => {
      const first = await store.signUrl('owner-a/x.jpg', 60);
      const second = await store.signUrl('owner-a/x.jpg', 60);

      expect(first).toBe(second);
      expect(first).toContain(`expires=${NOW_SECONDS + 60}&`);
    });

    it.each(['../escape.jpg', 'owner-a/../../escape.jpg', '/etc/passwd', 'owner-a\\x.jpg', ''])(
      'should reject the path %p',
      async (storedName) => {
        await expect(store.signUrl(storedName)).rejects.toMatchObject({ code: ErrorCode.InvalidPath });
      },
    );
  });

  describe('openSigned', () => {
    const storedName = 'owner-a/20260301100000_abcd1234.jpg';

    beforeEach(async () => {
      await store.put(storedName, Readable.from([Buffer.from('jpeg-bytes')]), 'image/jpeg', 10);
    });

    function queryOf(url: string): URLSearchParams {
      return new URL(url).searchParams;
    }

    it('should stream the file for a valid signature', async () => {
      const query = queryOf(await store.signUrl(storedName));

      const file = await store.openSigned(storedName, query.get('expires') ?? undefined, query.get('signature') ?? undefined);

      expect(file.contentType).toBe('image/jpeg');
      expect(file.sizeBytes).toBe(10);
      expect(await readAll(file.stream)).toBe('jpeg-bytes');
    });

    it('should refuse an expired URL', async () => {
      const query = queryOf(await store.signUrl(storedName, 60));
      clock.advance(61_000);

      await expect(
        store.openSigned(storedName, query.get('expires') ?? undefined, query.get('signature') ?? undefined),
      ).rejects.toMatchObject({ code: ErrorCode.SignedUrlExpired, httpStatusCode: 401 });
    });

    it('should refuse a signature for another object', async () => {
      const query = queryOf(await store.signUrl('owner-b/other.jpg'));

      await expect(
        store.openSigned(storedName, query.get('expires') ?? undefined, query.get('signature') ?? undefined),
      ).rejects.toMatchObject({ code: ErrorCode.SignedUrlExpired });
    });

    it('should refuse a missing signature', async () => {
      await expect(store.openSigned(storedName, String(NOW_SECONDS + 60), undefined)).rejects.toMatchObject({
        code: ErrorCode.SignedUrlExpired,
      });
    });

    async function openWithSignature(name: string) {
      const query = queryOf(await store.signUrl(name));
      return store.openSigned(name, query.get('expires') ?? undefined, query.get('signature') ?? undefined);
    }

    it('should serve the content type given at write time for an extensionless name', async () => {
      const { storedName: bare } = await store.upload(Readable.from([Buffer.from('jpeg')]), 'owner-a', 'photo', 'image/jpeg', 4);
      expect(bare).toMatch(/^owner-a\/20260301100000_[0-9a-f]{8}$/);

      const file = await openWithSignature(bare);

      expect(file.contentType).toBe('image/jpeg');
      expect(await readAll(file.stream)).toBe('jpeg');
    });

    it('should serve a configured type the extension table does not know', async () => {
      await store.put('owner-a/pic.heic', Readable.from([Buffer.from('heic')]), 'image/heic', 4);

      expect((await openWithSignature('owner-a/pic.heic')).contentType).toBe('image/heic');
    });

    it('should fall back to the extension when no content type was recorded', async () => {
      await fs.mkdir(path.join(basePath, 'media-files', 'owner-a'), { recursive: true });
      await fs.writeFile(path.join(basePath, 'media-files', 'owner-a', 'legacy.png'), 'png');

      expect((await openWithSignature('owner-a/legacy.png')).contentType).toBe('image/png');
    });

    it('should report a deleted object as not found', async () => {
      const query = queryOf(await store.signUrl(storedName));
      await store.delete(storedName);

      await expect(
        store.openSigned(storedName, query.get('expires') ?? undefined, query.get('signature') ?? undefined),
      ).rejects.toMatchObject({ code: ErrorCode.ObjectNotFound, httpStatusCode: 404 });
    });
  });

  describe('delete', () => {
    it('should delete once and report absence afterwards', async () => {
      await store.put('owner-a/y.mp4', Readable.from([Buffer.from('video')]), 'video/mp4', 5);

      expect(await store.delete('owner-a/y.mp4')).toBe(true);
      expect(await store.delete('owner-a/y.mp4')).toBe(false);
      expect(await fs.readdir(path.join(basePath, 'media-files', 'owner-a'))).toEqual([]);
    });

    it('should return false instead of throwing for an invalid path', async () => {
      expect(await store.delete('../outside.jpg')).toBe(false);
    });
  });
});
