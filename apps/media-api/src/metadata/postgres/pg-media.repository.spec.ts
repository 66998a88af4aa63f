import { ConfigService } from '@nestjs/config';
import { AppConfig, loadConfig } from '@cloudmedia/common/config';
import { DatabaseService } from '@cloudmedia/common/database';
import { ErrorCode, MediaPlatformError } from '@cloudmedia/common/errors';
import { PgMediaRepository } from './pg-media.repository';
import { MediaRecord } from '../records';

const uploadedAt = new Date('2026-03-01T10:00:00Z');

const row = {
  id: 'media-1',
  owner_id: 'owner-a',
  stored_name: 'owner-a/20260301100000_abcd1234.png',
  original_name: 'photo.png',
  media_type: 'image',
  size_bytes: '2048',
  mime_type: 'image/png',
  object_url: 'http://localhost:8000/api/files/owner-a/20260301100000_abcd1234.png',
  thumbnail_url: null,
  description: 'a photo',
  tags: ['one', 'two'],
  uploaded_at: uploadedAt,
  updated_at: uploadedAt,
};

const record: MediaRecord = {
  id: 'media-1',
  ownerId: 'owner-a',
  storedName: 'owner-a/20260301100000_abcd1234.png',
  originalName: 'photo.png',
  mediaType: 'image',
  sizeBytes: 2048,
  mimeType: 'image/png',
  objectUrl: 'http://localhost:8000/api/files/owner-a/20260301100000_abcd1234.png',
  thumbnailUrl: null,
  description: 'a photo',
  tags: ['one', 'two'],
  uploadedAt,
  updatedAt: uploadedAt,
};

describe('PgMediaRepository', () => {
  let config: ConfigService<AppConfig, true>;
  let database: DatabaseService;
  let repository: PgMediaRepository;

  beforeEach(() => {
    config = new ConfigService<AppConfig, true>({
      ...loadConfig({ DATABASE_URL: 'postgres://localhost/test' }),
      mediaCollection: 'media_items',
    });
    database = new DatabaseService(config);
    repository = new PgMediaRepository(database, config);
  });

  it('should refuse a table name that is not an SQL identifier', () => {
    const badConfig = new ConfigService<AppConfig, true>({
      ...loadConfig({}),
      mediaCollection: 'media; DROP TABLE users',
    });

    expect(() => new PgMediaRepository(database, badConfig)).toThrow(
      "MEDIA_COLLECTION must be a lower-case SQL identifier, got 'media; DROP TABLE users'",
    );
  });

  describe('findById', () => {
    it('should map a row into a record', async () => {
      const queryOne = jest.spyOn(database, 'queryOne').mockResolvedValue(row);

      const result = await repository.findById('media-1', 'owner-b');

      expect(result).toEqual({ kind: 'found', value: record });
      expect(queryOne.mock.calls[0][0]).toContain('FROM media_items');
      expect(queryOne.mock.calls[0][1]).toEqual(['media-1']);
    });

    it('should return not_found when no row matches', async () => {
      jest.spyOn(database, 'queryOne').mockResolvedValue(null);

      expect(await repository.findById('media-1', 'owner-a')).toEqual({ kind: 'not_found' });
    });

    it('should reject a malformed row as a backend failure', async () => {
      jest.spyOn(database, 'queryOne').mockResolvedValue({ ...row, media_type: 'audio' });

      const error = await repository.findById('media-1', 'owner-a').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(MediaPlatformError);
      expect(error).toMatchObject({ code: ErrorCode.BackendUnavailable, httpStatusCode: 500 });
    });

    it('should wrap driver failures as BackendUnavailable', async () => {
      jest.spyOn(database, 'queryOne').mockRejectedValue(new Error('connection terminated'));

      await expect(repository.findById('media-1', 'owner-a')).rejects.toMatchObject({
        code: ErrorCode.BackendUnavailable,
        message: 'Storage backend failed during read from media_items',
        details: 'connection terminated',
      });
    });
  });

  describe('create', () => {
    it('should insert every column and return the record', async () => {
      const query = jest.spyOn(database, 'query').mockResolvedValue({
        command: 'INSERT',
        rowCount: 1,
        oid: 0,
        fields: [],
        rows: [],
      });

      const result = await repository.create(record);

      expect(result).toEqual({ kind: 'created', value: record });
      expect(query.mock.calls[0][1]).toEqual([
        'media-1',
        'owner-a',
        'owner-a/20260301100000_abcd1234.png',
        'photo.png',
        'image',
        2048,
        'image/png',
        'http://localhost:8000/api/files/owner-a/20260301100000_abcd1234.png',
        null,
        'a photo',
        ['one', 'two'],
        uploadedAt,
        uploadedAt,
      ]);
    });

    it('should report a unique violation as already_exists', async () => {
      jest
        .spyOn(database, 'query')
        .mockRejectedValue(Object.assign(new Error('duplicate key'), { code: '23505' }));

      expect(await repository.create(record)).toEqual({ kind: 'already_exists' });
    });
  });

  describe('search', () => {
    it('should escape LIKE wildcards and count every match', async () => {
      const queryOne = jest.spyOn(database, 'queryOne').mockResolvedValue({ total: '7' });
      const queryMany = jest.spyOn(database, 'queryMany').mockResolvedValue([row]);

      const page = await repository.search('owner-a', '50%_off', { page: 3, pageSize: 2 });

      expect(page).toEqual({ items: [record], total: 7 });
      expect(queryOne.mock.calls[0][1]).toEqual(['owner-a', '%50\\%\\_off%', '50%_off']);
      expect(queryMany.mock.calls[0][1]).toEqual(['owner-a', '%50\\%\\_off%', '50%_off', 2, 4]);
      expect(queryMany.mock.calls[0][0]).toContain('ORDER BY uploaded_at DESC, id DESC');
    });
  });

  describe('listPaginated', () => {
    it('should add the media type filter as a parameter', async () => {
      jest.spyOn(database, 'queryOne').mockResolvedValue({ total: '0' });
      const queryMany = jest.spyOn(database, 'queryMany').mockResolvedValue([]);

      const page = await repository.listPaginated('owner-a', { page: 1, pageSize: 20, mediaType: 'video' });

      expect(page).toEqual({ items: [], total: 0 });
      expect(queryMany.mock.calls[0][0]).toContain('owner_id = $1 AND media_type = $2');
      expect(queryMany.mock.calls[0][1]).toEqual(['owner-a', 'video', 20, 0]);
    });
  });

  describe('delete', () => {
    it('should report whether a row was removed', async () => {
      jest
        .spyOn(database, 'query')
        .mockResolvedValueOnce({ command: 'DELETE', rowCount: 1, oid: 0, fields: [], rows: [] })
        .mockResolvedValueOnce({ command: 'DELETE', rowCount: 0, oid: 0, fields: [], rows: [] });

      expect(await repository.delete('media-1', 'owner-a')).toBe(true);
      expect(await repository.delete('media-1', 'owner-a')).toBe(false);
    });
  });
});
