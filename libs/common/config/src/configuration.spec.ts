import { loadConfig, parseList, validateConfig } from './configuration';

describe('configuration', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      nodeEnv: 'development',
      apiHost: '0.0.0.0',
      apiPort: 8000,
      allowedOrigins: ['http://localhost:4200'],
      metadataDriver: 'postgres',
      usersCollection: 'users',
      mediaCollection: 'media',
      objectStoreDriver: 'disk',
      storageContainer: 'media-files',
      publicBaseUrl: 'http://localhost:8000',
      signedUrlTtlSeconds: 31536000,
      jwtAlgorithm: 'HS256',
      jwtExpireMinutes: 1440,
      maxFileSizeMb: 100,
      allowedImageTypes: ['image/jpeg', 'image/png', 'image/gif', 'image/webp'],
      allowedVideoTypes: ['video/mp4', 'video/mpeg', 'video/quicktime', 'video/webm'],
      thumbnailMaxWidth: 300,
      thumbnailMaxHeight: 300,
      thumbnailQuality: 85,
    });
  });

  it('should parse lists, numbers and choices from the environment', () => {
    const config = loadConfig({
      ALLOWED_ORIGINS: 'https://a.example, https://b.example',
      ALLOWED_IMAGE_TYPES: 'Image/JPEG, image/avif,',
      API_PORT: '9000',
      METADATA_DRIVER: 'memory',
      JWT_ALGORITHM: 'HS512',
      PUBLIC_BASE_URL: 'https://media.example//',
      S3_FORCE_PATH_STYLE: 'true',
    });

    expect(config.allowedOrigins).toEqual(['https://a.example', 'https://b.example']);
    expect(config.allowedImageTypes).toEqual(['image/jpeg', 'image/avif']);
    expect(config.apiPort).toBe(9000);
    expect(config.metadataDriver).toBe('memory');
    expect(config.jwtAlgorithm).toBe('HS512');
    expect(config.publicBaseUrl).toBe('https://media.example');
    expect(config.s3ForcePathStyle).toBe(true);
  });

  it.each([
    [{ API_PORT: 'eighty' }, "API_PORT must be a positive integer, got 'eighty'"],
    [{ MAX_FILE_SIZE_MB: '0' }, "MAX_FILE_SIZE_MB must be a positive integer, got '0'"],
    [{ JWT_ALGORITHM: 'none' }, "JWT_ALGORITHM must be one of HS256, HS384, HS512, got 'none'"],
    [{ OBJECT_STORE_DRIVER: 'ftp' }, "OBJECT_STORE_DRIVER must be one of disk, s3, got 'ftp'"],
  ])('should reject %p', (env, message) => {
    expect(() => loadConfig(env)).toThrow(message);
  });

  it('should require a database URL for the postgres driver', () => {
    expect(() => validateConfig(loadConfig({}))).toThrow('Missing required environment variables: DATABASE_URL');
  });

  it('should leave token and URL signing secrets to the components that use them', () => {
    const config = loadConfig({ DATABASE_URL: 'postgres://localhost/media' });

    expect(validateConfig(config)).toBe(config);
    expect(validateConfig(loadConfig({ METADATA_DRIVER: 'memory' }))).toMatchObject({ metadataDriver: 'memory' });
  });

  it('should refuse a thumbnail quality above 100', () => {
    const config = loadConfig({
      JWT_SECRET: 'test-secret',
      METADATA_DRIVER: 'memory',
      STORAGE_SIGNING_SECRET: 'test-secret',
      THUMBNAIL_QUALITY: '101',
    });

    expect(() => validateConfig(config)).toThrow('THUMBNAIL_QUALITY must be between 1 and 100');
  });

  it('should fall back when a list variable is unset', () => {
    expect(parseList(undefined, 'a,B')).toEqual(['a', 'b']);
  });
});
