/**
 * Cloud Media Configuration
 * Environment variables mapped onto a flat, typed settings object
 */

import * as os from 'os';
import * as path from 'path';

export type MetadataDriver = 'postgres' | 'memory';
export type ObjectStoreDriver = 'disk' | 's3';
export type JwtAlgorithm = 'HS256' | 'HS384' | 'HS512';

export interface AppConfig {
  nodeEnv: string;

  // API
  apiHost: string;
  apiPort: number;
  allowedOrigins: string[];

  // Metadata store
  metadataDriver: MetadataDriver;
  databaseUrl?: string;
  usersCollection: string;
  mediaCollection: string;

  // Object store
  objectStoreDriver: ObjectStoreDriver;
  storageContainer: string;
  storageBasePath: string;
  publicBaseUrl: string;
  storageSigningSecret?: string;
  signedUrlTtlSeconds: number;
  s3Bucket: string;
  s3Region: string;
  s3Endpoint?: string;
  s3ForcePathStyle: boolean;
  s3AccessKeyId?: string;
  s3SecretAccessKey?: string;

  // Tokens & passwords
  jwtSecret?: string;
  jwtAlgorithm: JwtAlgorithm;
  jwtExpireMinutes: number;
  passwordTimeCost: number;
  passwordMemoryCost: number;

  // Uploads
  maxFileSizeMb: number;
  allowedImageTypes: string[];
  allowedVideoTypes: string[];
  thumbnailMaxWidth: number;
  thumbnailMaxHeight: number;
  thumbnailQuality: number;
  uploadTmpDir: string;
}

const JWT_ALGORITHMS: readonly JwtAlgorithm[] = ['HS256', 'HS384', 'HS512'];

export function parseList(value: string | undefined, fallback: string): string[] {
  return (value ?? fallback)
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
}

function parseInteger(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer, got '${value}'`);
  }
  return parsed;
}

function parseChoice<T extends string>(
  name: string,
  value: string | undefined,
  choices: readonly T[],
  fallback: T,
): T {
  if (value === undefined || value === '') {
    return fallback;
  }
  const match = choices.find((choice) => choice === value);
  if (!match) {
    throw new Error(`${name} must be one of ${choices.join(', ')}, got '${value}'`);
  }
  return match;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    nodeEnv: env.NODE_ENV || 'development',

    apiHost: env.API_HOST || '0.0.0.0',
    apiPort: parseInteger('API_PORT', env.API_PORT, 8000),
    allowedOrigins: (env.ALLOWED_ORIGINS || 'http://localhost:4200')
      .split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),

    metadataDriver: parseChoice('METADATA_DRIVER', env.METADATA_DRIVER, ['postgres', 'memory'], 'postgres'),
    databaseUrl: env.DATABASE_URL,
    usersCollection: env.USERS_COLLECTION || 'users',
    mediaCollection: env.MEDIA_COLLECTION || 'media',

    objectStoreDriver: parseChoice('OBJECT_STORE_DRIVER', env.OBJECT_STORE_DRIVER, ['disk', 's3'], 'disk'),
    storageContainer: env.STORAGE_CONTAINER || 'media-files',
    storageBasePath: env.STORAGE_BASE_PATH || path.join(process.cwd(), 'data', 'objects'),
    publicBaseUrl: (env.PUBLIC_BASE_URL || 'http://localhost:8000').replace(/\/+$/, ''),
    storageSigningSecret: env.STORAGE_SIGNING_SECRET,
    signedUrlTtlSeconds: parseInteger('SIGNED_URL_TTL_SECONDS', env.SIGNED_URL_TTL_SECONDS, 365 * 24 * 60 * 60),
    s3Bucket: env.S3_BUCKET || 'media-files',
    s3Region: env.S3_REGION || 'us-east-1',
    s3Endpoint: env.S3_ENDPOINT || undefined,
    s3ForcePathStyle: env.S3_FORCE_PATH_STYLE === 'true',
    s3AccessKeyId: env.S3_ACCESS_KEY_ID || undefined,
    s3SecretAccessKey: env.S3_SECRET_ACCESS_KEY || undefined,

    jwtSecret: env.JWT_SECRET,
    jwtAlgorithm: parseChoice('JWT_ALGORITHM', env.JWT_ALGORITHM, JWT_ALGORITHMS, 'HS256'),
    jwtExpireMinutes: parseInteger('JWT_EXPIRE_MINUTES', env.JWT_EXPIRE_MINUTES, 1440),
    passwordTimeCost: parseInteger('PASSWORD_TIME_COST', env.PASSWORD_TIME_COST, 2),
    passwordMemoryCost: parseInteger('PASSWORD_MEMORY_COST', env.PASSWORD_MEMORY_COST, 65536),

    maxFileSizeMb: parseInteger('MAX_FILE_SIZE_MB', env.MAX_FILE_SIZE_MB, 100),
    allowedImageTypes: parseList(env.ALLOWED_IMAGE_TYPES, 'image/jpeg,image/png,image/gif,image/webp'),
    allowedVideoTypes: parseList(env.ALLOWED_VIDEO_TYPES, 'video/mp4,video/mpeg,video/quicktime,video/webm'),
    thumbnailMaxWidth: parseInteger('THUMBNAIL_MAX_WIDTH', env.THUMBNAIL_MAX_WIDTH, 300),
    thumbnailMaxHeight: parseInteger('THUMBNAIL_MAX_HEIGHT', env.THUMBNAIL_MAX_HEIGHT, 300),
    thumbnailQuality: parseInteger('THUMBNAIL_QUALITY', env.THUMBNAIL_QUALITY, 85),
    uploadTmpDir: env.UPLOAD_TMP_DIR || path.join(os.tmpdir(), 'cloud-media-uploads'),
  };
}

/**
 * Fail fast on settings every entry point needs.
 * JWT_SECRET and STORAGE_SIGNING_SECRET are checked where they are used
 * (JwtModule, DiskObjectStore), so the admin CLI runs without them.
 */
export function validateConfig(config: AppConfig): AppConfig {
  const missing: string[] = [];

  if (config.metadataDriver === 'postgres' && !config.databaseUrl) {
    missing.push('DATABASE_URL');
  }

  if (missing.length > 0) {
    throw new Error(`Missing required environment variables: ${missing.join(', ')}`);
  }

  if (config.thumbnailQuality > 100) {
    throw new Error('THUMBNAIL_QUALITY must be between 1 and 100');
  }

  return config;
}

export default (): AppConfig => validateConfig(loadConfig());
