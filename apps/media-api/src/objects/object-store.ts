import { Readable } from 'stream';
import { Clock } from '@cloudmedia/common/clock';
import { generateStoredName } from './object-key';

export interface StoredObject {
  storedName: string;
  url: string;
}

/**
 * Binary content store addressed by stored name
 */
export abstract class ObjectStore {
  protected constructor(protected readonly clock: Clock) {}

  /**
   * Store content under a freshly generated name for the owner
   */
  async upload(
    stream: Readable,
    ownerId: string,
    originalFilename: string,
    contentType: string,
    sizeBytes: number,
  ): Promise<StoredObject> {
    const storedName = generateStoredName(ownerId, originalFilename, this.clock.now());
    const url = await this.put(storedName, stream, contentType, sizeBytes);
    return { storedName, url };
  }

  /**
   * Store content under an explicit name; resolves to a signed read URL
   */
  abstract put(storedName: string, stream: Readable, contentType: string, sizeBytes: number): Promise<string>;

  /**
   * Best effort: false when the object is absent or the backend fails
   */
  abstract delete(storedName: string): Promise<boolean>;

  /**
   * Read-only, time-limited URL; expiry is measured from the injected clock
   */
  abstract signUrl(storedName: string, ttlSeconds?: number): Promise<string>;
}
