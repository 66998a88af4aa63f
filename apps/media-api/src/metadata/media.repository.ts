import {
  CreateResult,
  FindResult,
  ListMediaOptions,
  MediaPatch,
  MediaRecord,
  Page,
  PageRequest,
} from './records';

/**
 * Media records collection, partitioned by owner.
 *
 * Lookups take the owner as a partition key but locate records by id alone, so
 * callers can tell a missing record from one that belongs to someone else.
 * Listing and search order by `uploadedAt` descending, ties broken by id.
 * Backend failures are thrown as BackendUnavailable errors.
 */
export abstract class MediaRepository {
  abstract create(record: MediaRecord): Promise<CreateResult<MediaRecord>>;

  abstract findById(id: string, partitionKey: string): Promise<FindResult<MediaRecord>>;

  abstract listPaginated(ownerId: string, options: ListMediaOptions): Promise<Page<MediaRecord>>;

  /**
   * Case-insensitive match on original name or description (substring),
   * or on a tag (whole value)
   */
  abstract search(ownerId: string, query: string, options: PageRequest): Promise<Page<MediaRecord>>;

  abstract update(id: string, partitionKey: string, patch: MediaPatch): Promise<FindResult<MediaRecord>>;

  /**
   * @returns false when the record did not exist
   */
  abstract delete(id: string, partitionKey: string): Promise<boolean>;
}
