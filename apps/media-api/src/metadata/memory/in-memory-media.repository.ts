import { Injectable } from '@nestjs/common';
import { MediaRepository } from '../media.repository';
import {
  CreateResult,
  FindResult,
  ListMediaOptions,
  MediaPatch,
  MediaRecord,
  Page,
  PageRequest,
  alreadyExists,
  created,
  found,
  notFound,
  pageOffset,
} from '../records';

/**
 * Process-local media collection for development and tests.
 * Records are copied on the way in and out, so callers never share state with the store.
 */
@Injectable()
export class InMemoryMediaRepository extends MediaRepository {
  private readonly records = new Map<string, MediaRecord>();

  async create(record: MediaRecord): Promise<CreateResult<MediaRecord>> {
    if (this.records.has(record.id)) {
      return alreadyExists();
    }

    this.records.set(record.id, structuredClone(record));
    return created(structuredClone(record));
  }

  async findById(id: string, _partitionKey: string): Promise<FindResult<MediaRecord>> {
    const record = this.records.get(id);
    return record ? found(structuredClone(record)) : notFound();
  }

  async listPaginated(ownerId: string, options: ListMediaOptions): Promise<Page<MediaRecord>> {
    return this.page(
      (record) =>
        record.ownerId === ownerId &&
        (options.mediaType === undefined || record.mediaType === options.mediaType),
      options,
    );
  }

  async search(ownerId: string, query: string, options: PageRequest): Promise<Page<MediaRecord>> {
    const needle = query.toLowerCase();

    return this.page(
      (record) =>
        record.ownerId === ownerId &&
        (record.originalName.toLowerCase().includes(needle) ||
          (record.description ?? '').toLowerCase().includes(needle) ||
          (record.tags ?? []).some((tag) => tag.toLowerCase() === needle)),
      options,
    );
  }

  async update(id: string, partitionKey: string, patch: MediaPatch): Promise<FindResult<MediaRecord>> {
    const record = this.records.get(id);
    if (!record || record.ownerId !== partitionKey) {
      return notFound();
    }

    const updated: MediaRecord = {
      ...record,
      description: patch.description !== undefined ? patch.description : record.description,
      tags: patch.tags !== undefined ? patch.tags : record.tags,
      updatedAt: patch.updatedAt,
    };
    this.records.set(id, structuredClone(updated));
    return found(structuredClone(updated));
  }

  async delete(id: string, partitionKey: string): Promise<boolean> {
    const record = this.records.get(id);
    if (!record || record.ownerId !== partitionKey) {
      return false;
    }
    return this.records.delete(id);
  }

  private page(matches: (record: MediaRecord) => boolean, request: PageRequest): Page<MediaRecord> {
    const all = [...this.records.values()]
      .filter(matches)
      .sort(
        (a, b) =>
          b.uploadedAt.getTime() - a.uploadedAt.getTime() || (a.id < b.id ? 1 : a.id > b.id ? -1 : 0),
      );

    const offset = pageOffset(request);
    return {
      items: all.slice(offset, offset + request.pageSize).map((record) => structuredClone(record)),
      total: all.length,
    };
  }
}
