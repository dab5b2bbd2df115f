import * as path from 'node:path';
import type { ResultAsync } from 'neverthrow';
import { errAsync, okAsync } from 'neverthrow';
import type {
  IndexStoreError,
  IndexStorePort,
  IndexedFileQuery,
  IndexedFileRecord,
} from '../../../ports/index-store.port.js';

/** SQL LIKE (with `\` escapes) as an anchored regex. */
export function likeToRegExp(like: string): RegExp {
  let source = '';
  for (let i = 0; i < like.length; i++) {
    const ch = like.charAt(i);
    if (ch === '\\' && i + 1 < like.length) {
      source += like.charAt(++i).replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    } else if (ch === '%') {
      source += '.*';
    } else if (ch === '_') {
      source += '.';
    } else {
      source += ch.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`, 's');
}

function identityKey(record: IndexedFileRecord): string {
  return JSON.stringify([
    record.descriptor,
    record.contentDate?.getTime() ?? null,
    record.version,
    record.deletionDate?.getTime() ?? null,
  ]);
}

/**
 * In-process index store. Same uniqueness rule as the `files` table:
 * (descriptor, content date, version, deletion date), nulls equal.
 */
export class InMemoryIndexStore implements IndexStorePort {
  private readonly records = new Map<number, IndexedFileRecord>();
  private nextId = 1;

  upsertFile(record: IndexedFileRecord): ResultAsync<IndexedFileRecord, IndexStoreError> {
    const key = identityKey(record);
    const existing = [...this.records.values()].find((r) => identityKey(r) === key);
    const id = existing?.id ?? this.nextId++;
    const stored: IndexedFileRecord = { ...record, id };
    this.records.set(id, stored);
    return okAsync(stored);
  }

  findFiles(query: IndexedFileQuery): ResultAsync<readonly IndexedFileRecord[], IndexStoreError> {
    const like = likeToRegExp(query.nameLike);
    const matches = [...this.records.values()].filter(
      (r) =>
        (query.includeDeleted === true || r.deletionDate === null) &&
        path.posix.dirname(r.path) === query.folder &&
        like.test(r.name) &&
        query.nameRegex.test(r.name)
    );
    return okAsync(matches.sort((a, b) => b.version - a.version));
  }

  markDeleted(record: IndexedFileRecord, deletionDate: Date): ResultAsync<IndexedFileRecord, IndexStoreError> {
    const id = record.id;
    const stored = id === undefined ? undefined : this.records.get(id);
    if (id === undefined || !stored) {
      return errAsync({ code: 'INDEX_STORE_NOT_FOUND', message: `No indexed file ${record.path}` } as const);
    }

    const deleted: IndexedFileRecord = { ...stored, deletionDate };
    const key = identityKey(deleted);
    if ([...this.records.values()].some((r) => r.id !== id && identityKey(r) === key)) {
      return errAsync({ code: 'INDEX_STORE_CONFLICT', message: `Deleted record already exists for ${record.path}` } as const);
    }

    this.records.set(id, deleted);
    return okAsync(deleted);
  }

  /** Snapshot of every record, deleted ones included. */
  all(): readonly IndexedFileRecord[] {
    return [...this.records.values()];
  }
}
