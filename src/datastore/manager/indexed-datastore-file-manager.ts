import * as path from 'node:path';
import type { ResultAsync } from 'neverthrow';
import { errAsync, okAsync } from 'neverthrow';
import type { Logger } from '../../core/logging/index.js';
import type { DatastoreError } from '../core/errors.js';
import { DatastoreErr } from '../core/errors.js';
import type { PathHandler, SequencedPathHandler } from '../core/path-handlers/index.js';
import {
  contentDateForIndexing,
  folderStructure,
  indexDescriptor,
  supportsSequencing,
  unsequencedPattern,
  withSequence,
} from '../core/path-handlers/index.js';
import type { Fingerprint, FingerprintPort } from '../ports/fingerprint.port.js';
import type { FileReadPort } from '../ports/fs.port.js';
import type { IndexStorePort, IndexedFileRecord, JsonObject } from '../ports/index-store.port.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import type { DatastoreFileManager } from './datastore-file-manager.js';
import type { AddFileOptions, AddFileResult, DatastoreFileManagerPort } from './types.js';

export interface IndexedAddFileOptions extends AddFileOptions {
  /** Stored with the index record. */
  readonly metadata?: JsonObject;
}

export interface IndexedAddFileResult<H extends PathHandler = PathHandler> extends AddFileResult<H> {
  readonly record: IndexedFileRecord;
}

export interface ArchivedFile {
  /** Record of the copy in the archive folder. */
  readonly archived: IndexedFileRecord;
  /** The original record, now marked deleted. */
  readonly deleted: IndexedFileRecord;
}

export interface IndexedDatastoreFileManagerDeps {
  readonly files: DatastoreFileManager;
  readonly index: IndexStorePort;
  readonly fingerprint: FingerprintPort;
  readonly fs: FileReadPort;
  readonly clock: TimeClockPort;
  readonly softwareVersion: string;
  readonly logger: Logger;
}

function toPosix(relativePath: string): string {
  return relativePath.split(path.sep).join('/');
}

/**
 * Decorates the file manager: every stored file gets an index record, and a
 * sequenced add whose content is already indexed resolves to that version.
 */
export class IndexedDatastoreFileManager implements DatastoreFileManagerPort {
  constructor(private readonly deps: IndexedDatastoreFileManagerDeps) {}

  get root(): string {
    return this.deps.files.root;
  }

  addFile<H extends PathHandler>(
    sourceFile: string,
    handler: H,
    options: IndexedAddFileOptions = {}
  ): ResultAsync<IndexedAddFileResult<H>, DatastoreError> {
    return this.deps.fingerprint
      .fingerprintFile(sourceFile)
      .mapErr((e): DatastoreError => (e.code === 'FS_NOT_FOUND' ? DatastoreErr.sourceNotFound(sourceFile) : DatastoreErr.storeIo(e)))
      .andThen((fingerprint) => {
        const indexed: ResultAsync<IndexedAddFileResult<H> | undefined, DatastoreError> = supportsSequencing(handler)
          ? this.findIndexedDuplicate(handler, fingerprint)
          : okAsync(undefined);

        return indexed.andThen(
          (duplicate): ResultAsync<IndexedAddFileResult<H>, DatastoreError> =>
            duplicate ? okAsync(duplicate) : this.storeAndIndex(sourceFile, handler, options)
        );
      });
  }

  /**
   * Mark the record deleted, then remove the file. A file already missing
   * from disk is not an error.
   */
  deleteFile(record: IndexedFileRecord): ResultAsync<IndexedFileRecord, DatastoreError> {
    const filePath = this.absolutePath(record.path);

    return this.deps.index
      .markDeleted(record, new Date(this.deps.clock.nowMs()))
      .mapErr(DatastoreErr.indexStore)
      .andThen((deleted) =>
        this.deps.files.removeFile(filePath).map((removed) => {
          this.deps.logger.info({ path: record.path, removed }, 'File deleted');
          return deleted;
        })
      );
  }

  /**
   * Copy the file under `archiveFolder` (same relative path), index the copy,
   * mark the original deleted and remove it. The copy is removed again when
   * it cannot be indexed.
   *
   * The copy is recorded relative to the root when the archive folder is
   * inside it, and absolute otherwise. Its descriptor gets an `archive:`
   * prefix so it never shares an identity with live records.
   */
  archiveFile(record: IndexedFileRecord, archiveFolder: string): ResultAsync<ArchivedFile, DatastoreError> {
    const source = this.absolutePath(record.path);
    const relative = path.isAbsolute(record.path) ? path.basename(record.path) : record.path;
    const destination = path.join(path.resolve(this.root, archiveFolder), relative);
    const fromRoot = path.relative(this.root, destination);
    const inside = fromRoot.length > 0 && !fromRoot.startsWith('..') && !path.isAbsolute(fromRoot);

    return this.deps.files
      .copyFile(source, destination)
      .andThen(() =>
        this.deps.index
          .upsertFile({
            name: record.name,
            path: inside ? toPosix(fromRoot) : destination,
            descriptor: `archive:${record.descriptor}`,
            contentDate: record.contentDate,
            version: record.version,
            hash: record.hash,
            sizeBytes: record.sizeBytes,
            creationDate: record.creationDate,
            softwareVersion: record.softwareVersion,
            metadata: record.metadata,
            deletionDate: null,
          })
          .mapErr(DatastoreErr.indexStore)
          .orElse(
            (e): ResultAsync<IndexedFileRecord, DatastoreError> =>
              this.deps.files.removeFile(destination).andThen(() => errAsync(e))
          )
      )
      .andThen((archived) =>
        this.deps.index
          .markDeleted(record, new Date(this.deps.clock.nowMs()))
          .mapErr(DatastoreErr.indexStore)
          .map((deleted): ArchivedFile => ({ archived, deleted }))
      )
      .andThen((result) =>
        this.deps.files.removeFile(source).map(() => {
          this.deps.logger.info({ path: record.path, archive: result.archived.path }, 'File archived');
          return result;
        })
      );
  }

  private absolutePath(recordPath: string): string {
    return path.isAbsolute(recordPath) ? recordPath : path.join(this.root, recordPath);
  }

  /**
   * A record with the same fingerprint in the same identity means the content
   * is already stored under that record's version, provided the file on disk
   * still has that content.
   */
  private findIndexedDuplicate<H extends SequencedPathHandler>(
    handler: H,
    fingerprint: Fingerprint
  ): ResultAsync<IndexedAddFileResult<H> | undefined, DatastoreError> {
    const folder = folderStructure(handler);
    const pattern = unsequencedPattern(handler);
    if (folder.isErr()) return errAsync(folder.error);
    if (pattern.isErr()) return errAsync(pattern.error);

    return this.deps.index
      .findFiles({ folder: folder.value, nameLike: pattern.value.sqlLike, nameRegex: pattern.value.regex })
      .mapErr(DatastoreErr.indexStore)
      .andThen((records): ResultAsync<IndexedAddFileResult<H> | undefined, DatastoreError> => {
        const match = records.find((r) => r.hash === fingerprint);
        if (!match) return okAsync(undefined);

        const storedPath = path.join(this.root, match.path);
        return this.deps.fingerprint
          .fingerprintFile(storedPath)
          .map((onDisk) => onDisk === fingerprint)
          .orElse((e): ResultAsync<boolean, DatastoreError> =>
            e.code === 'FS_NOT_FOUND' ? okAsync(false) : errAsync(DatastoreErr.storeIo(e))
          )
          .map((intact): IndexedAddFileResult<H> | undefined => {
            if (!intact) {
              this.deps.logger.warn({ path: match.path }, 'Indexed file missing or changed on disk; storing again');
              return undefined;
            }
            this.deps.logger.info({ path: match.path, version: match.version }, 'Content already indexed; skipping');
            return {
              path: storedPath,
              handler: withSequence(handler, match.version),
              outcome: 'duplicate',
              fingerprint,
              record: match,
            };
          });
      });
  }

  /**
   * The inner manager always copies. A moved source is removed only once the
   * record is written, so a failed index write leaves the source in place.
   */
  private storeAndIndex<H extends PathHandler>(
    sourceFile: string,
    handler: H,
    options: IndexedAddFileOptions
  ): ResultAsync<IndexedAddFileResult<H>, DatastoreError> {
    return this.deps.files.addFile(sourceFile, handler, { transfer: 'copy' }).andThen((stored) =>
      this.upsertRecord(stored, options.metadata ?? null)
        .orElse((e): ResultAsync<IndexedFileRecord, DatastoreError> => {
          if (stored.outcome !== 'added') return errAsync(e);

          this.deps.logger.error({ path: stored.path, error: e.message }, 'Indexing failed; removing stored file');
          return this.deps.files.removeFile(stored.path).andThen(() => errAsync(e));
        })
        .andThen((record) =>
          this.releaseSource(sourceFile, stored, options).map((): IndexedAddFileResult<H> => ({ ...stored, record }))
        )
    );
  }

  private releaseSource(
    sourceFile: string,
    stored: AddFileResult,
    options: IndexedAddFileOptions
  ): ResultAsync<void, DatastoreError> {
    if (options.transfer !== 'move' || stored.outcome === 'duplicate') return okAsync(undefined);
    if (path.resolve(sourceFile) === path.resolve(stored.path)) return okAsync(undefined);
    return this.deps.files.removeFile(sourceFile).map(() => undefined);
  }

  private upsertRecord(stored: AddFileResult, metadata: JsonObject | null): ResultAsync<IndexedFileRecord, DatastoreError> {
    const descriptor = indexDescriptor(stored.handler);
    if (descriptor.isErr()) return errAsync(descriptor.error);

    return this.deps.fs
      .stat(stored.path)
      .mapErr(DatastoreErr.storeIo)
      .andThen((stat) =>
        this.deps.index
          .upsertFile({
            name: path.basename(stored.path),
            path: toPosix(path.relative(this.root, stored.path)),
            descriptor: descriptor.value,
            contentDate: contentDateForIndexing(stored.handler) ?? null,
            version: supportsSequencing(stored.handler) ? stored.handler.sequence : 0,
            hash: stored.fingerprint,
            sizeBytes: stat.sizeBytes,
            creationDate: new Date(this.deps.clock.nowMs()),
            softwareVersion: this.deps.softwareVersion,
            metadata,
            deletionDate: null,
          })
          .mapErr(DatastoreErr.indexStore)
      )
      .map((record) => {
        this.deps.logger.info({ path: record.path, version: record.version }, 'File indexed');
        return record;
      });
  }
}
