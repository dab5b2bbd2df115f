import * as path from 'node:path';
import type { Result, ResultAsync } from 'neverthrow';
import { errAsync, ok, okAsync } from 'neverthrow';
import type { Logger } from '../../core/logging/index.js';
import type { DatastoreError, IdentityError, StoreIoError } from '../core/errors.js';
import { DatastoreErr } from '../core/errors.js';
import type { PathHandler, SequencedPathHandler } from '../core/path-handlers/index.js';
import {
  disciplineOf,
  filename,
  folderStructure,
  supportsSequencing,
  unsequencedPattern,
  withSequence,
} from '../core/path-handlers/index.js';
import type { DatastoreFileFinder } from '../finder/datastore-file-finder.js';
import type { Fingerprint, FingerprintPort } from '../ports/fingerprint.port.js';
import type { DatastoreFileSystemPort, FsError } from '../ports/fs.port.js';
import type { AddFileOptions, AddFileResult, AddOutcome, DatastoreFileManagerPort } from './types.js';

export interface DatastoreFileManagerDeps {
  readonly root: string;
  readonly fs: DatastoreFileSystemPort;
  readonly fingerprint: FingerprintPort;
  readonly finder: DatastoreFileFinder;
  readonly logger: Logger;
}

type Placement<H extends PathHandler> =
  | { readonly outcome: 'duplicate'; readonly path: string; readonly handler: H }
  | { readonly outcome: Exclude<AddOutcome, 'duplicate'>; readonly handler: H };

/** Everything an add needs from the identity, checked before any I/O. */
function validateIdentity(handler: PathHandler): Result<string, IdentityError> {
  return folderStructure(handler)
    .andThen((folder) => filename(handler).map(() => folder))
    .andThen((folder) => (supportsSequencing(handler) ? unsequencedPattern(handler).map(() => folder) : ok(folder)));
}

/**
 * An explicitly requested discriminator is honoured for the first file of an
 * identity; otherwise numbering starts at the discipline's starting value.
 */
function initialSequence(handler: SequencedPathHandler): number {
  const discipline = disciplineOf(handler);
  return handler.sequence !== discipline.unset ? handler.sequence : discipline.start;
}

function storeIo(e: FsError): StoreIoError {
  return DatastoreErr.storeIo(e);
}

/**
 * Version-aware placement of local files into the datastore.
 *
 * Files become visible only through an atomic rename of a fully written and
 * synced temporary file. Ingests of the same identity must be serialised by
 * the caller.
 */
export class DatastoreFileManager implements DatastoreFileManagerPort {
  constructor(private readonly deps: DatastoreFileManagerDeps) {}

  get root(): string {
    return this.deps.root;
  }

  addFile<H extends PathHandler>(
    sourceFile: string,
    handler: H,
    options: AddFileOptions = {}
  ): ResultAsync<AddFileResult<H>, DatastoreError> {
    const identity = validateIdentity(handler);
    if (identity.isErr()) return errAsync(identity.error);

    const folderPath = path.join(this.deps.root, identity.value);

    return this.checkSource(sourceFile)
      .andThen(() => this.deps.fingerprint.fingerprintFile(sourceFile).mapErr(storeIo))
      .andThen((fingerprint) => this.deps.fs.mkdirp(folderPath).mapErr(storeIo).map(() => fingerprint))
      .andThen((fingerprint) =>
        this.plan(handler, fingerprint).andThen((placement): ResultAsync<AddFileResult<H>, DatastoreError> => {
          if (placement.outcome === 'duplicate') {
            this.deps.logger.info({ path: placement.path }, 'Identical file already stored; skipping');
            return okAsync<AddFileResult<H>>({
              path: placement.path,
              handler: placement.handler,
              outcome: 'duplicate',
              fingerprint,
            });
          }

          return this.place(sourceFile, placement.handler, options).map((destination): AddFileResult<H> => {
            this.deps.logger.info({ source: sourceFile, path: destination, outcome: placement.outcome }, 'File stored');
            return { path: destination, handler: placement.handler, outcome: placement.outcome, fingerprint };
          });
        })
      );
  }

  /**
   * Remove a file. Returns false when it was already gone.
   */
  removeFile(filePath: string): ResultAsync<boolean, StoreIoError> {
    return this.deps.fs
      .unlink(filePath)
      .map(() => true)
      .orElse((e): ResultAsync<boolean, StoreIoError> =>
        e.code === 'FS_NOT_FOUND' ? okAsync(false) : errAsync(storeIo(e))
      );
  }

  /** Copy `sourceFile` to `destination` through a synced temporary file, creating folders. */
  copyFile(sourceFile: string, destination: string): ResultAsync<string, DatastoreError> {
    return this.deps.fs
      .mkdirp(path.dirname(destination))
      .mapErr(storeIo)
      .andThen(() =>
        this.deps.fs
          .readFileBytes(sourceFile)
          .mapErr((e): DatastoreError => (e.code === 'FS_NOT_FOUND' ? DatastoreErr.sourceNotFound(sourceFile) : storeIo(e)))
      )
      .andThen((bytes) => this.writeAtomically(destination, bytes).mapErr(storeIo))
      .map(() => destination);
  }

  private checkSource(sourceFile: string): ResultAsync<void, DatastoreError> {
    return this.deps.fs
      .stat(sourceFile)
      .mapErr((e): DatastoreError => (e.code === 'FS_NOT_FOUND' ? DatastoreErr.sourceNotFound(sourceFile) : storeIo(e)))
      .andThen(
        (stat): ResultAsync<void, DatastoreError> =>
          stat.isFile ? okAsync(undefined) : errAsync(DatastoreErr.sourceNotFound(sourceFile))
      );
  }

  private plan<H extends PathHandler>(handler: H, fingerprint: Fingerprint): ResultAsync<Placement<H>, DatastoreError> {
    return supportsSequencing(handler) ? this.planSequenced(handler, fingerprint) : this.planFixed(handler, fingerprint);
  }

  /** Compare with the latest stored version only: equal is a duplicate, different is latest + 1. */
  private planSequenced<H extends SequencedPathHandler>(
    handler: H,
    fingerprint: Fingerprint
  ): ResultAsync<Placement<H>, DatastoreError> {
    return this.deps.finder
      .findLatestVersion(this.deps.root, handler)
      .andThen((latest): ResultAsync<Placement<H>, DatastoreError> => {
        if (!latest) {
          return okAsync<Placement<H>>({ outcome: 'added', handler: withSequence(handler, initialSequence(handler)) });
        }

        return this.deps.fingerprint
          .fingerprintFile(latest.path)
          .mapErr(storeIo)
          .map((existing): Placement<H> => {
            if (existing === fingerprint) {
              return { outcome: 'duplicate', path: latest.path, handler: latest.handler };
            }
            const next = latest.handler.sequence + 1;
            this.deps.logger.debug({ latest: latest.path, next }, 'Content changed; storing next version');
            return { outcome: 'added', handler: withSequence(handler, next) };
          });
      });
  }

  /** Non-sequenced identities have one physical file: identical is a duplicate, different is replaced. */
  private planFixed<H extends PathHandler>(handler: H, fingerprint: Fingerprint): ResultAsync<Placement<H>, DatastoreError> {
    return this.deps.finder
      .findLatestVersion(this.deps.root, handler)
      .andThen((existing): ResultAsync<Placement<H>, DatastoreError> => {
        if (!existing) return okAsync<Placement<H>>({ outcome: 'added', handler });

        return this.deps.fingerprint
          .fingerprintFile(existing.path)
          .mapErr(storeIo)
          .map((stored): Placement<H> =>
            stored === fingerprint
              ? { outcome: 'duplicate', path: existing.path, handler }
              : { outcome: 'overwritten', handler }
          );
      });
  }

  private place(sourceFile: string, handler: PathHandler, options: AddFileOptions): ResultAsync<string, DatastoreError> {
    const folder = folderStructure(handler);
    const name = filename(handler);
    if (folder.isErr()) return errAsync(folder.error);
    if (name.isErr()) return errAsync(name.error);

    const destination = path.join(this.deps.root, folder.value, name.value);

    return this.copyFile(sourceFile, destination).andThen((): ResultAsync<string, DatastoreError> => {
      if (options.transfer !== 'move' || path.resolve(sourceFile) === path.resolve(destination)) {
        return okAsync(destination);
      }
      return this.deps.fs.unlink(sourceFile).mapErr(storeIo).map(() => destination);
    });
  }

  private writeAtomically(destination: string, bytes: Uint8Array): ResultAsync<void, FsError> {
    const tmpPath = `${destination}.tmp`;

    return this.deps.fs
      .writeFileSynced(tmpPath, bytes)
      .andThen(() => this.deps.fs.rename(tmpPath, destination))
      .orElse((e): ResultAsync<void, FsError> => this.discardTemp(tmpPath).andThen(() => errAsync(e)))
      .andThen(() => this.syncFolder(path.dirname(destination)));
  }

  /** Runs after the rename; a failure is logged, not returned. */
  private syncFolder(dir: string): ResultAsync<void, never> {
    return this.deps.fs.fsyncDir(dir).orElse((e): ResultAsync<void, never> => {
      if (e.code !== 'FS_UNSUPPORTED') {
        this.deps.logger.warn({ path: dir, code: e.code, error: e.message }, 'Could not sync folder after rename');
      }
      return okAsync(undefined);
    });
  }

  private discardTemp(tmpPath: string): ResultAsync<void, never> {
    return this.deps.fs.unlink(tmpPath).orElse((e) => {
      if (e.code !== 'FS_NOT_FOUND') {
        this.deps.logger.warn({ path: tmpPath, code: e.code }, 'Could not remove temporary file');
      }
      return okAsync(undefined);
    });
  }
}
