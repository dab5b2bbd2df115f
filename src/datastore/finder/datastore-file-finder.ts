import * as path from 'node:path';
import type { ResultAsync } from 'neverthrow';
import { errAsync, okAsync } from 'neverthrow';
import type { Logger } from '../../core/logging/index.js';
import type { FileNotFoundError, IdentityError, StoreIoError } from '../core/errors.js';
import { DatastoreErr } from '../core/errors.js';
import type { LenientLookup, LookupOptions, StrictLookup } from '../core/lookup.js';
import type { PathHandler, SequencedPathHandler, UnsequencedPattern } from '../core/path-handlers/index.js';
import {
  filename,
  folderStructure,
  hasUnsetSequence,
  sequenceOf,
  supportsSequencing,
  unsequencedPattern,
  withSequence,
} from '../core/path-handlers/index.js';
import type { DirectoryListingPort, FileReadPort } from '../ports/fs.port.js';

export type FinderError = IdentityError | FileNotFoundError | StoreIoError;

/** A file found in the datastore and the handler describing exactly that file. */
export interface MatchedFile<H extends PathHandler = PathHandler> {
  readonly path: string;
  readonly handler: H;
}

export interface DatastoreFileFinderDeps {
  readonly fs: DirectoryListingPort & FileReadPort;
  readonly logger: Logger;
}

/**
 * Read-only lookups in a datastore tree. Never decides a discriminator; the
 * file manager owns that.
 */
export class DatastoreFileFinder {
  constructor(private readonly deps: DatastoreFileFinderDeps) {}

  /**
   * Exact name when the handler is not sequenced or names a specific
   * discriminator; otherwise the highest discriminator present.
   */
  findMatchingFile(root: string, handler: PathHandler, options: StrictLookup): ResultAsync<string, FinderError>;
  findMatchingFile(root: string, handler: PathHandler, options?: LenientLookup): ResultAsync<string | undefined, FinderError>;
  findMatchingFile(root: string, handler: PathHandler, options?: LookupOptions): ResultAsync<string | undefined, FinderError>;
  findMatchingFile(
    root: string,
    handler: PathHandler,
    options: LookupOptions = {}
  ): ResultAsync<string | undefined, FinderError> {
    if (supportsSequencing(handler) && hasUnsetSequence(handler)) {
      return this.findLatestVersion(root, handler, options).map((found) => found?.path);
    }
    return this.findExact(root, handler, options).map((found) => found?.path);
  }

  /** Highest discriminator present, independent of directory listing order. */
  findLatestVersion<H extends PathHandler>(root: string, handler: H, options: StrictLookup): ResultAsync<MatchedFile<H>, FinderError>;
  findLatestVersion<H extends PathHandler>(
    root: string,
    handler: H,
    options?: LenientLookup
  ): ResultAsync<MatchedFile<H> | undefined, FinderError>;
  findLatestVersion<H extends PathHandler>(
    root: string,
    handler: H,
    options?: LookupOptions
  ): ResultAsync<MatchedFile<H> | undefined, FinderError>;
  findLatestVersion<H extends PathHandler>(
    root: string,
    handler: H,
    options: LookupOptions = {}
  ): ResultAsync<MatchedFile<H> | undefined, FinderError> {
    if (!supportsSequencing(handler)) return this.findExact(root, handler, options);
    return this.findHighestSequence(root, handler, options);
  }

  /** Every stored discriminator of the handler's identity, highest first. */
  findAllSequences<H extends SequencedPathHandler>(
    root: string,
    handler: H
  ): ResultAsync<readonly MatchedFile<H>[], FinderError> {
    return folderStructure(handler)
      .andThen((folder) => unsequencedPattern(handler).map((pattern) => ({ folder, pattern })))
      .asyncAndThen(({ folder, pattern }) => this.listMatches(path.join(root, folder), handler, pattern));
  }

  private findHighestSequence<H extends SequencedPathHandler>(
    root: string,
    handler: H,
    options: LookupOptions
  ): ResultAsync<MatchedFile<H> | undefined, FinderError> {
    return folderStructure(handler)
      .andThen((folder) => unsequencedPattern(handler).map((pattern) => ({ folder, pattern })))
      .asyncAndThen(({ folder, pattern }) =>
        this.listMatches(path.join(root, folder), handler, pattern).andThen(
          (matches): ResultAsync<MatchedFile<H> | undefined, FinderError> => {
            const latest = matches[0];
            if (latest) {
              this.deps.logger.debug({ path: latest.path, sequence: latest.handler.sequence }, 'Latest version found');
              return okAsync(latest);
            }
            return this.absent(options, folder, pattern.regex.source);
          }
        )
      );
  }

  private findExact<H extends PathHandler>(
    root: string,
    handler: H,
    options: LookupOptions
  ): ResultAsync<MatchedFile<H> | undefined, FinderError> {
    return folderStructure(handler)
      .andThen((folder) => filename(handler).map((name) => ({ folder, name })))
      .asyncAndThen(({ folder, name }) => {
        const filePath = path.join(root, folder, name);
        return this.deps.fs
          .stat(filePath)
          .map((stat) => stat.isFile)
          .orElse((e): ResultAsync<boolean, StoreIoError> =>
            e.code === 'FS_NOT_FOUND' ? okAsync(false) : errAsync(DatastoreErr.storeIo(e))
          )
          .andThen((exists): ResultAsync<MatchedFile<H> | undefined, FinderError> => {
            if (exists) {
              this.deps.logger.debug({ path: filePath }, 'Exact match found');
              return okAsync({ path: filePath, handler });
            }
            return this.absent(options, folder, name);
          });
      });
  }

  private listMatches<H extends SequencedPathHandler>(
    folderPath: string,
    handler: H,
    pattern: UnsequencedPattern
  ): ResultAsync<readonly MatchedFile<H>[], StoreIoError> {
    return this.deps.fs
      .readdir(folderPath)
      .orElse((e): ResultAsync<readonly string[], StoreIoError> =>
        e.code === 'FS_NOT_FOUND' ? okAsync([]) : errAsync(DatastoreErr.storeIo(e))
      )
      .map((names) =>
        names
          .flatMap((name) => {
            const sequence = sequenceOf(pattern, name);
            return sequence === undefined ? [] : [{ name, sequence }];
          })
          // Ties (v1 vs v001) break on name so the result never depends on listing order.
          .sort((a, b) => b.sequence - a.sequence || (a.name < b.name ? 1 : a.name > b.name ? -1 : 0))
          .map(({ name, sequence }) => ({ path: path.join(folderPath, name), handler: withSequence(handler, sequence) }))
      );
  }

  private absent(options: LookupOptions, folder: string, pattern: string): ResultAsync<undefined, FileNotFoundError> {
    this.deps.logger.debug({ folder, pattern }, 'No matching file');
    return options.throwIfNotFound ? errAsync(DatastoreErr.fileNotFound(folder, pattern)) : okAsync(undefined);
  }
}
