import type { ResultAsync } from 'neverthrow';
import type { DatastoreError } from '../core/errors.js';
import type { PathHandler } from '../core/path-handlers/index.js';
import type { Fingerprint } from '../ports/fingerprint.port.js';

export type TransferMode = 'copy' | 'move';

/**
 * - `added`: a new physical file was written.
 * - `duplicate`: identical content was already stored; nothing was written.
 * - `overwritten`: a non-sequenced file was replaced with different content.
 */
export type AddOutcome = 'added' | 'duplicate' | 'overwritten';

export interface AddFileOptions {
  readonly transfer?: TransferMode;
}

export interface AddFileResult<H extends PathHandler = PathHandler> {
  /** Absolute path of the stored file. */
  readonly path: string;
  /** Handler describing the stored file, with its final discriminator. */
  readonly handler: H;
  readonly outcome: AddOutcome;
  readonly fingerprint: Fingerprint;
}

export interface DatastoreFileManagerPort {
  readonly root: string;
  addFile<H extends PathHandler>(
    sourceFile: string,
    handler: H,
    options?: AddFileOptions
  ): ResultAsync<AddFileResult<H>, DatastoreError>;
}
