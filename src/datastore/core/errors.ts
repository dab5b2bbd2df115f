/**
 * Datastore error taxonomy.
 *
 * Errors are data: every expected failure travels as a tagged value inside a
 * neverthrow Result. A duplicate ingest is a success outcome, not an error.
 */

import type { FsError } from '../ports/fs.port.js';
import type { IndexStoreError } from '../ports/index-store.port.js';
import { assertNever } from '../../runtime/assert-never.js';

export interface MissingAttributeError {
  readonly _tag: 'MissingAttribute';
  readonly operation: string;
  readonly attributes: readonly string[];
  readonly message: string;
}

export interface UnknownAttributeValueError {
  readonly _tag: 'UnknownAttributeValue';
  readonly attribute: string;
  readonly value: string;
  readonly message: string;
}

export interface UnrecognisedFileError {
  readonly _tag: 'UnrecognisedFile';
  readonly path: string;
  readonly message: string;
}

export interface FileNotFoundError {
  readonly _tag: 'FileNotFound';
  readonly folder: string;
  readonly pattern: string;
  readonly message: string;
}

export interface SourceNotFoundError {
  readonly _tag: 'SourceNotFound';
  readonly path: string;
  readonly message: string;
}

export interface StoreIoError {
  readonly _tag: 'StoreIo';
  readonly cause: FsError;
  readonly message: string;
}

export interface IndexStoreFailedError {
  readonly _tag: 'IndexStore';
  readonly cause: IndexStoreError;
  readonly message: string;
}

/** Failures of pure identity operations (no I/O). */
export type IdentityError = MissingAttributeError | UnknownAttributeValueError;

export type DatastoreError =
  | IdentityError
  | UnrecognisedFileError
  | FileNotFoundError
  | SourceNotFoundError
  | StoreIoError
  | IndexStoreFailedError;

export const DatastoreErr = {
  missingAttribute: (operation: string, attributes: readonly string[]): MissingAttributeError => ({
    _tag: 'MissingAttribute',
    operation,
    attributes,
    message: `No ${attributes.map((a) => `'${a}'`).join(', ')} defined. Cannot generate ${operation}.`,
  }),

  unknownAttributeValue: (attribute: string, value: string): UnknownAttributeValueError => ({
    _tag: 'UnknownAttributeValue',
    attribute,
    value,
    message: `Unknown ${attribute} '${value}'.`,
  }),

  unrecognisedFile: (path: string): UnrecognisedFileError => ({
    _tag: 'UnrecognisedFile',
    path,
    message: `No suitable path handler found for file ${path}.`,
  }),

  fileNotFound: (folder: string, pattern: string): FileNotFoundError => ({
    _tag: 'FileNotFound',
    folder,
    pattern,
    message: `No files found matching ${pattern} in folder ${folder}.`,
  }),

  sourceNotFound: (path: string): SourceNotFoundError => ({
    _tag: 'SourceNotFound',
    path,
    message: `File ${path} does not exist.`,
  }),

  storeIo: (cause: FsError): StoreIoError => ({
    _tag: 'StoreIo',
    cause,
    message: cause.message,
  }),

  indexStore: (cause: IndexStoreError): IndexStoreFailedError => ({
    _tag: 'IndexStore',
    cause,
    message: cause.message,
  }),
} as const;

export function formatDatastoreError(error: DatastoreError): string {
  switch (error._tag) {
    case 'MissingAttribute':
    case 'UnknownAttributeValue':
    case 'UnrecognisedFile':
    case 'FileNotFound':
    case 'SourceNotFound':
      return error.message;
    case 'StoreIo':
      return `Datastore I/O failed (${error.cause.code}): ${error.message}`;
    case 'IndexStore':
      return `Index store failed (${error.cause.code}): ${error.message}`;
    default:
      return assertNever(error);
  }
}
