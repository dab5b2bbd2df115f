import type { ResultAsync } from 'neverthrow';
import type { Fingerprint } from './fingerprint.port.js';

export type IndexStoreError =
  | { readonly code: 'INDEX_STORE_IO_ERROR'; readonly message: string }
  | { readonly code: 'INDEX_STORE_NOT_FOUND'; readonly message: string }
  | { readonly code: 'INDEX_STORE_CONFLICT'; readonly message: string };

export type JsonValue = string | number | boolean | null | readonly JsonValue[] | { readonly [key: string]: JsonValue };
export type JsonObject = { readonly [key: string]: JsonValue };

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      return Array.isArray(value) ? value.every(isJsonValue) : Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && isJsonValue(value);
}

/**
 * One indexed file. Unique per (descriptor, contentDate, version, deletionDate).
 * `path` is relative to the datastore root and includes the file name.
 */
export interface IndexedFileRecord {
  readonly id?: number;
  readonly name: string;
  readonly path: string;
  readonly descriptor: string;
  readonly contentDate: Date | null;
  readonly version: number;
  readonly hash: Fingerprint;
  readonly sizeBytes: number;
  readonly creationDate: Date;
  readonly softwareVersion: string;
  readonly metadata: JsonObject | null;
  readonly deletionDate: Date | null;
}

export interface IndexedFileQuery {
  /** Folder (datastore-relative) the records must live in. */
  readonly folder: string;
  /** SQL LIKE pattern over the file name. */
  readonly nameLike: string;
  /** Exact refinement applied after the LIKE filter. */
  readonly nameRegex: RegExp;
  readonly includeDeleted?: boolean;
}

/**
 * Port: relational index of ingested files.
 *
 * Only insert/upsert and query-by-identity are needed by the datastore core.
 */
export interface IndexStorePort {
  upsertFile(record: IndexedFileRecord): ResultAsync<IndexedFileRecord, IndexStoreError>;
  findFiles(query: IndexedFileQuery): ResultAsync<readonly IndexedFileRecord[], IndexStoreError>;
  markDeleted(record: IndexedFileRecord, deletionDate: Date): ResultAsync<IndexedFileRecord, IndexStoreError>;
}
