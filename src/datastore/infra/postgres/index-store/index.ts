import type { PoolClient } from 'pg';
import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA, errAsync, okAsync } from 'neverthrow';
import * as path from 'node:path';
import type {
  IndexStoreError,
  IndexStorePort,
  IndexedFileQuery,
  IndexedFileRecord,
} from '../../../ports/index-store.port.js';
import { isJsonObject } from '../../../ports/index-store.port.js';
import { asFingerprint } from '../../../ports/fingerprint.port.js';
import { escapeLike } from '../../../core/path-handlers/sequence.js';
import type { PostgresHelpers } from '../pool.js';

type FileRow = {
  id: number;
  name: string;
  path: string;
  descriptor: string;
  content_date: Date | null;
  version: number;
  hash: string;
  size: number;
  creation_date: Date;
  software_version: string;
  metadata: unknown;
  deletion_date: Date | null;
};

const UNIQUE_VIOLATION = '23505';

function mapFileRow(row: FileRow): IndexedFileRecord {
  return {
    id: row.id,
    name: row.name,
    path: row.path,
    descriptor: row.descriptor,
    contentDate: row.content_date,
    version: row.version,
    hash: asFingerprint(row.hash),
    sizeBytes: row.size,
    creationDate: row.creation_date,
    softwareVersion: row.software_version,
    metadata: isJsonObject(row.metadata) ? row.metadata : null,
    deletionDate: row.deletion_date,
  };
}

function toIndexStoreError(e: unknown): IndexStoreError {
  if (e instanceof Error && 'code' in e && e.code === UNIQUE_VIOLATION) {
    return { code: 'INDEX_STORE_CONFLICT', message: e.message };
  }
  return { code: 'INDEX_STORE_IO_ERROR', message: e instanceof Error ? e.message : String(e) };
}

/**
 * Index store over the `files` table.
 */
export class PostgresIndexStore implements IndexStorePort {
  constructor(private readonly db: PostgresHelpers) {}

  /** Apply the table definition; idempotent. */
  ensureSchema(schemaSql: string): ResultAsync<void, IndexStoreError> {
    return RA.fromPromise(
      this.db.withTransaction(async (client) => {
        await client.query(schemaSql);
      }),
      toIndexStoreError
    );
  }

  upsertFile(record: IndexedFileRecord): ResultAsync<IndexedFileRecord, IndexStoreError> {
    return this.run(async (client) => {
      const { rows } = await client.query<FileRow>(
        `INSERT INTO files (name, path, descriptor, content_date, version, hash, size,
                            creation_date, software_version, metadata, deletion_date)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
         ON CONFLICT ON CONSTRAINT files_identity_unique DO UPDATE SET
           name = EXCLUDED.name,
           path = EXCLUDED.path,
           hash = EXCLUDED.hash,
           size = EXCLUDED.size,
           creation_date = EXCLUDED.creation_date,
           software_version = EXCLUDED.software_version,
           metadata = EXCLUDED.metadata
         RETURNING *`,
        [
          record.name,
          record.path,
          record.descriptor,
          record.contentDate,
          record.version,
          record.hash,
          record.sizeBytes,
          record.creationDate,
          record.softwareVersion,
          record.metadata === null ? null : JSON.stringify(record.metadata),
          record.deletionDate,
        ]
      );
      const row = rows[0];
      if (!row) throw new Error(`Upsert of ${record.path} returned no row`);
      return mapFileRow(row);
    });
  }

  findFiles(query: IndexedFileQuery): ResultAsync<readonly IndexedFileRecord[], IndexStoreError> {
    return this.run(async (client) => {
      const { rows } = await client.query<FileRow>(
        `SELECT * FROM files
          WHERE name LIKE $1
            AND path LIKE $2
            AND ($3::boolean OR deletion_date IS NULL)
          ORDER BY version DESC`,
        [query.nameLike, `${escapeLike(query.folder)}/%`, query.includeDeleted === true]
      );
      return rows
        .map(mapFileRow)
        .filter((r) => path.posix.dirname(r.path) === query.folder && query.nameRegex.test(r.name));
    });
  }

  markDeleted(record: IndexedFileRecord, deletionDate: Date): ResultAsync<IndexedFileRecord, IndexStoreError> {
    return this.run(async (client) => {
      const { rows } = await client.query<FileRow>(
        'UPDATE files SET deletion_date = $2 WHERE id = $1 RETURNING *',
        [record.id ?? null, deletionDate]
      );
      const row = rows[0];
      return row ? mapFileRow(row) : undefined;
    }).andThen(
      (updated): ResultAsync<IndexedFileRecord, IndexStoreError> =>
        updated
          ? okAsync(updated)
          : errAsync({ code: 'INDEX_STORE_NOT_FOUND', message: `No indexed file ${record.path}` } as const)
    );
  }

  private run<T>(fn: (client: PoolClient) => Promise<T>): ResultAsync<T, IndexStoreError> {
    return RA.fromPromise(this.db.withConnection(fn), toIndexStoreError);
  }
}
