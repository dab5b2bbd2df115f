import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { ResultAsync } from 'neverthrow';
import { errAsync } from 'neverthrow';
import { IndexedDatastoreFileManager } from '../../../src/datastore/manager/indexed-datastore-file-manager.js';
import { DatastoreFileManager } from '../../../src/datastore/manager/datastore-file-manager.js';
import { DatastoreFileFinder } from '../../../src/datastore/finder/datastore-file-finder.js';
import { NodeDatastoreFileSystem } from '../../../src/datastore/infra/local/fs/index.js';
import { Sha256Fingerprint } from '../../../src/datastore/infra/local/fingerprint/index.js';
import { InMemoryIndexStore } from '../../../src/datastore/infra/local/index-store/index.js';
import type {
  IndexStoreError,
  IndexStorePort,
  IndexedFileQuery,
  IndexedFileRecord,
} from '../../../src/datastore/ports/index-store.port.js';
import {
  createHkBinaryFileHandler,
  createHkFileHandler,
  createIalirtFileHandler,
  createScienceFileHandler,
} from '../../../src/datastore/core/path-handlers/index.js';
import { utcDate } from '../../../src/datastore/core/dates.js';
import { FixedClock, listFiles, mkTempDir, rmTempDir, silentLogger, writeFileAt } from '../../helpers/datastore-fixtures.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

const FOLDER = 'mag/l1a/2025/05/02';
const V1 = 'imap_mag_l1a_norm-mago_20250502_v001.cdf';
const NOW = Date.UTC(2025, 5, 1, 12, 0, 0);

const magNorm = () =>
  createScienceFileHandler({
    instrument: 'mag',
    level: 'l1a',
    descriptor: 'norm-mago',
    contentDate: utcDate(2025, 5, 2),
    extension: 'cdf',
  });

/** Accepts queries but refuses every write. */
class RefusingIndexStore implements IndexStorePort {
  private readonly inner = new InMemoryIndexStore();

  upsertFile(): ResultAsync<IndexedFileRecord, IndexStoreError> {
    return errAsync({ code: 'INDEX_STORE_IO_ERROR', message: 'index unavailable' } as const);
  }

  findFiles(query: IndexedFileQuery): ResultAsync<readonly IndexedFileRecord[], IndexStoreError> {
    return this.inner.findFiles(query);
  }

  markDeleted(record: IndexedFileRecord, deletionDate: Date): ResultAsync<IndexedFileRecord, IndexStoreError> {
    return this.inner.markDeleted(record, deletionDate);
  }
}

describe('IndexedDatastoreFileManager', () => {
  let root: string;
  let incoming: string;
  let clock: FixedClock;

  const build = (index: IndexStorePort): IndexedDatastoreFileManager => {
    const nodeFs = new NodeDatastoreFileSystem();
    const fingerprint = new Sha256Fingerprint(nodeFs);
    const files = new DatastoreFileManager({
      root,
      fs: nodeFs,
      fingerprint,
      finder: new DatastoreFileFinder({ fs: nodeFs, logger: silentLogger() }),
      logger: silentLogger(),
    });
    return new IndexedDatastoreFileManager({
      files,
      index,
      fingerprint,
      fs: nodeFs,
      clock,
      softwareVersion: 'test-1.0',
      logger: silentLogger(),
    });
  };

  beforeEach(async () => {
    root = await mkTempDir('indexed');
    incoming = await mkTempDir('incoming');
    clock = new FixedClock(NOW);
  });

  afterEach(async () => {
    await rmTempDir(root);
    await rmTempDir(incoming);
  });

  it('records every stored file', async () => {
    const store = new InMemoryIndexStore();
    const manager = build(store);
    const source = await writeFileAt(incoming, 'a.cdf', 'alpha');

    const result = expectOk(await manager.addFile(source, magNorm(), { metadata: { run: 'nightly', attempt: 2 } }), 'add');

    expect(result.outcome).toBe('added');
    expect(result.record).toEqual({
      id: 1,
      name: V1,
      path: `${FOLDER}/${V1}`,
      descriptor: 'mag_l1a_norm-mago.cdf',
      contentDate: utcDate(2025, 5, 2),
      version: 1,
      hash: result.fingerprint,
      sizeBytes: 5,
      creationDate: new Date(NOW),
      softwareVersion: 'test-1.0',
      metadata: { run: 'nightly', attempt: 2 },
      deletionDate: null,
    });
  });

  it('resolves content already indexed under an older version to that version', async () => {
    const store = new InMemoryIndexStore();
    const manager = build(store);
    const alpha = await writeFileAt(incoming, 'a.cdf', 'alpha');
    const beta = await writeFileAt(incoming, 'b.cdf', 'beta');

    expectOk(await manager.addFile(alpha, magNorm()), 'v1');
    expectOk(await manager.addFile(beta, magNorm()), 'v2');
    const again = expectOk(await manager.addFile(alpha, magNorm()), 'alpha again');

    expect(again.outcome).toBe('duplicate');
    expect(again.handler.sequence).toBe(1);
    expect(again.path).toBe(path.join(root, FOLDER, V1));
    expect(store.all()).toHaveLength(2);
  });

  it('stores again when the indexed file changed on disk', async () => {
    const store = new InMemoryIndexStore();
    const manager = build(store);
    const alpha = await writeFileAt(incoming, 'a.cdf', 'alpha');

    expectOk(await manager.addFile(alpha, magNorm()), 'v1');
    await fs.writeFile(path.join(root, FOLDER, V1), 'tampered', 'utf8');
    const again = expectOk(await manager.addFile(alpha, magNorm()), 'alpha again');

    expect(again.outcome).toBe('added');
    expect(again.record.version).toBe(2);
  });

  it('removes the new file when indexing fails', async () => {
    const manager = build(new RefusingIndexStore());
    const source = await writeFileAt(incoming, 'a.cdf', 'alpha');

    const error = expectErr(await manager.addFile(source, magNorm()), 'refused');

    expect(error).toEqual({
      _tag: 'IndexStore',
      cause: { code: 'INDEX_STORE_IO_ERROR', message: 'index unavailable' },
      message: 'index unavailable',
    });
    expect(await listFiles(path.join(root, FOLDER))).toEqual([]);
    expect(await listFiles(incoming)).toEqual(['a.cdf']);
  });

  it('keeps a moved source in place when indexing fails', async () => {
    const manager = build(new RefusingIndexStore());
    const source = await writeFileAt(incoming, 'a.cdf', 'alpha');

    const error = expectErr(await manager.addFile(source, magNorm(), { transfer: 'move' }), 'refused');

    expect(error._tag).toBe('IndexStore');
    expect(await listFiles(path.join(root, FOLDER))).toEqual([]);
    expect(await fs.readFile(source, 'utf8')).toBe('alpha');
  });

  it('removes a moved source once its record is written', async () => {
    const store = new InMemoryIndexStore();
    const manager = build(store);
    const source = await writeFileAt(incoming, 'a.cdf', 'alpha');

    const result = expectOk(await manager.addFile(source, magNorm(), { transfer: 'move' }), 'move');

    expect(result.outcome).toBe('added');
    expect(await fs.readFile(result.path, 'utf8')).toBe('alpha');
    expect(await listFiles(incoming)).toEqual([]);
    expect(store.all()).toHaveLength(1);
  });

  it('gives science products of different levels on the same day their own records', async () => {
    const store = new InMemoryIndexStore();
    const manager = build(store);
    const l1a = await writeFileAt(incoming, 'a.cdf', 'alpha');
    const l1b = await writeFileAt(incoming, 'b.cdf', 'beta');

    const first = expectOk(await manager.addFile(l1a, magNorm()), 'l1a');
    const second = expectOk(await manager.addFile(l1b, { ...magNorm(), level: 'l1b' }), 'l1b');

    expect(first.record.id).toBe(1);
    expect(second.record.id).toBe(2);
    expect(store.all().map((r) => [r.descriptor, r.path])).toEqual([
      ['mag_l1a_norm-mago.cdf', `${FOLDER}/${V1}`],
      ['mag_l1b_norm-mago.cdf', 'mag/l1b/2025/05/02/imap_mag_l1b_norm-mago_20250502_v001.cdf'],
    ]);
  });

  it('gives decoded and raw housekeeping of the same day their own records', async () => {
    const store = new InMemoryIndexStore();
    const manager = build(store);
    const decoded = await writeFileAt(incoming, 'hk.cdf', 'decoded');
    const raw = await writeFileAt(incoming, 'hk.pkts', 'raw');
    const day = utcDate(2025, 3, 9);

    expectOk(
      await manager.addFile(
        decoded,
        createHkFileHandler({ instrument: 'mag', level: 'l1', descriptor: 'hsk-pw', contentDate: day, extension: 'cdf' })
      ),
      'decoded'
    );
    expectOk(
      await manager.addFile(
        raw,
        createHkBinaryFileHandler({ instrument: 'mag', descriptor: 'hsk-pw', contentDate: day, extension: 'pkts' })
      ),
      'raw'
    );

    expect(store.all().map((r) => [r.descriptor, r.version])).toEqual([
      ['mag_l1_hsk-pw.cdf', 1],
      ['mag_l0-binary_hsk-pw.pkts', 1],
    ]);
  });

  it('indexes non-sequenced files as version 0', async () => {
    const store = new InMemoryIndexStore();
    const manager = build(store);
    const source = await writeFileAt(incoming, 'a.csv', 'row');

    const result = expectOk(await manager.addFile(source, createIalirtFileHandler({ contentDate: utcDate(2025, 1, 1) })), 'ialirt');

    expect(result.record.descriptor).toBe('ialirt.csv');
    expect(result.record.version).toBe(0);
    expect(result.record.path).toBe('ialirt/2025/01/imap_ialirt_20250101.csv');
    expect(result.record.metadata).toBeNull();
  });

  it('marks records deleted and removes their files', async () => {
    const store = new InMemoryIndexStore();
    const manager = build(store);
    const source = await writeFileAt(incoming, 'a.cdf', 'alpha');
    const stored = expectOk(await manager.addFile(source, magNorm()), 'add');

    clock.advance(60_000);
    const deleted = expectOk(await manager.deleteFile(stored.record), 'delete');

    expect(deleted.deletionDate).toEqual(new Date(NOW + 60_000));
    expect(await listFiles(path.join(root, FOLDER))).toEqual([]);

    const live = expectOk(
      await store.findFiles({ folder: FOLDER, nameLike: '%', nameRegex: /.*/ }),
      'live records'
    );
    expect(live).toEqual([]);
  });

  it('fails to delete a record the index does not hold', async () => {
    const manager = build(new InMemoryIndexStore());
    const source = await writeFileAt(incoming, 'a.cdf', 'alpha');
    const stored = expectOk(await manager.addFile(source, magNorm()), 'add');

    const error = expectErr(await build(new InMemoryIndexStore()).deleteFile(stored.record), 'unknown record');

    expect(error._tag).toBe('IndexStore');
    expect(await listFiles(path.join(root, FOLDER))).toEqual([V1]);
  });

  describe('archiveFile', () => {
    it('moves the file under the archive folder and indexes the copy', async () => {
      const store = new InMemoryIndexStore();
      const manager = build(store);
      const source = await writeFileAt(incoming, 'a.cdf', 'alpha');
      const stored = expectOk(await manager.addFile(source, magNorm(), { metadata: { run: 'nightly' } }), 'add');

      clock.advance(60_000);
      const { archived, deleted } = expectOk(await manager.archiveFile(stored.record, 'archive'), 'archive');

      expect(archived).toEqual({
        id: 2,
        name: V1,
        path: `archive/${FOLDER}/${V1}`,
        descriptor: 'archive:mag_l1a_norm-mago.cdf',
        contentDate: utcDate(2025, 5, 2),
        version: 1,
        hash: stored.fingerprint,
        sizeBytes: 5,
        creationDate: new Date(NOW),
        softwareVersion: 'test-1.0',
        metadata: { run: 'nightly' },
        deletionDate: null,
      });
      expect(deleted.id).toBe(1);
      expect(deleted.deletionDate).toEqual(new Date(NOW + 60_000));
      expect(await fs.readFile(path.join(root, 'archive', FOLDER, V1), 'utf8')).toBe('alpha');
      expect(await listFiles(path.join(root, FOLDER))).toEqual([]);
    });

    it('records an absolute path for an archive outside the datastore', async () => {
      const store = new InMemoryIndexStore();
      const manager = build(store);
      const source = await writeFileAt(incoming, 'a.cdf', 'alpha');
      const stored = expectOk(await manager.addFile(source, magNorm()), 'add');
      const archiveFolder = path.join(incoming, 'archive');

      const { archived } = expectOk(await manager.archiveFile(stored.record, archiveFolder), 'archive');

      expect(archived.path).toBe(path.join(archiveFolder, FOLDER, V1));
      expect(await fs.readFile(archived.path, 'utf8')).toBe('alpha');
    });

    it('leaves the original untouched when the index refuses the copy', async () => {
      const source = await writeFileAt(incoming, 'a.cdf', 'alpha');
      const stored = expectOk(await build(new InMemoryIndexStore()).addFile(source, magNorm()), 'add');

      const error = expectErr(await build(new RefusingIndexStore()).archiveFile(stored.record, 'archive'), 'refused');

      expect(error._tag).toBe('IndexStore');
      expect(await listFiles(path.join(root, FOLDER))).toEqual([V1]);
      expect(await listFiles(path.join(root, 'archive', FOLDER))).toEqual([]);
    });
  });
});
