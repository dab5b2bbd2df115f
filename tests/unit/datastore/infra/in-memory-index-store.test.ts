import { describe, it, expect } from 'vitest';
import { InMemoryIndexStore, likeToRegExp } from '../../../../src/datastore/infra/local/index-store/index.js';
import type { IndexedFileRecord } from '../../../../src/datastore/ports/index-store.port.js';
import { asFingerprint } from '../../../../src/datastore/ports/fingerprint.port.js';
import { utcDate } from '../../../../src/datastore/core/dates.js';
import { expectErr, expectOk } from '../../../helpers/result-helpers.js';

const FOLDER = 'mag/l1a/2025/05/02';

function record(version: number, overrides: Partial<IndexedFileRecord> = {}): IndexedFileRecord {
  const name = `imap_mag_l1a_norm-mago_20250502_v00${version}.cdf`;
  return {
    name,
    path: `${FOLDER}/${name}`,
    descriptor: 'norm-mago',
    contentDate: utcDate(2025, 5, 2),
    version,
    hash: asFingerprint(`sha256:${version}`),
    sizeBytes: 10,
    creationDate: utcDate(2025, 6, 1),
    softwareVersion: 'test',
    metadata: null,
    deletionDate: null,
    ...overrides,
  };
}

const query = {
  folder: FOLDER,
  nameLike: 'imap\\_mag\\_l1a\\_norm-mago\\_20250502\\_v%.cdf',
  nameRegex: /^imap_mag_l1a_norm-mago_20250502_v(?<version>\d+)\.cdf$/,
};

describe('likeToRegExp', () => {
  it('honours wildcards and escapes', () => {
    const like = likeToRegExp('imap\\_a%.cdf');

    expect(like.test('imap_abc.cdf')).toBe(true);
    expect(like.test('imapXabc.cdf')).toBe(false);
    expect(like.test('imap_abcXcdf')).toBe(false);
    expect(likeToRegExp('v_').test('v1')).toBe(true);
  });
});

describe('InMemoryIndexStore', () => {
  it('assigns ids and replaces records with the same identity', async () => {
    const store = new InMemoryIndexStore();

    const first = expectOk(await store.upsertFile(record(1)), 'first');
    const second = expectOk(await store.upsertFile(record(2)), 'second');
    const replaced = expectOk(await store.upsertFile(record(1, { sizeBytes: 99 })), 'replace');

    expect([first.id, second.id, replaced.id]).toEqual([1, 2, 1]);
    expect(store.all()).toHaveLength(2);
    expect(store.all().find((r) => r.id === 1)?.sizeBytes).toBe(99);
  });

  it('finds records of one identity, highest version first', async () => {
    const store = new InMemoryIndexStore();
    await store.upsertFile(record(1));
    await store.upsertFile(record(3));
    await store.upsertFile(record(2));
    await store.upsertFile(record(1, { name: 'other.cdf', path: `${FOLDER}/other.cdf`, descriptor: 'other' }));
    await store.upsertFile(record(4, { path: `elsewhere/imap_mag_l1a_norm-mago_20250502_v004.cdf` }));

    const found = expectOk(await store.findFiles(query), 'find');

    expect(found.map((r) => r.version)).toEqual([3, 2, 1]);
  });

  it('hides deleted records unless asked', async () => {
    const store = new InMemoryIndexStore();
    const stored = expectOk(await store.upsertFile(record(1)), 'upsert');

    const deleted = expectOk(await store.markDeleted(stored, utcDate(2025, 7, 1)), 'delete');

    expect(deleted.deletionDate).toEqual(utcDate(2025, 7, 1));
    expect(expectOk(await store.findFiles(query), 'live')).toEqual([]);
    expect(expectOk(await store.findFiles({ ...query, includeDeleted: true }), 'all')).toEqual([deleted]);
  });

  it('lets a version be stored again after deletion', async () => {
    const store = new InMemoryIndexStore();
    const stored = expectOk(await store.upsertFile(record(1)), 'upsert');
    expectOk(await store.markDeleted(stored, utcDate(2025, 7, 1)), 'delete');

    const again = expectOk(await store.upsertFile(record(1)), 'again');

    expect(again.id).toBe(2);
    expect(store.all()).toHaveLength(2);
  });

  it('refuses to delete unknown records or to collide with a deleted twin', async () => {
    const store = new InMemoryIndexStore();
    expect(expectErr(await store.markDeleted(record(1), utcDate(2025, 7, 1)), 'unknown').code).toBe('INDEX_STORE_NOT_FOUND');

    const first = expectOk(await store.upsertFile(record(1)), 'first');
    expectOk(await store.markDeleted(first, utcDate(2025, 7, 1)), 'delete');
    const second = expectOk(await store.upsertFile(record(1)), 'second');

    expect(expectErr(await store.markDeleted(second, utcDate(2025, 7, 1)), 'twin').code).toBe('INDEX_STORE_CONFLICT');
  });
});
