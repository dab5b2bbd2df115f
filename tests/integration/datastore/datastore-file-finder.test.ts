import * as path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DatastoreFileFinder } from '../../../src/datastore/finder/datastore-file-finder.js';
import { NodeDatastoreFileSystem } from '../../../src/datastore/infra/local/fs/index.js';
import {
  createIalirtFileHandler,
  createScienceFileHandler,
  withSequence,
} from '../../../src/datastore/core/path-handlers/index.js';
import { utcDate } from '../../../src/datastore/core/dates.js';
import { mkTempDir, rmTempDir, silentLogger, writeFileAt } from '../../helpers/datastore-fixtures.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

const FOLDER = 'mag/l1a/2025/05/02';
const name = (version: string, descriptor = 'norm-mago') => `imap_mag_l1a_${descriptor}_20250502_v${version}.cdf`;

const magNorm = () =>
  createScienceFileHandler({
    instrument: 'mag',
    level: 'l1a',
    descriptor: 'norm-mago',
    contentDate: utcDate(2025, 5, 2),
    extension: 'cdf',
  });

describe('DatastoreFileFinder', () => {
  let root: string;
  let finder: DatastoreFileFinder;

  beforeEach(async () => {
    root = await mkTempDir('finder');
    finder = new DatastoreFileFinder({ fs: new NodeDatastoreFileSystem(), logger: silentLogger() });
  });

  afterEach(async () => {
    await rmTempDir(root);
  });

  it('finds the highest version whatever order the files were written in', async () => {
    for (const version of ['001', '003', '002']) {
      await writeFileAt(root, `${FOLDER}/${name(version)}`, version);
    }
    await writeFileAt(root, `${FOLDER}/${name('009', 'norm-magi')}`, 'other identity');

    const latest = expectOk(await finder.findLatestVersion(root, magNorm(), { throwIfNotFound: true }), 'latest');

    expect(latest.path).toBe(path.join(root, FOLDER, name('003')));
    expect(latest.handler.sequence).toBe(3);
  });

  it('resolves an unset version to the latest and a set one to that exact file', async () => {
    await writeFileAt(root, `${FOLDER}/${name('001')}`, 'a');
    await writeFileAt(root, `${FOLDER}/${name('002')}`, 'b');

    expect(expectOk(await finder.findMatchingFile(root, magNorm()), 'unset')).toBe(path.join(root, FOLDER, name('002')));
    expect(expectOk(await finder.findMatchingFile(root, withSequence(magNorm(), 1)), 'set')).toBe(
      path.join(root, FOLDER, name('001'))
    );
  });

  it('fails strict lookups of a missing version', async () => {
    await writeFileAt(root, `${FOLDER}/${name('001')}`, 'a');

    const error = expectErr(
      await finder.findMatchingFile(root, withSequence(magNorm(), 7), { throwIfNotFound: true }),
      'missing version'
    );
    expect(error).toEqual({
      _tag: 'FileNotFound',
      folder: FOLDER,
      pattern: name('007'),
      message: `No files found matching ${name('007')} in folder ${FOLDER}.`,
    });
  });

  it('treats a missing folder as no files', async () => {
    expect(expectOk(await finder.findLatestVersion(root, magNorm()), 'lenient')).toBeUndefined();
    expect(expectErr(await finder.findLatestVersion(root, magNorm(), { throwIfNotFound: true }), 'strict')._tag).toBe(
      'FileNotFound'
    );
  });

  it('lists every stored version, highest first', async () => {
    for (const version of ['002', '010', '001']) {
      await writeFileAt(root, `${FOLDER}/${name(version)}`, version);
    }

    const all = expectOk(await finder.findAllSequences(root, magNorm()), 'all');
    expect(all.map((m) => m.handler.sequence)).toEqual([10, 2, 1]);
  });

  it('looks up non-sequenced files by exact name', async () => {
    const handler = createIalirtFileHandler({ contentDate: utcDate(2025, 1, 1) });
    expect(expectOk(await finder.findMatchingFile(root, handler), 'absent')).toBeUndefined();

    await writeFileAt(root, 'ialirt/2025/01/imap_ialirt_20250101.csv', 'x');
    expect(expectOk(await finder.findMatchingFile(root, handler, { throwIfNotFound: true }), 'present')).toBe(
      path.join(root, 'ialirt/2025/01/imap_ialirt_20250101.csv')
    );
  });

  it('reports a handler without identity before touching the disk', async () => {
    const error = expectErr(await finder.findLatestVersion(root, createScienceFileHandler({ instrument: 'mag' })), 'identity');
    expect(error._tag).toBe('MissingAttribute');
  });
});
