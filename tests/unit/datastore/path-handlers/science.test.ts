import { describe, it, expect } from 'vitest';
import {
  createScienceFileHandler,
  scienceRecognizer,
  filename,
  folderStructure,
  fullPath,
  hasUnsetSequence,
  increaseSequence,
  indexDescriptor,
  sequenceOf,
  unsequencedPattern,
  withSequence,
} from '../../../../src/datastore/core/path-handlers/index.js';
import { utcDate } from '../../../../src/datastore/core/dates.js';
import { expectErr, expectOk } from '../../../helpers/result-helpers.js';

const magNorm = () =>
  createScienceFileHandler({
    instrument: 'mag',
    level: 'l1a',
    descriptor: 'norm-mago',
    contentDate: utcDate(2025, 5, 2),
    extension: 'cdf',
  });

describe('science file handler', () => {
  it('starts with an unset version', () => {
    const handler = magNorm();
    expect(handler.sequence).toBe(0);
    expect(hasUnsetSequence(handler)).toBe(true);
  });

  it('renders the folder and the versioned file name', () => {
    const handler = withSequence(magNorm(), 0);
    expect(expectOk(folderStructure(handler), 'folder')).toBe('mag/l1a/2025/05/02');
    expect(expectOk(filename(handler), 'name')).toBe('imap_mag_l1a_norm-mago_20250502_v000.cdf');
    expect(expectOk(fullPath(increaseSequence(handler)), 'full path')).toBe(
      'mag/l1a/2025/05/02/imap_mag_l1a_norm-mago_20250502_v001.cdf'
    );
  });

  it('pads versions to three digits and lets larger ones grow', () => {
    expect(expectOk(filename(withSequence(magNorm(), 12)), 'name')).toBe('imap_mag_l1a_norm-mago_20250502_v012.cdf');
    expect(expectOk(filename(withSequence(magNorm(), 1234)), 'name')).toBe(
      'imap_mag_l1a_norm-mago_20250502_v1234.cdf'
    );
  });

  it('names every missing attribute for the operation', () => {
    const error = expectErr(folderStructure(createScienceFileHandler({ instrument: 'mag' })), 'folder');
    expect(error._tag).toBe('MissingAttribute');
    expect(error.message).toBe("No 'level', 'contentDate' defined. Cannot generate folder structure.");

    const nameError = expectErr(filename(createScienceFileHandler({ instrument: 'mag', level: 'l1a' })), 'name');
    expect(nameError.message).toBe(
      "No 'descriptor', 'contentDate', 'extension' defined. Cannot generate file name."
    );
  });

  it('indexes under every identity attribute except date and version', () => {
    expect(expectOk(indexDescriptor(magNorm()), 'descriptor')).toBe('mag_l1a_norm-mago.cdf');
    expect(expectOk(indexDescriptor({ ...magNorm(), level: 'l1b' }), 'l1b')).toBe('mag_l1b_norm-mago.cdf');
    expect(expectErr(indexDescriptor(createScienceFileHandler()), 'descriptor').message).toBe(
      "No 'instrument', 'level', 'descriptor', 'extension' defined. Cannot generate index descriptor."
    );
  });

  it('matches every version of the same identity and nothing else', () => {
    const pattern = expectOk(unsequencedPattern(magNorm()), 'pattern');

    expect(pattern.sqlLike).toBe('imap\\_mag\\_l1a\\_norm-mago\\_20250502\\_v%.cdf');
    expect(sequenceOf(pattern, 'imap_mag_l1a_norm-mago_20250502_v003.cdf')).toBe(3);
    expect(sequenceOf(pattern, 'imap_mag_l1a_norm-mago_20250502_v1000.cdf')).toBe(1000);
    expect(sequenceOf(pattern, 'imap_mag_l1a_norm-magi_20250502_v003.cdf')).toBeUndefined();
    expect(sequenceOf(pattern, 'imap_mag_l1a_norm-mago_20250502_v003.cdfx')).toBeUndefined();
    expect(sequenceOf(pattern, 'imap_mag_l1a_norm-mago_20250502_vabc.cdf')).toBeUndefined();
  });
});

describe('science recognizer', () => {
  it('parses a science name into its attributes', () => {
    const handler = scienceRecognizer.fromFilename('some/dir/imap_mag_l1b_norm-magi_20251231_v004.cdf');

    expect(handler).toEqual({
      kind: 'science',
      rootFolder: '',
      mission: 'imap',
      instrument: 'mag',
      level: 'l1b',
      descriptor: 'norm-magi',
      contentDate: utcDate(2025, 12, 31),
      sequence: 4,
      extension: 'cdf',
    });
  });

  it('accepts pre-release levels and burst descriptors', () => {
    expect(scienceRecognizer.fromFilename('imap_mag_l1c-pre_burst-mago_20250101_v001.cdf')?.level).toBe('l1c-pre');
  });

  it('rejects impossible dates and foreign descriptors', () => {
    expect(scienceRecognizer.fromFilename('imap_mag_l1a_norm-mago_20250231_v001.cdf')).toBeUndefined();
    expect(scienceRecognizer.fromFilename('imap_mag_l0_hsk-pw_20250101_v001.pkts')).toBeUndefined();
    expect(scienceRecognizer.fromFilename('imap_mag_l1a_norm-mago_20250101.cdf')).toBeUndefined();
  });

  it('round-trips a recognised name', () => {
    const name = 'imap_mag_l2_norm-dsrf_20250615_v002.cdf';
    const handler = scienceRecognizer.fromFilename(name);
    expect(handler).toBeDefined();
    if (handler) expect(expectOk(filename(handler), 'name')).toBe(name);
  });
});
