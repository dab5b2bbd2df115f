import { describe, it, expect } from 'vitest';
import type { SpiceFileHandler } from '../../../../src/datastore/core/path-handlers/index.js';
import {
  contentDateForIndexing,
  createSpiceFileHandler,
  createSpiceFileHandlerForType,
  createSpiceRecognizer,
  createUnversionedSpiceFileHandler,
  createUnversionedSpiceFileHandlerForType,
  filename,
  folderStructure,
  fullPath,
  increaseSequence,
  indexDescriptor,
  sequenceOf,
  supportsSequencing,
  unsequencedPattern,
} from '../../../../src/datastore/core/path-handlers/index.js';
import { TableSpiceFileValidator } from '../../../../src/datastore/infra/local/spice-file-validator/index.js';
import { utcDate } from '../../../../src/datastore/core/dates.js';
import { expectErr, expectOk } from '../../../helpers/result-helpers.js';
import { testSpiceValidator } from '../../../helpers/datastore-fixtures.js';

describe('SPICE file validator', () => {
  const validator = testSpiceValidator();

  it('splits a kernel name around its version field', () => {
    expect(validator.extractComponents('imap_2025_032_2025_033_001.ah.bc')).toEqual({
      type: 'attitude_history',
      subfolder: 'ck',
      datePartitioned: true,
      versioned: true,
      startDate: utcDate(2025, 2, 1),
      endDate: utcDate(2025, 2, 2),
      version: 1,
      versionWidth: 3,
      namePrefix: 'imap_2025_032_2025_033_',
      nameSuffix: '.ah.bc',
      extension: 'bc',
    });
  });

  it('reads compact dates and keeps the version width', () => {
    const components = validator.extractComponents('imap_recon_20250101_20250108_v02.bsp');
    expect(components?.startDate).toEqual(utcDate(2025, 1, 1));
    expect(components?.endDate).toEqual(utcDate(2025, 1, 8));
    expect(components).toMatchObject({ versioned: true, version: 2, versionWidth: 2 });
  });

  it('keeps fixed-name kernels whole', () => {
    expect(validator.extractComponents('de440s.bsp')).toEqual({
      type: 'planetary_ephemeris',
      subfolder: 'spk',
      datePartitioned: false,
      versioned: false,
      startDate: undefined,
      endDate: undefined,
      extension: 'bsp',
      name: 'de440s.bsp',
    });
  });

  it('rejects names with impossible dates or no matching type', () => {
    expect(validator.extractComponents('imap_2025_400_2025_401_001.ah.bc')).toBeUndefined();
    expect(validator.extractComponents('imap_recon_20250230_20250301_v01.bsp')).toBeUndefined();
    expect(validator.extractComponents('naif0012.tls')).toBeUndefined();
  });

  it('uses the parent folder to pick between look-alike types', () => {
    const ambiguous = new TableSpiceFileValidator([
      {
        type: 'ephemeris_reconstructed',
        subfolder: 'spk',
        datePartitioned: false,
        versioned: true,
        regex: /^imap_(?<version>\d+)\.bsp$/d,
      },
      {
        type: 'ephemeris_predicted',
        subfolder: 'spk-pred',
        datePartitioned: false,
        versioned: true,
        regex: /^imap_(?<version>\d+)\.bsp$/d,
      },
    ]);

    expect(ambiguous.extractComponents('imap_01.bsp')?.type).toBe('ephemeris_reconstructed');
    expect(ambiguous.extractComponents('spk-pred/imap_01.bsp')?.type).toBe('ephemeris_predicted');
  });

  it('looks kernel types up by name', () => {
    expect(validator.kernelType('spacecraft_clock')).toEqual({
      type: 'spacecraft_clock',
      subfolder: 'sclk',
      datePartitioned: false,
      versioned: true,
      regex: /^imap_sclk_(?<version>\d+)\.tsc$/d,
    });
    expect(validator.kernelType('unknown')).toBeUndefined();
  });
});

describe('SPICE file handler', () => {
  const recognizer = createSpiceRecognizer(testSpiceValidator());

  function versioned(name: string): SpiceFileHandler {
    const handler = recognizer.fromFilename(name);
    if (handler?.kind !== 'spice') throw new Error(`Expected a versioned kernel: ${name}`);
    return handler;
  }

  it('partitions dated kernels by month of their start', () => {
    const handler = versioned('imap_2025_032_2025_033_001.ah.bc');

    expect(expectOk(folderStructure(handler), 'folder')).toBe('spice/ck/2025/02');
    expect(expectOk(filename(increaseSequence(handler)), 'name')).toBe('imap_2025_032_2025_033_002.ah.bc');
    expect(expectOk(indexDescriptor(handler), 'descriptor')).toBe('attitude_history:imap_2025_032_2025_033_.ah.bc');
  });

  it('cannot place a date-partitioned kernel without its start date', () => {
    const handler = createSpiceFileHandler({
      type: 'attitude_history',
      subfolder: 'ck',
      datePartitioned: true,
      namePrefix: 'imap_',
      nameSuffix: '.ah.bc',
    });

    const error = expectErr(folderStructure(handler), 'folder');
    expect(error).toEqual({
      _tag: 'MissingAttribute',
      operation: 'folder structure',
      attributes: ['startDate'],
      message: "No 'startDate' defined. Cannot generate folder structure.",
    });
  });

  it('keeps flat kernels in their subfolder and preserves version width', () => {
    const handler = versioned('imap_sclk_0007.tsc');

    expect(expectOk(folderStructure(handler), 'folder')).toBe('spice/sclk');
    expect(expectOk(filename(increaseSequence(handler)), 'name')).toBe('imap_sclk_0008.tsc');

    const pattern = expectOk(unsequencedPattern(handler), 'pattern');
    expect(pattern.sqlLike).toBe('imap\\_sclk\\_%.tsc');
    expect(sequenceOf(pattern, 'imap_sclk_0123.tsc')).toBe(123);
    expect(sequenceOf(pattern, 'imap_sclk_0123.tsc.bak')).toBeUndefined();
  });

  it('gives kernels that differ only in their span different index descriptors', () => {
    const first = versioned('imap_recon_20250101_20250108_v01.bsp');
    const second = versioned('imap_recon_20250101_20250115_v01.bsp');

    expect(expectOk(indexDescriptor(first), 'first')).toBe('ephemeris_reconstructed:imap_recon_20250101_20250108_v.bsp');
    expect(expectOk(indexDescriptor(second), 'second')).toBe('ephemeris_reconstructed:imap_recon_20250101_20250115_v.bsp');
  });

  it('builds a handler from a kernel type name', () => {
    const handler = expectOk(
      createSpiceFileHandlerForType(testSpiceValidator(), 'spacecraft_clock', {
        namePrefix: 'imap_sclk_',
        nameSuffix: '.tsc',
        versionWidth: 4,
        sequence: 1,
      }),
      'spice handler'
    );
    expect(expectOk(filename(handler), 'name')).toBe('imap_sclk_0001.tsc');

    const error = expectErr(createSpiceFileHandlerForType(testSpiceValidator(), 'meta_kernel'), 'unknown type');
    expect(error.message).toBe("Unknown versioned SPICE type 'meta_kernel'.");
  });

  it('cannot name a kernel without its name parts', () => {
    const handler = createSpiceFileHandler();
    expect(expectErr(filename(handler), 'name').message).toBe(
      "No 'namePrefix', 'nameSuffix' defined. Cannot generate file name."
    );
    expect(expectErr(folderStructure(handler), 'folder').message).toBe(
      "No 'subfolder' defined. Cannot generate folder structure."
    );
  });
});

describe('Unversioned SPICE file handler', () => {
  const recognizer = createSpiceRecognizer(testSpiceValidator());

  it('recognises fixed-name kernels as non-sequenced', () => {
    const handler = recognizer.fromFilename('de440s.bsp');
    expect(handler).toEqual(
      createUnversionedSpiceFileHandler({
        type: 'planetary_ephemeris',
        subfolder: 'spk',
        datePartitioned: false,
        startDate: undefined,
        endDate: undefined,
        extension: 'bsp',
        name: 'de440s.bsp',
      })
    );
    if (!handler) return;

    expect(supportsSequencing(handler)).toBe(false);
    expect(expectOk(fullPath(handler), 'path')).toBe('spice/spk/de440s.bsp');
    expect(expectOk(indexDescriptor(handler), 'descriptor')).toBe('planetary_ephemeris:de440s.bsp');
    expect(contentDateForIndexing(handler)).toBeUndefined();
  });

  it('builds a handler only for unversioned kernel types', () => {
    const handler = expectOk(
      createUnversionedSpiceFileHandlerForType(testSpiceValidator(), 'planetary_ephemeris', { name: 'de430.bsp' }),
      'unversioned handler'
    );
    expect(expectOk(fullPath(handler, '/data'), 'path')).toBe('/data/spice/spk/de430.bsp');

    const versionedType = expectErr(
      createUnversionedSpiceFileHandlerForType(testSpiceValidator(), 'spacecraft_clock'),
      'versioned type'
    );
    expect(versionedType.message).toBe("Unknown unversioned SPICE type 'spacecraft_clock'.");
    expect(expectErr(createSpiceFileHandlerForType(testSpiceValidator(), 'planetary_ephemeris'), 'fixed').message).toBe(
      "Unknown versioned SPICE type 'planetary_ephemeris'."
    );
  });

  it('needs the name to name the file', () => {
    const handler = createUnversionedSpiceFileHandler({ subfolder: 'mk' });
    expect(expectErr(filename(handler), 'name').message).toBe("No 'name' defined. Cannot generate file name.");
    expect(expectErr(indexDescriptor(handler), 'descriptor').message).toBe(
      "No 'type', 'name' defined. Cannot generate index descriptor."
    );
  });
});
