import { describe, it, expect } from 'vitest';
import { PathHandlerSelector, PATH_HANDLER_PRIORITY } from '../../../../src/datastore/selector/path-handler-selector.js';
import { capturingLogger, silentLogger, testPacketTable, testSpiceValidator } from '../../../helpers/datastore-fixtures.js';
import { expectErr, expectOk } from '../../../helpers/result-helpers.js';

const selector = () =>
  new PathHandlerSelector({ packets: testPacketTable(), spiceValidator: testSpiceValidator(), logger: silentLogger() });

const EXAMPLES: [name: string, kind: string][] = [
  ['imap_mag_l1d-calibration_20250101_v001.cdf', 'ancillary'],
  ['imap_mag_gradiometry-layer-data_20250410_v001.csv', 'calibration-layer'],
  ['imap_ialirt_20250101.csv', 'ialirt'],
  ['imap_quicklook_mag-overview_20250301_20250302.png', 'quicklook'],
  ['imap_mag_l0_hsk-pw_20250101_1.pkts', 'hk-binary'],
  ['imap_mag_l1_hsk-pw_20250101_v001.cdf', 'hk'],
  ['imap_mag_l1a_norm-mago_20250502_v001.cdf', 'science'],
  ['imap_sclk_0007.tsc', 'spice'],
];

describe('PathHandlerSelector', () => {
  it('tries the narrow conventions before the general ones', () => {
    expect(PATH_HANDLER_PRIORITY).toEqual([
      'ancillary',
      'calibration-layer',
      'ialirt',
      'quicklook',
      'hk-binary',
      'hk',
      'science',
      'spice',
    ]);
    expect(selector().recognizers.map((r) => r.kind)).toEqual([...PATH_HANDLER_PRIORITY]);
  });

  it.each(EXAMPLES)('recognises %s as %s', (name, kind) => {
    const handler = expectOk(selector().findByPath(`/incoming/${name}`, { throwIfNotFound: true }), name);
    expect(handler.kind).toBe(kind);
  });

  it.each(EXAMPLES)('lets exactly one convention claim %s', (name, kind) => {
    expect(selector().claimantsOf(name)).toEqual([kind]);
  });

  it('hands fixed-name kernels to the SPICE recognizer as unversioned handlers', () => {
    const handler = expectOk(selector().findByPath('/incoming/de440s.bsp', { throwIfNotFound: true }), 'de440s');
    expect(handler.kind).toBe('spice-unversioned');
    expect(selector().claimantsOf('de440s.bsp')).toEqual(['spice']);
  });

  it('fails strict lookups of unknown names', () => {
    const error = expectErr(selector().findByPath('notes/readme.txt', { throwIfNotFound: true }), 'unknown');
    expect(error).toEqual({
      _tag: 'UnrecognisedFile',
      path: 'notes/readme.txt',
      message: 'No suitable path handler found for file notes/readme.txt.',
    });
  });

  it('yields undefined for unknown names on lenient lookups', () => {
    expect(expectOk(selector().findByPath('notes/readme.txt'), 'lenient')).toBeUndefined();
  });

  it('logs which handler was picked', () => {
    const { logger, entries } = capturingLogger();
    const logged = new PathHandlerSelector({ packets: testPacketTable(), spiceValidator: testSpiceValidator(), logger });

    logged.findByPath('imap_ialirt_20250101.csv');

    const [entry] = entries();
    expect(entry?.msg).toBe('Path handler found');
    expect(entry?.['kind']).toBe('ialirt');
    expect(entry?.['path']).toBe('imap_ialirt_20250101.csv');
  });
});
