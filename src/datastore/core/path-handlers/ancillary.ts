import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { AncillaryFileHandler } from './types.js';
import type { PathRecognizer, SequencedPathConvention } from './convention.js';
import { VERSION_DISCIPLINE, patternAround, renderVersion } from './sequence.js';
import { baseName, joinSegments, requireAttributes } from './attributes.js';
import type { IdentityError } from '../errors.js';
import { DatastoreErr } from '../errors.js';
import { formatCompactDate, parseCompactDate, yearMonthFolder } from '../dates.js';

export type AncillaryFileAttributes = Partial<Omit<AncillaryFileHandler, 'kind'>>;

export function createAncillaryFileHandler(attributes: AncillaryFileAttributes = {}): AncillaryFileHandler {
  return {
    kind: 'ancillary',
    rootFolder: 'science-ancillary',
    mission: 'imap',
    sequence: VERSION_DISCIPLINE.unset,
    ...attributes,
  };
}

const FIXED_SUBFOLDERS: ReadonlyMap<string, string> = new Map([
  ['ialirt-calibration', 'ialirt'],
  ['l1b-calibration', 'l1b'],
  ['l1d-calibration', 'l1d'],
  ['l2-calibration', 'l2-rotation'],
]);

/** Offsets are produced daily, so they are partitioned by month. */
export function ancillarySubfolder(descriptor: string, startDate: Date): Result<string, IdentityError> {
  const fixed = FIXED_SUBFOLDERS.get(descriptor);
  if (fixed !== undefined) return ok(fixed);
  if (descriptor.endsWith('-offsets')) return ok(joinSegments('l2-offsets', yearMonthFolder(startDate)));

  return err(DatastoreErr.unknownAttributeValue('ancillary descriptor', descriptor));
}

const NAME_KEYS = ['instrument', 'descriptor', 'startDate', 'extension'] as const;

function validityRange(startDate: Date, endDate: Date | undefined): string {
  return endDate === undefined
    ? formatCompactDate(startDate)
    : `${formatCompactDate(startDate)}_${formatCompactDate(endDate)}`;
}

export const ancillaryConvention: SequencedPathConvention<AncillaryFileHandler> = {
  kind: 'ancillary',
  discipline: VERSION_DISCIPLINE,

  folderStructure(handler) {
    return requireAttributes(handler, 'folder structure', ['descriptor', 'startDate']).andThen((h) =>
      ancillarySubfolder(h.descriptor, h.startDate).map((sub) => joinSegments(h.rootFolder, sub))
    );
  },

  filename(handler) {
    return requireAttributes(handler, 'file name', NAME_KEYS).map(
      (h) =>
        `${h.mission}_${h.instrument}_${h.descriptor}_${validityRange(h.startDate, h.endDate)}_${renderVersion(h.sequence)}.${h.extension}`
    );
  },

  unsequencedPattern(handler) {
    return requireAttributes(handler, 'pattern', NAME_KEYS).map((h) =>
      patternAround(
        `${h.mission}_${h.instrument}_${h.descriptor}_${validityRange(h.startDate, h.endDate)}_v`,
        `.${h.extension}`,
        'version'
      )
    );
  },

  contentDateForIndexing(handler) {
    return handler.startDate;
  },

  indexDescriptor(handler) {
    return requireAttributes(handler, 'index descriptor', ['instrument', 'descriptor', 'extension']).map((h) =>
      h.endDate
        ? `${h.instrument}_${h.descriptor}_${formatCompactDate(h.endDate)}.${h.extension}`
        : `${h.instrument}_${h.descriptor}.${h.extension}`
    );
  },
};

const ANCILLARY_NAME =
  /^imap_(?<instrument>[a-z0-9]+)_(?<descriptor>[^_]+(?:-calibration|-offsets))_(?<start>\d{8})_(?:(?<end>\d{8})_)?v(?<version>\d+)\.(?<ext>\w+)$/;

export const ancillaryRecognizer: PathRecognizer<AncillaryFileHandler> = {
  kind: 'ancillary',
  fromFilename(path) {
    const groups = ANCILLARY_NAME.exec(baseName(path))?.groups;
    if (!groups) return undefined;

    const startDate = parseCompactDate(groups['start'] ?? '');
    const endText = groups['end'];
    const endDate = endText === undefined ? undefined : parseCompactDate(endText);
    if (!startDate || (endText !== undefined && !endDate)) return undefined;

    return createAncillaryFileHandler({
      instrument: groups['instrument'],
      descriptor: groups['descriptor'],
      startDate,
      endDate,
      sequence: Number(groups['version']),
      extension: groups['ext'],
    });
  },
};
