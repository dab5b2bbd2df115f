import type { ScienceFileHandler } from './types.js';
import type { PathRecognizer, SequencedPathConvention } from './convention.js';
import { VERSION_DISCIPLINE, patternAround, renderVersion } from './sequence.js';
import { baseName, joinSegments, requireAttributes } from './attributes.js';
import { formatCompactDate, parseCompactDate, yearMonthDayFolder } from '../dates.js';

export type ScienceFileAttributes = Partial<Omit<ScienceFileHandler, 'kind'>>;

export function createScienceFileHandler(attributes: ScienceFileAttributes = {}): ScienceFileHandler {
  return {
    kind: 'science',
    rootFolder: '',
    mission: 'imap',
    sequence: VERSION_DISCIPLINE.unset,
    ...attributes,
  };
}

const NAME_KEYS = ['instrument', 'level', 'descriptor', 'contentDate', 'extension'] as const;

export const scienceConvention: SequencedPathConvention<ScienceFileHandler> = {
  kind: 'science',
  discipline: VERSION_DISCIPLINE,

  folderStructure(handler) {
    return requireAttributes(handler, 'folder structure', ['instrument', 'level', 'contentDate']).map((h) =>
      joinSegments(h.rootFolder, h.instrument, h.level, yearMonthDayFolder(h.contentDate))
    );
  },

  filename(handler) {
    return requireAttributes(handler, 'file name', NAME_KEYS).map(
      (h) =>
        `${h.mission}_${h.instrument}_${h.level}_${h.descriptor}_${formatCompactDate(h.contentDate)}_${renderVersion(h.sequence)}.${h.extension}`
    );
  },

  unsequencedPattern(handler) {
    return requireAttributes(handler, 'pattern', NAME_KEYS).map((h) =>
      patternAround(
        `${h.mission}_${h.instrument}_${h.level}_${h.descriptor}_${formatCompactDate(h.contentDate)}_v`,
        `.${h.extension}`,
        'version'
      )
    );
  },

  contentDateForIndexing(handler) {
    return handler.contentDate;
  },

  indexDescriptor(handler) {
    return requireAttributes(handler, 'index descriptor', ['instrument', 'level', 'descriptor', 'extension']).map(
      (h) => `${h.instrument}_${h.level}_${h.descriptor}.${h.extension}`
    );
  },
};

// Descriptor grammar is stricter than the template: science descriptors are
// `norm*` or `burst*`, which keeps housekeeping and ancillary names out.
const SCIENCE_NAME =
  /^imap_(?<instrument>[a-z0-9]+)_(?<level>l\d[a-z]?(?:-pre)?)_(?<descriptor>(?:norm|burst)[^_]*)_(?<date>\d{8})_v(?<version>\d+)\.(?<ext>\w+)$/;

export const scienceRecognizer: PathRecognizer<ScienceFileHandler> = {
  kind: 'science',
  fromFilename(path) {
    const groups = SCIENCE_NAME.exec(baseName(path))?.groups;
    if (!groups) return undefined;

    const contentDate = parseCompactDate(groups['date'] ?? '');
    if (!contentDate) return undefined;

    return createScienceFileHandler({
      instrument: groups['instrument'],
      level: groups['level'],
      descriptor: groups['descriptor'],
      contentDate,
      sequence: Number(groups['version']),
      extension: groups['ext'],
    });
  },
};
