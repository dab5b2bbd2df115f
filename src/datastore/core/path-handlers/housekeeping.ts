import type { HkBinaryFileHandler, HkFileHandler } from './types.js';
import type { PathRecognizer, SequencedPathConvention } from './convention.js';
import { PART_DISCIPLINE, VERSION_DISCIPLINE, patternAround, renderVersion } from './sequence.js';
import { baseName, joinSegments, requireAttributes } from './attributes.js';
import { formatCompactDate, parseCompactDate, yearMonthFolder } from '../dates.js';
import type { HousekeepingPacketTable } from '../housekeeping-packets.js';

export const HK_ROOT_FOLDER = 'hk';
export const HK_BINARY_LEVEL = 'l0';

export type HkFileAttributes = Partial<Omit<HkFileHandler, 'kind'>>;
export type HkBinaryFileAttributes = Partial<Omit<HkBinaryFileHandler, 'kind'>>;

export function createHkFileHandler(attributes: HkFileAttributes = {}): HkFileHandler {
  return {
    kind: 'hk',
    rootFolder: HK_ROOT_FOLDER,
    mission: 'imap',
    sequence: VERSION_DISCIPLINE.unset,
    ...attributes,
  };
}

export function createHkBinaryFileHandler(attributes: HkBinaryFileAttributes = {}): HkBinaryFileHandler {
  return {
    kind: 'hk-binary',
    rootFolder: HK_ROOT_FOLDER,
    mission: 'imap',
    sequence: PART_DISCIPLINE.unset,
    ...attributes,
  };
}

const FOLDER_KEYS = ['instrument', 'descriptor', 'contentDate'] as const;
const NAME_KEYS = ['instrument', 'descriptor', 'contentDate', 'extension'] as const;

export const hkConvention: SequencedPathConvention<HkFileHandler> = {
  kind: 'hk',
  discipline: VERSION_DISCIPLINE,

  folderStructure(handler) {
    return requireAttributes(handler, 'folder structure', [...FOLDER_KEYS, 'level']).map((h) =>
      joinSegments(h.rootFolder, h.instrument, h.level, h.descriptor, yearMonthFolder(h.contentDate))
    );
  },

  filename(handler) {
    return requireAttributes(handler, 'file name', [...NAME_KEYS, 'level']).map(
      (h) =>
        `${h.mission}_${h.instrument}_${h.level}_${h.descriptor}_${formatCompactDate(h.contentDate)}_${renderVersion(h.sequence)}.${h.extension}`
    );
  },

  unsequencedPattern(handler) {
    return requireAttributes(handler, 'pattern', [...NAME_KEYS, 'level']).map((h) =>
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

export const hkBinaryConvention: SequencedPathConvention<HkBinaryFileHandler> = {
  kind: 'hk-binary',
  discipline: PART_DISCIPLINE,

  folderStructure(handler) {
    return requireAttributes(handler, 'folder structure', FOLDER_KEYS).map((h) =>
      joinSegments(h.rootFolder, h.instrument, HK_BINARY_LEVEL, h.descriptor, yearMonthFolder(h.contentDate))
    );
  },

  filename(handler) {
    return requireAttributes(handler, 'file name', NAME_KEYS).map(
      (h) =>
        `${h.mission}_${h.instrument}_${HK_BINARY_LEVEL}_${h.descriptor}_${formatCompactDate(h.contentDate)}_${h.sequence}.${h.extension}`
    );
  },

  unsequencedPattern(handler) {
    return requireAttributes(handler, 'pattern', NAME_KEYS).map((h) =>
      patternAround(
        `${h.mission}_${h.instrument}_${HK_BINARY_LEVEL}_${h.descriptor}_${formatCompactDate(h.contentDate)}_`,
        `.${h.extension}`,
        'part'
      )
    );
  },

  contentDateForIndexing(handler) {
    return handler.contentDate;
  },

  indexDescriptor(handler) {
    return requireAttributes(handler, 'index descriptor', ['instrument', 'descriptor', 'extension']).map(
      (h) => `${h.instrument}_${HK_BINARY_LEVEL}-binary_${h.descriptor}.${h.extension}`
    );
  },
};

const HK_NAME =
  /^imap_(?<instrument>[a-z0-9]+)_(?<level>l\d)_(?<descriptor>[a-z0-9]+-[^_]+)_(?<date>\d{8})_v(?<version>\d+)\.(?<ext>\w+)$/;
const HK_BINARY_NAME =
  /^imap_(?<instrument>[a-z0-9]+)_l0_(?<descriptor>[a-z0-9]+-[^_]+)_(?<date>\d{8})_(?<part>\d+)\.(?<ext>\w+)$/;

/**
 * Only descriptors whose family is in the packet table are claimed, so names
 * that merely look like housekeeping fall through to other variants.
 */
export function createHkRecognizer(packets: HousekeepingPacketTable): PathRecognizer<HkFileHandler> {
  return {
    kind: 'hk',
    fromFilename(path) {
      const groups = HK_NAME.exec(baseName(path))?.groups;
      if (!groups) return undefined;

      const descriptor = groups['descriptor'] ?? '';
      const contentDate = parseCompactDate(groups['date'] ?? '');
      if (!packets.isKnownDescriptor(descriptor) || !contentDate) return undefined;

      return createHkFileHandler({
        instrument: groups['instrument'],
        level: groups['level'],
        descriptor,
        contentDate,
        sequence: Number(groups['version']),
        extension: groups['ext'],
      });
    },
  };
}

export function createHkBinaryRecognizer(packets: HousekeepingPacketTable): PathRecognizer<HkBinaryFileHandler> {
  return {
    kind: 'hk-binary',
    fromFilename(path) {
      const groups = HK_BINARY_NAME.exec(baseName(path))?.groups;
      if (!groups) return undefined;

      const descriptor = groups['descriptor'] ?? '';
      const contentDate = parseCompactDate(groups['date'] ?? '');
      if (!packets.isKnownDescriptor(descriptor) || !contentDate) return undefined;

      return createHkBinaryFileHandler({
        instrument: groups['instrument'],
        descriptor,
        contentDate,
        sequence: Number(groups['part']),
        extension: groups['ext'],
      });
    },
  };
}
