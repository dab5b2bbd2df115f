import type { CalibrationLayerFileHandler, CalibrationLayerPart } from './types.js';
import type { PathRecognizer, SequencedPathConvention } from './convention.js';
import { VERSION_DISCIPLINE, patternAround, renderVersion } from './sequence.js';
import { baseName, joinSegments, requireAttributes } from './attributes.js';
import { formatCompactDate, parseCompactDate, yearMonthFolder } from '../dates.js';

export type CalibrationLayerFileAttributes = Partial<Omit<CalibrationLayerFileHandler, 'kind'>>;

/** Layer data is tabular, layer metadata is a JSON document. */
export const LAYER_PART_EXTENSION: Readonly<Record<CalibrationLayerPart, string>> = {
  data: 'csv',
  meta: 'json',
};

export function createCalibrationLayerFileHandler(
  attributes: CalibrationLayerFileAttributes = {}
): CalibrationLayerFileHandler {
  return {
    kind: 'calibration-layer',
    rootFolder: 'calibration/layers',
    mission: 'imap',
    layerPart: 'data',
    sequence: VERSION_DISCIPLINE.unset,
    ...attributes,
  };
}

const NAME_KEYS = ['instrument', 'descriptor', 'contentDate'] as const;

interface LayerIdentity {
  readonly mission: string;
  readonly instrument: string;
  readonly descriptor: string;
  readonly layerPart: CalibrationLayerPart;
  readonly contentDate: Date;
}

function namePrefix(h: LayerIdentity): string {
  return `${h.mission}_${h.instrument}_${h.descriptor}-layer-${h.layerPart}_${formatCompactDate(h.contentDate)}_`;
}

export const calibrationLayerConvention: SequencedPathConvention<CalibrationLayerFileHandler> = {
  kind: 'calibration-layer',
  discipline: VERSION_DISCIPLINE,

  folderStructure(handler) {
    return requireAttributes(handler, 'folder structure', ['contentDate']).map((h) =>
      joinSegments(h.rootFolder, yearMonthFolder(h.contentDate))
    );
  },

  filename(handler) {
    return requireAttributes(handler, 'file name', NAME_KEYS).map(
      (h) => `${namePrefix(h)}${renderVersion(h.sequence)}.${LAYER_PART_EXTENSION[h.layerPart]}`
    );
  },

  unsequencedPattern(handler) {
    return requireAttributes(handler, 'pattern', NAME_KEYS).map((h) =>
      patternAround(`${namePrefix(h)}v`, `.${LAYER_PART_EXTENSION[h.layerPart]}`, 'version')
    );
  },

  contentDateForIndexing(handler) {
    return handler.contentDate;
  },

  indexDescriptor(handler) {
    return requireAttributes(handler, 'index descriptor', ['instrument', 'descriptor']).map(
      (h) => `${h.instrument}_${h.descriptor}-layer-${h.layerPart}`
    );
  },
};

const LAYER_NAME =
  /^imap_(?<instrument>[a-z0-9]+)_(?<descriptor>[^_]+)-layer-(?<part>data|meta)_(?<date>\d{8})_v(?<version>\d+)\.(?<ext>csv|json)$/;

function isLayerPart(value: string | undefined): value is CalibrationLayerPart {
  return value === 'data' || value === 'meta';
}

export const calibrationLayerRecognizer: PathRecognizer<CalibrationLayerFileHandler> = {
  kind: 'calibration-layer',
  fromFilename(path) {
    const groups = LAYER_NAME.exec(baseName(path))?.groups;
    if (!groups) return undefined;

    const layerPart = groups['part'];
    const contentDate = parseCompactDate(groups['date'] ?? '');
    if (!isLayerPart(layerPart) || !contentDate) return undefined;
    // `-layer-data_...json` is not a layer file.
    if (LAYER_PART_EXTENSION[layerPart] !== groups['ext']) return undefined;

    return createCalibrationLayerFileHandler({
      instrument: groups['instrument'],
      descriptor: groups['descriptor'],
      layerPart,
      contentDate,
      sequence: Number(groups['version']),
    });
  },
};
