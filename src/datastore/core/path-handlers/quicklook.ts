import type { QuicklookFileHandler } from './types.js';
import type { PathConvention, PathRecognizer } from './convention.js';
import { baseName, joinSegments, requireAttributes } from './attributes.js';
import { formatCompactDate, parseCompactDate, yearMonthFolder } from '../dates.js';

export type QuicklookFileAttributes = Partial<Omit<QuicklookFileHandler, 'kind'>>;

export function createQuicklookFileHandler(attributes: QuicklookFileAttributes = {}): QuicklookFileHandler {
  return {
    kind: 'quicklook',
    rootFolder: 'quicklook',
    mission: 'imap',
    extension: 'png',
    ...attributes,
  };
}

const NAME_KEYS = ['plotType', 'startDate', 'endDate', 'extension'] as const;

export const quicklookConvention: PathConvention<QuicklookFileHandler> = {
  kind: 'quicklook',

  // Partitioned by the start of the plotted interval.
  folderStructure(handler) {
    return requireAttributes(handler, 'folder structure', ['plotType', 'startDate']).map((h) =>
      joinSegments(h.rootFolder, h.plotType, yearMonthFolder(h.startDate))
    );
  },

  filename(handler) {
    return requireAttributes(handler, 'file name', NAME_KEYS).map(
      (h) =>
        `${h.mission}_quicklook_${h.plotType}_${formatCompactDate(h.startDate)}_${formatCompactDate(h.endDate)}.${h.extension}`
    );
  },

  contentDateForIndexing(handler) {
    return handler.startDate;
  },

  indexDescriptor(handler) {
    return requireAttributes(handler, 'index descriptor', ['plotType', 'endDate', 'extension']).map(
      (h) => `quicklook-${h.plotType}_${formatCompactDate(h.endDate)}.${h.extension}`
    );
  },
};

const QUICKLOOK_NAME = /^imap_quicklook_(?<plot>[a-z0-9-]+)_(?<start>\d{8})_(?<end>\d{8})\.(?<ext>\w+)$/;

export const quicklookRecognizer: PathRecognizer<QuicklookFileHandler> = {
  kind: 'quicklook',
  fromFilename(path) {
    const groups = QUICKLOOK_NAME.exec(baseName(path))?.groups;
    if (!groups) return undefined;

    const startDate = parseCompactDate(groups['start'] ?? '');
    const endDate = parseCompactDate(groups['end'] ?? '');
    if (!startDate || !endDate) return undefined;

    return createQuicklookFileHandler({
      plotType: groups['plot'],
      startDate,
      endDate,
      extension: groups['ext'],
    });
  },
};
