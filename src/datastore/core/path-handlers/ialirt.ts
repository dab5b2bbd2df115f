import { ok } from 'neverthrow';
import type { IalirtFileHandler } from './types.js';
import type { PathConvention, PathRecognizer } from './convention.js';
import { baseName, joinSegments, requireAttributes } from './attributes.js';
import { formatCompactDate, parseCompactDate, yearMonthFolder } from '../dates.js';

export type IalirtFileAttributes = Partial<Omit<IalirtFileHandler, 'kind'>>;

/** One I-ALiRT snapshot per day, no revisions: re-ingest overwrites. */
export function createIalirtFileHandler(attributes: IalirtFileAttributes = {}): IalirtFileHandler {
  return {
    kind: 'ialirt',
    rootFolder: 'ialirt',
    mission: 'imap',
    extension: 'csv',
    ...attributes,
  };
}

export const ialirtConvention: PathConvention<IalirtFileHandler> = {
  kind: 'ialirt',

  folderStructure(handler) {
    return requireAttributes(handler, 'folder structure', ['contentDate']).map((h) =>
      joinSegments(h.rootFolder, yearMonthFolder(h.contentDate))
    );
  },

  filename(handler) {
    return requireAttributes(handler, 'file name', ['contentDate', 'extension']).map(
      (h) => `${h.mission}_ialirt_${formatCompactDate(h.contentDate)}.${h.extension}`
    );
  },

  contentDateForIndexing(handler) {
    return handler.contentDate;
  },

  indexDescriptor(handler) {
    return ok(`ialirt.${handler.extension}`);
  },
};

const IALIRT_NAME = /^imap_ialirt_(?<date>\d{8})\.(?<ext>\w+)$/;

export const ialirtRecognizer: PathRecognizer<IalirtFileHandler> = {
  kind: 'ialirt',
  fromFilename(path) {
    const groups = IALIRT_NAME.exec(baseName(path))?.groups;
    const contentDate = parseCompactDate(groups?.['date'] ?? '');
    if (!groups || !contentDate) return undefined;

    return createIalirtFileHandler({ contentDate, extension: groups['ext'] });
  },
};
