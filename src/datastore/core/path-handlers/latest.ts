import type { LatestFileHandler } from './types.js';
import type { PathConvention } from './convention.js';
import { joinSegments, requireAttributes } from './attributes.js';

export type LatestFileAttributes = Partial<Omit<LatestFileHandler, 'kind'>>;

/**
 * `latest.{ext}` in a caller-chosen folder, rewritten on every publish.
 * Not selectable from a name: the name carries no identity.
 */
export function createLatestFileHandler(attributes: LatestFileAttributes = {}): LatestFileHandler {
  return {
    kind: 'latest',
    rootFolder: '',
    mission: 'imap',
    ...attributes,
  };
}

export const latestConvention: PathConvention<LatestFileHandler> = {
  kind: 'latest',

  folderStructure(handler) {
    return requireAttributes(handler, 'folder structure', ['folder']).map((h) => joinSegments(h.rootFolder, h.folder));
  },

  filename(handler) {
    return requireAttributes(handler, 'file name', ['extension']).map((h) => `latest.${h.extension}`);
  },

  contentDateForIndexing(handler) {
    return handler.latestDate;
  },

  indexDescriptor(handler) {
    return requireAttributes(handler, 'index descriptor', ['folder', 'extension']).map(
      (h) => `${h.folder}/latest.${h.extension}`
    );
  },
};
