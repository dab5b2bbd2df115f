import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { SpiceFileHandler, UnversionedSpiceFileHandler } from './types.js';
import type { PathConvention, PathRecognizer, SequencedPathConvention } from './convention.js';
import { VERSION_DISCIPLINE, patternAround } from './sequence.js';
import { joinSegments, requireAttributes } from './attributes.js';
import type { IdentityError } from '../errors.js';
import { DatastoreErr } from '../errors.js';
import { yearMonthFolder } from '../dates.js';
import type { SpiceFileValidator, SpiceKernelType } from '../../ports/spice-file-validator.port.js';

export type SpiceFileAttributes = Partial<Omit<SpiceFileHandler, 'kind'>>;
export type UnversionedSpiceFileAttributes = Partial<Omit<UnversionedSpiceFileHandler, 'kind'>>;

type KernelAttributeKeys = 'type' | 'subfolder' | 'datePartitioned';

export function createSpiceFileHandler(attributes: SpiceFileAttributes = {}): SpiceFileHandler {
  return {
    kind: 'spice',
    rootFolder: 'spice',
    mission: 'imap',
    datePartitioned: false,
    versionWidth: 3,
    sequence: VERSION_DISCIPLINE.unset,
    ...attributes,
  };
}

export function createUnversionedSpiceFileHandler(
  attributes: UnversionedSpiceFileAttributes = {}
): UnversionedSpiceFileHandler {
  return {
    kind: 'spice-unversioned',
    rootFolder: 'spice',
    mission: 'imap',
    datePartitioned: false,
    ...attributes,
  };
}

function kernelOfType(
  validator: SpiceFileValidator,
  type: string,
  versioned: boolean
): Result<SpiceKernelType, IdentityError> {
  const kernel = validator.kernelType(type);
  if (!kernel || kernel.versioned !== versioned) {
    return err(DatastoreErr.unknownAttributeValue(versioned ? 'versioned SPICE type' : 'unversioned SPICE type', type));
  }
  return ok(kernel);
}

/**
 * Build a handler for a versioned kernel type by name, taking its subfolder
 * and partitioning from the kernel table.
 */
export function createSpiceFileHandlerForType(
  validator: SpiceFileValidator,
  type: string,
  attributes: Omit<SpiceFileAttributes, KernelAttributeKeys> = {}
): Result<SpiceFileHandler, IdentityError> {
  return kernelOfType(validator, type, true).map((kernel) =>
    createSpiceFileHandler({
      ...attributes,
      type: kernel.type,
      subfolder: kernel.subfolder,
      datePartitioned: kernel.datePartitioned,
    })
  );
}

export function createUnversionedSpiceFileHandlerForType(
  validator: SpiceFileValidator,
  type: string,
  attributes: Omit<UnversionedSpiceFileAttributes, KernelAttributeKeys> = {}
): Result<UnversionedSpiceFileHandler, IdentityError> {
  return kernelOfType(validator, type, false).map((kernel) =>
    createUnversionedSpiceFileHandler({
      ...attributes,
      type: kernel.type,
      subfolder: kernel.subfolder,
      datePartitioned: kernel.datePartitioned,
    })
  );
}

/** `spice/{subfolder}`, then `YYYY/MM` of the start date for partitioned types. */
function kernelFolder(handler: SpiceFileHandler | UnversionedSpiceFileHandler): Result<string, IdentityError> {
  return requireAttributes(handler, 'folder structure', ['subfolder']).andThen((h): Result<string, IdentityError> => {
    if (!h.datePartitioned) return ok(joinSegments(h.rootFolder, h.subfolder));
    return requireAttributes(h, 'folder structure', ['startDate']).map((dated) =>
      joinSegments(dated.rootFolder, dated.subfolder, yearMonthFolder(dated.startDate))
    );
  });
}

const NAME_KEYS = ['namePrefix', 'nameSuffix'] as const;

export const spiceConvention: SequencedPathConvention<SpiceFileHandler> = {
  kind: 'spice',
  discipline: VERSION_DISCIPLINE,

  folderStructure: kernelFolder,

  filename(handler) {
    return requireAttributes(handler, 'file name', NAME_KEYS).map(
      (h) => `${h.namePrefix}${String(h.sequence).padStart(h.versionWidth, '0')}${h.nameSuffix}`
    );
  },

  unsequencedPattern(handler) {
    return requireAttributes(handler, 'pattern', NAME_KEYS).map((h) =>
      patternAround(h.namePrefix, h.nameSuffix, 'version')
    );
  },

  contentDateForIndexing(handler) {
    return handler.startDate;
  },

  indexDescriptor(handler) {
    return requireAttributes(handler, 'index descriptor', ['type', ...NAME_KEYS]).map(
      (h) => `${h.type}:${h.namePrefix}${h.nameSuffix}`
    );
  },
};

export const unversionedSpiceConvention: PathConvention<UnversionedSpiceFileHandler> = {
  kind: 'spice-unversioned',

  folderStructure: kernelFolder,

  filename(handler) {
    return requireAttributes(handler, 'file name', ['name']).map((h) => h.name);
  },

  contentDateForIndexing(handler) {
    return handler.startDate;
  },

  indexDescriptor(handler) {
    return requireAttributes(handler, 'index descriptor', ['type', 'name']).map((h) => `${h.type}:${h.name}`);
  },
};

export function createSpiceRecognizer(
  validator: SpiceFileValidator
): PathRecognizer<SpiceFileHandler | UnversionedSpiceFileHandler> {
  return {
    kind: 'spice',
    fromFilename(path) {
      const components = validator.extractComponents(path);
      if (!components) return undefined;

      const kernel = {
        type: components.type,
        subfolder: components.subfolder,
        datePartitioned: components.datePartitioned,
        startDate: components.startDate,
        endDate: components.endDate,
        extension: components.extension,
      };
      if (!components.versioned) return createUnversionedSpiceFileHandler({ ...kernel, name: components.name });

      return createSpiceFileHandler({
        ...kernel,
        namePrefix: components.namePrefix,
        nameSuffix: components.nameSuffix,
        versionWidth: components.versionWidth,
        sequence: components.version,
      });
    },
  };
}
