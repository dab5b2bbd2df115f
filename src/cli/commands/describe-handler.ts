import type { Result } from 'neverthrow';
import type { IdentityError } from '../../datastore/core/errors.js';
import type { PathHandler } from '../../datastore/core/path-handlers/index.js';
import {
  disciplineOf,
  filename,
  folderStructure,
  getSequence,
  indexDescriptor,
  supportsSequencing,
} from '../../datastore/core/path-handlers/index.js';

export type HandlerField = readonly [string, string];

/**
 * Fields shown for a handler: kind, folder, file name, index descriptor and,
 * for sequenced handlers, the discriminator under its discipline's name.
 */
export function describeHandler(handler: PathHandler): Result<readonly HandlerField[], IdentityError> {
  return folderStructure(handler).andThen((folder) =>
    filename(handler).andThen((name) =>
      indexDescriptor(handler).map((descriptor): readonly HandlerField[] => {
        const fields: HandlerField[] = [
          ['kind', handler.kind],
          ['folder', folder === '' ? '.' : folder],
          ['filename', name],
          ['descriptor', descriptor],
        ];
        if (supportsSequencing(handler)) {
          fields.push([disciplineOf(handler).name, String(getSequence(handler))]);
        }
        return fields;
      })
    )
  );
}
