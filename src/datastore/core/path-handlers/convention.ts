import type { Result } from 'neverthrow';
import type { IdentityError } from '../errors.js';
import type { PathHandler, SequencedPathHandler } from './types.js';
import type { SequenceDiscipline, UnsequencedPattern } from './sequence.js';

/**
 * Layout and naming rules of one variant.
 *
 * All operations are pure and deterministic over the handler's attributes.
 */
export interface PathConvention<H extends PathHandler> {
  readonly kind: H['kind'];
  folderStructure(handler: H): Result<string, IdentityError>;
  filename(handler: H): Result<string, IdentityError>;
  contentDateForIndexing(handler: H): Date | undefined;
  /** Descriptor recorded by the index store. */
  indexDescriptor(handler: H): Result<string, IdentityError>;
}

export interface SequencedPathConvention<H extends SequencedPathHandler> extends PathConvention<H> {
  readonly discipline: SequenceDiscipline;
  unsequencedPattern(handler: H): Result<UnsequencedPattern, IdentityError>;
}

/**
 * Parses a bare file name (or `parent/name` for variants that read an
 * attribute from the folder) into a handler. Never throws: a name that does not
 * fit the template yields undefined so other variants can be tried.
 */
export interface PathRecognizer<H extends PathHandler = PathHandler> {
  readonly kind: H['kind'];
  fromFilename(path: string): H | undefined;
}
