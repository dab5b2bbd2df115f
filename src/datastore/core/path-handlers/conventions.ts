/**
 * Convention dispatch.
 *
 * Every operation on an arbitrary handler goes through here: the handler's
 * `kind` selects the variant's convention. Sequencing is a capability only
 * some variants have; `supportsSequencing` narrows to them.
 */

import * as path from 'node:path';
import type { Result } from 'neverthrow';
import type { IdentityError } from '../errors.js';
import type { HandlerOfKind, PathHandler, PathHandlerKind, SequencedPathHandler } from './types.js';
import type { PathConvention, SequencedPathConvention } from './convention.js';
import type { SequenceDiscipline, UnsequencedPattern } from './sequence.js';
import { scienceConvention } from './science.js';
import { hkBinaryConvention, hkConvention } from './housekeeping.js';
import { ialirtConvention } from './ialirt.js';
import { quicklookConvention } from './quicklook.js';
import { calibrationLayerConvention } from './calibration-layer.js';
import { ancillaryConvention } from './ancillary.js';
import { spiceConvention, unversionedSpiceConvention } from './spice.js';
import { latestConvention } from './latest.js';

export type SequencedKind = SequencedPathHandler['kind'];
export type SequencedHandlerOfKind<K extends SequencedKind> = Extract<SequencedPathHandler, { readonly kind: K }>;

type SequencedConventionTable = {
  readonly [K in SequencedKind]: SequencedPathConvention<SequencedHandlerOfKind<K>>;
};

type ConventionTable = {
  readonly [K in PathHandlerKind]: PathConvention<HandlerOfKind<K>>;
};

const SEQUENCED_CONVENTIONS: SequencedConventionTable = {
  science: scienceConvention,
  hk: hkConvention,
  'hk-binary': hkBinaryConvention,
  'calibration-layer': calibrationLayerConvention,
  ancillary: ancillaryConvention,
  spice: spiceConvention,
};

const CONVENTIONS: ConventionTable = {
  ...SEQUENCED_CONVENTIONS,
  ialirt: ialirtConvention,
  quicklook: quicklookConvention,
  'spice-unversioned': unversionedSpiceConvention,
  latest: latestConvention,
};

export function conventionFor<K extends PathHandlerKind>(kind: K): PathConvention<HandlerOfKind<K>> {
  return CONVENTIONS[kind];
}

export function sequencedConventionFor<K extends SequencedKind>(
  kind: K
): SequencedPathConvention<SequencedHandlerOfKind<K>> {
  return SEQUENCED_CONVENTIONS[kind];
}

export function supportsSequencing(handler: PathHandler): handler is SequencedPathHandler {
  return 'sequence' in handler;
}

export function folderStructure(handler: PathHandler): Result<string, IdentityError> {
  return conventionFor(handler.kind).folderStructure(handler);
}

export function filename(handler: PathHandler): Result<string, IdentityError> {
  return conventionFor(handler.kind).filename(handler);
}

/** Folder structure joined with the file name, under `parent` when given. */
export function fullPath(handler: PathHandler, parent?: string): Result<string, IdentityError> {
  return folderStructure(handler).andThen((folder) =>
    filename(handler).map((name) => {
      const relative = folder.length > 0 ? path.posix.join(folder, name) : name;
      return parent === undefined ? relative : path.join(parent, relative);
    })
  );
}

export function contentDateForIndexing(handler: PathHandler): Date | undefined {
  return conventionFor(handler.kind).contentDateForIndexing(handler);
}

export function indexDescriptor(handler: PathHandler): Result<string, IdentityError> {
  return conventionFor(handler.kind).indexDescriptor(handler);
}

export function disciplineOf(handler: SequencedPathHandler): SequenceDiscipline {
  return sequencedConventionFor(handler.kind).discipline;
}

export function unsequencedPattern(handler: SequencedPathHandler): Result<UnsequencedPattern, IdentityError> {
  return sequencedConventionFor(handler.kind).unsequencedPattern(handler);
}

export function getSequence(handler: SequencedPathHandler): number {
  return handler.sequence;
}

/** Handlers are immutable: "set" is "copy with". */
export function withSequence<H extends SequencedPathHandler>(handler: H, sequence: number): H {
  return { ...handler, sequence };
}

export function increaseSequence<H extends SequencedPathHandler>(handler: H): H {
  return withSequence(handler, handler.sequence + 1);
}

/** True when the discriminator still holds its unset value, i.e. "any". */
export function hasUnsetSequence(handler: SequencedPathHandler): boolean {
  return handler.sequence === disciplineOf(handler).unset;
}
