import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { Logger } from '../../core/logging/index.js';
import type { UnrecognisedFileError } from '../core/errors.js';
import { DatastoreErr } from '../core/errors.js';
import type { LenientLookup, LookupOptions, StrictLookup } from '../core/lookup.js';
import type { HousekeepingPacketTable } from '../core/housekeeping-packets.js';
import type { HandlerOfKind, PathHandler, PathHandlerKind, PathRecognizer } from '../core/path-handlers/index.js';
import {
  ancillaryRecognizer,
  calibrationLayerRecognizer,
  createHkBinaryRecognizer,
  createHkRecognizer,
  createSpiceRecognizer,
  ialirtRecognizer,
  quicklookRecognizer,
  scienceRecognizer,
} from '../core/path-handlers/index.js';
import type { SpiceFileValidator } from '../ports/spice-file-validator.port.js';

/**
 * Recognizers are tried in this order and the first match wins.
 *
 * Narrow, suffix-specific conventions come first. Science is late because its
 * template is the most general mission template; SPICE is last because kernel
 * names are opaque.
 */
export const PATH_HANDLER_PRIORITY = [
  'ancillary',
  'calibration-layer',
  'ialirt',
  'quicklook',
  'hk-binary',
  'hk',
  'science',
  'spice',
] as const satisfies readonly PathHandlerKind[];

export type SelectableKind = (typeof PATH_HANDLER_PRIORITY)[number];

/** SPICE names resolve to a versioned or an unversioned kernel. */
type RecognizedHandler<K extends SelectableKind> = K extends 'spice'
  ? HandlerOfKind<'spice' | 'spice-unversioned'>
  : HandlerOfKind<K>;

type RecognizerTable = { readonly [K in SelectableKind]: PathRecognizer<RecognizedHandler<K>> };

export interface PathHandlerSelectorDeps {
  readonly packets: HousekeepingPacketTable;
  readonly spiceValidator: SpiceFileValidator;
  readonly logger: Logger;
}

export class PathHandlerSelector {
  readonly recognizers: readonly PathRecognizer[];
  private readonly logger: Logger;

  constructor(deps: PathHandlerSelectorDeps) {
    const table: RecognizerTable = {
      ancillary: ancillaryRecognizer,
      'calibration-layer': calibrationLayerRecognizer,
      ialirt: ialirtRecognizer,
      quicklook: quicklookRecognizer,
      'hk-binary': createHkBinaryRecognizer(deps.packets),
      hk: createHkRecognizer(deps.packets),
      science: scienceRecognizer,
      spice: createSpiceRecognizer(deps.spiceValidator),
    };

    this.recognizers = PATH_HANDLER_PRIORITY.map((kind): PathRecognizer => table[kind]);
    this.logger = deps.logger;
  }

  findByPath(path: string, options: StrictLookup): Result<PathHandler, UnrecognisedFileError>;
  findByPath(path: string, options?: LenientLookup): Result<PathHandler | undefined, never>;
  findByPath(path: string, options?: LookupOptions): Result<PathHandler | undefined, UnrecognisedFileError>;
  findByPath(path: string, options: LookupOptions = {}): Result<PathHandler | undefined, UnrecognisedFileError> {
    for (const recognizer of this.recognizers) {
      const handler = recognizer.fromFilename(path);
      if (handler) {
        this.logger.debug({ path, kind: handler.kind }, 'Path handler found');
        return ok(handler);
      }
    }

    this.logger.debug({ path }, 'No path handler matched');
    return options.throwIfNotFound ? err(DatastoreErr.unrecognisedFile(path)) : ok(undefined);
  }

  /** Kinds whose recognizer accepts the name, in priority order. */
  claimantsOf(path: string): readonly PathHandlerKind[] {
    return this.recognizers.filter((r) => r.fromFilename(path) !== undefined).map((r) => r.kind);
  }
}
