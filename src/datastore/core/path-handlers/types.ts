/**
 * Path handlers: immutable, tagged values identifying one logical file.
 *
 * A handler only carries identity attributes. The folder layout, the file
 * name template and (where it applies) the sequencing discipline live in the
 * variant's convention, see `conventions.ts`.
 *
 * Identity attributes are optional on construction; an operation that needs
 * one that is unset fails with a MissingAttribute error.
 */

interface HandlerCommon {
  /** Top-level datastore folder for the variant (may be empty). */
  readonly rootFolder: string;
  readonly mission: string;
}

/** Standard mission product: `imap_{instrument}_{level}_{descriptor}_{date}_v{NNN}.{ext}` */
export interface ScienceFileHandler extends HandlerCommon {
  readonly kind: 'science';
  readonly instrument?: string;
  readonly level?: string;
  readonly descriptor?: string;
  readonly contentDate?: Date;
  readonly extension?: string;
  /** Version; 0 means unset. */
  readonly sequence: number;
}

/** Decoded housekeeping: same name template as science, housekeeping folder layout. */
export interface HkFileHandler extends HandlerCommon {
  readonly kind: 'hk';
  readonly instrument?: string;
  readonly level?: string;
  readonly descriptor?: string;
  readonly contentDate?: Date;
  readonly extension?: string;
  readonly sequence: number;
}

/** Raw housekeeping telemetry, split into numbered parts. Level is always `l0`. */
export interface HkBinaryFileHandler extends HandlerCommon {
  readonly kind: 'hk-binary';
  readonly instrument?: string;
  readonly descriptor?: string;
  readonly contentDate?: Date;
  readonly extension?: string;
  /** Part number, 1-based. */
  readonly sequence: number;
}

export interface IalirtFileHandler extends HandlerCommon {
  readonly kind: 'ialirt';
  readonly contentDate?: Date;
  readonly extension: string;
}

export interface QuicklookFileHandler extends HandlerCommon {
  readonly kind: 'quicklook';
  readonly plotType?: string;
  readonly startDate?: Date;
  readonly endDate?: Date;
  readonly extension: string;
}

export type CalibrationLayerPart = 'data' | 'meta';

export interface CalibrationLayerFileHandler extends HandlerCommon {
  readonly kind: 'calibration-layer';
  readonly instrument?: string;
  /** Calibration descriptor, without the `-layer-{part}` suffix. */
  readonly descriptor?: string;
  readonly layerPart: CalibrationLayerPart;
  readonly contentDate?: Date;
  readonly sequence: number;
}

export interface AncillaryFileHandler extends HandlerCommon {
  readonly kind: 'ancillary';
  readonly instrument?: string;
  readonly descriptor?: string;
  /** Start of validity. */
  readonly startDate?: Date;
  /** End of validity; open-ended when unset. */
  readonly endDate?: Date;
  readonly extension?: string;
  readonly sequence: number;
}

/**
 * Ephemeris / SPICE kernel. The name is opaque: it is kept as the text around
 * its version field so that re-versioning only rewrites that field.
 */
export interface SpiceFileHandler extends HandlerCommon {
  readonly kind: 'spice';
  readonly type?: string;
  readonly subfolder?: string;
  readonly datePartitioned: boolean;
  readonly startDate?: Date;
  readonly endDate?: Date;
  readonly extension?: string;
  readonly namePrefix?: string;
  readonly nameSuffix?: string;
  readonly versionWidth: number;
  readonly sequence: number;
}

/** Kernel published under one fixed name; a new release replaces it in place. */
export interface UnversionedSpiceFileHandler extends HandlerCommon {
  readonly kind: 'spice-unversioned';
  readonly type?: string;
  readonly subfolder?: string;
  readonly datePartitioned: boolean;
  readonly startDate?: Date;
  readonly endDate?: Date;
  readonly extension?: string;
  readonly name?: string;
}

/** Fixed `latest.{ext}` pointer in a caller-chosen folder. */
export interface LatestFileHandler extends HandlerCommon {
  readonly kind: 'latest';
  readonly folder?: string;
  readonly extension?: string;
  readonly latestDate?: Date;
}

export type PathHandler =
  | ScienceFileHandler
  | HkFileHandler
  | HkBinaryFileHandler
  | IalirtFileHandler
  | QuicklookFileHandler
  | CalibrationLayerFileHandler
  | AncillaryFileHandler
  | SpiceFileHandler
  | UnversionedSpiceFileHandler
  | LatestFileHandler;

export type PathHandlerKind = PathHandler['kind'];

/** Handlers that implement the sequence contract. */
export type SequencedPathHandler = Extract<PathHandler, { readonly sequence: number }>;

export type HandlerOfKind<K extends PathHandlerKind> = Extract<PathHandler, { readonly kind: K }>;
