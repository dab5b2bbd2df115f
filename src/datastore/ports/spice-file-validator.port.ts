/**
 * Decomposes ephemeris / SPICE kernel names.
 *
 * Kernel naming is owned by the mission's kernel producers, not by the
 * datastore, so the datastore treats names as opaque and asks this port which
 * parts it can rely on.
 */

interface SpiceFileBase {
  /** Kernel type, e.g. `attitude_history`. */
  readonly type: string;
  /** Datastore subfolder for the type, e.g. `ck`. */
  readonly subfolder: string;
  readonly datePartitioned: boolean;
  readonly startDate?: Date;
  readonly endDate?: Date;
  readonly extension: string;
}

/** A kernel whose name carries a version field. */
export interface VersionedSpiceFileComponents extends SpiceFileBase {
  readonly versioned: true;
  readonly version: number;
  /** Digits the version field is written with. */
  readonly versionWidth: number;
  /** Name text before the version digits. */
  readonly namePrefix: string;
  /** Name text after the version digits. */
  readonly nameSuffix: string;
}

/** A kernel published under one fixed name (planetary ephemerides, metakernels). */
export interface UnversionedSpiceFileComponents extends SpiceFileBase {
  readonly versioned: false;
  readonly name: string;
}

export type SpiceFileComponents = VersionedSpiceFileComponents | UnversionedSpiceFileComponents;

export interface SpiceKernelType {
  readonly type: string;
  readonly subfolder: string;
  readonly datePartitioned: boolean;
  readonly versioned: boolean;
}

export interface SpiceFileValidator {
  /**
   * Accepts a bare name or `parent/name`. The parent segment, when present,
   * picks between kernel types whose names look alike.
   */
  extractComponents(path: string): SpiceFileComponents | undefined;
  kernelType(type: string): SpiceKernelType | undefined;
}
