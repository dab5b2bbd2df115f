export type * from './types.js';
export type { PathConvention, SequencedPathConvention, PathRecognizer } from './convention.js';
export type { SequenceDiscipline, SequenceName, UnsequencedPattern } from './sequence.js';
export { VERSION_DISCIPLINE, PART_DISCIPLINE, sequenceOf, renderVersion } from './sequence.js';
export { requireAttributes, hasAttributes } from './attributes.js';

export * from './conventions.js';

export { createScienceFileHandler, scienceConvention, scienceRecognizer } from './science.js';
export {
  HK_ROOT_FOLDER,
  HK_BINARY_LEVEL,
  createHkFileHandler,
  createHkBinaryFileHandler,
  createHkRecognizer,
  createHkBinaryRecognizer,
  hkConvention,
  hkBinaryConvention,
} from './housekeeping.js';
export { createIalirtFileHandler, ialirtConvention, ialirtRecognizer } from './ialirt.js';
export { createQuicklookFileHandler, quicklookConvention, quicklookRecognizer } from './quicklook.js';
export {
  LAYER_PART_EXTENSION,
  createCalibrationLayerFileHandler,
  calibrationLayerConvention,
  calibrationLayerRecognizer,
} from './calibration-layer.js';
export {
  ancillarySubfolder,
  createAncillaryFileHandler,
  ancillaryConvention,
  ancillaryRecognizer,
} from './ancillary.js';
export {
  createSpiceFileHandler,
  createSpiceFileHandlerForType,
  createUnversionedSpiceFileHandler,
  createUnversionedSpiceFileHandlerForType,
  createSpiceRecognizer,
  spiceConvention,
  unversionedSpiceConvention,
} from './spice.js';
export { createLatestFileHandler, latestConvention } from './latest.js';
