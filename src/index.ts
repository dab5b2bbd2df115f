// DI Container exports
export { initializeContainer, disposeContainer, container, resetContainer, isInitialized } from './di/container.js';
export type { ContainerInitOptions, RuntimeMode, IndexStoreCloser } from './di/container.js';
export { DI } from './di/tokens.js';

// Configuration
export { loadConfig, createValidatedConfig, DEFAULT_SOFTWARE_VERSION } from './config/app-config.js';
export type { AppConfig, ValidatedConfig, IndexBackend } from './config/app-config.js';
export type { AppError, ConfigInvalidError, StartupFailedError } from './errors/index.js';
export { formatAppError } from './errors/index.js';
export { BUNDLED_HK_PACKETS_FILE, BUNDLED_SPICE_KERNELS_FILE, FILES_SCHEMA_SQL_FILE } from './config/resources.js';

// Path handlers and the sequence contract
export * from './datastore/core/path-handlers/index.js';
export type {
  DatastoreError,
  IdentityError,
  MissingAttributeError,
  UnknownAttributeValueError,
  UnrecognisedFileError,
  FileNotFoundError,
  SourceNotFoundError,
  StoreIoError,
  IndexStoreFailedError,
} from './datastore/core/errors.js';
export { DatastoreErr, formatDatastoreError } from './datastore/core/errors.js';
export type { LookupOptions, StrictLookup, LenientLookup } from './datastore/core/lookup.js';
export type { HousekeepingPacket, HousekeepingPacketTable } from './datastore/core/housekeeping-packets.js';
export {
  createHousekeepingPacketTable,
  packetToDescriptor,
  descriptorFamily,
} from './datastore/core/housekeeping-packets.js';

// Services
export { PathHandlerSelector, PATH_HANDLER_PRIORITY } from './datastore/selector/path-handler-selector.js';
export type { SelectableKind } from './datastore/selector/path-handler-selector.js';
export { DatastoreFileFinder } from './datastore/finder/datastore-file-finder.js';
export type { FinderError, MatchedFile } from './datastore/finder/datastore-file-finder.js';
export { DatastoreFileManager } from './datastore/manager/datastore-file-manager.js';
export { IndexedDatastoreFileManager } from './datastore/manager/indexed-datastore-file-manager.js';
export type {
  ArchivedFile,
  IndexedAddFileOptions,
  IndexedAddFileResult,
} from './datastore/manager/indexed-datastore-file-manager.js';
export type {
  AddFileOptions,
  AddFileResult,
  AddOutcome,
  TransferMode,
  DatastoreFileManagerPort,
} from './datastore/manager/types.js';

// Ports and adapters
export type { IndexStorePort, IndexedFileRecord, IndexedFileQuery, IndexStoreError, JsonObject, JsonValue } from './datastore/ports/index-store.port.js';
export type {
  SpiceFileValidator,
  SpiceFileComponents,
  VersionedSpiceFileComponents,
  UnversionedSpiceFileComponents,
  SpiceKernelType,
} from './datastore/ports/spice-file-validator.port.js';
export type { Fingerprint, FingerprintPort } from './datastore/ports/fingerprint.port.js';
export { InMemoryIndexStore } from './datastore/infra/local/index-store/index.js';
export { PostgresIndexStore } from './datastore/infra/postgres/index-store/index.js';
export { createPostgresPool } from './datastore/infra/postgres/pool.js';
export { NodeDatastoreFileSystem } from './datastore/infra/local/fs/index.js';
export { Sha256Fingerprint } from './datastore/infra/local/fingerprint/index.js';
export { NodeTimeClock } from './datastore/infra/local/time-clock/index.js';
export { loadHousekeepingPacketTable } from './datastore/infra/local/housekeeping-packets/index.js';
export { loadSpiceFileValidator, TableSpiceFileValidator } from './datastore/infra/local/spice-file-validator/index.js';
