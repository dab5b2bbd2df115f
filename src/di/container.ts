import 'reflect-metadata';
import * as path from 'node:path';
import { container, instanceCachingFactory } from 'tsyringe';
import type { DependencyContainer } from 'tsyringe';
import type { ResultAsync } from 'neverthrow';
import { errAsync, okAsync } from 'neverthrow';
import { DI } from './tokens.js';
import { assertNever } from '../runtime/assert-never.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import { FILES_SCHEMA_SQL_FILE } from '../config/resources.js';
import type { AppError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import { PinoLoggerFactory, createBootstrapLogger } from '../core/logging/index.js';
import type { DatastoreFileSystemPort } from '../datastore/ports/fs.port.js';
import type { FingerprintPort } from '../datastore/ports/fingerprint.port.js';
import type { TimeClockPort } from '../datastore/ports/time-clock.port.js';
import type { IndexStorePort } from '../datastore/ports/index-store.port.js';
import type { SpiceFileValidator } from '../datastore/ports/spice-file-validator.port.js';
import type { HousekeepingPacketTable } from '../datastore/core/housekeeping-packets.js';
import { NodeDatastoreFileSystem } from '../datastore/infra/local/fs/index.js';
import { Sha256Fingerprint } from '../datastore/infra/local/fingerprint/index.js';
import { NodeTimeClock } from '../datastore/infra/local/time-clock/index.js';
import { InMemoryIndexStore } from '../datastore/infra/local/index-store/index.js';
import { loadHousekeepingPacketTable } from '../datastore/infra/local/housekeeping-packets/index.js';
import { loadSpiceFileValidator } from '../datastore/infra/local/spice-file-validator/index.js';
import { createPostgresPool } from '../datastore/infra/postgres/pool.js';
import { PostgresIndexStore } from '../datastore/infra/postgres/index-store/index.js';
import { PathHandlerSelector } from '../datastore/selector/path-handler-selector.js';
import { DatastoreFileFinder } from '../datastore/finder/datastore-file-finder.js';
import { DatastoreFileManager } from '../datastore/manager/datastore-file-manager.js';
import { IndexedDatastoreFileManager } from '../datastore/manager/indexed-datastore-file-manager.js';

export type RuntimeMode = { readonly kind: 'production' } | { readonly kind: 'cli' } | { readonly kind: 'test' };

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
  /** Overrides DATASTORE_ROOT. */
  readonly root?: string;
  readonly env?: Record<string, string | undefined>;
  readonly cwd?: string;
}

/** Releases whatever the index store holds open (the Postgres pool). */
export interface IndexStoreCloser {
  close(): Promise<void>;
}

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;
let initialization: ResultAsync<void, AppError> | null = null;

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(options: ContainerInitOptions): ResultAsync<ValidatedConfig, AppError> {
  // Tests may register a config before initialization; never overwrite it.
  if (!container.isRegistered(DI.Config.App)) {
    const configResult = loadConfig({ env: options.env ?? process.env, cwd: options.cwd ?? process.cwd() });
    if (configResult.isErr()) return errAsync(configResult.error);
    container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
  }

  const config = container.resolve<ValidatedConfig>(DI.Config.App);
  container.register(DI.Config.LogLevel, { useValue: config.logLevel });
  return okAsync(config);
}

function registerLogging(): void {
  if (!container.isRegistered(DI.Logging.Factory)) {
    container.register<ILoggerFactory>(DI.Logging.Factory, {
      useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(): RuntimeMode {
  if (process.env['VITEST'] || process.env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'production' };
}

function toProcessTerminator(mode: RuntimeMode): ProcessTerminator {
  switch (mode.kind) {
    case 'test':
      return new ThrowingProcessTerminator();
    case 'cli':
    case 'production':
      return new NodeProcessTerminator();
    default:
      return assertNever(mode);
  }
}

function registerRuntime(options: ContainerInitOptions): void {
  if (!container.isRegistered(DI.Runtime.ProcessTerminator)) {
    const terminator = toProcessTerminator(options.runtimeMode ?? detectRuntimeMode());
    container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// INFRASTRUCTURE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerPrimitives(): void {
  container.register<DatastoreFileSystemPort>(DI.Infra.FileSystem, {
    useFactory: instanceCachingFactory(() => new NodeDatastoreFileSystem()),
  });
  container.register<FingerprintPort>(DI.Infra.Fingerprint, {
    useFactory: instanceCachingFactory(
      (c) => new Sha256Fingerprint(c.resolve<DatastoreFileSystemPort>(DI.Infra.FileSystem))
    ),
  });
  if (!container.isRegistered(DI.Infra.TimeClock)) {
    container.register<TimeClockPort>(DI.Infra.TimeClock, {
      useFactory: instanceCachingFactory(() => new NodeTimeClock()),
    });
  }
}

/**
 * Reference tables are loaded once; any defect fails startup.
 */
function loadReferenceTables(config: ValidatedConfig): ResultAsync<void, AppError> {
  const fs = container.resolve<DatastoreFileSystemPort>(DI.Infra.FileSystem);
  const { hkPacketsFile, spiceKernelsFile } = config.referenceTables;

  return loadHousekeepingPacketTable(fs, hkPacketsFile)
    .andThen((packets) => loadSpiceFileValidator(fs, spiceKernelsFile).map((spice) => ({ packets, spice })))
    .mapErr((e): AppError => Err.startupFailed('reference-tables', e.message, e))
    .map(({ packets, spice }) => {
      container.register<HousekeepingPacketTable>(DI.Tables.HousekeepingPackets, { useValue: packets });
      container.register<SpiceFileValidator>(DI.Tables.SpiceValidator, { useValue: spice });
    });
}

function registerIndexStore(config: ValidatedConfig): ResultAsync<void, AppError> {
  // Tests register an in-process store up front.
  if (container.isRegistered(DI.Infra.IndexStore)) {
    if (!container.isRegistered(DI.Infra.IndexStoreCloser)) {
      container.register<IndexStoreCloser>(DI.Infra.IndexStoreCloser, { useValue: { close: async () => undefined } });
    }
    return okAsync(undefined);
  }

  const backend = config.index;
  switch (backend.kind) {
    case 'in_memory':
      container.register<IndexStorePort>(DI.Infra.IndexStore, { useValue: new InMemoryIndexStore() });
      container.register<IndexStoreCloser>(DI.Infra.IndexStoreCloser, { useValue: { close: async () => undefined } });
      return okAsync(undefined);

    case 'postgres': {
      const logger = container.resolve<ILoggerFactory>(DI.Logging.Factory).create('postgres');
      const pool = createPostgresPool({ connectionString: backend.databaseUrl }, logger);
      const store = new PostgresIndexStore(pool);
      const fs = container.resolve<DatastoreFileSystemPort>(DI.Infra.FileSystem);

      container.register<IndexStorePort>(DI.Infra.IndexStore, { useValue: store });
      container.register<IndexStoreCloser>(DI.Infra.IndexStoreCloser, { useValue: { close: pool.closePool } });

      return fs
        .readFileUtf8(FILES_SCHEMA_SQL_FILE)
        .mapErr((e): AppError => Err.startupFailed('index-store', e.message, e))
        .andThen((sql) =>
          store.ensureSchema(sql).mapErr((e): AppError => Err.startupFailed('index-store', e.message, e))
        );
    }

    default:
      return assertNever(backend);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// DATASTORE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerDatastore(config: ValidatedConfig, root: string | undefined): void {
  const loggers = (c: DependencyContainer): ILoggerFactory => c.resolve<ILoggerFactory>(DI.Logging.Factory);

  container.register<PathHandlerSelector>(DI.Datastore.Selector, {
    useFactory: instanceCachingFactory(
      (c) =>
        new PathHandlerSelector({
          packets: c.resolve<HousekeepingPacketTable>(DI.Tables.HousekeepingPackets),
          spiceValidator: c.resolve<SpiceFileValidator>(DI.Tables.SpiceValidator),
          logger: loggers(c).create('selector'),
        })
    ),
  });

  container.register<DatastoreFileFinder>(DI.Datastore.Finder, {
    useFactory: instanceCachingFactory(
      (c) =>
        new DatastoreFileFinder({
          fs: c.resolve<DatastoreFileSystemPort>(DI.Infra.FileSystem),
          logger: loggers(c).create('finder'),
        })
    ),
  });

  // Without a root there is nothing to place files into.
  if (root === undefined) return;

  container.register<DatastoreFileManager>(DI.Datastore.FileManager, {
    useFactory: instanceCachingFactory(
      (c) =>
        new DatastoreFileManager({
          root,
          fs: c.resolve<DatastoreFileSystemPort>(DI.Infra.FileSystem),
          fingerprint: c.resolve<FingerprintPort>(DI.Infra.Fingerprint),
          finder: c.resolve<DatastoreFileFinder>(DI.Datastore.Finder),
          logger: loggers(c).create('file-manager'),
        })
    ),
  });

  container.register<IndexedDatastoreFileManager>(DI.Datastore.IndexedFileManager, {
    useFactory: instanceCachingFactory(
      (c) =>
        new IndexedDatastoreFileManager({
          files: c.resolve<DatastoreFileManager>(DI.Datastore.FileManager),
          index: c.resolve<IndexStorePort>(DI.Infra.IndexStore),
          fingerprint: c.resolve<FingerprintPort>(DI.Infra.Fingerprint),
          fs: c.resolve<DatastoreFileSystemPort>(DI.Infra.FileSystem),
          clock: c.resolve<TimeClockPort>(DI.Infra.TimeClock),
          softwareVersion: config.softwareVersion,
          logger: loggers(c).create('indexed-file-manager'),
        })
    ),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the DI container: config, logging, runtime, reference tables,
 * index store, then the datastore services.
 *
 * Idempotent: concurrent and repeated calls share one initialization.
 */
export function initializeContainer(options: ContainerInitOptions = {}): ResultAsync<void, AppError> {
  if (initialized) return okAsync(undefined);
  if (initialization) return initialization;

  const logger = createBootstrapLogger('di');

  initialization = registerConfig(options)
    .andThen((config) => {
      registerLogging();
      registerRuntime(options);
      registerPrimitives();
      return loadReferenceTables(config)
        .andThen(() => registerIndexStore(config))
        .map(() => {
          const root = options.root === undefined ? config.root : path.resolve(options.cwd ?? process.cwd(), options.root);
          registerDatastore(config, root);
          initialized = true;
          logger.debug({ root, index: config.index.kind }, 'Container initialized');
        });
    })
    .mapErr((e) => {
      initialization = null;
      return e;
    });

  return initialization;
}

/**
 * Release the index store's resources. Safe to call when nothing was opened.
 */
export async function disposeContainer(): Promise<void> {
  if (container.isRegistered(DI.Infra.IndexStoreCloser)) {
    await container.resolve<IndexStoreCloser>(DI.Infra.IndexStoreCloser).close();
  }
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
  initialization = null;
}

export function isInitialized(): boolean {
  return initialized;
}

// Export container for direct access when needed
export { container };
