/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens, grouped by layer.
 * Registrations live in container.ts.
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Complete application configuration (validated). */
    App: Symbol('Config.App'),
    /** Log level taken from the validated config */
    LogLevel: Symbol('Config.LogLevel'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // INFRASTRUCTURE (ports and their adapters)
  // ═══════════════════════════════════════════════════════════════════
  Infra: {
    FileSystem: Symbol('Infra.FileSystem'),
    Fingerprint: Symbol('Infra.Fingerprint'),
    TimeClock: Symbol('Infra.TimeClock'),
    /** Postgres or in-memory, per config */
    IndexStore: Symbol('Infra.IndexStore'),
    /** Closes whatever the index store holds open */
    IndexStoreCloser: Symbol('Infra.IndexStoreCloser'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // REFERENCE TABLES (loaded once at startup)
  // ═══════════════════════════════════════════════════════════════════
  Tables: {
    HousekeepingPackets: Symbol('Tables.HousekeepingPackets'),
    SpiceValidator: Symbol('Tables.SpiceValidator'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // DATASTORE
  // ═══════════════════════════════════════════════════════════════════
  Datastore: {
    Selector: Symbol('Datastore.Selector'),
    Finder: Symbol('Datastore.Finder'),
    /** Plain file manager; requires a datastore root */
    FileManager: Symbol('Datastore.FileManager'),
    /** File manager decorated with the index store */
    IndexedFileManager: Symbol('Datastore.IndexedFileManager'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME (process-level behavior, injected for explicitness)
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    /** Process terminator (composition roots only) */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
  },
} as const;

/** Type helper for token values */
export type DIToken = (typeof DI)[keyof typeof DI][keyof (typeof DI)[keyof typeof DI]];
