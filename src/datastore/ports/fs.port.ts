import type { ResultAsync } from 'neverthrow';

export type FsError =
  | { readonly code: 'FS_IO_ERROR'; readonly message: string }
  | { readonly code: 'FS_NOT_FOUND'; readonly message: string }
  | { readonly code: 'FS_ALREADY_EXISTS'; readonly message: string }
  | { readonly code: 'FS_PERMISSION_DENIED'; readonly message: string }
  | { readonly code: 'FS_UNSUPPORTED'; readonly message: string };

export interface FileStat {
  readonly sizeBytes: number;
  readonly isFile: boolean;
}

/**
 * Port: Directory operations (creation and syncing).
 * Used by: file manager (destination folders).
 */
export interface DirectoryOpsPort {
  mkdirp(dirPath: string): ResultAsync<void, FsError>;
  fsyncDir(dirPath: string): ResultAsync<void, FsError>;
}

/**
 * Port: File reading and metadata.
 * Used by: fingerprint adapter, file manager, table loaders.
 */
export interface FileReadPort {
  readFileUtf8(filePath: string): ResultAsync<string, FsError>;
  readFileBytes(filePath: string): ResultAsync<Uint8Array, FsError>;
  stat(filePath: string): ResultAsync<FileStat, FsError>;
}

/**
 * Port: Durable writes.
 * Used by: file manager (write temp + fsync + rename).
 */
export interface FileWritePort {
  /** Create or truncate `filePath`, write `bytes` and fsync before resolving. */
  writeFileSynced(filePath: string, bytes: Uint8Array): ResultAsync<void, FsError>;
}

/**
 * Port: File manipulation (rename, delete).
 */
export interface FileManipulationPort {
  rename(fromPath: string, toPath: string): ResultAsync<void, FsError>;
  unlink(filePath: string): ResultAsync<void, FsError>;
}

/**
 * Port: Directory listing.
 * Used by: file finder.
 */
export interface DirectoryListingPort {
  /**
   * List directory entries (names, not full paths).
   * A missing directory is FS_NOT_FOUND; callers decide whether that is empty.
   */
  readdir(dirPath: string): ResultAsync<readonly string[], FsError>;
}

/**
 * Composite port for the datastore. The finder, the file manager and the
 * fingerprint adapter each only touch a slice of it.
 */
export interface DatastoreFileSystemPort
  extends DirectoryOpsPort,
    FileReadPort,
    FileWritePort,
    FileManipulationPort,
    DirectoryListingPort {}
