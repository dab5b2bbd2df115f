import * as fs from 'node:fs/promises';
import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA } from 'neverthrow';
import type { DatastoreFileSystemPort, FileStat, FsError } from '../../../ports/fs.port.js';

const UNSUPPORTED_DIR_SYNC = new Set(['EINVAL', 'ENOTSUP', 'EISDIR']);

function nodeErrorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null) return undefined;
  const code = (e as { readonly code?: unknown }).code;
  return typeof code === 'string' ? code : undefined;
}

function toFsError(e: unknown, target: string): FsError {
  switch (nodeErrorCode(e)) {
    case 'ENOENT':
      return { code: 'FS_NOT_FOUND', message: `Not found: ${target}` };
    case 'EEXIST':
      return { code: 'FS_ALREADY_EXISTS', message: `Already exists: ${target}` };
    case 'EACCES':
    case 'EPERM':
      return { code: 'FS_PERMISSION_DENIED', message: `Permission denied: ${target}` };
    default:
      return { code: 'FS_IO_ERROR', message: `FS error at ${target}: ${e instanceof Error ? e.message : String(e)}` };
  }
}

function attempt<T>(operation: Promise<T>, target: string): ResultAsync<T, FsError> {
  return RA.fromPromise(operation, (e) => toFsError(e, target));
}

/** Open `filePath` with `flags`, run `use` on the handle and always close it. */
async function withHandle(filePath: string, flags: string, use: (handle: fs.FileHandle) => Promise<void>): Promise<void> {
  const handle = await fs.open(filePath, flags, 0o644);
  try {
    await use(handle);
  } finally {
    await handle.close();
  }
}

export class NodeDatastoreFileSystem implements DatastoreFileSystemPort {
  mkdirp(dirPath: string): ResultAsync<void, FsError> {
    return attempt(fs.mkdir(dirPath, { recursive: true }), dirPath).map(() => undefined);
  }

  /** Platforms that cannot sync a directory report FS_UNSUPPORTED. */
  fsyncDir(dirPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(
      withHandle(dirPath, 'r', (handle) => handle.sync()),
      (e): FsError =>
        UNSUPPORTED_DIR_SYNC.has(nodeErrorCode(e) ?? '')
          ? { code: 'FS_UNSUPPORTED', message: `Directory fsync unsupported for: ${dirPath}` }
          : toFsError(e, dirPath)
    );
  }

  readFileUtf8(filePath: string): ResultAsync<string, FsError> {
    return attempt(fs.readFile(filePath, 'utf8'), filePath);
  }

  readFileBytes(filePath: string): ResultAsync<Uint8Array, FsError> {
    return attempt(fs.readFile(filePath), filePath).map((buffer) => new Uint8Array(buffer));
  }

  stat(filePath: string): ResultAsync<FileStat, FsError> {
    return attempt(fs.stat(filePath), filePath).map((s) => ({ sizeBytes: s.size, isFile: s.isFile() }));
  }

  writeFileSynced(filePath: string, bytes: Uint8Array): ResultAsync<void, FsError> {
    return attempt(
      withHandle(filePath, 'w', async (handle) => {
        await handle.writeFile(bytes);
        await handle.sync();
      }),
      filePath
    );
  }

  rename(fromPath: string, toPath: string): ResultAsync<void, FsError> {
    return attempt(fs.rename(fromPath, toPath), `${fromPath} -> ${toPath}`);
  }

  unlink(filePath: string): ResultAsync<void, FsError> {
    return attempt(fs.unlink(filePath), filePath);
  }

  readdir(dirPath: string): ResultAsync<readonly string[], FsError> {
    return attempt(fs.readdir(dirPath), dirPath);
  }
}
