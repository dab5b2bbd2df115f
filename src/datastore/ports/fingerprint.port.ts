import type { ResultAsync } from 'neverthrow';
import type { Brand } from '../../runtime/brand.js';
import type { FsError } from './fs.port.js';

/** Content fingerprint, rendered as `sha256:<hex>`. */
export type Fingerprint = Brand<string, 'datastore.Fingerprint'>;

export function asFingerprint(value: string): Fingerprint {
  return value as Fingerprint;
}

/**
 * Port: content fingerprint of a file.
 *
 * Deterministic over the file bytes. Only ever compared for equality, never
 * used to locate files.
 */
export interface FingerprintPort {
  fingerprintBytes(bytes: Uint8Array): Fingerprint;
  fingerprintFile(filePath: string): ResultAsync<Fingerprint, FsError>;
}
