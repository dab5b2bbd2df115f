import { createHash } from 'crypto';
import type { ResultAsync } from 'neverthrow';
import type { FileReadPort, FsError } from '../../../ports/fs.port.js';
import type { Fingerprint, FingerprintPort } from '../../../ports/fingerprint.port.js';
import { asFingerprint } from '../../../ports/fingerprint.port.js';

export class Sha256Fingerprint implements FingerprintPort {
  constructor(private readonly fs: FileReadPort) {}

  fingerprintBytes(bytes: Uint8Array): Fingerprint {
    const hex = createHash('sha256').update(Buffer.from(bytes)).digest('hex');
    return asFingerprint(`sha256:${hex}`);
  }

  fingerprintFile(filePath: string): ResultAsync<Fingerprint, FsError> {
    return this.fs.readFileBytes(filePath).map((bytes) => this.fingerprintBytes(bytes));
  }
}
