import fs from 'fs-extra';
import { createHash } from 'crypto';
import { VerifyResult } from '../types/engine';

/**
 * Computes the content signature of a file. The default is a streamed SHA-256 in lowercase hex.
 */
export interface ContentHasher {
  readonly algorithm: string;
  hashFile(filePath: string): Promise<string>;
}

export class Sha256Hasher implements ContentHasher {
  readonly algorithm = 'sha256';

  hashFile(filePath: string): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const hash = createHash('sha256');
      const stream = fs.createReadStream(filePath);
      stream.on('error', reject);
      stream.on('data', (chunk) => hash.update(chunk));
      stream.on('end', () => resolve(hash.digest('hex')));
    });
  }
}

function normalizeSignature(signature: string): string {
  return signature.trim().toLowerCase();
}

export class IntegrityVerifier {
  constructor(private readonly hasher: ContentHasher = new Sha256Hasher()) {}

  get algorithm(): string {
    return this.hasher.algorithm;
  }

  async verify(filePath: string, expectedSignature: string): Promise<VerifyResult> {
    const actual = normalizeSignature(await this.hasher.hashFile(filePath));
    const expected = normalizeSignature(expectedSignature);
    if (actual !== expected) {
      return { status: 'corrupt', expected, actual };
    }
    return { status: 'ok', signature: actual };
  }
}
