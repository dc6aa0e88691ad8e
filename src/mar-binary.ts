/**
 * MAR archive helpers: file loading, decoding and signable-bytes extraction.
 */
import { readFile } from 'node:fs/promises';
import { createHash } from 'node:crypto';
import { decodeMar, type MarDecodeOptions } from './mar-decoder.js';
import { MarError } from './mar-errors.js';
import { marSignableBytes } from './mar-signable.js';
import type { MarArchive, Signature, SignatureAlgorithmName } from './types/mar-archive.js';

/** Node digest names for the signature algorithms MAR defines. */
const DIGEST_ALGORITHMS: Readonly<Record<Exclude<SignatureAlgorithmName, 'unknown'>, string>> = {
  'RSA-PKCS1-SHA1': 'sha1',
  'RSA-PKCS1-SHA384': 'sha384'
};

/**
 * Entry points of the MAR codec. Decoding and signable-bytes extraction are pure;
 * only {@link MarBinary.read} touches the file system.
 */
export class MarBinary {
  /** Base class of every error the codec raises. */
  static readonly Error: typeof MarError = MarError;

  /**
   * Reads a MAR file from disk and decodes it.
   *
   * @param filePath - Path to the archive
   * @throws {MarDecodeError} If the file is not a well-formed MAR archive
   */
  static async read({ filePath, ...options }: { readonly filePath: string } & MarDecodeOptions): Promise<MarArchive> {
    const buffer: Buffer = await readFile(filePath);
    return decodeMar(buffer, options);
  }

  /**
   * Decodes an archive already held in memory. The buffer is only borrowed for the call.
   *
   * @throws {MarDecodeError} If the buffer is not a well-formed MAR archive
   */
  static decode({ buffer, ...options }: { readonly buffer: Buffer } & MarDecodeOptions): MarArchive {
    return decodeMar(buffer, options);
  }

  /**
   * Bytes a signature over this archive covers.
   * @throws {MarEncodeError} If the archive's index or offsets are inconsistent
   */
  static signableBytes({ archive }: { readonly archive: MarArchive }): Buffer {
    return marSignableBytes(archive);
  }

  /**
   * Digest of the signable bytes under the hash a signature's algorithm uses,
   * or null when the algorithm is unknown.
   *
   * @returns Hexadecimal digest
   */
  static digestForSignature({ archive, signature }: { readonly archive: MarArchive; readonly signature: Signature }): string | null {
    if (signature.algorithm === 'unknown') {
      return null;
    }
    return createHash(DIGEST_ALGORITHMS[signature.algorithm]).update(marSignableBytes(archive)).digest('hex');
  }
}
