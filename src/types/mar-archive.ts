/**
 * Parsed representation of a MAR archive. Every value is produced once by the
 * decoder and never mutated afterwards.
 */

export type SignatureAlgorithmName = 'RSA-PKCS1-SHA1' | 'RSA-PKCS1-SHA384' | 'unknown';

export interface SignaturesHeader {
  /** Size of the whole archive as recorded by its producer. */
  readonly fileSize: number;
  readonly numSignatures: number;
}

export interface Signature {
  readonly algorithmId: number;
  /** Declared length of the signature data. */
  readonly size: number;
  readonly algorithm: SignatureAlgorithmName;
  readonly data: Buffer;
}

export interface AdditionalSectionsHeader {
  readonly numAdditionalSections: number;
}

export interface AdditionalSection {
  /** Size of the block including its 8-byte header. */
  readonly blockSize: number;
  readonly blockId: number;
  readonly data: Buffer;
}

export interface IndexHeader {
  /** Byte size of the index entries, excluding the header field itself. */
  readonly size: number;
}

export interface IndexEntry {
  /** Absolute offset of the content in the signed file. */
  readonly offsetToContent: number;
  readonly size: number;
  /** Unix permission bits. */
  readonly flags: number;
  /**
   * Name as text: the UTF-8 reading when the bytes are valid UTF-8, otherwise every byte
   * mapped to the lone surrogate U+DC00 + byte. Distinct byte sequences never share a name.
   */
  readonly fileName: string;
  /** Name exactly as stored, without its zero terminator. */
  readonly fileNameBytes: Buffer;
}

export interface ContentEntry {
  readonly data: Buffer;
  /** Content starts with the xz magic bytes. Nothing is decompressed. */
  readonly isCompressed: boolean;
}

export interface MarArchive {
  readonly marId: string;
  readonly offsetToIndex: number;
  /** Trimmed text of the last product information block, if any. */
  readonly productInformation?: string;
  readonly signaturesHeader: SignaturesHeader;
  readonly signatures: readonly Signature[];
  readonly additionalSectionsHeader: AdditionalSectionsHeader;
  readonly additionalSections: readonly AdditionalSection[];
  readonly indexHeader: IndexHeader;
  readonly index: readonly IndexEntry[];
  /** Content keyed by file name, in index order. */
  readonly content: ReadonlyMap<string, ContentEntry>;
}
