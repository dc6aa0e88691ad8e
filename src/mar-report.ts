/**
 * JSON-safe view of a decoded archive for inspection tooling.
 * Byte fields are base64 encoded; content is keyed by file name.
 */
import type { MarArchive } from './types/mar-archive.js';

export interface SignatureRecord {
  readonly algorithmId: number;
  readonly size: number;
  readonly algorithm: string;
  readonly data: string;
}

export interface AdditionalSectionRecord {
  readonly blockSize: number;
  readonly blockId: number;
  readonly data: string;
}

export interface IndexEntryRecord {
  readonly offsetToContent: number;
  readonly size: number;
  readonly flags: number;
  /** Permission bits rendered like `ls -l`, e.g. "-rw-r--r--". */
  readonly mode: string;
  readonly fileName: string;
  /** Stored name bytes, base64. */
  readonly fileNameBytes: string;
}

export interface ContentEntryRecord {
  /** Omitted unless content data was requested. */
  readonly data?: string;
  readonly size: number;
  readonly isCompressed: boolean;
}

export interface MarArchiveRecord {
  readonly marId: string;
  readonly offsetToIndex: number;
  readonly productInformation?: string;
  readonly signaturesHeader: { readonly fileSize: number; readonly numSignatures: number };
  readonly signatures: readonly SignatureRecord[];
  readonly additionalSectionsHeader: { readonly numAdditionalSections: number };
  readonly additionalSections: readonly AdditionalSectionRecord[];
  readonly indexHeader: { readonly size: number };
  readonly index: readonly IndexEntryRecord[];
  readonly content: Readonly<Record<string, ContentEntryRecord>>;
}

const PERMISSION_CHARS = 'rwxrwxrwx';

export function formatPermissions(flags: number): string {
  let mode = '-';
  for (let bit = 0; bit < PERMISSION_CHARS.length; bit++) {
    const mask = 1 << (PERMISSION_CHARS.length - 1 - bit);
    mode += (flags & mask) !== 0 ? PERMISSION_CHARS[bit] : '-';
  }
  return mode;
}

export function toArchiveRecord(archive: MarArchive, { includeContentData = false }: { readonly includeContentData?: boolean } = {}): MarArchiveRecord {
  const content: Record<string, ContentEntryRecord> = {};
  for (const [fileName, entry] of archive.content) {
    content[fileName] = {
      ...(includeContentData ? { data: entry.data.toString('base64') } : {}),
      size: entry.data.length,
      isCompressed: entry.isCompressed
    };
  }
  return {
    marId: archive.marId,
    offsetToIndex: archive.offsetToIndex,
    ...(archive.productInformation !== undefined ? { productInformation: archive.productInformation } : {}),
    signaturesHeader: { ...archive.signaturesHeader },
    signatures: archive.signatures.map((signature) => ({
      algorithmId: signature.algorithmId,
      size: signature.size,
      algorithm: signature.algorithm,
      data: signature.data.toString('base64')
    })),
    additionalSectionsHeader: { ...archive.additionalSectionsHeader },
    additionalSections: archive.additionalSections.map((section) => ({
      blockSize: section.blockSize,
      blockId: section.blockId,
      data: section.data.toString('base64')
    })),
    indexHeader: { ...archive.indexHeader },
    index: archive.index.map((entry) => ({
      offsetToContent: entry.offsetToContent,
      size: entry.size,
      flags: entry.flags,
      mode: formatPermissions(entry.flags),
      fileName: entry.fileName,
      fileNameBytes: entry.fileNameBytes.toString('base64')
    })),
    content
  };
}
