/**
 * Decoder turning a raw MAR buffer into a {@link MarArchive}.
 */
import {
  ADDITIONAL_SECTION_ENTRY_HEADER_LENGTH,
  BLOCK_ID_PRODUCT_INFO,
  INDEX_HEADER_LENGTH,
  MAR_ID_LENGTH,
  MIN_MAR_LENGTH,
  SIG_ALG_RSA_PKCS1_SHA1,
  SIG_ALG_RSA_PKCS1_SHA384,
  XZ_MAGIC
} from './constants/mar-format.js';
import { MarDecodeError } from './mar-errors.js';
import type {
  AdditionalSection,
  AdditionalSectionsHeader,
  ContentEntry,
  IndexEntry,
  IndexHeader,
  MarArchive,
  Signature,
  SignatureAlgorithmName,
  SignaturesHeader
} from './types/mar-archive.js';
import type { MarDecodeObserver } from './types/mar-observer.js';
import { BoundedReader } from './utils/big-endian-buffer.js';

export interface MarDecodeOptions {
  /** Receives structural events while decoding. */
  readonly observer?: MarDecodeObserver | undefined;
  /**
   * Reject archives whose index header size disagrees with the bytes the index entries occupy.
   * Without it the mismatch is only reported through `observer.onWarning`.
   */
  readonly strictIndexSize?: boolean | undefined;
}

export function signatureAlgorithmName(algorithmId: number): SignatureAlgorithmName {
  switch (algorithmId) {
    case SIG_ALG_RSA_PKCS1_SHA1:
      return 'RSA-PKCS1-SHA1';
    case SIG_ALG_RSA_PKCS1_SHA384:
      return 'RSA-PKCS1-SHA384';
    default:
      return 'unknown';
  }
}

export function isXzCompressed(data: Uint8Array): boolean {
  if (data.length < XZ_MAGIC.length) {
    return false;
  }
  return XZ_MAGIC.every((byte, position) => data[position] === byte);
}

const utf8DecoderFatal = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Text form of a stored file name that maps distinct byte sequences to distinct strings.
 * Names that are not valid UTF-8 become lone surrogates, which no valid UTF-8 decodes to.
 */
export function decodeFileName(bytes: Uint8Array): string {
  try {
    return utf8DecoderFatal.decode(bytes);
  } catch (error) {
    if (!(error instanceof TypeError)) {
      throw error;
    }
    return Array.from(bytes, (byte) => String.fromCharCode(0xdc00 | byte)).join('');
  }
}

/**
 * Product information is a run of null-separated fields, e.g. "app\0channel\0version\0".
 * Outer nulls are dropped and each inner null becomes a space. Display only: invalid
 * UTF-8 shows up as U+FFFD.
 */
export function decodeProductInformation(data: Buffer): string {
  return data.toString('utf8').replace(/^\0+|\0+$/g, '').replace(/\0/g, ' ');
}

function readSignatures(reader: BoundedReader, count: number, observer?: MarDecodeObserver): Signature[] {
  const signatures: Signature[] = [];
  for (let i = 0; i < count; i++) {
    const algorithmId = reader.readUint32('TruncatedSignature');
    const size = reader.readUint32('TruncatedSignature');
    const data = reader.readBytes(size, 'TruncatedSignature');
    const signature: Signature = { algorithmId, size, algorithm: signatureAlgorithmName(algorithmId), data };
    observer?.onSignature?.(signature, i);
    signatures.push(signature);
  }
  return signatures;
}

function readAdditionalSections(
  reader: BoundedReader,
  count: number,
  observer?: MarDecodeObserver
): { sections: AdditionalSection[]; productInformation: string | undefined } {
  const sections: AdditionalSection[] = [];
  let productInformation: string | undefined;
  for (let i = 0; i < count; i++) {
    const headerOffset = reader.offset;
    const blockSize = reader.readUint32();
    const blockId = reader.readUint32();
    if (blockSize < ADDITIONAL_SECTION_ENTRY_HEADER_LENGTH) {
      throw new MarDecodeError(
        'InvalidBlockSize',
        `Additional section ${i} declares block size ${blockSize}, smaller than its ${ADDITIONAL_SECTION_ENTRY_HEADER_LENGTH}-byte header`,
        { offset: headerOffset }
      );
    }
    const data = reader.readBytes(blockSize - ADDITIONAL_SECTION_ENTRY_HEADER_LENGTH);
    let blockName = `${blockId} (unknown)`;
    if (blockId === BLOCK_ID_PRODUCT_INFO) {
      blockName = 'Product Information';
      productInformation = decodeProductInformation(data);
    }
    const section: AdditionalSection = { blockSize, blockId, data };
    observer?.onAdditionalSection?.(section, i, blockName);
    sections.push(section);
  }
  return { sections, productInformation };
}

/**
 * Index entries carry no count; they run until the cursor reaches the recorded file size.
 */
function readIndexEntries(reader: BoundedReader, fileSize: number, observer?: MarDecodeObserver): IndexEntry[] {
  const entries: IndexEntry[] = [];
  while (reader.offset < fileSize) {
    const offsetToContent = reader.readUint32();
    const size = reader.readUint32();
    const flags = reader.readUint32();
    const nameOffset = reader.offset;
    const name = reader.readZeroTerminated();
    if (name === null) {
      throw new MarDecodeError('MissingNameTerminator', `Index entry ${entries.length} has no zero byte ending its file name`, {
        offset: nameOffset
      });
    }
    const entry: IndexEntry = { offsetToContent, size, flags, fileName: decodeFileName(name), fileNameBytes: name };
    observer?.onIndexEntry?.(entry, entries.length);
    entries.push(entry);
  }
  return entries;
}

function readContent(reader: BoundedReader, index: readonly IndexEntry[]): Map<string, ContentEntry> {
  const content = new Map<string, ContentEntry>();
  for (const entry of index) {
    if (content.has(entry.fileName)) {
      throw new MarDecodeError('DuplicateName', `File "${entry.fileName}" appears more than once in the index`, {
        offset: entry.offsetToContent,
        fileName: entry.fileName
      });
    }
    if (entry.offsetToContent + entry.size > reader.length) {
      throw new MarDecodeError(
        'BoundsViolation',
        `Content of "${entry.fileName}" (${entry.size} bytes at ${entry.offsetToContent}) extends beyond a buffer of ${reader.length} bytes`,
        { offset: entry.offsetToContent, fileName: entry.fileName }
      );
    }
    const data = reader.sliceAt(entry.offsetToContent, entry.size);
    content.set(entry.fileName, { data, isCompressed: isXzCompressed(data) });
  }
  return content;
}

/**
 * Parses a complete MAR archive. The buffer is only read, never retained or modified.
 *
 * @throws {MarDecodeError} On any truncation, bad length or duplicate entry. No partial archive is returned.
 */
export function decodeMar(buffer: Buffer, options: MarDecodeOptions = {}): MarArchive {
  const { observer } = options;
  if (buffer.length < MIN_MAR_LENGTH) {
    throw new MarDecodeError('TooShort', `Input of ${buffer.length} bytes is smaller than the ${MIN_MAR_LENGTH}-byte minimum MAR size`, {
      offset: 0
    });
  }
  const reader = new BoundedReader(buffer);

  const marId = reader.readBytes(MAR_ID_LENGTH).toString('latin1');
  const offsetToIndex = reader.readUint32();
  observer?.onHeader?.({ marId, offsetToIndex });

  const signaturesHeader: SignaturesHeader = {
    fileSize: reader.readUint64(),
    numSignatures: reader.readUint32()
  };
  observer?.onSignaturesHeader?.(signaturesHeader);
  if (signaturesHeader.fileSize !== buffer.length) {
    observer?.onWarning?.({
      code: 'FileSizeMismatch',
      message: `Header records a file size of ${signaturesHeader.fileSize} bytes but the input holds ${buffer.length}`
    });
  }
  const signatures = readSignatures(reader, signaturesHeader.numSignatures, observer);

  const additionalSectionsHeader: AdditionalSectionsHeader = { numAdditionalSections: reader.readUint32() };
  observer?.onAdditionalSectionsHeader?.(additionalSectionsHeader);
  const { sections, productInformation } = readAdditionalSections(reader, additionalSectionsHeader.numAdditionalSections, observer);

  // The index sits after all content, so this is a forward jump rather than a sequential read.
  reader.seek(offsetToIndex, 'IndexOutOfBounds');
  observer?.onIndexSeek?.(offsetToIndex);

  const indexHeader: IndexHeader = { size: reader.readUint32() };
  observer?.onIndexHeader?.(indexHeader);
  const index = readIndexEntries(reader, signaturesHeader.fileSize, observer);

  const consumed = reader.offset - offsetToIndex - INDEX_HEADER_LENGTH;
  if (consumed !== indexHeader.size) {
    const message = `Index header declares ${indexHeader.size} bytes but its entries occupy ${consumed}`;
    if (options.strictIndexSize === true) {
      throw new MarDecodeError('IndexSizeMismatch', message, { offset: offsetToIndex });
    }
    observer?.onWarning?.({ code: 'IndexSizeMismatch', message, offset: offsetToIndex });
  }

  const content = readContent(reader, index);

  return {
    marId,
    offsetToIndex,
    ...(productInformation !== undefined ? { productInformation } : {}),
    signaturesHeader,
    signatures,
    additionalSectionsHeader,
    additionalSections: sections,
    indexHeader,
    index,
    content
  };
}
