/**
 * Rebuilds the byte range a MAR signature is computed over: the whole file
 * except the signature data blocks.
 */
import { INDEX_HEADER_LENGTH } from './constants/mar-format.js';
import { MarEncodeError } from './mar-errors.js';
import type { MarArchive } from './types/mar-archive.js';
import { BigEndianWriter } from './utils/big-endian-buffer.js';

function assertUint32(value: number, label: string): void {
  if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
    throw new MarEncodeError('BoundsViolation', `${label} ${value} does not fit in an unsigned 32-bit field`);
  }
}

/**
 * Copies `bytes` into `output` at `position` after checking the whole range fits.
 */
function placeAt(output: Buffer, position: number, bytes: Uint8Array, label: string, fileName?: string): void {
  if (position < 0 || position + bytes.length > output.length) {
    throw new MarEncodeError(
      'BoundsViolation',
      `${label} (${bytes.length} bytes at ${position}) falls outside the ${output.length}-byte signable range`,
      { offset: position, fileName }
    );
  }
  output.set(bytes, position);
}

function serializeHead(archive: MarArchive): Buffer {
  const writer = new BigEndianWriter();
  writer.writeBytes(Buffer.from(archive.marId, 'latin1'));
  assertUint32(archive.offsetToIndex, 'Offset to index');
  writer.writeUint32(archive.offsetToIndex);
  writer.writeUint64(archive.signaturesHeader.fileSize);
  assertUint32(archive.signaturesHeader.numSignatures, 'Signature count');
  writer.writeUint32(archive.signaturesHeader.numSignatures);
  for (const signature of archive.signatures) {
    assertUint32(signature.algorithmId, 'Signature algorithm id');
    assertUint32(signature.size, 'Signature size');
    writer.writeUint32(signature.algorithmId);
    writer.writeUint32(signature.size);
  }
  assertUint32(archive.additionalSectionsHeader.numAdditionalSections, 'Additional section count');
  writer.writeUint32(archive.additionalSectionsHeader.numAdditionalSections);
  for (const section of archive.additionalSections) {
    assertUint32(section.blockSize, 'Block size');
    assertUint32(section.blockId, 'Block id');
    writer.writeUint32(section.blockSize);
    writer.writeUint32(section.blockId);
    writer.writeBytes(section.data);
  }
  return writer.getBuffer();
}

function serializeIndex(archive: MarArchive): Buffer {
  const writer = new BigEndianWriter();
  assertUint32(archive.indexHeader.size, 'Index size');
  writer.writeUint32(archive.indexHeader.size);
  for (const entry of archive.index) {
    assertUint32(entry.offsetToContent, `Content offset of "${entry.fileName}"`);
    assertUint32(entry.size, `Content size of "${entry.fileName}"`);
    assertUint32(entry.flags, `Flags of "${entry.fileName}"`);
    writer.writeUint32(entry.offsetToContent);
    writer.writeUint32(entry.size);
    writer.writeUint32(entry.flags);
    writer.writeBytes(entry.fileNameBytes);
    writer.writeByte(0);
  }
  return writer.getBuffer();
}

/**
 * Produces the bytes to feed to signature generation or verification.
 * Signature algorithm ids and sizes are kept; only their data is left out,
 * so every absolute offset moves back by the total signature data size.
 * The archive is not modified and repeated calls return identical bytes.
 *
 * @throws {MarEncodeError} When the index no longer matches its declared size or any range falls outside the output.
 */
export function marSignableBytes(archive: MarArchive): Buffer {
  if (!Number.isSafeInteger(archive.signaturesHeader.fileSize) || archive.signaturesHeader.fileSize < 0) {
    throw new MarEncodeError('BoundsViolation', `Recorded file size ${archive.signaturesHeader.fileSize} is not a valid byte count`);
  }
  const sigDataSize = archive.signatures.reduce((total, signature) => total + signature.size, 0);
  const outputLength = archive.signaturesHeader.fileSize - sigDataSize;
  if (outputLength < 0) {
    throw new MarEncodeError(
      'BoundsViolation',
      `Signature data (${sigDataSize} bytes) exceeds the recorded file size of ${archive.signaturesHeader.fileSize}`
    );
  }
  const output = Buffer.alloc(outputLength);

  placeAt(output, 0, serializeHead(archive), 'Archive headers');

  const indexBytes = serializeIndex(archive);
  if (indexBytes.length !== archive.indexHeader.size + INDEX_HEADER_LENGTH) {
    throw new MarEncodeError(
      'IndexSizeMismatch',
      `Serialized index has ${indexBytes.length - INDEX_HEADER_LENGTH} bytes of entries when ${archive.indexHeader.size} were declared`,
      { offset: archive.offsetToIndex }
    );
  }

  for (const entry of archive.index) {
    const content = archive.content.get(entry.fileName);
    if (content === undefined) {
      throw new MarEncodeError('MissingContent', `Index entry "${entry.fileName}" has no content`, { fileName: entry.fileName });
    }
    if (content.data.length !== entry.size) {
      throw new MarEncodeError(
        'BoundsViolation',
        `Content of "${entry.fileName}" holds ${content.data.length} bytes but the index declares ${entry.size}`,
        { offset: entry.offsetToContent - sigDataSize, fileName: entry.fileName }
      );
    }
    placeAt(output, entry.offsetToContent - sigDataSize, content.data, `Content of "${entry.fileName}"`, entry.fileName);
  }

  placeAt(output, archive.offsetToIndex - sigDataSize, indexBytes, 'Index');
  return output;
}
