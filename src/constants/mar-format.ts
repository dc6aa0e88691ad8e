/**
 * Fixed sizes and identifiers of the MAR container layout.
 * All multi-byte integers on the wire are unsigned big-endian.
 */

/** Length of the leading archive identifier, typically "MAR1". */
export const MAR_ID_LENGTH = 4;

/** Length of the absolute offset to the index. */
export const OFFSET_TO_INDEX_LENGTH = 4;

/** Total file size (8 bytes) followed by the signature count (4 bytes). */
export const SIGNATURES_HEADER_LENGTH = 12;

/** Algorithm id and data length, 4 bytes each. */
export const SIGNATURE_ENTRY_HEADER_LENGTH = 8;

/** Number of additional sections. */
export const ADDITIONAL_SECTIONS_HEADER_LENGTH = 4;

/** Block size and block id, 4 bytes each. The block size counts this header. */
export const ADDITIONAL_SECTION_ENTRY_HEADER_LENGTH = 8;

/** Byte size of the index, not counting this field. */
export const INDEX_HEADER_LENGTH = 4;

/** Content offset, content size and permission flags, 4 bytes each. */
export const INDEX_ENTRY_HEADER_LENGTH = 12;

/** Smallest buffer that can hold every fixed-size header. */
export const MIN_MAR_LENGTH =
  MAR_ID_LENGTH + OFFSET_TO_INDEX_LENGTH + SIGNATURES_HEADER_LENGTH + ADDITIONAL_SECTIONS_HEADER_LENGTH + INDEX_HEADER_LENGTH;

export const SIG_ALG_RSA_PKCS1_SHA1 = 1;
export const SIG_ALG_RSA_PKCS1_SHA384 = 2;

export const BLOCK_ID_PRODUCT_INFO = 1;

/** Leading bytes of an xz stream; entries starting with them are flagged compressed. */
export const XZ_MAGIC: Uint8Array = Uint8Array.of(0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00);
