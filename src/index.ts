/**
 * MAR Tools - Main entry point
 *
 * Decodes signed MAR archives and rebuilds the byte range their signatures cover.
 */

export { MarBinary } from './mar-binary.js';
export { decodeMar, isXzCompressed, signatureAlgorithmName, decodeProductInformation, decodeFileName } from './mar-decoder.js';
export type { MarDecodeOptions } from './mar-decoder.js';
export { marSignableBytes } from './mar-signable.js';
export { MarError, MarDecodeError, MarEncodeError } from './mar-errors.js';
export type { MarErrorCode, MarDecodeErrorCode, MarEncodeErrorCode, MarErrorOptions } from './mar-errors.js';
export { toArchiveRecord, formatPermissions } from './mar-report.js';
export type { MarArchiveRecord, SignatureRecord, AdditionalSectionRecord, IndexEntryRecord, ContentEntryRecord } from './mar-report.js';
export { createConsoleObserver } from './utils/console-observer.js';
export * from './constants/mar-format.js';
export type * from './types/mar-archive.js';
export type * from './types/mar-observer.js';
