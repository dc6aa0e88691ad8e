/**
 * Hooks the decoder reports structural events to while it walks an archive.
 * Every hook is optional and none of them can alter the result.
 */
import type {
  AdditionalSection,
  AdditionalSectionsHeader,
  IndexEntry,
  IndexHeader,
  Signature,
  SignaturesHeader
} from './mar-archive.js';

export type MarDecodeWarningCode = 'IndexSizeMismatch' | 'FileSizeMismatch';

/** Inconsistency the decoder noticed but did not reject. */
export interface MarDecodeWarning {
  readonly code: MarDecodeWarningCode;
  readonly message: string;
  readonly offset?: number;
}

export interface MarDecodeObserver {
  onHeader?(header: { readonly marId: string; readonly offsetToIndex: number }): void;
  onSignaturesHeader?(header: SignaturesHeader): void;
  onSignature?(signature: Signature, position: number): void;
  onAdditionalSectionsHeader?(header: AdditionalSectionsHeader): void;
  /** `blockName` is "Product Information" or "<id> (unknown)". */
  onAdditionalSection?(section: AdditionalSection, position: number, blockName: string): void;
  onIndexSeek?(offset: number): void;
  onIndexHeader?(header: IndexHeader): void;
  onIndexEntry?(entry: IndexEntry, position: number): void;
  onWarning?(warning: MarDecodeWarning): void;
}
