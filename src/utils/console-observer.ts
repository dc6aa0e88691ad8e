/**
 * Decode observer that prints the archive layout as it is walked.
 */
import { formatPermissions } from '../mar-report.js';
import type { MarDecodeObserver } from '../types/mar-observer.js';

export function createConsoleObserver(log: (line: string) => void = (line) => console.error(line)): MarDecodeObserver {
  return {
    onHeader: ({ marId, offsetToIndex }) => log(`Header: MAR ID=${JSON.stringify(marId)}, Offset to Index=${offsetToIndex}`),
    onSignaturesHeader: ({ fileSize, numSignatures }) => log(`Signatures Header: FileSize=${fileSize}, NumSignatures=${numSignatures}`),
    onSignature: (signature, position) =>
      log(`* Signature ${position}: Algorithm=${JSON.stringify(signature.algorithm)}, Size=${signature.size}, Data=${signature.data.toString('hex').toUpperCase()}`),
    onAdditionalSectionsHeader: ({ numAdditionalSections }) => log(`Additional Sections: ${numAdditionalSections}`),
    onAdditionalSection: (section, position, blockName) =>
      log(`* Additional Section ${position}: BlockSize=${section.blockSize}, BlockID=${JSON.stringify(blockName)}, DataLength=${section.data.length}`),
    onIndexSeek: (offset) => log(`Jumping to index at offset ${offset}`),
    onIndexHeader: ({ size }) => log(`Index Size: ${size}`),
    onIndexEntry: (entry, position) =>
      log(
        `* Index Entry ${String(position).padStart(3)}: Size=${String(entry.size).padStart(10)} Flags=${formatPermissions(entry.flags)} ` +
          `Offset=${String(entry.offsetToContent).padStart(10)} Name=${JSON.stringify(entry.fileName)}`
      ),
    onWarning: (warning) => log(`⚠️  ${warning.code}: ${warning.message}`)
  };
}
