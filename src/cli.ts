#!/usr/bin/env node
/**
 * MAR Tools - CLI Interface
 *
 * Command-line interface for inspecting MAR archives and extracting their signable bytes.
 */

import { Command } from 'commander';
import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { MarBinary } from './mar-binary.js';
import { toArchiveRecord } from './mar-report.js';
import { createConsoleObserver } from './utils/console-observer.js';

interface InspectOptions {
  readonly verbose?: boolean;
  readonly data?: boolean;
  readonly strictIndex?: boolean;
}

interface SignableOptions {
  readonly strictIndex?: boolean;
}

const program = new Command();

// Version is set at build time
const version = '0.1.0';

program
  .name('mar-tools')
  .description('Inspect signed MAR archives and extract the bytes their signatures cover')
  .version(version);

program
  .command('inspect')
  .description('Decode a MAR archive and print its structure as JSON')
  .argument('<input-file>', 'Path to the MAR archive')
  .option('--verbose', 'Print each header and index entry to stderr while decoding')
  .option('--data', 'Include base64 content data in the output')
  .option('--strict-index', 'Reject archives whose index size header disagrees with its entries')
  .action(async (inputFile: string, options: InspectOptions) => {
    try {
      const archive = await MarBinary.read({
        filePath: resolve(inputFile),
        observer: options.verbose === true ? createConsoleObserver() : undefined,
        strictIndexSize: options.strictIndex
      });
      console.log(JSON.stringify(toArchiveRecord(archive, { includeContentData: options.data === true }), null, 2));
    } catch (error) {
      console.error('❌ Inspect failed:', error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  });

program
  .command('signable')
  .description('Write the bytes covered by the archive signatures and print their digests')
  .argument('<input-file>', 'Path to the MAR archive')
  .argument('<output-file>', 'Path where the signable bytes will be written')
  .option('--strict-index', 'Reject archives whose index size header disagrees with its entries')
  .action(async (inputFile: string, outputFile: string, options: SignableOptions) => {
    try {
      console.log(`Reading archive: ${inputFile}`);
      const archive = await MarBinary.read({ filePath: resolve(inputFile), strictIndexSize: options.strictIndex });
      const signable = MarBinary.signableBytes({ archive });
      await writeFile(resolve(outputFile), signable);
      console.log(`Wrote ${signable.length} signable bytes to: ${outputFile}`);

      for (const [position, signature] of archive.signatures.entries()) {
        const digest = MarBinary.digestForSignature({ archive, signature });
        console.log(`* Signature ${position} (${signature.algorithm}): ${digest ?? 'no digest for unknown algorithm'}`);
      }

      console.log('');
      console.log('✅ Signable bytes extracted successfully!');
    } catch (error) {
      console.error('❌ Extraction failed:', error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  });

await program.parseAsync(process.argv);
