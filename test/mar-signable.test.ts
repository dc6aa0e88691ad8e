import test from 'node:test';
import assert from 'node:assert/strict';
import { createHash } from 'node:crypto';
import { MarBinary } from '../src/mar-binary.js';
import { decodeMar } from '../src/mar-decoder.js';
import { MarEncodeError } from '../src/mar-errors.js';
import { marSignableBytes } from '../src/mar-signable.js';
import type { IndexEntry, MarArchive } from '../src/types/mar-archive.js';
import { buildMar, bytes } from './helpers/mar-fixture.js';

function signedFixture() {
  return buildMar({
    signatures: [
      { algorithmId: 1, data: Buffer.alloc(16, 0x11) },
      { algorithmId: 2, data: Buffer.alloc(32, 0x22) }
    ],
    sections: [{ blockId: 1, data: bytes('app\0release\0') }],
    files: [
      { name: 'a.txt', data: bytes('abcd') },
      { name: 'dir/b.bin', data: Buffer.from([0, 1, 2, 3, 4, 5, 6]), flags: 0o755 }
    ]
  });
}

function assertEncodeError(fn: () => unknown, code: string): void {
  assert.throws(fn, (error: unknown) => error instanceof MarEncodeError && error.code === code);
}

test('signable bytes are the original file without signature data', () => {
  const built = signedFixture();
  const archive = decodeMar(built.buffer);
  const [first, second] = built.signatureDataOffsets;
  assert.equal(first, 28);
  assert.equal(second, 52);

  const expected = Buffer.concat([
    built.buffer.subarray(0, 28),
    built.buffer.subarray(44, 52),
    built.buffer.subarray(84)
  ]);

  const signable = marSignableBytes(archive);

  assert.equal(signable.length, archive.signaturesHeader.fileSize - 48);
  assert.deepEqual(signable, expected);
});

test('signable bytes equal the whole file when there are no signatures', () => {
  const { buffer } = buildMar({ files: [{ name: 'a.txt', data: bytes('abcd') }] });

  assert.deepEqual(marSignableBytes(decodeMar(buffer)), buffer);
});

test('signable bytes keep file names that are not valid UTF-8 byte for byte', () => {
  const { buffer } = buildMar({
    files: [
      { name: Buffer.from([0x61, 0xf0, 0x90, 0x80, 0x62]), data: bytes('abcd') },
      { name: Buffer.from([0xef, 0xbb, 0xbf, 0x63]), data: bytes('ef') }
    ]
  });

  assert.deepEqual(marSignableBytes(decodeMar(buffer)), buffer);
});

test('signable bytes are identical across calls and leave the archive untouched', () => {
  const archive = decodeMar(signedFixture().buffer);
  const indexBefore = archive.index.map((entry) => ({ ...entry }));

  const first = marSignableBytes(archive);
  const second = marSignableBytes(archive);

  assert.deepEqual(first, second);
  assert.notEqual(first, second);
  assert.deepEqual(archive.index, indexBefore);
  assert.deepEqual(archive.signatures[0]?.data, Buffer.alloc(16, 0x11));
});

test('rejects an index that no longer matches its declared size', () => {
  const decoded = decodeMar(buildMar({ files: [{ name: 'a.txt', data: bytes('abcd') }], indexSizeDelta: 2 }).buffer);
  assertEncodeError(() => marSignableBytes(decoded), 'IndexSizeMismatch');

  const archive = decodeMar(signedFixture().buffer);
  const extra: IndexEntry = { offsetToContent: 0, size: 0, flags: 0, fileName: 'extra', fileNameBytes: bytes('extra') };
  assertEncodeError(() => marSignableBytes({ ...archive, index: [...archive.index, extra] }), 'IndexSizeMismatch');
});

test('rejects index entries without content', () => {
  const archive = decodeMar(signedFixture().buffer);

  assertEncodeError(() => marSignableBytes({ ...archive, content: new Map() }), 'MissingContent');
});

test('rejects positions outside the signable range', () => {
  const archive = decodeMar(signedFixture().buffer);

  assertEncodeError(() => marSignableBytes({ ...archive, offsetToIndex: archive.offsetToIndex + 100 }), 'BoundsViolation');

  const shifted: MarArchive = {
    ...archive,
    index: archive.index.map((entry) => (entry.fileName === 'a.txt' ? { ...entry, offsetToContent: 4 } : entry))
  };
  assertEncodeError(() => marSignableBytes(shifted), 'BoundsViolation');

  const oversized: MarArchive = {
    ...archive,
    signatures: archive.signatures.map((signature) => ({ ...signature, size: archive.signaturesHeader.fileSize }))
  };
  assertEncodeError(() => marSignableBytes(oversized), 'BoundsViolation');
});

test('digests the signable bytes with the hash matching each signature', () => {
  const archive = decodeMar(signedFixture().buffer);
  const signable = marSignableBytes(archive);
  const [sha1Signature, sha384Signature] = archive.signatures;
  assert.ok(sha1Signature && sha384Signature);

  assert.equal(
    MarBinary.digestForSignature({ archive, signature: sha1Signature }),
    createHash('sha1').update(signable).digest('hex')
  );
  assert.equal(
    MarBinary.digestForSignature({ archive, signature: sha384Signature }),
    createHash('sha384').update(signable).digest('hex')
  );
  assert.equal(MarBinary.digestForSignature({ archive, signature: { ...sha1Signature, algorithmId: 5, algorithm: 'unknown' } }), null);
});
