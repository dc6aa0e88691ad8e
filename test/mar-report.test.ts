import test from 'node:test';
import assert from 'node:assert/strict';
import { decodeMar } from '../src/mar-decoder.js';
import { MarDecodeError } from '../src/mar-errors.js';
import { formatPermissions, toArchiveRecord, type MarArchiveRecord } from '../src/mar-report.js';
import { createConsoleObserver } from '../src/utils/console-observer.js';
import { buildMar, bytes } from './helpers/mar-fixture.js';

test('formats permission bits like ls', () => {
  assert.equal(formatPermissions(0o644), '-rw-r--r--');
  assert.equal(formatPermissions(0o755), '-rwxr-xr-x');
  assert.equal(formatPermissions(0), '----------');
  assert.equal(formatPermissions(0o100600), '-rw-------');
});

test('archive record is JSON safe and omits content data by default', () => {
  const archive = decodeMar(
    buildMar({
      signatures: [{ algorithmId: 1, data: Buffer.from([0xca, 0xfe]) }],
      sections: [{ blockId: 1, data: bytes('app\0beta\0') }],
      files: [{ name: 'a.txt', data: bytes('abcd') }]
    }).buffer
  );

  const record: MarArchiveRecord = JSON.parse(JSON.stringify(toArchiveRecord(archive)));

  assert.equal(record.productInformation, 'app beta');
  assert.deepEqual(record.signatures, [{ algorithmId: 1, size: 2, algorithm: 'RSA-PKCS1-SHA1', data: 'yv4=' }]);
  assert.deepEqual(record.additionalSections, [{ blockSize: 17, blockId: 1, data: 'YXBwAGJldGEA' }]);
  assert.deepEqual(record.index, [{ offsetToContent: 51, size: 4, flags: 0o644, mode: '-rw-r--r--', fileName: 'a.txt', fileNameBytes: 'YS50eHQ=' }]);
  assert.deepEqual(record.content, { 'a.txt': { size: 4, isCompressed: false } });

  const withData = toArchiveRecord(archive, { includeContentData: true });
  assert.deepEqual(withData.content['a.txt'], { data: 'YWJjZA==', size: 4, isCompressed: false });
});

test('console observer prints the layout as it is decoded', () => {
  const lines: string[] = [];

  decodeMar(buildMar({ files: [{ name: 'a.txt', data: bytes('abcd') }] }).buffer, {
    observer: createConsoleObserver((line) => lines.push(line))
  });

  assert.deepEqual(lines, [
    'Header: MAR ID="MAR1", Offset to Index=28',
    'Signatures Header: FileSize=50, NumSignatures=0',
    'Additional Sections: 0',
    'Jumping to index at offset 28',
    'Index Size: 18',
    '* Index Entry   0: Size=         4 Flags=-rw-r--r-- Offset=        24 Name="a.txt"'
  ]);
});

test('decode errors serialize their code and position', () => {
  const error = new MarDecodeError('IndexOutOfBounds', 'Offset to index 99 lies beyond a buffer of 50 bytes', { offset: 99 });

  assert.equal(error.message, 'Offset to index 99 lies beyond a buffer of 50 bytes (at byte 99)');
  assert.deepEqual(JSON.parse(JSON.stringify(error)), {
    name: 'MarDecodeError',
    code: 'IndexOutOfBounds',
    message: 'Offset to index 99 lies beyond a buffer of 50 bytes (at byte 99)',
    offset: 99
  });
});
