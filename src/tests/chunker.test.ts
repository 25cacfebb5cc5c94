import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  buildChunks,
  computeMaxChunkBytes,
  exceedsCapacity,
  iterateLines,
  readFileContent,
  readLines,
  splitAtLineBoundaries,
  splitLinesStream,
} from '../core/chunking/index.js';
import { InputError } from '../utils/errors.js';

async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) items.push(item);
  return items;
}

describe('Chunk size cap', () => {
  it('should derive 2362 bytes from the default capacity and margin', () => {
    assert.strictEqual(computeMaxChunkBytes(), 2362);
  });

  it('should floor custom sizing', () => {
    assert.strictEqual(computeMaxChunkBytes({ maxPayloadBytes: 1000, safetyMargin: 0.75 }), 750);
    assert.strictEqual(computeMaxChunkBytes({ maxPayloadBytes: 10, safetyMargin: 0.55 }), 5);
  });

  it('should reject sizing that leaves no room for a body', () => {
    assert.throws(() => computeMaxChunkBytes({ maxPayloadBytes: 1, safetyMargin: 0.5 }), InputError);
  });
});

describe('Line iteration', () => {
  it('should keep terminators and a trailing partial line', () => {
    assert.deepStrictEqual([...iterateLines('a\nbb\nccc')], ['a\n', 'bb\n', 'ccc']);
  });

  it('should split on LF only and keep CR inside the line', () => {
    assert.deepStrictEqual([...iterateLines('one\r\ntwo\r\n')], ['one\r\n', 'two\r\n']);
  });

  it('should yield nothing for empty content', () => {
    assert.deepStrictEqual([...iterateLines('')], []);
  });
});

describe('Line-boundary splitting', () => {
  it('should put each line in its own chunk when two lines exceed the cap', () => {
    const content = 'AAAA\nBBBB\nCCCC\n';
    const chunks = splitAtLineBoundaries(content, 6);

    assert.deepStrictEqual(chunks, ['AAAA\n', 'BBBB\n', 'CCCC\n']);
    assert.strictEqual(chunks.join(''), content);
    assert.strictEqual(Buffer.byteLength(chunks.join(''), 'utf8'), 15);
  });

  it('should pack lines up to the cap', () => {
    assert.deepStrictEqual(splitAtLineBoundaries('ab\ncd\nef\n', 6), ['ab\ncd\n', 'ef\n']);
  });

  it('should keep an oversized line whole in its own chunk', () => {
    const long = 'x'.repeat(20) + '\n';
    const chunks = splitAtLineBoundaries(`a\n${long}b\n`, 8);

    assert.deepStrictEqual(chunks, ['a\n', long, 'b\n']);
  });

  it('should measure the cap in UTF-8 bytes, not characters', () => {
    // 'é' is two bytes, so each line is 3 bytes
    assert.deepStrictEqual(splitAtLineBoundaries('é\né\n', 5), ['é\n', 'é\n']);
    assert.deepStrictEqual(splitAtLineBoundaries('é\né\n', 6), ['é\né\n']);
  });

  it('should never split inside a line', () => {
    const lines = Array.from({ length: 200 }, (_, i) => `line ${i} ${'z'.repeat(i % 37)}\n`);
    const content = lines.join('');
    const chunks = splitAtLineBoundaries(content, 64);

    assert.strictEqual(chunks.join(''), content);
    for (const chunk of chunks) {
      assert.ok(chunk.endsWith('\n'), 'every chunk should end at a line boundary');
      assert.ok(Buffer.byteLength(chunk, 'utf8') <= 64);
    }
  });

  it('should return no chunks for empty content', () => {
    assert.deepStrictEqual(splitAtLineBoundaries('', 10), []);
  });

  it('should reject a non-positive cap', () => {
    assert.throws(() => splitAtLineBoundaries('a\n', 0), InputError);
    assert.throws(() => splitAtLineBoundaries('a\n', 2.5), InputError);
  });

  it('should give the same chunks from a line stream', async () => {
    const content = 'AAAA\nBBBB\nCCCC\nD';
    const streamed = await collect(splitLinesStream(iterateLines(content), 10));
    assert.deepStrictEqual(streamed, splitAtLineBoundaries(content, 10));
  });
});

describe('Chunk building', () => {
  it('should number chunks from 1 and record the total', () => {
    const chunks = buildChunks('notes.txt', ['a\n', 'b\n']);
    assert.deepStrictEqual(chunks, [
      { index: 1, total: 2, filename: 'notes.txt', body: 'a\n' },
      { index: 2, total: 2, filename: 'notes.txt', body: 'b\n' },
    ]);
  });

  it('should flag counts above the threshold only', () => {
    assert.strictEqual(exceedsCapacity(100), false);
    assert.strictEqual(exceedsCapacity(101), true);
    assert.strictEqual(exceedsCapacity(6, 5), true);
  });
});

describe('File reading', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'chunker-test-'));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should strip a UTF-8 BOM', async () => {
    const path = join(testDir, 'bom.txt');
    await writeFile(path, Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('hi\n')]));

    assert.strictEqual(await readFileContent(path), 'hi\n');
    assert.deepStrictEqual(await collect(readLines(path)), ['hi\n']);
  });

  it('should replace invalid UTF-8 bytes instead of failing', async () => {
    const path = join(testDir, 'bad.txt');
    await writeFile(path, Buffer.from([0x61, 0xff, 0x62, 0x0a]));

    assert.strictEqual(await readFileContent(path), 'a�b\n');
  });

  it('should reassemble multi-byte characters split across reads', async () => {
    const path = join(testDir, 'split.txt');
    await writeFile(path, 'ééé\nü\n', 'utf-8');

    const lines = await collect(readLines(path, 3));
    assert.deepStrictEqual(lines, ['ééé\n', 'ü\n']);
  });
});
