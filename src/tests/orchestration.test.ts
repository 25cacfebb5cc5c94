import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { CryptoEngine } from '../core/crypto/index.js';
import { fileHash } from '../core/integrity/index.js';
import { buildChunks } from '../core/chunking/index.js';
import { encodeChunk, splitRecords } from '../core/codec/index.js';
import { Reassembler, staticPassword } from '../core/reassembly/index.js';
import { TextDumpDecoder } from '../core/symbols/index.js';
import {
  checkSourceFile,
  chunkFileName,
  collectChunkDirectory,
  generateTransfer,
  ingestSymbols,
  rebuildTransfer,
  scannedChunkFileName,
} from '../core/orchestration/index.js';
import type { GeneratedTransfer, GenerateOptions } from '../core/orchestration/index.js';
import type { SymbolDecoder, SymbolEncoder, SymbolOptions } from '../core/symbols/index.js';
import { InputError, MissingPartsError, WeakPasswordError } from '../utils/errors.js';
import { silentLogger } from '../utils/logger.js';

const engine = new CryptoEngine({ iterations: 1000 });
const CONTENT = 'AAAA\nBBBB\nCCCC\n';

let root: string;
let sourcePath: string;
let chunkDir: string;
let outputDir: string;

async function generate(overrides: Partial<GenerateOptions> = {}): Promise<GeneratedTransfer> {
  const result = await generateTransfer({
    sourcePath,
    outputDir: chunkDir,
    maxChunkBytes: 6,
    crypto: engine,
    logger: silentLogger,
    ...overrides,
  });
  assert.strictEqual(result.status, 'written');
  if (result.status !== 'written') throw new Error('unreachable');
  return result;
}

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), 'airgap-flow-'));
  sourcePath = join(root, 'notes.txt');
  chunkDir = join(root, 'chunks');
  outputDir = join(root, 'out');
  await writeFile(sourcePath, CONTENT);
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe('Chunk file naming', () => {
  it('should name generated and scanned chunk files', () => {
    assert.strictEqual(chunkFileName('notes.txt', 2, 12, false), 'notes_part_02_of_12.txt');
    assert.strictEqual(chunkFileName('notes.txt', 1, 3, true), 'notes_encrypted_part_01_of_03.txt');
    assert.strictEqual(scannedChunkFileName('notes.txt', 7), 'notes_chunk_007.txt');
  });
});

describe('generateTransfer', () => {
  it('should write one chunk file per record', async () => {
    const result = await generate();

    assert.strictEqual(result.totalChunks, 3);
    assert.strictEqual(result.fileHash, fileHash(CONTENT));
    assert.strictEqual(result.bytes, 15);
    assert.deepStrictEqual(result.oversized, []);
    assert.deepStrictEqual((await readdir(chunkDir)).sort(), [
      'notes_part_01_of_03.txt',
      'notes_part_02_of_03.txt',
      'notes_part_03_of_03.txt',
    ]);

    const second = await readFile(join(chunkDir, 'notes_part_02_of_03.txt'), 'utf-8');
    assert.ok(second.startsWith('--BEGIN part_02_of_03 file: notes.txt chunk_hash: '));
    assert.ok(second.endsWith('\nBBBB\n--END part_02--'));
  });

  it('should flag a single line longer than the cap', async () => {
    await writeFile(sourcePath, 'short\nthis line is long\n');
    const result = await generate();

    assert.strictEqual(result.totalChunks, 2);
    assert.deepStrictEqual(result.oversized, [2]);
  });

  it('should reject a missing source, a directory and an empty file', async () => {
    await assert.rejects(generate({ sourcePath: join(root, 'nope.txt') }), {
      name: 'InputError',
      message: `Source file not found: ${join(root, 'nope.txt')}`,
    });
    await assert.rejects(generate({ sourcePath: root }), {
      name: 'InputError',
      message: `Not a file: ${root}`,
    });

    await writeFile(sourcePath, '');
    await assert.rejects(generate(), {
      name: 'InputError',
      message: 'notes.txt is empty; nothing to transfer',
    });
  });

  it('should render each record beside its chunk file', async () => {
    const calls: Array<{ payload: string; options: SymbolOptions }> = [];
    const renderer: SymbolEncoder = {
      extension: '.img',
      encodeSymbol: async (payload, options) => {
        calls.push({ payload, options });
        return new TextEncoder().encode(`image ${calls.length}`);
      },
    };
    const symbolOptions: SymbolOptions = { boxSize: 6, border: 2, errorCorrectionLevel: 'M' };

    const result = await generate({ renderer, symbolOptions });

    assert.deepStrictEqual(result.images, [
      join(chunkDir, 'notes_part_01_of_03.img'),
      join(chunkDir, 'notes_part_02_of_03.img'),
      join(chunkDir, 'notes_part_03_of_03.img'),
    ]);
    assert.strictEqual(calls.length, 3);
    assert.strictEqual(calls[1].payload, await readFile(result.files[1], 'utf-8'));
    assert.deepStrictEqual(calls[0].options, symbolOptions);
    assert.strictEqual(await readFile(result.images[2], 'utf-8'), 'image 3');
  });

  it('should pass the default symbol options and write no images without a renderer', async () => {
    const seen: SymbolOptions[] = [];
    const renderer: SymbolEncoder = {
      extension: '.img',
      encodeSymbol: async (_payload, options) => {
        seen.push(options);
        return new Uint8Array([1]);
      },
    };

    await generate({ renderer, maxChunkBytes: 100 });
    assert.deepStrictEqual(seen, [{ boxSize: 10, border: 4, errorCorrectionLevel: 'L' }]);

    const plain = await generate({ outputDir: join(root, 'plain') });
    assert.deepStrictEqual(plain.images, []);
    assert.strictEqual((await readdir(join(root, 'plain'))).length, 3);
  });

  it('should check the source file on its own', async () => {
    assert.strictEqual(await checkSourceFile(sourcePath), 15);
    await assert.rejects(checkSourceFile(join(root, 'nope.txt')), {
      name: 'InputError',
      message: `Source file not found: ${join(root, 'nope.txt')}`,
    });
  });

  it('should refuse a file that needs more parts than a header can declare', async () => {
    await writeFile(sourcePath, 'x\n'.repeat(100000));
    await assert.rejects(generate({ maxChunkBytes: 1 }), {
      name: 'InputError',
      message: 'notes.txt needs 100000 parts; at most 99999 fit the record format',
    });
    await assert.rejects(readdir(chunkDir), { code: 'ENOENT' });
  });

  it('should check the password before splitting', async () => {
    await assert.rejects(generate({ encrypt: true, password: 'short' }), WeakPasswordError);
    await assert.rejects(
      generate({ encrypt: true, password: 'test-secret', crypto: undefined }),
      InputError
    );
  });

  it('should stop without writing when capacity is declined', async () => {
    const asked: number[] = [];
    const result = await generateTransfer(
      { sourcePath, outputDir: chunkDir, maxChunkBytes: 6, capacityThreshold: 2, logger: silentLogger },
      {
        confirmCapacity: async (total) => {
          asked.push(total);
          return false;
        },
      }
    );

    assert.deepStrictEqual(result, { status: 'cancelled', filename: 'notes.txt', totalChunks: 3 });
    assert.deepStrictEqual(asked, [3]);
    await assert.rejects(readdir(chunkDir), { code: 'ENOENT' });
  });
});

describe('rebuildTransfer', () => {
  it('should rebuild a plain transfer byte for byte', async () => {
    await generate();
    const summary = await rebuildTransfer({ chunkDir, outputDir, crypto: engine, logger: silentLogger });

    assert.strictEqual(summary.collected.files, 3);
    assert.strictEqual(summary.collected.records, 3);
    assert.deepStrictEqual(summary.written, [join(outputDir, 'notes.txt')]);
    assert.strictEqual(await readFile(join(outputDir, 'notes.txt'), 'utf-8'), CONTENT);
  });

  it('should rebuild an encrypted transfer with the password', async () => {
    const generated = await generate({ encrypt: true, password: 'test-secret' });
    assert.strictEqual(
      generated.files[0],
      join(chunkDir, 'notes_encrypted_part_01_of_03.txt')
    );

    const summary = await rebuildTransfer({
      chunkDir,
      outputDir,
      crypto: engine,
      passwordProvider: staticPassword('test-secret'),
      logger: silentLogger,
    });

    assert.strictEqual(summary.verified.length, 1);
    assert.strictEqual(summary.verified[0].encrypted, true);
    assert.strictEqual(await readFile(join(outputDir, 'notes.txt'), 'utf-8'), CONTENT);
  });

  it('should write nothing when a part is missing', async () => {
    await generate();
    await rm(join(chunkDir, 'notes_part_02_of_03.txt'));

    const failures: string[] = [];
    const summary = await rebuildTransfer(
      { chunkDir, outputDir, crypto: engine, logger: silentLogger },
      { onFileFailed: (file) => failures.push(file.error.message) }
    );

    assert.strictEqual(summary.failed.length, 1);
    assert.ok(summary.failed[0].error instanceof MissingPartsError);
    assert.deepStrictEqual(failures, ['notes.txt: missing parts [2] of 3']);
    assert.deepStrictEqual(summary.written, []);
    await assert.rejects(readdir(outputDir), { code: 'ENOENT' });
  });

  it('should verify without writing in verify-only mode', async () => {
    await generate();
    const summary = await rebuildTransfer({
      chunkDir,
      outputDir,
      verifyOnly: true,
      crypto: engine,
      logger: silentLogger,
    });

    assert.strictEqual(summary.verified.length, 1);
    assert.deepStrictEqual(summary.written, []);
    await assert.rejects(readdir(outputDir), { code: 'ENOENT' });
  });

  it('should skip an existing output when overwrite is declined', async () => {
    await generate();
    await mkdir(outputDir);
    await writeFile(join(outputDir, 'notes.txt'), 'keep me');

    const asked: string[] = [];
    const summary = await rebuildTransfer(
      { chunkDir, outputDir, crypto: engine, logger: silentLogger },
      {
        confirmOverwrite: async (path) => {
          asked.push(path);
          return false;
        },
      }
    );

    assert.deepStrictEqual(asked, [join(outputDir, 'notes.txt')]);
    assert.deepStrictEqual(summary.skipped, [join(outputDir, 'notes.txt')]);
    assert.strictEqual(await readFile(join(outputDir, 'notes.txt'), 'utf-8'), 'keep me');
  });

  it('should replace an existing output when forced', async () => {
    await generate();
    await mkdir(outputDir);
    await writeFile(join(outputDir, 'notes.txt'), 'old');

    await rebuildTransfer({ chunkDir, outputDir, force: true, crypto: engine, logger: silentLogger });
    assert.strictEqual(await readFile(join(outputDir, 'notes.txt'), 'utf-8'), CONTENT);
  });

  it('should write the other files when one cannot be written', async () => {
    await mkdir(chunkDir);
    for (const filename of ['..', 'a.txt']) {
      const [chunk] = buildChunks(filename, ['x\n']);
      const encoded = await encodeChunk(chunk, { fileHash: fileHash('x\n') });
      await writeFile(join(chunkDir, `record_${filename === '..' ? 'dots' : 'a'}.txt`), encoded.text);
    }

    const failures: string[] = [];
    const summary = await rebuildTransfer(
      { chunkDir, outputDir, crypto: engine, logger: silentLogger },
      { onFileWriteFailed: (failure) => failures.push(failure.filename) }
    );

    assert.deepStrictEqual(
      summary.verified.map((file) => file.filename),
      ['..', 'a.txt']
    );
    assert.deepStrictEqual(summary.written, [join(outputDir, 'a.txt')]);
    assert.strictEqual(summary.writeFailed.length, 1);
    assert.strictEqual(summary.writeFailed[0].filename, '..');
    assert.strictEqual(summary.writeFailed[0].path, undefined);
    assert.ok(summary.writeFailed[0].error instanceof InputError);
    assert.deepStrictEqual(failures, ['..']);
    assert.strictEqual(await readFile(join(outputDir, 'a.txt'), 'utf-8'), 'x\n');
  });

  it('should report a destination that is a directory and carry on', async () => {
    await generate();
    await mkdir(join(outputDir, 'notes.txt'), { recursive: true });

    const summary = await rebuildTransfer({
      chunkDir,
      outputDir,
      force: true,
      crypto: engine,
      logger: silentLogger,
    });

    assert.deepStrictEqual(summary.written, []);
    assert.strictEqual(summary.writeFailed.length, 1);
    assert.strictEqual(summary.writeFailed[0].path, join(outputDir, 'notes.txt'));
  });
});

describe('collectChunkDirectory', () => {
  it('should reject a missing directory and one without chunk files', async () => {
    await assert.rejects(collectChunkDirectory(join(root, 'missing')), {
      name: 'InputError',
      message: `Chunk directory not found: ${join(root, 'missing')}`,
    });

    await mkdir(chunkDir);
    await writeFile(join(chunkDir, 'image.png'), 'not text');
    await assert.rejects(collectChunkDirectory(chunkDir), {
      name: 'InputError',
      message: `No .txt chunk files in ${chunkDir}`,
    });
  });

  it('should read several records appended to one file and count rejects', async () => {
    const generated = await generate();
    const texts = await Promise.all(generated.files.map((file) => readFile(file, 'utf-8')));
    const mergedDir = join(root, 'merged');
    await mkdir(mergedDir);
    await writeFile(join(mergedDir, 'all.txt'), texts.join('\n'));
    await writeFile(join(mergedDir, 'notes_readme.txt'), 'not a record');

    const { reassembler, stats } = await collectChunkDirectory(
      mergedDir,
      new Reassembler({ logger: silentLogger })
    );
    assert.strictEqual(stats.files, 2);
    assert.strictEqual(stats.records, 3);
    assert.strictEqual(stats.rejected.length, 1);
    assert.strictEqual(reassembler.status('notes.txt'), 'complete');
  });
});

describe('ingestSymbols', () => {
  let dumpPath: string;

  beforeEach(async () => {
    const notes = await generate();
    const notesTexts = await Promise.all(notes.files.map((file) => readFile(file, 'utf-8')));

    const partialSource = join(root, 'partial.txt');
    await writeFile(partialSource, 'x\ny\n');
    const partial = await generate({ sourcePath: partialSource, maxChunkBytes: 2 });
    const partialFirst = await readFile(partial.files[0], 'utf-8');

    // Scanner order is arbitrary
    dumpPath = join(root, 'scan-dump.log');
    await writeFile(
      dumpPath,
      [notesTexts[2], partialFirst, notesTexts[0], notesTexts[1]].join('\n') + '\n'
    );
  });

  it('should save complete files as chunk files and report the rest', async () => {
    const completed: string[] = [];
    const result = await ingestSymbols(
      [dumpPath],
      new TextDumpDecoder(),
      { outputDir, crypto: engine, logger: silentLogger },
      { onFileComplete: (filename) => completed.push(filename) }
    );

    assert.deepStrictEqual(result.stats, {
      sourcesProcessed: 1,
      symbolsFound: 4,
      validRecords: 4,
      errors: 0,
    });
    assert.deepStrictEqual(result.complete, ['notes.txt']);
    assert.deepStrictEqual(completed, ['notes.txt']);
    assert.deepStrictEqual(result.incomplete, [{ filename: 'partial.txt', total: 2, missing: [2] }]);
    assert.strictEqual(result.reconstruction, undefined);
    assert.deepStrictEqual((await readdir(outputDir)).sort(), [
      'notes_chunk_001.txt',
      'notes_chunk_002.txt',
      'notes_chunk_003.txt',
      'scan_report.json',
    ]);

    const report: unknown = JSON.parse(await readFile(result.reportPath, 'utf-8'));
    assert.ok(typeof report === 'object' && report !== null);
    assert.deepStrictEqual(
      'filesFound' in report ? report.filesFound : undefined,
      { 'notes.txt': { totalParts: 3, parts: [1, 2, 3], estimatedSize: 15 } }
    );
    assert.deepStrictEqual(
      'incompleteFiles' in report ? report.incompleteFiles : undefined,
      { 'partial.txt': { totalParts: 2, missing: [2] } }
    );
  });

  it('should write chunk files that rebuild to the original', async () => {
    await ingestSymbols([dumpPath], new TextDumpDecoder(), {
      outputDir,
      crypto: engine,
      logger: silentLogger,
    });

    const rebuiltDir = join(root, 'rebuilt');
    const summary = await rebuildTransfer({
      chunkDir: outputDir,
      outputDir: rebuiltDir,
      crypto: engine,
      logger: silentLogger,
    });
    assert.deepStrictEqual(summary.written, [join(rebuiltDir, 'notes.txt')]);
    assert.strictEqual(await readFile(join(rebuiltDir, 'notes.txt'), 'utf-8'), CONTENT);
  });

  it('should reconstruct complete files when asked', async () => {
    const result = await ingestSymbols([dumpPath], new TextDumpDecoder(), {
      outputDir,
      autoReconstruct: true,
      crypto: engine,
      logger: silentLogger,
    });

    assert.deepStrictEqual(result.reconstruction?.written, [join(outputDir, 'notes.txt')]);
    assert.strictEqual(await readFile(join(outputDir, 'notes.txt'), 'utf-8'), CONTENT);
  });

  it('should count a source that cannot be decoded and carry on', async () => {
    const failed: string[] = [];
    const missing = join(root, 'missing.log');
    const result = await ingestSymbols(
      [missing, dumpPath],
      new TextDumpDecoder(),
      { outputDir, crypto: engine, logger: silentLogger },
      { onSourceFailed: (source) => failed.push(source) }
    );

    assert.deepStrictEqual(failed, [missing]);
    assert.strictEqual(result.stats.sourcesProcessed, 1);
    assert.strictEqual(result.stats.errors, 1);
    assert.deepStrictEqual(result.complete, ['notes.txt']);
  });

  it('should take symbols from any decoder', async () => {
    const text = await readFile(dumpPath, 'utf-8');
    const decoder: SymbolDecoder = {
      decodeSymbols: async () => ['http://example.test/menu', ...splitRecords(text)],
    };
    const result = await ingestSymbols(['photo.jpg'], decoder, {
      outputDir,
      crypto: engine,
      logger: silentLogger,
    });

    assert.strictEqual(result.stats.errors, 1);
    assert.deepStrictEqual(result.complete, ['notes.txt']);
  });
});
