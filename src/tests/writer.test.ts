import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { resolveOutputPath, writeReconstructedFile } from '../core/reassembly/index.js';
import { writeFileAtomic } from '../utils/files.js';
import { InputError, OutputExistsError } from '../utils/errors.js';

describe('Reconstructed file writer', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'airgap-writer-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write content to a new file', async () => {
    const target = join(dir, 'out.txt');
    await writeReconstructedFile(target, 'hello\n');
    assert.strictEqual(await readFile(target, 'utf-8'), 'hello\n');
  });

  it('should refuse to replace an existing file', async () => {
    const target = join(dir, 'out.txt');
    await writeFile(target, 'original');

    await assert.rejects(writeReconstructedFile(target, 'new'), (error: unknown) => {
      assert.ok(error instanceof OutputExistsError);
      assert.strictEqual(error.message, `Output file already exists: ${target}`);
      return true;
    });
    assert.strictEqual(await readFile(target, 'utf-8'), 'original');
  });

  it('should replace an existing file when overwrite is set', async () => {
    const target = join(dir, 'out.txt');
    await writeFile(target, 'original');

    await writeReconstructedFile(target, 'new', { overwrite: true });
    assert.strictEqual(await readFile(target, 'utf-8'), 'new');
  });

  it('should create missing directories and leave no temporary files', async () => {
    const target = join(dir, 'nested', 'deeper', 'out.txt');
    await writeFileAtomic(target, 'data');

    assert.deepStrictEqual(await readdir(join(dir, 'nested', 'deeper')), ['out.txt']);
  });
});

describe('Output path resolution', () => {
  it('should keep only the final name component', () => {
    assert.strictEqual(resolveOutputPath('/out', 'notes.txt'), join('/out', 'notes.txt'));
    assert.strictEqual(resolveOutputPath('/out', '../../etc/passwd'), join('/out', 'passwd'));
    assert.strictEqual(resolveOutputPath('/out', 'C:\\Users\\me\\a.txt'), join('/out', 'a.txt'));
  });

  it('should reject names with no usable component', () => {
    assert.throws(() => resolveOutputPath('/out', '..'), InputError);
    assert.throws(() => resolveOutputPath('/out', ''), InputError);
  });
});
