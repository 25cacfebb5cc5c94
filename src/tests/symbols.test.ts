import { describe, it } from 'node:test';
import assert from 'node:assert';
import { defaultSymbolOptions, QrImageEncoder } from '../core/symbols/index.js';
import { InputError } from '../utils/errors.js';

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

describe('QR image encoder', () => {
  it('should render a record as a PNG', async () => {
    const encoder = new QrImageEncoder();
    const image = await encoder.encodeSymbol(
      '--BEGIN part_01_of_01 file: a.txt--\nx\n--END part_01--',
      defaultSymbolOptions()
    );

    assert.strictEqual(encoder.extension, '.png');
    assert.deepStrictEqual([...image.subarray(0, 8)], PNG_SIGNATURE);
  });

  it('should scale the image with the box size', async () => {
    const encoder = new QrImageEncoder();
    const small = await encoder.encodeSymbol('hello', { ...defaultSymbolOptions(), boxSize: 2 });
    const large = await encoder.encodeSymbol('hello', { ...defaultSymbolOptions(), boxSize: 8 });

    // IHDR width sits at bytes 16-19
    const width = (png: Uint8Array): number => Buffer.from(png).readUInt32BE(16);
    assert.strictEqual(width(large), width(small) * 4);
  });

  it('should fail with an input error when the record does not fit', async () => {
    const encoder = new QrImageEncoder();
    await assert.rejects(
      encoder.encodeSymbol('a'.repeat(2000), { ...defaultSymbolOptions(), errorCorrectionLevel: 'H' }),
      (error: unknown) => {
        assert.ok(error instanceof InputError);
        assert.strictEqual(
          error.message,
          'Cannot render a 2000-byte record as a QR code at error correction H'
        );
        return true;
      }
    );
  });
});
