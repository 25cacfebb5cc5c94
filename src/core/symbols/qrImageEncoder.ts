import QRCode from 'qrcode';
import type { SymbolEncoder, SymbolOptions } from './symbol.types.js';
import { InputError } from '../../utils/errors.js';

/**
 * Renders records as PNG QR codes. `boxSize` maps to the pixel scale and
 * `border` to the quiet-zone margin.
 */
export class QrImageEncoder implements SymbolEncoder {
  readonly extension = '.png';

  async encodeSymbol(payload: string, options: SymbolOptions): Promise<Uint8Array> {
    try {
      return await QRCode.toBuffer(payload, {
        type: 'png',
        errorCorrectionLevel: options.errorCorrectionLevel,
        scale: options.boxSize,
        margin: options.border,
      });
    } catch (error) {
      throw new InputError(
        `Cannot render a ${Buffer.byteLength(payload, 'utf8')}-byte record as a QR code ` +
          `at error correction ${options.errorCorrectionLevel}`,
        { cause: error }
      );
    }
  }
}
