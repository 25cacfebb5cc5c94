/**
 * Symbols Module
 * Boundary to whatever renders records as codes and turns scans back into text
 */

export { TextDumpDecoder } from './textDumpDecoder.js';
export { QrImageEncoder } from './qrImageEncoder.js';
export { defaultSymbolOptions } from './symbolOptions.js';
export type {
  ErrorCorrectionLevel,
  SymbolDecoder,
  SymbolEncoder,
  SymbolOptions,
} from './symbol.types.js';
