/**
 * Symbol Types
 */

import type { ERROR_CORRECTION_LEVELS } from '../../utils/constants.js';

export type ErrorCorrectionLevel = (typeof ERROR_CORRECTION_LEVELS)[number];

export interface SymbolOptions {
  /** Pixels per module */
  boxSize: number;
  /** Quiet zone width in modules */
  border: number;
  errorCorrectionLevel: ErrorCorrectionLevel;
}

/**
 * Renders one record into an image an optical scanner can read back
 */
export interface SymbolEncoder {
  /** File extension of the produced images, with the leading dot */
  readonly extension: string;
  encodeSymbol(payload: string, options: SymbolOptions): Promise<Uint8Array>;
}

/**
 * Recovers record payload strings from a scanned source (an image, a dump of
 * a scanner app's history, ...). A source may hold zero or more symbols; the
 * order of the returned strings carries no meaning.
 */
export interface SymbolDecoder {
  decodeSymbols(source: string): Promise<string[]>;
}
