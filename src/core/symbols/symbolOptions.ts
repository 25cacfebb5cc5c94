import type { SymbolOptions } from './symbol.types.js';
import {
  DEFAULT_BORDER,
  DEFAULT_BOX_SIZE,
  DEFAULT_ERROR_CORRECTION,
} from '../../utils/constants.js';

export function defaultSymbolOptions(): SymbolOptions {
  return {
    boxSize: DEFAULT_BOX_SIZE,
    border: DEFAULT_BORDER,
    errorCorrectionLevel: DEFAULT_ERROR_CORRECTION,
  };
}
