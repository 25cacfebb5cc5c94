import { readFile } from 'fs/promises';
import type { SymbolDecoder } from './symbol.types.js';
import { splitRecords } from '../codec/recordParser.js';
import { InputError } from '../../utils/errors.js';

/**
 * Reads text exported by a scanner app, where each decoded symbol was
 * appended as-is, and splits it back into one string per record
 */
export class TextDumpDecoder implements SymbolDecoder {
  async decodeSymbols(source: string): Promise<string[]> {
    let dump: string;
    try {
      dump = await readFile(source, 'utf-8');
    } catch (error) {
      throw new InputError(`Cannot read scan dump ${source}`, { cause: error });
    }
    return splitRecords(dump);
  }
}
