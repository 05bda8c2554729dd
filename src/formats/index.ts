import type { FormatWriters } from './types.js';
import { writeAst, writeTypedAst } from './writeAst.js';
import { writeBytecode } from './writeBytecode.js';
import { writeIr } from './writeIr.js';
import { writeSymbols } from './writeSymbols.js';
import { writeTokens } from './writeTokens.js';

/**
 * Default in-memory artifact writers.
 *
 * These writers implement the `FormatWriters` contract and return artifacts without writing to disk.
 */
export const defaultFormatWriters: FormatWriters = {
  writeTokens,
  writeAst,
  writeTypedAst,
  writeSymbols,
  writeIr,
  writeBytecode,
};
