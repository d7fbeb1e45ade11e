export const version = '0.1.0';
export * from './lexer.js';
export * from './ast.js';
export * from './lists.js';
export * from './conditions.js';
export * from './context.js';
export * from './parser.js';
export * from './options.js';
export * from './diagnostics.js';

import type {Unit} from './ast.js';
import {ParseError} from './diagnostics.js';
import type {Lexer} from './lexer.js';
import type {ParserOptions} from './options.js';
import {Parser} from './parser.js';

export type ParseResult = {ok: true; unit: Unit} | {ok: false; error: ParseError};

/**
 * Parses one stub file. Returns the unit, or the single error that stopped
 * the parse. Errors other than `ParseError` (a misbehaving lexer, invalid
 * options) are thrown.
 */
export function parse(lexer: Lexer, options?: ParserOptions): ParseResult {
  try {
    return {ok: true, unit: new Parser(lexer, options).parse()};
  } catch (e) {
    if (e instanceof ParseError) {
      return {ok: false, error: e};
    }
    throw e;
  }
}
