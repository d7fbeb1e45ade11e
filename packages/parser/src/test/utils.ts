import assert from 'node:assert';
import type {
  Declaration,
  KeywordParent,
  Mutator,
  Param,
  SourceLocation,
  TypeExpr,
  Unit,
} from '../lib/ast.js';
import type {ParseError} from '../lib/diagnostics.js';
import {parse} from '../lib/index.js';
import type {ParserOptions} from '../lib/options.js';
import {dedent, lex} from './stub-scanner.js';

type AnyNode = Declaration | TypeExpr | Param | Mutator | KeywordParent;

export const parseStub = (source: string, options?: ParserOptions): Unit => {
  const result = parse(lex(dedent(source)), options);
  if (!result.ok) {
    throw new assert.AssertionError({
      message: `Unexpected parse error: ${result.error.message}`,
    });
  }
  return result.unit;
};

export const parseFailure = (
  source: string,
  options?: ParserOptions,
): ParseError => {
  const result = parse(lex(dedent(source)), options);
  if (result.ok) {
    throw new assert.AssertionError({message: 'Expected the parse to fail.'});
  }
  return result.error;
};

const isNode = <K extends AnyNode['type']>(
  node: AnyNode,
  type: K,
): node is Extract<AnyNode, {type: K}> => node.type === type;

/** Asserts that `node` exists and has the given type, and narrows it. */
export function expectNode<K extends AnyNode['type']>(
  node: AnyNode | undefined,
  type: K,
): Extract<AnyNode, {type: K}> {
  if (node === undefined || !isNode(node, type)) {
    throw new assert.AssertionError({
      message: `Expected ${type}, got ${node?.type ?? 'nothing'}.`,
    });
  }
  return node;
}

export const loc = (
  line: number,
  column: number,
  endLine: number,
  endColumn: number,
): SourceLocation => ({line, column, endLine, endColumn});
