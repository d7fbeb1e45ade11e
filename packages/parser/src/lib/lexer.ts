import type {SourceLocation} from './ast.js';

export const TokenType = {
  // Keywords
  Class: 'Class',
  Def: 'Def',
  Else: 'Else',
  Elif: 'Elif',
  If: 'If',
  Or: 'Or',
  Pass: 'Pass',
  Import: 'Import',
  From: 'From',
  As: 'As',
  Raise: 'Raise',
  Raises: 'Raises',
  ExternalCode: 'ExternalCode',
  Nothing: 'Nothing',
  NamedTuple: 'NamedTuple',
  TypeVar: 'TypeVar',

  // Identifiers & Literals
  Name: 'Name',
  Number: 'Number',
  TripleQuoted: 'TripleQuoted',
  TypeComment: 'TypeComment',

  // Operators
  Arrow: 'Arrow',
  ColonEquals: 'ColonEquals',
  Ellipsis: 'Ellipsis',
  Equals: 'Equals',
  EqualsEquals: 'EqualsEquals',
  BangEquals: 'BangEquals',
  Less: 'Less',
  LessEquals: 'LessEquals',
  Greater: 'Greater',
  GreaterEquals: 'GreaterEquals',
  Star: 'Star',

  // Punctuation
  LParen: 'LParen',
  RParen: 'RParen',
  LBracket: 'LBracket',
  RBracket: 'RBracket',
  Colon: 'Colon',
  Comma: 'Comma',
  Dot: 'Dot',
  At: 'At',
  Question: 'Question',

  // Block structure
  Indent: 'Indent',
  Dedent: 'Dedent',

  LexError: 'LexError',
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TokenType)[keyof typeof TokenType];

export interface Token {
  type: TokenType;
  /**
   * Source text of the token. For `TripleQuoted` it is the string contents,
   * for `LexError` the lexer's diagnostic message. A `TypeComment` only marks
   * the start of a `# type:` comment; the type itself follows as ordinary
   * tokens.
   */
  value: string;
  loc: SourceLocation;
}

/**
 * Supplies tokens on demand. Implementations own indentation tracking and
 * must keep returning an `EOF` token once the input is exhausted.
 */
export interface Lexer {
  next(): Token;
}

/**
 * A `Lexer` over an already materialized token list. An `EOF` token is
 * synthesized at the end of the last token if the list does not end in one.
 */
export class TokenStream implements Lexer {
  #tokens: readonly Token[];
  #current = 0;

  constructor(tokens: readonly Token[]) {
    this.#tokens = tokens;
  }

  next(): Token {
    if (this.#current < this.#tokens.length) {
      return this.#tokens[this.#current++];
    }
    const last = this.#tokens[this.#tokens.length - 1];
    if (last?.type === TokenType.EOF) return last;
    const line = last ? last.loc.endLine : 1;
    const column = last ? last.loc.endColumn : 1;
    return {
      type: TokenType.EOF,
      value: '',
      loc: {line, column, endLine: line, endColumn: column},
    };
  }
}

const TOKEN_TEXT: Partial<Record<TokenType, string>> = {
  [TokenType.Class]: 'class',
  [TokenType.Def]: 'def',
  [TokenType.Else]: 'else',
  [TokenType.Elif]: 'elif',
  [TokenType.If]: 'if',
  [TokenType.Or]: 'or',
  [TokenType.Pass]: 'pass',
  [TokenType.Import]: 'import',
  [TokenType.From]: 'from',
  [TokenType.As]: 'as',
  [TokenType.Raise]: 'raise',
  [TokenType.Raises]: 'raises',
  [TokenType.ExternalCode]: 'EXTERNAL',
  [TokenType.Nothing]: 'nothing',
  [TokenType.NamedTuple]: 'NamedTuple',
  [TokenType.TypeVar]: 'TypeVar',
  [TokenType.Arrow]: '->',
  [TokenType.ColonEquals]: ':=',
  [TokenType.Ellipsis]: '...',
  [TokenType.Equals]: '=',
  [TokenType.EqualsEquals]: '==',
  [TokenType.BangEquals]: '!=',
  [TokenType.Less]: '<',
  [TokenType.LessEquals]: '<=',
  [TokenType.Greater]: '>',
  [TokenType.GreaterEquals]: '>=',
  [TokenType.Star]: '*',
  [TokenType.LParen]: '(',
  [TokenType.RParen]: ')',
  [TokenType.LBracket]: '[',
  [TokenType.RBracket]: ']',
  [TokenType.Colon]: ':',
  [TokenType.Comma]: ',',
  [TokenType.Dot]: '.',
  [TokenType.At]: '@',
  [TokenType.Question]: '?',
};

/**
 * Human readable form of a token type, used in "expected ..." messages.
 */
export const describeTokenType = (type: TokenType): string => {
  const text = TOKEN_TEXT[type];
  if (text !== undefined) return `'${text}'`;
  switch (type) {
    case TokenType.Name:
      return 'name';
    case TokenType.Number:
      return 'number';
    case TokenType.Indent:
      return 'indent';
    case TokenType.Dedent:
      return 'dedent';
    case TokenType.TripleQuoted:
      return 'docstring';
    case TokenType.TypeComment:
      return 'type comment';
    case TokenType.LexError:
      return 'lexical error';
    default:
      return 'end of file';
  }
};

/**
 * Human readable form of an actual token, used in "unexpected ..." messages.
 */
export const describeToken = (token: Token): string => {
  switch (token.type) {
    case TokenType.Name:
      return `name '${token.value}'`;
    case TokenType.Number:
      return `number ${token.value}`;
    case TokenType.Indent:
    case TokenType.Dedent:
    case TokenType.TripleQuoted:
    case TokenType.TypeComment:
    case TokenType.EOF:
      return describeTokenType(token.type);
    default:
      return `'${token.value}'`;
  }
};
