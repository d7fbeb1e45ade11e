import assert from 'node:assert';
import {suite, test} from 'node:test';
import {
  TokenStream,
  TokenType,
  describeToken,
  describeTokenType,
  type Token,
} from '../lib/lexer.js';
import {loc} from './utils.js';

const token = (type: TokenType, value: string): Token => ({
  type,
  value,
  loc: loc(1, 1, 1, 1 + value.length),
});

suite('TokenStream', () => {
  test('returns tokens in order, then a synthesized EOF', () => {
    const tokens: Token[] = [
      {type: TokenType.Name, value: 'x', loc: loc(1, 1, 1, 2)},
      {type: TokenType.Colon, value: ':', loc: loc(1, 2, 1, 3)},
    ];
    const stream = new TokenStream(tokens);

    assert.strictEqual(stream.next(), tokens[0]);
    assert.strictEqual(stream.next(), tokens[1]);
    const eof = stream.next();
    assert.strictEqual(eof.type, TokenType.EOF);
    assert.deepStrictEqual(eof.loc, loc(1, 3, 1, 3));
    assert.strictEqual(stream.next().type, TokenType.EOF);
  });

  test('places EOF at 1:1 for an empty list', () => {
    const eof = new TokenStream([]).next();
    assert.strictEqual(eof.type, TokenType.EOF);
    assert.deepStrictEqual(eof.loc, loc(1, 1, 1, 1));
  });

  test('keeps returning a trailing EOF token', () => {
    const end: Token = {type: TokenType.EOF, value: '', loc: loc(2, 4, 2, 4)};
    const stream = new TokenStream([token(TokenType.Name, 'x'), end]);
    stream.next();
    assert.strictEqual(stream.next(), end);
    assert.strictEqual(stream.next(), end);
  });
});

suite('describeToken', () => {
  test('describes names and numbers with their text', () => {
    assert.strictEqual(describeToken(token(TokenType.Name, 'foo')), "name 'foo'");
    assert.strictEqual(describeToken(token(TokenType.Number, '42')), 'number 42');
  });

  test('describes layout tokens by kind', () => {
    assert.strictEqual(describeToken(token(TokenType.Indent, '')), 'indent');
    assert.strictEqual(describeToken(token(TokenType.Dedent, '')), 'dedent');
    assert.strictEqual(describeToken(token(TokenType.EOF, '')), 'end of file');
    assert.strictEqual(
      describeToken(token(TokenType.TripleQuoted, 'Doc.')),
      'docstring',
    );
  });

  test('quotes keywords and punctuation', () => {
    assert.strictEqual(describeToken(token(TokenType.Colon, ':')), "':'");
    assert.strictEqual(describeToken(token(TokenType.Class, 'class')), "'class'");
  });
});

suite('describeTokenType', () => {
  test('uses the source text where there is one', () => {
    assert.strictEqual(describeTokenType(TokenType.Def), "'def'");
    assert.strictEqual(describeTokenType(TokenType.Arrow), "'->'");
    assert.strictEqual(describeTokenType(TokenType.ExternalCode), "'EXTERNAL'");
  });

  test('names token classes without fixed text', () => {
    assert.strictEqual(describeTokenType(TokenType.Name), 'name');
    assert.strictEqual(describeTokenType(TokenType.Number), 'number');
    assert.strictEqual(describeTokenType(TokenType.Indent), 'indent');
    assert.strictEqual(describeTokenType(TokenType.EOF), 'end of file');
  });
});
