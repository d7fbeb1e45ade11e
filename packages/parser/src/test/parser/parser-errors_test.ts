import assert from 'node:assert';
import {suite, test} from 'node:test';
import {DiagnosticCode, DiagnosticSeverity} from '../../lib/diagnostics.js';
import {Parser} from '../../lib/parser.js';
import {lex} from '../stub-scanner.js';
import {loc, parseFailure} from '../utils.js';

suite('Parser - Errors', () => {
  test('should pass lexical errors through verbatim', () => {
    const error = parseFailure('x: $');
    assert.strictEqual(error.code, DiagnosticCode.LexicalError);
    assert.strictEqual(error.message, "Illegal character '$'");
    assert.deepStrictEqual(error.location, loc(1, 4, 1, 5));
  });

  test('should report a lexical error in the first token', () => {
    const error = parseFailure('$');
    assert.strictEqual(error.code, DiagnosticCode.LexicalError);
    assert.deepStrictEqual(error.location, loc(1, 1, 1, 2));
  });

  test('should report an unexpected token at top level', () => {
    const error = parseFailure('-> int');
    assert.strictEqual(error.code, DiagnosticCode.UnexpectedToken);
    assert.strictEqual(error.message, "Unexpected '->', expected a declaration.");
    assert.deepStrictEqual(error.location, loc(1, 1, 1, 3));
  });

  test('should report the expected token', () => {
    const error = parseFailure('class A pass');
    assert.strictEqual(error.code, DiagnosticCode.ExpectedToken);
    assert.strictEqual(error.message, "Unexpected 'pass', expected ':'.");
    assert.deepStrictEqual(error.location, loc(1, 9, 1, 13));
  });

  test('should report an unexpected end of file', () => {
    const error = parseFailure('def f(');
    assert.strictEqual(
      error.message,
      'Unexpected end of file, expected a parameter.',
    );
    assert.deepStrictEqual(error.location, loc(1, 7, 1, 7));
  });

  test('should describe names in messages', () => {
    const error = parseFailure('x: int\ny str');
    assert.strictEqual(error.code, DiagnosticCode.ExpectedToken);
    assert.strictEqual(error.message, "Unexpected name 'str', expected '='.");
    assert.deepStrictEqual(error.location, loc(2, 3, 2, 6));
  });

  test('should convert to a diagnostic', () => {
    const error = parseFailure('def f(: ...');
    assert.deepStrictEqual(error.toDiagnostic(), {
      code: DiagnosticCode.UnexpectedToken,
      message: "Unexpected ':', expected a parameter.",
      severity: DiagnosticSeverity.Error,
      location: loc(1, 7, 1, 8),
    });
  });

  test('should report deeply nested input as a parse error', () => {
    const depth = 50000;
    const error = parseFailure(
      'X = ' + '('.repeat(depth) + 'int' + ')'.repeat(depth),
    );
    assert.strictEqual(error.code, DiagnosticCode.NestingTooDeep);
    assert.strictEqual(error.message, 'Input is nested too deeply.');
  });

  test('should only parse once', () => {
    const parser = new Parser(lex('x: int'));
    parser.parse();
    assert.throws(() => parser.parse(), {
      message: 'Parser instances can only parse once.',
    });
  });
});
