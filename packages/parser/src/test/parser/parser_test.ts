import assert from 'node:assert';
import {suite, test} from 'node:test';
import {NodeType, printType} from '../../lib/ast.js';
import {DiagnosticCode} from '../../lib/diagnostics.js';
import {expectNode, loc, parseFailure, parseStub} from '../utils.js';

suite('Parser', () => {
  test('should parse a function with a return type', () => {
    const unit = parseStub('def f() -> int: ...');

    assert.strictEqual(unit.type, NodeType.Unit);
    assert.strictEqual(unit.body.length, 1);
    const fn = expectNode(unit.body[0], NodeType.FuncDef);
    assert.strictEqual(fn.name, 'f');
    assert.deepStrictEqual(fn.params, []);
    assert.deepStrictEqual(fn.decorators, []);
    assert.deepStrictEqual(fn.raises, []);
    assert.strictEqual(fn.body, 'ellipsis');
    assert.strictEqual(fn.acceptsExtraArgs, false);
    const returnType = expectNode(fn.returnType, NodeType.NamedType);
    assert.strictEqual(returnType.name, 'int');
  });

  test('should resolve a class name used inside its own body', () => {
    const unit = parseStub(`
      class A:
          def m(self) -> A: ...
    `);

    const cls = expectNode(unit.body[0], NodeType.ClassDef);
    assert.strictEqual(cls.name, 'A');
    const method = expectNode(cls.body[0], NodeType.FuncDef);
    assert.strictEqual(method.params[0].name, 'self');
    assert.strictEqual(method.params[0].paramType, undefined);
    const returnType = expectNode(method.returnType, NodeType.ClassType);
    assert.strictEqual(returnType.name, 'A');
  });

  test('should keep the branch selected by the target version', () => {
    const source = `
      if sys.version_info >= (3, 8):
          x: int
      else:
          x: str
    `;

    const newer = parseStub(source, {targetVersion: [3, 8]});
    assert.strictEqual(newer.body.length, 1);
    const x = expectNode(newer.body[0], NodeType.Constant);
    assert.strictEqual(x.name, 'x');
    assert.strictEqual(printType(x.valueType), 'int');

    const older = parseStub(source, {targetVersion: [2, 7]});
    assert.strictEqual(older.body.length, 1);
    const y = expectNode(older.body[0], NodeType.Constant);
    assert.strictEqual(printType(y.valueType), 'str');
  });

  test('should nest unions to the left', () => {
    const unit = parseStub('X = int or str or None');

    const alias = expectNode(unit.body[0], NodeType.Alias);
    const outer = expectNode(alias.target, NodeType.UnionType);
    const inner = expectNode(outer.left, NodeType.UnionType);
    assert.strictEqual(expectNode(inner.left, NodeType.NamedType).name, 'int');
    assert.strictEqual(expectNode(inner.right, NodeType.NamedType).name, 'str');
    assert.strictEqual(expectNode(outer.right, NodeType.NamedType).name, 'None');
    assert.strictEqual(printType(alias.target), 'int or str or None');
  });

  test('should not depend on the order of disjoint branches', () => {
    const forward = `
      if sys.version_info >= (3,):
          x: int
      elif sys.version_info < (3,):
          x: str
    `;
    const backward = `
      if sys.version_info < (3,):
          x: str
      elif sys.version_info >= (3,):
          x: int
    `;

    for (const targetVersion of [[2, 7], [3, 6]]) {
      const a = expectNode(
        parseStub(forward, {targetVersion}).body[0],
        NodeType.Constant,
      );
      const b = expectNode(
        parseStub(backward, {targetVersion}).body[0],
        NodeType.Constant,
      );
      assert.strictEqual(printType(a.valueType), printType(b.valueType));
    }
  });

  test('should report a missing parameter at the offending token', () => {
    const error = parseFailure('def f(: ...');

    assert.strictEqual(error.code, DiagnosticCode.UnexpectedToken);
    assert.strictEqual(error.message, "Unexpected ':', expected a parameter.");
    assert.deepStrictEqual(error.location, loc(1, 7, 1, 8));
  });

  test('should keep duplicate declarations in source order', () => {
    const unit = parseStub(`
      x: int
      x: str
      def f(a: int) -> int: ...
      def f(a: str) -> str: ...
    `);

    assert.deepStrictEqual(
      unit.body.map((d) => d.type),
      [
        NodeType.Constant,
        NodeType.Constant,
        NodeType.FuncDef,
        NodeType.FuncDef,
      ],
    );
    const first = expectNode(unit.body[0], NodeType.Constant);
    const second = expectNode(unit.body[1], NodeType.Constant);
    assert.strictEqual(printType(first.valueType), 'int');
    assert.strictEqual(printType(second.valueType), 'str');
    const overload = expectNode(unit.body[3], NodeType.FuncDef);
    assert.strictEqual(printType(overload.returnType), 'str');
  });

  test('should parse an empty unit', () => {
    const unit = parseStub('');
    assert.deepStrictEqual(unit.body, []);
    assert.strictEqual(unit.docstring, undefined);
  });

  test('should read the module docstring', () => {
    const unit = parseStub(`
      """Module docs."""
      x: int
    `);
    assert.strictEqual(unit.docstring, 'Module docs.');
    assert.strictEqual(unit.body.length, 1);
  });
});
