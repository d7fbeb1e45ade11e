import assert from 'node:assert';
import {suite, test} from 'node:test';
import {appendList, extendList, startList} from '../lib/lists.js';

suite('Lists', () => {
  test('startList creates a single item list', () => {
    assert.deepStrictEqual(startList('a'), ['a']);
  });

  test('appendList adds to the end and returns the same list', () => {
    const list = startList(1);
    assert.strictEqual(appendList(list, 2), list);
    assert.deepStrictEqual(list, [1, 2]);
  });

  test('extendList keeps the order of both lists', () => {
    const list = [1, 2];
    assert.strictEqual(extendList(list, [3, 4]), list);
    assert.deepStrictEqual(list, [1, 2, 3, 4]);
    assert.deepStrictEqual(extendList(list, []), [1, 2, 3, 4]);
  });
});
