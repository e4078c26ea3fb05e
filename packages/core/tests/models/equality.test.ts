import { describe, expect, it } from 'vitest';
import { UpDocument } from '../../src/models/document.js';
import { documentsEqual, nodesEqual, valuesEqual } from '../../src/models/equality.js';
import { node } from '../../src/models/node.js';
import { block, list, multiline, scalar, table } from '../../src/models/value.js';

describe('structural equality', () => {
  it('compares scalars and multiline strings by kind and text', () => {
    expect(valuesEqual(scalar('a'), scalar('a'))).toBe(true);
    expect(valuesEqual(scalar('a'), multiline('a'))).toBe(false);
    expect(valuesEqual(multiline('a\nb'), multiline('a\nb'))).toBe(true);
  });

  it('compares nested containers deeply and in order', () => {
    const a = block([node('x', list([scalar('1'), block([node('y', scalar('2'))])]))]);
    const b = block([node('x', list([scalar('1'), block([node('y', scalar('2'))])]))]);
    const reordered = list([block([node('y', scalar('2'))]), scalar('1')]);

    expect(valuesEqual(a, b)).toBe(true);
    expect(valuesEqual(list([scalar('1'), block([node('y', scalar('2'))])]), reordered)).toBe(false);
  });

  it('compares annotations', () => {
    expect(nodesEqual(node('a', scalar('1'), 'int'), node('a', scalar('1')))).toBe(false);
  });

  it('compares table columns and rows', () => {
    const t = table(['a', 'b'], [['1', '2']]);

    expect(valuesEqual(t, table(['a', 'b'], [['1', '2']]))).toBe(true);
    expect(valuesEqual(t, table(['b', 'a'], [['2', '1']]))).toBe(false);
    expect(valuesEqual(t, table(['a', 'b'], [['1', '3']]))).toBe(false);
  });

  it('compares documents node by node', () => {
    const left = new UpDocument([node('a', scalar('1')), node('a', scalar('2'))]);

    expect(documentsEqual(left, new UpDocument([...left.nodes]))).toBe(true);
    expect(documentsEqual(left, new UpDocument([node('a', scalar('1'))]))).toBe(false);
  });
});
