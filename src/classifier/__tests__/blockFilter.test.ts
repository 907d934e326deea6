import { describe, test, expect } from 'vitest';
import { filterDuplicateBlocks } from '../BlockFilter';
import { makeDrawing, makeText } from '../../test/factories';

describe('filterDuplicateBlocks', () => {
  test('keeps the larger of two stacked drawings', () => {
    const small = makeDrawing(1, [0, 0, 100, 100]);
    const large = makeDrawing(2, [0, 0, 100, 101]);
    const label = makeText(3, [0, 0, 100, 100], 'same box, other kind');
    const far = makeDrawing(4, [200, 200, 210, 210]);

    const { kept, removed } = filterDuplicateBlocks([small, large, label, far]);
    expect(kept).toEqual([large, label, far]);
    expect(removed).toEqual(new Map([[1, 2]]));
  });

  test('groups duplicates transitively', () => {
    const a = makeDrawing(1, [0, 0, 100, 100]);
    const b = makeDrawing(2, [0, 0, 100, 110]);
    const c = makeDrawing(3, [0, 0, 100, 130]);

    const { kept, removed } = filterDuplicateBlocks([a, b, c]);
    expect(kept).toEqual([c]);
    expect(removed).toEqual(new Map([[1, 3], [2, 3]]));
  });

  test('equal areas keep the first block', () => {
    const first = makeDrawing(5, [0, 0, 10, 10]);
    const second = makeDrawing(6, [0, 0, 10, 10]);
    expect(filterDuplicateBlocks([first, second]).removed).toEqual(new Map([[6, 5]]));
  });

  test('respects the threshold', () => {
    const a = makeDrawing(1, [0, 0, 100, 100]);
    const b = makeDrawing(2, [0, 0, 100, 110]);
    expect(filterDuplicateBlocks([a, b], 0.95).removed.size).toBe(0);
  });
});
