import { describe, it, expect } from 'vitest';
import { buildLinesFromItems, groupRows, toTextItems, type TextItem } from '@bankstmt/pdf-extract';

function item(str: string, x: number, y: number, width = str.length * 5, height = 10): TextItem {
  return { str, x, y, width, height, page: 1 };
}

describe('toTextItems', () => {
  it('should read position from the transform matrix', () => {
    const items = toTextItems([{ str: ' HSBC ', transform: [12, 0, 0, 12, 72, 700], width: 30, height: 12 }], 2);

    expect(items).toEqual([{ str: 'HSBC', x: 72, y: 700, width: 30, height: 12, page: 2 }]);
  });

  it('should skip marked-content entries and blank runs', () => {
    const items = toTextItems(
      [{ type: 'beginMarkedContent' }, { str: '   ', transform: [1, 0, 0, 1, 0, 0] }, { str: 'ok', transform: [1, 0, 0, 1, 5, 6], width: 8, height: 9 }],
      1
    );

    expect(items.map((entry) => entry.str)).toEqual(['ok']);
  });

  it('should estimate size from the transform when pdfjs gives none', () => {
    const items = toTextItems([{ str: 'abcd', transform: [10, 0, 0, 10, 5, 6] }], 1);

    expect(items).toEqual([{ str: 'abcd', x: 5, y: 6, width: 24, height: 10, page: 1 }]);
  });
});

describe('buildLinesFromItems', () => {
  it('should return no lines for no items', () => {
    expect(buildLinesFromItems([])).toEqual([]);
  });

  it('should order rows top to bottom and items left to right', () => {
    const lines = buildLinesFromItems([
      item('second', 40, 700),
      item('world', 70, 720),
      item('hello', 40, 720),
    ]);

    expect(lines).toEqual(['hello world', 'second']);
  });

  it('should treat items within the row tolerance as one row', () => {
    const lines = buildLinesFromItems([item('left', 40, 500), item('right', 64, 501.5)]);

    expect(lines).toEqual(['left right']);
  });

  it('should join touching runs without a space', () => {
    // "HS" ends at x=50, "BC" starts at 51
    const lines = buildLinesFromItems([item('HS', 40, 500), item('BC', 51, 500)]);

    expect(lines).toEqual(['HSBC']);
  });

  it('should separate wide column gaps with a tab', () => {
    const lines = buildLinesFromItems([item('01/03/2024', 40, 500), item('100.00', 300, 500)]);

    expect(lines).toEqual(['01/03/2024\t100.00']);
  });
});

describe('groupRows', () => {
  it('should keep table columns as separate cells', () => {
    const rows = groupRows([
      item('2024-01-05', 40, 500),
      item('REFUND', 120, 500),
      item('ORDER', 155, 500),
      item('12.50', 185, 500),
      item('5.00', 300, 500),
      item('1,005.00', 400, 500),
    ]);

    expect(rows).toEqual([{ y: 500, cells: ['2024-01-05', 'REFUND ORDER 12.50', '5.00', '1,005.00'] }]);
  });

  it('should scale gaps with the font height', () => {
    // A 30 unit gap is a column break in 10 unit print but a word gap in 20 unit print
    const small = groupRows([item('a', 0, 500, 5), item('b', 35, 500, 5)]);
    const large = groupRows([item('a', 0, 500, 5, 20), item('b', 35, 500, 5, 20)]);

    expect(small[0]?.cells).toEqual(['a', 'b']);
    expect(large[0]?.cells).toEqual(['a b']);
  });

  it('should widen the row tolerance for large print', () => {
    const rows = groupRows([item('left', 40, 500, 20, 20), item('right', 70, 503.5, 25, 20)]);

    expect(rows.map((row) => row.cells)).toEqual([['left right']]);
  });
});
