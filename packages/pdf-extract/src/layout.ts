/**
 * Page text as rows of cells.
 *
 * pdfjs hands out positioned text runs, not lines. Runs whose baselines sit
 * within a fraction of the font height form one row; along a row, runs
 * close together form one cell and a wide gap starts the next cell. All
 * distances scale with the font height, so the same rules hold for small
 * and large print.
 */

export interface TextItem {
  str: string;
  /** Left edge in PDF units */
  x: number;
  /** Baseline in PDF units, origin bottom-left */
  y: number;
  width: number;
  height: number;
  /** 1-based */
  page: number;
}

export interface TextRow {
  y: number;
  cells: string[];
}

// Multiples of the font height
const ROW_TOLERANCE = 0.2;
const WORD_GAP = 0.25;
const COLUMN_GAP = 1.8;

const DEFAULT_FONT_HEIGHT = 12;
const AVERAGE_GLYPH_WIDTH = 0.6;

interface PdfjsTextRun {
  str: string;
  transform: unknown[];
  width?: unknown;
  height?: unknown;
}

function isTextRun(item: unknown): item is PdfjsTextRun {
  return (
    typeof item === 'object' &&
    item !== null &&
    'str' in item &&
    typeof item.str === 'string' &&
    'transform' in item &&
    Array.isArray(item.transform)
  );
}

function positive(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) && value !== 0 ? Math.abs(value) : undefined;
}

function coordinate(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

/**
 * Positioned text items of one page. Marked-content markers and blank runs
 * are dropped.
 */
export function toTextItems(contentItems: readonly unknown[], pageNumber: number): TextItem[] {
  return contentItems.flatMap((item): TextItem[] => {
    if (!isTextRun(item)) return [];
    const str = item.str.trim();
    if (str.length === 0) return [];

    // [scaleX, skewY, skewX, scaleY, translateX, translateY]
    const [scaleX, , , scaleY, translateX, translateY] = item.transform;
    const height = positive(item.height) ?? positive(scaleY) ?? DEFAULT_FONT_HEIGHT;
    const width = positive(item.width) ?? (positive(scaleX) ?? 1) * str.length * AVERAGE_GLYPH_WIDTH;

    return [{ str, x: coordinate(translateX), y: coordinate(translateY), width, height, page: pageNumber }];
  });
}

function rowCells(row: readonly TextItem[]): string[] {
  const cells: string[] = [];
  let cell = '';
  let previous: TextItem | undefined;

  for (const item of row) {
    if (previous !== undefined) {
      const gap = item.x - (previous.x + previous.width);
      const scale = Math.max(previous.height, item.height);
      if (gap > scale * COLUMN_GAP) {
        cells.push(cell);
        cell = '';
      } else if (gap > scale * WORD_GAP) {
        cell += ' ';
      }
    }
    cell += item.str;
    previous = item;
  }
  cells.push(cell);

  return cells.map((text) => text.trim()).filter((text) => text.length > 0);
}

/** Rows top to bottom, cells left to right. */
export function groupRows(items: readonly TextItem[]): TextRow[] {
  const sorted = [...items].sort((a, b) => b.y - a.y || a.x - b.x);
  const rows: TextItem[][] = [];

  for (const item of sorted) {
    const row = rows[rows.length - 1];
    const anchor = row?.[0];
    if (row !== undefined && anchor !== undefined) {
      const tolerance = Math.max(anchor.height, item.height) * ROW_TOLERANCE;
      if (Math.abs(anchor.y - item.y) <= tolerance) {
        row.push(item);
        continue;
      }
    }
    rows.push([item]);
  }

  return rows
    .map((row) => {
      row.sort((a, b) => a.x - b.x);
      return { y: row[0]?.y ?? 0, cells: rowCells(row) };
    })
    .filter((row) => row.cells.length > 0);
}

/** One line per row, cells separated by a tab. */
export function buildLinesFromItems(items: readonly TextItem[]): string[] {
  return groupRows(items).map((row) => row.cells.join('\t'));
}
