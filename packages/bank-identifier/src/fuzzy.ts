/**
 * Fuzzy partial matching of a keyword against statement text.
 *
 * The similarity of two strings is 2·LCS / (|a| + |b|), where LCS is the
 * length of their longest common subsequence (the indel-distance ratio).
 * The partial score slides a window the length of the shorter string over
 * the longer one and keeps the best window, scaled to 0–100.
 */

/**
 * Length of the longest common subsequence of two strings.
 */
export function lcsLength(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;

  let prevRow = new Array<number>(b.length + 1).fill(0);
  let currentRow = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      if (a.charAt(i - 1) === b.charAt(j - 1)) {
        currentRow[j] = (prevRow[j - 1] ?? 0) + 1;
      } else {
        currentRow[j] = Math.max(prevRow[j] ?? 0, currentRow[j - 1] ?? 0);
      }
    }
    [prevRow, currentRow] = [currentRow, prevRow];
  }

  return prevRow[b.length] ?? 0;
}

/**
 * Similarity of two whole strings, 0–1.
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * lcsLength(a, b)) / total;
}

function countChars(text: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    counts.set(ch, (counts.get(ch) ?? 0) + 1);
  }
  return counts;
}

/**
 * Best-aligned substring similarity of two strings, 0–100.
 * Either string empty scores 0.
 */
export function partialRatio(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;

  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
  const m = shorter.length;

  const wanted = countChars(shorter);
  const inWindow = new Map<string, number>();
  // Characters the window shares with `shorter`, counted with multiplicity;
  // an upper bound on the window's LCS
  let overlap = 0;

  const add = (ch: string): void => {
    const count = (inWindow.get(ch) ?? 0) + 1;
    inWindow.set(ch, count);
    if (count <= (wanted.get(ch) ?? 0)) overlap++;
  };
  const remove = (ch: string): void => {
    const count = inWindow.get(ch) ?? 0;
    if (count <= (wanted.get(ch) ?? 0)) overlap--;
    inWindow.set(ch, count - 1);
  };

  for (let i = 0; i < m; i++) {
    add(longer.charAt(i));
  }

  let best = 0;
  for (let start = 0; start + m <= longer.length; start++) {
    if (start > 0) {
      remove(longer.charAt(start - 1));
      add(longer.charAt(start + m - 1));
    }
    if (overlap <= best) continue;

    best = Math.max(best, lcsLength(shorter, longer.slice(start, start + m)));
    if (best === m) break;
  }

  return Math.round((100 * best) / m);
}
