/**
 * Character-sequence similarity for subject and body comparison.
 *
 * ratio = 2 * LCS(a, b) / (|a| + |b|), over code points. Case and whitespace
 * are significant. Symmetric and reflexive; two empty strings score 1.
 */

export function lcsLength(a: readonly string[], b: readonly string[]): number {
  if (a.length === 0 || b.length === 0) return 0;
  const [short, long] = a.length <= b.length ? [a, b] : [b, a];

  let prev = new Uint32Array(short.length + 1);
  let curr = new Uint32Array(short.length + 1);
  for (const item of long) {
    for (let j = 1; j <= short.length; j++) {
      curr[j] = item === short[j - 1] ? prev[j - 1] + 1 : Math.max(prev[j], curr[j - 1]);
    }
    [prev, curr] = [curr, prev];
  }
  return prev[short.length];
}

export function similarity(a: string, b: string): number {
  const xs = Array.from(a);
  const ys = Array.from(b);
  const total = xs.length + ys.length;
  if (total === 0) return 1;
  return (2 * lcsLength(xs, ys)) / total;
}

/** Similarity of two optional texts: both null → 1, exactly one null → 0 */
export function nullableSimilarity(a: string | null, b: string | null): number {
  if (a === null && b === null) return 1;
  if (a === null || b === null) return 0;
  return similarity(a, b);
}

export type DiffLine = { op: 'equal' | 'delete' | 'insert'; text: string };

/** Line-level edit script from `a` to `b` along a longest common subsequence */
export function diffLines(a: string, b: string): DiffLine[] {
  const xs = a.split('\n');
  const ys = b.split('\n');

  // table[i][j] = LCS of xs[i..] and ys[j..]
  const table: number[][] = Array.from({ length: xs.length + 1 }, () => new Array<number>(ys.length + 1).fill(0));
  for (let i = xs.length - 1; i >= 0; i--) {
    for (let j = ys.length - 1; j >= 0; j--) {
      table[i][j] = xs[i] === ys[j] ? table[i + 1][j + 1] + 1 : Math.max(table[i + 1][j], table[i][j + 1]);
    }
  }

  const out: DiffLine[] = [];
  let i = 0;
  let j = 0;
  while (i < xs.length && j < ys.length) {
    if (xs[i] === ys[j]) {
      out.push({ op: 'equal', text: xs[i] });
      i++;
      j++;
    } else if (table[i + 1][j] >= table[i][j + 1]) {
      out.push({ op: 'delete', text: xs[i++] });
    } else {
      out.push({ op: 'insert', text: ys[j++] });
    }
  }
  while (i < xs.length) out.push({ op: 'delete', text: xs[i++] });
  while (j < ys.length) out.push({ op: 'insert', text: ys[j++] });
  return out;
}
