/**
 * Ratcliff/Obershelp string similarity: 2 * matched characters / total
 * characters, where matches are found by repeatedly taking the longest
 * common block and recursing on both sides of it.
 */

interface Block {
  i: number;
  j: number;
  size: number;
}

function indexPositions(b: string): Map<string, number[]> {
  const positions = new Map<string, number[]>();
  for (let j = 0; j < b.length; j++) {
    const list = positions.get(b[j]) ?? [];
    list.push(j);
    positions.set(b[j], list);
  }
  return positions;
}

/** Longest common block within a[alo, ahi) and b[blo, bhi); earliest in a, then in b, on ties */
function longestMatch(a: string, positions: Map<string, number[]>, alo: number, ahi: number, blo: number, bhi: number): Block {
  let best: Block = { i: alo, j: blo, size: 0 };
  let runs = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    for (const j of positions.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (runs.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > best.size) best = { i: i - k + 1, j: j - k + 1, size: k };
    }
    runs = next;
  }
  return best;
}

export function matchingCharacters(a: string, b: string): number {
  const positions = indexPositions(b);
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  let total = 0;

  while (queue.length > 0) {
    const next = queue.pop();
    if (!next) break;
    const [alo, ahi, blo, bhi] = next;
    const { i, j, size } = longestMatch(a, positions, alo, ahi, blo, bhi);
    if (size === 0) continue;
    total += size;
    if (alo < i && blo < j) queue.push([alo, i, blo, j]);
    if (i + size < ahi && j + size < bhi) queue.push([i + size, ahi, j + size, bhi]);
  }
  return total;
}

/** Similarity in [0, 1]; two empty strings are identical */
export function similarity(a: string, b: string): number {
  const length = a.length + b.length;
  if (length === 0) return 1;
  return (2 * matchingCharacters(a, b)) / length;
}
