interface Block {
  a: number;
  b: number;
  size: number;
}

function indexPositions(b: string): Map<string, number[]> {
  const positions = new Map<string, number[]>();
  for (let j = 0; j < b.length; j++) {
    const ch = b.charAt(j);
    const list = positions.get(ch);
    if (list) list.push(j);
    else positions.set(ch, [j]);
  }
  return positions;
}

/**
 * Longest common substring of a[alo:ahi] and b[blo:bhi].
 * Ties go to the earliest start in `a`, then in `b`.
 */
function longestMatch(
  a: string,
  positions: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number,
): Block {
  let best: Block = { a: alo, b: blo, size: 0 };
  let runs = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const nextRuns = new Map<number, number>();
    for (const j of positions.get(a.charAt(i)) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (runs.get(j - 1) ?? 0) + 1;
      nextRuns.set(j, k);
      if (k > best.size) {
        best = { a: i - k + 1, b: j - k + 1, size: k };
      }
    }
    runs = nextRuns;
  }

  return best;
}

/** Total size of the Ratcliff/Obershelp matching blocks between `a` and `b`. */
export function matchingCharacters(a: string, b: string): number {
  const positions = indexPositions(b);
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  let total = 0;

  while (queue.length > 0) {
    const range = queue.pop();
    if (!range) break;
    const [alo, ahi, blo, bhi] = range;
    const block = longestMatch(a, positions, alo, ahi, blo, bhi);
    if (block.size === 0) continue;

    total += block.size;
    if (alo < block.a && blo < block.b) {
      queue.push([alo, block.a, blo, block.b]);
    }
    if (block.a + block.size < ahi && block.b + block.size < bhi) {
      queue.push([block.a + block.size, ahi, block.b + block.size, bhi]);
    }
  }

  return total;
}

/**
 * Sequence similarity ratio in [0, 1]: 2·M / (|a| + |b|), where M is the
 * number of characters in the recursively found longest common substrings.
 * Two empty strings are identical (1.0).
 */
export function sequenceRatio(a: string, b: string): number {
  const length = a.length + b.length;
  if (length === 0) return 1;
  return (2 * matchingCharacters(a, b)) / length;
}
