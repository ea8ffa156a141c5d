/**
 * Sequence-matching string similarity.
 *
 * `similarity(a, b)` is `2 * M / (|a| + |b|)` over the lower-cased inputs, where
 * `M` is the total length of the matching blocks found by repeatedly taking the
 * longest common contiguous block and recursing on the unmatched text to its
 * left and right (Ratcliff/Obershelp). Ties go to the earliest block in `a`,
 * and for second strings of 200+ characters any character filling more than
 * 1% of them is ignored when seeding blocks. This is not edit distance: the
 * result depends on which blocks get matched first.
 *
 * Lengths are measured in Unicode code points.
 */

type Block = { i: number; j: number; size: number };

const POPULAR_MIN_LENGTH = 200;

function indexPositions(b: string[]): Map<string, number[]> {
  const b2j = new Map<string, number[]>();
  b.forEach((elt, j) => {
    const positions = b2j.get(elt);
    if (positions) {
      positions.push(j);
    } else {
      b2j.set(elt, [j]);
    }
  });

  const n = b.length;
  if (n >= POPULAR_MIN_LENGTH) {
    const threshold = Math.floor(n / 100) + 1;
    for (const [elt, positions] of [...b2j]) {
      if (positions.length > threshold) {
        b2j.delete(elt);
      }
    }
  }
  return b2j;
}

function findLongestMatch(
  a: string[],
  b: string[],
  b2j: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number,
): Block {
  let besti = alo;
  let bestj = blo;
  let bestsize = 0;
  let j2len = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    for (const j of b2j.get(a[i] ?? '') ?? []) {
      if (j < blo) {
        continue;
      }
      if (j >= bhi) {
        break;
      }
      const k = (j2len.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > bestsize) {
        besti = i - k + 1;
        bestj = j - k + 1;
        bestsize = k;
      }
    }
    j2len = next;
  }

  // Popular elements were left out of the index; grow the block over them.
  while (besti > alo && bestj > blo && a[besti - 1] === b[bestj - 1]) {
    besti--;
    bestj--;
    bestsize++;
  }
  while (
    besti + bestsize < ahi &&
    bestj + bestsize < bhi &&
    a[besti + bestsize] === b[bestj + bestsize]
  ) {
    bestsize++;
  }

  return { i: besti, j: bestj, size: bestsize };
}

export function matchingBlocks(a: string[], b: string[]): Block[] {
  const b2j = indexPositions(b);
  const blocks: Block[] = [];
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  let range = queue.pop();
  while (range) {
    const [alo, ahi, blo, bhi] = range;
    const block = findLongestMatch(a, b, b2j, alo, ahi, blo, bhi);
    if (block.size > 0) {
      blocks.push(block);
      if (alo < block.i && blo < block.j) {
        queue.push([alo, block.i, blo, block.j]);
      }
      if (block.i + block.size < ahi && block.j + block.size < bhi) {
        queue.push([block.i + block.size, ahi, block.j + block.size, bhi]);
      }
    }
    range = queue.pop();
  }

  return blocks.sort((x, y) => x.i - y.i || x.j - y.j);
}

export function sequenceRatio(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  const total = left.length + right.length;
  if (total === 0) {
    return 1;
  }
  const matched = matchingBlocks(left, right).reduce((sum, block) => sum + block.size, 0);
  return (2 * matched) / total;
}

export function similarity(a: string, b: string): number {
  return sequenceRatio(a.toLowerCase(), b.toLowerCase());
}
