/**
 * Ratcliff/Obershelp similarity ("gestalt pattern matching").
 *
 * Finds the longest common block, recurses on the unmatched text to the
 * left and right of it, and reports 2·M / T where M is the total length of
 * all matched blocks and T the combined length of both strings.
 *
 * Characters that make up more than 1% of a string of 200+ characters are
 * not used to seed a match (they may still extend one), which keeps long
 * bank narratives full of spaces and zeros from dominating the ratio.
 */

export interface MatchingBlock {
  /** Start index in `a` */
  a: number;
  /** Start index in `b` */
  b: number;
  size: number;
}

const AUTOJUNK_MIN_LENGTH = 200;

/**
 * Index of every position of each character in `b`, minus popular characters.
 */
function indexCharacters(b: string): Map<string, number[]> {
  const positions = new Map<string, number[]>();

  for (let j = 0; j < b.length; j++) {
    const existing = positions.get(b[j]);
    if (existing) {
      existing.push(j);
    } else {
      positions.set(b[j], [j]);
    }
  }

  if (b.length >= AUTOJUNK_MIN_LENGTH) {
    const popularThreshold = Math.floor(b.length / 100) + 1;
    for (const [char, indexes] of positions) {
      if (indexes.length > popularThreshold) {
        positions.delete(char);
      }
    }
  }

  return positions;
}

/**
 * Longest block common to a[aLow, aHigh) and b[bLow, bHigh).
 * Ties go to the block starting earliest in `a`, then earliest in `b`.
 */
function findLongestMatch(
  a: string,
  b: string,
  positions: Map<string, number[]>,
  aLow: number,
  aHigh: number,
  bLow: number,
  bHigh: number
): MatchingBlock {
  let bestA = aLow;
  let bestB = bLow;
  let bestSize = 0;

  // runLengths.get(j) = length of the match ending at a[i - 1], b[j]
  let runLengths = new Map<number, number>();

  for (let i = aLow; i < aHigh; i++) {
    const nextRunLengths = new Map<number, number>();

    for (const j of positions.get(a[i]) ?? []) {
      if (j < bLow) continue;
      if (j >= bHigh) break;

      const size = (runLengths.get(j - 1) ?? 0) + 1;
      nextRunLengths.set(j, size);

      if (size > bestSize) {
        bestA = i - size + 1;
        bestB = j - size + 1;
        bestSize = size;
      }
    }

    runLengths = nextRunLengths;
  }

  // Popular characters were left out of the index; let them extend a block
  while (bestA > aLow && bestB > bLow && a[bestA - 1] === b[bestB - 1]) {
    bestA--;
    bestB--;
    bestSize++;
  }
  while (
    bestA + bestSize < aHigh &&
    bestB + bestSize < bHigh &&
    a[bestA + bestSize] === b[bestB + bestSize]
  ) {
    bestSize++;
  }

  return { a: bestA, b: bestB, size: bestSize };
}

/**
 * All non-overlapping common blocks, ordered by position.
 */
export function getMatchingBlocks(a: string, b: string): MatchingBlock[] {
  const positions = indexCharacters(b);
  const blocks: MatchingBlock[] = [];
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (queue.length > 0) {
    const next = queue.pop();
    if (!next) break;
    const [aLow, aHigh, bLow, bHigh] = next;

    const block = findLongestMatch(a, b, positions, aLow, aHigh, bLow, bHigh);
    if (block.size === 0) continue;

    blocks.push(block);
    if (aLow < block.a && bLow < block.b) {
      queue.push([aLow, block.a, bLow, block.b]);
    }
    if (block.a + block.size < aHigh && block.b + block.size < bHigh) {
      queue.push([block.a + block.size, aHigh, block.b + block.size, bHigh]);
    }
  }

  return blocks.sort((left, right) => left.a - right.a || left.b - right.b);
}

/**
 * Similarity ratio in [0, 1]. Two empty strings are identical (1.0).
 *
 * @example
 * similarityRatio('abcd', 'bcde') // 0.75
 * similarityRatio('abc', 'xyz')   // 0
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) {
    return 1;
  }

  const matched = getMatchingBlocks(a, b).reduce((sum, block) => sum + block.size, 0);
  return (2 * matched) / total;
}

export default similarityRatio;
