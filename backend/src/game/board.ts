import { TooFewWordsError } from '../errors.js';
import type { KeyColor, Seed, Tile } from './types.js';

const repeat = <T>(value: T, count: number): T[] => Array.from({ length: count }, () => value);

export const DEFAULT_COLOR_DISTRIBUTION: readonly KeyColor[] = Object.freeze([
  ...repeat<KeyColor>('green/green', 3),
  ...repeat<KeyColor>('green/neutral', 5),
  ...repeat<KeyColor>('neutral/green', 5),
  'assassin/assassin',
  'assassin/green',
  'green/assassin',
  'assassin/neutral',
  'neutral/assassin',
  ...repeat<KeyColor>('neutral/neutral', 7)
]);

// FNV-1a, 32 bit.
export const hashSeed = (seed: Seed): number => {
  let hash = 0x811c9dc5;
  for (let i = 0; i < seed.length; i += 1) {
    hash ^= seed.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
};

/** xorshift32 stream of floats in [0, 1). */
export const createRandom = (seed: Seed): (() => number) => {
  let state = hashSeed(seed);
  if (state === 0) {
    state = 0x6d2b79f5;
  }

  return () => {
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    return (state >>> 0) / 0x100000000;
  };
};

const shuffleInPlace = <T>(items: T[], random: () => number): T[] => {
  for (let i = items.length - 1; i > 0; i -= 1) {
    const j = Math.floor(random() * (i + 1));
    const current = items[i];
    const swap = items[j];
    if (current === undefined || swap === undefined) {
      continue;
    }
    items[i] = swap;
    items[j] = current;
  }
  return items;
};

/**
 * Builds the board for one generation of a game.
 *
 * Pure: the same seed, word list and distribution always produce the same tiles
 * in the same order, so a board never needs to be stored to be rebuilt.
 * Words are drawn by shuffling their indices and keeping the first
 * `distribution.length`; the distribution is then shuffled with the same
 * random stream and the two are zipped by position.
 */
export const generateBoard = <C extends string = KeyColor>(
  seed: Seed,
  words: readonly string[],
  distribution: readonly C[]
): Tile<C>[] => {
  if (words.length < distribution.length) {
    throw new TooFewWordsError(distribution.length);
  }

  const random = createRandom(seed);
  const wordIndices = shuffleInPlace(
    Array.from({ length: words.length }, (_, index) => index),
    random
  ).slice(0, distribution.length);
  const colors = shuffleInPlace([...distribution], random);

  return wordIndices.map((wordIndex, position) => {
    const word = words[wordIndex];
    const color = colors[position];
    if (word === undefined || color === undefined) {
      throw new Error(`Board position ${position} could not be filled`);
    }
    return { word, color, revealed: false };
  });
};
