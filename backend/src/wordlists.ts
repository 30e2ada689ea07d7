import { readdir, readFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';

/** Trims, drops blanks and duplicates, keeps first-seen order. */
export const normalizeWords = (words: readonly string[]): string[] => {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of words) {
    const word = raw.trim();
    if (!word || seen.has(word)) {
      continue;
    }
    seen.add(word);
    out.push(word);
  }
  return out;
};

const byCodePoint = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/** One word per line; `#` starts a comment line. */
export const parseWordList = (text: string): string[] =>
  normalizeWords(text.split(/\r?\n/).filter((line) => !line.trim().startsWith('#'))).sort(byCodePoint);

export const loadWordLists = async (directory: string): Promise<Map<string, string[]>> => {
  const entries = await readdir(directory);
  const lists = new Map<string, string[]>();

  for (const entry of entries.filter((name) => extname(name) === '.txt').sort(byCodePoint)) {
    const text = await readFile(join(directory, entry), 'utf8');
    lists.set(basename(entry, '.txt'), parseWordList(text));
  }

  return lists;
};

/** Sorted union of every list: the default vocabulary for new games. */
export const combineWordLists = (lists: ReadonlyMap<string, readonly string[]>): string[] =>
  normalizeWords([...lists.values()].flat()).sort(byCodePoint);
