import { compareText } from '../data/compare';
import type { Txn } from '../data/contract';

function isTagLine(line: string): boolean {
  return line.startsWith('#');
}

function capitalizeFirst(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

/**
 * Each line that begins with `#` becomes one tag: every `#` is dropped, the
 * words are capitalized and re-joined with single spaces. Indented lines and
 * inline hashtags are ignored.
 */
export function extractTags(note: string | null | undefined): string[] {
  if (note === null || note === undefined) return [];

  const tags: string[] = [];
  for (const line of note.split('\n')) {
    if (!isTagLine(line)) continue;
    const words = line.replace(/#/g, '').split(/\s+/).filter(Boolean);
    tags.push(words.map(capitalizeFirst).join(' '));
  }
  return tags;
}

export function stripTagLines(note: string | null | undefined): string {
  if (!note) return '';
  return note
    .split('\n')
    .filter((line) => !isTagLine(line))
    .join('\n')
    .trim();
}

export function hasTag(txn: Txn, group: string): boolean {
  return txn.tags.includes(group);
}

export function listGroups(txns: readonly Txn[]): string[] {
  const groups = new Set<string>();
  txns.forEach((txn) => {
    txn.tags.forEach((tag) => groups.add(tag));
  });
  return [...groups].sort(compareText);
}
