import { describe, expect, it } from 'vitest';
import { filterCandidates, isCommittable, normalizeHistory, pushHistory } from '@/utils/completionHistory';

const commitAll = (texts: string[], maxSize: number): string[] =>
  texts.reduce<string[]>((history, text) => pushHistory(history, text, maxSize), []);

describe('pushHistory', () => {
  it('moves a repeated value to the front instead of duplicating it', () => {
    expect(commitAll(['a', 'b', 'a'], 100)).toEqual(['a', 'b']);
  });

  it('keeps only the most recent entries up to the limit', () => {
    expect(commitAll(['a', 'b', 'c', 'd'], 3)).toEqual(['d', 'c', 'b']);
  });

  it('leaves the history unchanged for blank text', () => {
    expect(pushHistory(['a', 'b'], '', 100)).toEqual(['a', 'b']);
    expect(pushHistory(['a', 'b'], '  \t\n', 100)).toEqual(['a', 'b']);
  });

  it('stores the text exactly as typed', () => {
    expect(pushHistory(['a'], ' a ', 100)).toEqual([' a ', 'a']);
  });

  it('treats differently cased values as distinct', () => {
    expect(commitAll(['Foo', 'foo'], 100)).toEqual(['foo', 'Foo']);
  });

  it('does not mutate its input', () => {
    const history = ['b', 'a'];
    pushHistory(history, 'a', 100);
    expect(history).toEqual(['b', 'a']);
  });

  it('never exceeds the limit or repeats an entry', () => {
    const texts = Array.from({ length: 200 }, (_, i) => `q${(i * 7) % 23}`);
    let history: string[] = [];
    for (const text of texts) {
      history = pushHistory(history, text, 10);
      expect(history.length).toBeLessThanOrEqual(10);
      expect(new Set(history).size).toBe(history.length);
      expect(history[0]).toBe(text);
    }
  });
});

describe('normalizeHistory', () => {
  it('drops non-string, blank and repeated entries', () => {
    expect(normalizeHistory(['a', 1, 'a', ' ', 'b', null], 100)).toEqual(['a', 'b']);
  });

  it('returns an empty list for anything that is not an array', () => {
    expect(normalizeHistory(undefined, 100)).toEqual([]);
    expect(normalizeHistory('a', 100)).toEqual([]);
    expect(normalizeHistory({ 0: 'a' }, 100)).toEqual([]);
  });

  it('applies the limit', () => {
    expect(normalizeHistory(['a', 'b', 'c'], 2)).toEqual(['a', 'b']);
    expect(normalizeHistory(['a', 'b', 'c'])).toEqual(['a', 'b', 'c']);
  });
});

describe('isCommittable', () => {
  it('rejects empty and whitespace-only text', () => {
    expect(isCommittable('')).toBe(false);
    expect(isCommittable(' \t')).toBe(false);
    expect(isCommittable(' x ')).toBe(true);
  });
});

describe('filterCandidates', () => {
  const items = ['pineapple', 'Apple', 'banana', 'apricot'];

  it('returns every item for a blank query', () => {
    expect(filterCandidates(items, '')).toEqual(items);
    expect(filterCandidates(items, '  ')).toEqual(items);
  });

  it('lists prefix matches before substring matches', () => {
    expect(filterCandidates(items, 'ap')).toEqual(['Apple', 'apricot', 'pineapple']);
  });

  it('matches case-insensitively', () => {
    expect(filterCandidates(items, 'BAN')).toEqual(['banana']);
  });

  it('returns nothing when no item matches', () => {
    expect(filterCandidates(items, 'kiwi')).toEqual([]);
  });
});
