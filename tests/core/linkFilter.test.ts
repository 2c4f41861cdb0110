import { describe, it, expect } from 'vitest';
import { CrawlState, LinkFilter } from '../../src/core/linkFilter';

describe('LinkFilter', () => {
  it('normalizes, deduplicates and marks links as seen', () => {
    const state = new CrawlState(new Set());
    const filter = new LinkFilter(state, []);

    const out = filter.filter([
      'https://x.test/a/1#top',
      'https://x.test/a/1',
      'https://x.test/a/2',
      '',
      'mailto:editor@x.test',
    ]);

    expect(out).toEqual(['https://x.test/a/1', 'https://x.test/a/2']);
    expect([...state.seen]).toEqual(['https://x.test/a/1', 'https://x.test/a/2']);
  });

  it('emits a link only once per run, whichever page finds it', () => {
    const state = new CrawlState(new Set());
    const filter = new LinkFilter(state, []);

    expect(filter.filter(['https://x.test/a/1'])).toEqual(['https://x.test/a/1']);
    expect(filter.filter(['https://x.test/a/1', 'https://x.test/a/3'])).toEqual(['https://x.test/a/3']);
  });

  it('drops links already in history', () => {
    const state = new CrawlState(new Set(['https://x.test/a/1']));
    const filter = new LinkFilter(state, []);

    expect(filter.filter(['https://x.test/a/1', 'https://x.test/a/2'])).toEqual(['https://x.test/a/2']);
    expect(state.seen.has('https://x.test/a/1')).toBe(false);
  });

  it('applies the prefix allow-list', () => {
    const state = new CrawlState(new Set());
    const filter = new LinkFilter(state, ['https://x.test/a/']);

    expect(filter.filter(['https://x.test/b/1', 'https://x.test/a/1'])).toEqual(['https://x.test/a/1']);
    expect(state.seen.has('https://x.test/b/1')).toBe(false);
  });
});
