import { describe, expect, it } from 'vitest';
import { FeedPosting } from '../sources/base';
import { KeywordFilter } from './keyword-filter';

function posting(title: string): FeedPosting {
  return { title, url: `https://jobs.example.com/${encodeURIComponent(title)}`, description: '' };
}

describe('KeywordFilter', () => {
  it('accepts everything without keywords', () => {
    const filter = new KeywordFilter([]);
    expect(filter.matches(posting('Anything'))).toBe(true);
  });

  it('ignores blank keywords', () => {
    const filter = new KeywordFilter(['  ', '']);
    expect(filter.matches(posting('Anything'))).toBe(true);
  });

  it('matches case-insensitively on the title', () => {
    const filter = new KeywordFilter([' Analytics ', 'data manager']);

    const kept = filter.filter([
      posting('Head of ANALYTICS at Acme'),
      posting('Senior Data Manager'),
      posting('Backend Engineer'),
    ]);

    expect(kept.map(item => item.title)).toEqual(['Head of ANALYTICS at Acme', 'Senior Data Manager']);
  });

  it('does not look at the description', () => {
    const filter = new KeywordFilter(['analytics']);
    expect(filter.matches({ title: 'Engineer', url: 'https://jobs.example.com/1', description: 'analytics' })).toBe(false);
  });
});
