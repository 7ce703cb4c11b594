import { describe, expect, it } from 'vitest';
import { splitTitleAndCompany, stripHtml } from './title';

describe('splitTitleAndCompany', () => {
  it.each([
    ['Analytics Manager at Acme Corp', 'Analytics Manager', 'Acme Corp'],
    ['Data Manager AT Acme', 'Data Manager', 'Acme'],
    ['Data Manager @ Beta', 'Data Manager', 'Beta'],
    ['Data Manager | Beta Inc', 'Data Manager', 'Beta Inc'],
    ['BI Manager - Gamma', 'BI Manager', 'Gamma'],
    ['BI Manager – Gamma', 'BI Manager', 'Gamma'],
    ['BI Manager — Gamma', 'BI Manager', 'Gamma'],
  ])('splits "%s"', (raw, roleTitle, company) => {
    expect(splitTitleAndCompany(raw)).toEqual({ roleTitle, company });
  });

  it('prefers " at " over a later dash', () => {
    expect(splitTitleAndCompany('Manager, Data - Analytics at Acme')).toEqual({
      roleTitle: 'Manager, Data - Analytics',
      company: 'Acme',
    });
  });

  it('leaves titles without a separator whole', () => {
    expect(splitTitleAndCompany('  Analytics Manager  ')).toEqual({
      roleTitle: 'Analytics Manager',
      company: null,
    });
  });

  it('does not split inside a word', () => {
    expect(splitTitleAndCompany('Data Strategist')).toEqual({ roleTitle: 'Data Strategist', company: null });
  });
});

describe('stripHtml', () => {
  it('removes tags and collapses whitespace', () => {
    expect(stripHtml('<p>Lead the\n<b>analytics</b>   team</p>')).toBe('Lead the analytics team');
  });

  it('returns an empty string for markup only', () => {
    expect(stripHtml('<br/>')).toBe('');
  });
});
