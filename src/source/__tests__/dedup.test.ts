import { describe, it, expect } from 'vitest';
import { normalizeUrl, itemFingerprint } from '../dedup.js';
import { sha256 } from '../../shared/utils.js';

describe('normalizeUrl', () => {
  it('strips trailing slashes', () => {
    expect(normalizeUrl('https://example.com/')).toBe('https://example.com');
    expect(normalizeUrl('https://example.com/path//')).toBe('https://example.com/path');
  });

  it('removes www. and lowercases scheme and host', () => {
    expect(normalizeUrl('HTTPS://WWW.Example.COM/Path')).toBe('https://example.com/Path');
  });

  it('drops tracking params and sorts the rest', () => {
    expect(normalizeUrl('https://example.com/p?utm_source=x&z=1&spm=a.b&a=2&fbclid=q')).toBe(
      'https://example.com/p?a=2&z=1',
    );
  });

  it('drops the fragment and keeps the port', () => {
    expect(normalizeUrl('https://example.com:8080/page#top')).toBe('https://example.com:8080/page');
  });

  it('keeps file URLs as paths', () => {
    expect(normalizeUrl('file:///tmp/feed.xml')).toBe('file:///tmp/feed.xml');
  });

  it('returns unparseable input trimmed', () => {
    expect(normalizeUrl('  not a url ')).toBe('not a url');
  });
});

describe('itemFingerprint', () => {
  it('hashes the canonical link', () => {
    expect(itemFingerprint('https://www.example.com/a/?utm_medium=rss', 'Title')).toBe(
      sha256('https://example.com/a'),
    );
  });

  it('gives share variants of one link the same fingerprint', () => {
    expect(itemFingerprint('https://example.com/a?ref=home', 'x')).toBe(
      itemFingerprint('https://www.example.com/a/', 'y'),
    );
  });

  it('falls back to title and publish time without a link', () => {
    expect(itemFingerprint('', ' Title ', '2026-01-01')).toBe(sha256('title:Title|2026-01-01'));
  });
});
