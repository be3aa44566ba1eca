import { describe, it, expect } from 'vitest';
import { normalizeAppName, parseAppList } from './normalize';

describe('normalizeAppName', () => {
  it('lowercases and hyphenates spaces', () => {
    expect(normalizeAppName('Visual Studio Code')).toBe('visual-studio-code');
  });

  it('turns underscores into hyphens', () => {
    expect(normalizeAppName('Github_Desktop')).toBe('github-desktop');
  });

  it('replaces every separator, not just the first', () => {
    expect(normalizeAppName('a b_c d_e')).toBe('a-b-c-d-e');
  });

  it('leaves other punctuation alone', () => {
    expect(normalizeAppName('Notes.app (Beta)')).toBe('notes.app-(beta)');
  });

  it('is defined for the empty string', () => {
    expect(normalizeAppName('')).toBe('');
  });

  it('is idempotent', () => {
    for (const name of ['Google Chrome', 'VLC', 'my_App Name', '1Password 7', 'already-normal']) {
      const once = normalizeAppName(name);
      expect(normalizeAppName(once)).toBe(once);
    }
  });
});

describe('parseAppList', () => {
  it('trims lines and drops blanks', () => {
    expect(parseAppList('  Slack \n\n\tZoom\n   \n')).toEqual(['Slack', 'Zoom']);
  });

  it('handles CRLF and bare CR line endings', () => {
    expect(parseAppList('Slack\r\nZoom\rVLC')).toEqual(['Slack', 'Zoom', 'VLC']);
  });

  it('keeps duplicates in input order', () => {
    expect(parseAppList('Zoom\nSlack\nZoom')).toEqual(['Zoom', 'Slack', 'Zoom']);
  });

  it('strips information separators and NEL but keeps a byte order mark', () => {
    expect(parseAppList('\x1fSlack\x85\n\uFEFFZoom \n\x1c\x1d')).toEqual(['Slack', '\uFEFFZoom']);
  });

  it('returns nothing for an empty file', () => {
    expect(parseAppList('')).toEqual([]);
  });
});
