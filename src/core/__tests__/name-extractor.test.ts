import { describe, it, expect } from 'vitest';
import { extractNames, packageLinkPattern } from '../name-extractor.js';

describe('extractNames', () => {
  it('should extract link text from package links in scan order', () => {
    const lines = [
      '<table>',
      '<td><a href="/packages/zsh-theme/">zsh-theme</a></td>',
      '<td>1.0-1</td>',
      '<td><a href="/packages/alpha/">alpha</a></td>',
      '</table>'
    ];

    expect(extractNames(lines)).toEqual(['zsh-theme', 'alpha']);
  });

  it('should skip links to other paths', () => {
    const lines = [
      '<a href="/account/bob/">bob</a>',
      '<a href="https://example.test/packages/x/">x</a>',
      '<a href="/packages/kept/">kept</a>'
    ];

    expect(extractNames(lines)).toEqual(['kept']);
  });

  it('should accept extra attributes and single quotes', () => {
    const lines = [`<a title="details" href='/packages/lib32-foo+bar/' class="pkg">lib32-foo+bar</a>`];

    expect(extractNames(lines)).toEqual(['lib32-foo+bar']);
  });

  it('should keep the link text verbatim', () => {
    expect(extractNames(['<a href="/packages/x/"> spaced </a>'])).toEqual([' spaced ']);
  });

  it('should take at most one name per line', () => {
    const lines = ['<a href="/packages/first/">first</a> <a href="/packages/second/">second</a>'];

    expect(extractNames(lines)).toEqual(['first']);
  });

  it('should pass duplicates through', () => {
    const lines = ['<a href="/packages/dup/">dup</a>', '<a href="/packages/dup/">dup</a>'];

    expect(extractNames(lines)).toEqual(['dup', 'dup']);
  });

  it('should find nothing in its own output', () => {
    const first = extractNames(['<a href="/packages/one/">one</a>', '<a href="/packages/two/">two</a>']);

    expect(first).toEqual(['one', 'two']);
    expect(extractNames(first)).toEqual([]);
  });

  it('should honour a custom path prefix', () => {
    const lines = ['<a href="/pkg/a.b/">a.b</a>', '<a href="/packages/c/">c</a>'];

    expect(extractNames(lines, '/pkg/')).toEqual(['a.b']);
  });

  it('should escape regex characters in the prefix', () => {
    expect(packageLinkPattern('/p.k/').test('<a href="/pxk/a/">a</a>')).toBe(false);
    expect(packageLinkPattern('/p.k/').test('<a href="/p.k/a/">a</a>')).toBe(true);
  });
});
