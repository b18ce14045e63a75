import { describe, it, expect } from 'vitest';
import { buildPageUrl, createUrlBuilder, getBaseUrl } from '../url-utils.js';

describe('buildPageUrl', () => {
  it('should append the offset parameter', () => {
    expect(buildPageUrl('https://catalog.test/packages?K=&PP=250', 'O', 500))
      .toBe('https://catalog.test/packages?K=&PP=250&O=500');
  });

  it('should replace an existing offset in place', () => {
    expect(buildPageUrl('https://catalog.test/packages?O=0&PP=250', 'O', 250))
      .toBe('https://catalog.test/packages?O=250&PP=250');
  });
});

describe('createUrlBuilder', () => {
  it('should bind the search URL and parameter name', () => {
    const build = createUrlBuilder('https://catalog.test/search', 'offset');

    expect(build(0)).toBe('https://catalog.test/search?offset=0');
    expect(build(750)).toBe('https://catalog.test/search?offset=750');
  });
});

describe('getBaseUrl', () => {
  it('should return protocol and host', () => {
    expect(getBaseUrl('https://catalog.test:8443/packages?O=0')).toBe('https://catalog.test:8443');
  });

  it('should return the input when it is not a URL', () => {
    expect(getBaseUrl('not a url')).toBe('not a url');
  });
});

