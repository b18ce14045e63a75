/**
 * URL utility functions
 */
import type { UrlBuilder } from '../../types/package-list.js';

/**
 * Set the offset query parameter on a search URL, replacing any value
 * already present. Other parameters keep their order.
 */
export function buildPageUrl(searchUrl: string, offsetParam: string, offset: number): string {
  const url = new URL(searchUrl);
  url.searchParams.set(offsetParam, String(offset));
  return url.toString();
}

export function createUrlBuilder(searchUrl: string, offsetParam: string): UrlBuilder {
  return (offset: number) => buildPageUrl(searchUrl, offsetParam, offset);
}

/**
 * Get base URL from a full URL
 * @param url - Full URL
 * @returns Base URL (protocol + domain)
 */
export function getBaseUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.protocol}//${parsed.host}`;
  } catch {
    return url;
  }
}
