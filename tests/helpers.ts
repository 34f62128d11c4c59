import { vi } from 'vitest';
import type { Page } from '../src/crawler.js';
import type { PageLink } from '../src/parser.js';

export function htmlResponse(body: string, status = 200, contentType = 'text/html; charset=utf-8'): Response {
  return new Response(body, { status, headers: { 'Content-Type': contentType } });
}

function requestUrl(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  return input instanceof URL ? input.href : input.url;
}

/**
 * Serves `routes` from an in-memory map in place of the global fetch.
 * Strings are served as text/html; unknown URLs get a 404.
 */
export function stubSite(routes: Record<string, string | Response>) {
  // Stored Responses are read once and re-served as fresh Responses:
  // clone() tees the body, and cancelling one tee branch never settles
  // while the other branch stays unread.
  const bodies = new Map<string, Promise<string>>();
  const mockFetch = vi.fn(async (input: string | URL | Request, _init?: RequestInit) => {
    const url = requestUrl(input);
    const route = routes[url];
    if (route === undefined) return htmlResponse('Not Found', 404);
    if (typeof route === 'string') return htmlResponse(route);
    let body = bodies.get(url);
    if (body === undefined) {
      body = route.text();
      bodies.set(url, body);
    }
    return new Response(await body, { status: route.status, statusText: route.statusText, headers: route.headers });
  });
  vi.stubGlobal('fetch', mockFetch);
  return mockFetch;
}

export function fetchedUrls(mockFetch: ReturnType<typeof stubSite>): string[] {
  return mockFetch.mock.calls.map(([input]) => requestUrl(input));
}

export function page(url: string, text: string[] = [], links: PageLink[] = []): Page {
  return { url, text, links };
}
