/**
 * In-process stand-in for a view server: replaces the global fetch and answers
 * each request from the first route whose URL fragment it contains or whose
 * pattern it matches.
 */

import { vi } from 'vitest';
import { EgeriaTech } from '@egeria-sdk/client';

export interface PlatformRequest {
  url: string;
  method: string;
  body: unknown;
}

/** `[url fragment or pattern, reply]`; a function reply sees the request. */
export type Route = [match: string | RegExp, reply: Record<string, unknown> | ((request: PlatformRequest) => Record<string, unknown>)];

/**
 * Stubs fetch with the given routes. Unrouted requests get
 * `{ relatedHTTPCode: 200 }`.
 */
export function stubPlatform(...routes: Route[]): PlatformRequest[] {
  const requests: PlatformRequest[] = [];
  vi.stubGlobal(
    'fetch',
    vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
      const text = typeof init?.body === 'string' ? init.body : undefined;
      const request: PlatformRequest = {
        url: typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url,
        method: init?.method ?? 'GET',
        body: text === undefined ? undefined : JSON.parse(text),
      };
      requests.push(request);
      const route = routes.find(([match]) =>
        typeof match === 'string' ? request.url.includes(match) : match.test(request.url)
      );
      const reply = route === undefined ? { relatedHTTPCode: 200 } : route[1];
      const body = typeof reply === 'function' ? reply(request) : reply;
      return new Response(JSON.stringify(body), { status: 200 });
    })
  );
  return requests;
}

export function testClient(): EgeriaTech {
  return new EgeriaTech({
    platformUrl: 'https://localhost:9443',
    viewServer: 'view-server',
    userId: 'erinoverview',
    userPassword: 'test-secret',
    localQualifier: '',
  });
}

/**
 * A metadata element as the view services return it.
 */
export function element(guid: string, typeName: string, properties: Record<string, unknown>): Record<string, unknown> {
  return { elementHeader: { guid, status: 'ACTIVE', type: { typeName } }, properties };
}

/** URL fragments of the services the command processors call. */
export const ROUTES = {
  glossariesByName: '/glossary-browser/glossaries/by-name',
  glossarySearch: '/glossary-browser/glossaries/by-search-string',
  termSearch: '/glossary-browser/glossaries/terms/by-search-string',
  glossaryCreate: /\/glossary-manager\/glossaries$/,
  byPropertyValue: '/elements/by-exact-property-value',
  guidByName: '/elements/guid-by-unique-name',
} as const;
