/**
 * In-process stand-in for the platform: replaces the global fetch and
 * records each request the client sends.
 */

import { vi } from 'vitest';

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  /** Parsed JSON body, the raw text when it is not JSON, or undefined */
  body: unknown;
}

/** A canned reply: a Response as is, an object as a JSON 200, a string as a text 200. */
export type StubReply = Response | Record<string, unknown> | string;

/**
 * Stubs fetch with replies served in order; once they run out every call
 * gets `{ relatedHTTPCode: 200 }`.
 */
export function stubFetch(...replies: StubReply[]): RecordedRequest[] {
  const requests: RecordedRequest[] = [];
  const queue = [...replies];

  vi.stubGlobal(
    'fetch',
    vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
      const text = typeof init?.body === 'string' ? init.body : undefined;
      requests.push({
        url: typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url,
        method: init?.method ?? 'GET',
        headers: Object.fromEntries(new Headers(init?.headers).entries()),
        body: text === undefined ? undefined : parseBody(text),
      });
      const reply = queue.shift() ?? { relatedHTTPCode: 200 };
      if (reply instanceof Response) {
        return reply;
      }
      return new Response(typeof reply === 'string' ? reply : JSON.stringify(reply), { status: 200 });
    })
  );
  return requests;
}

function parseBody(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/** Root of the view-service URLs for the test platform. */
export const ROOT = 'https://localhost:9443/servers/view-server/api/open-metadata';

/** Client options used throughout the tests. */
export const OPTIONS = {
  platformUrl: 'https://localhost:9443',
  viewServer: 'view-server',
  userId: 'erinoverview',
  userPassword: 'test-secret',
  localQualifier: '',
};

/**
 * A metadata element as the newer view services return it.
 */
export function element(
  guid: string,
  typeName: string,
  properties: Record<string, unknown>,
  status = 'ACTIVE'
): Record<string, unknown> {
  return {
    elementHeader: { guid, status, type: { typeName } },
    properties,
  };
}
