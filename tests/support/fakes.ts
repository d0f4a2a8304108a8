import type { RuntimeOptions } from '../../src/config.js';
import type { Provider, ProviderContext } from '../../src/providers/types.js';
import type { GroupId, Item, RawItem } from '../../src/types.js';

type FakeBehaviour = RawItem[] | Error | ((ctx: ProviderContext) => Promise<RawItem[]>);

export class FakeProvider implements Provider {
  calls = 0;
  lastContext: ProviderContext | null = null;

  constructor(
    readonly name: string,
    readonly group: GroupId,
    private readonly behaviour: FakeBehaviour,
    readonly baseUrl = 'https://example.org/',
    readonly urlHint = 'https://example.org/status',
  ) {}

  async fetch(ctx: ProviderContext): Promise<RawItem[]> {
    this.calls++;
    this.lastContext = ctx;
    if (this.behaviour instanceof Error) throw this.behaviour;
    if (typeof this.behaviour === 'function') return this.behaviour(ctx);
    return this.behaviour.map((raw) => ({ ...raw }));
  }
}

export function testRuntime(overrides: Partial<RuntimeOptions> = {}): RuntimeOptions {
  return {
    timeZone: 'UTC',
    fetchTimeoutMs: 1000,
    resolveRedirects: false,
    secrets: {},
    now: () => new Date('2024-01-01T12:00:00Z'),
    ...overrides,
  };
}

export function makeItem(overrides: Partial<Item> = {}): Item {
  return {
    uid: 'uid-1',
    group: 'Governo/Multilaterais',
    source: 'Fake Gov',
    title: 'Innovation call',
    link: 'https://example.org/calls/1',
    deadline_iso: null,
    published_iso: null,
    agency: '',
    region: '',
    raw_json: '{}',
    created_at: '2024-01-01T00:00:00.000Z',
    seen: false,
    status: 'pendente',
    notes: '',
    do_not_show: false,
    ...overrides,
  };
}

/** Serves fixed bodies by URL; anything else is a 404. */
export function stubFetch(pages: Record<string, string>, contentType = 'text/html'): typeof fetch {
  return async (input) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url;
    const body = pages[url];
    if (body === undefined) {
      return new Response('missing', { status: 404, statusText: 'Not Found' });
    }
    return new Response(body, { status: 200, headers: { 'content-type': contentType } });
  };
}

export function silenceConsole(): void {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
}
