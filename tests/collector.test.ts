import { CancellationToken } from '../src/cancellation.js';
import { Collector } from '../src/collector.js';
import type { RuntimeOptions } from '../src/config.js';
import { FetchError, MissingCredentialsError } from '../src/errors.js';
import { planLinkRepairs } from '../src/linkRepair.js';
import { ListingProvider } from '../src/providers/listingProvider.js';
import type { Provider } from '../src/providers/types.js';
import { ProviderRegistry } from '../src/providers/registry.js';
import { storesOn, type Stores } from '../src/store/index.js';
import { MemorySheetGateway } from '../src/store/sheetGateway.js';
import type { RawItem } from '../src/types.js';
import { FakeProvider, makeItem, silenceConsole, stubFetch, testRuntime } from './support/fakes.js';

const GOV = 'Governo/Multilaterais';
const LATAM = 'América Latina / Brasil';

const govCalls: RawItem[] = [
  { source: 'Fake Gov', title: 'Inovação Aberta', link: 'https://example.org/calls/1', deadline: '2024-01-15' },
  { source: 'Fake Gov', title: 'Cultura', link: '/calls/2', deadline: '2024-01-20' },
  { source: 'Fake Gov', title: 'Inovação Rápida', link: 'https://example.org/calls/3', deadline: '2024-01-05' },
];

function collectorWith(stores: Stores, ...providers: Provider[]): Collector {
  return collectorOn(stores, testRuntime(), providers);
}

function collectorOn(stores: Stores, runtime: RuntimeOptions, providers: Provider[]): Collector {
  return new Collector({
    registry: new ProviderRegistry(providers),
    items: stores.items,
    config: stores.config,
    operations: stores.operations,
    runtime,
  });
}

const topicsPage = `<html><body>
  <a href="/topic/1">HORIZON-CL6-2024-BIODIV-01-1</a>
  <a href="/topic/2">HORIZON-CL6-2024-BIODIV-01-2</a>
  <a href="/topic/3">HORIZON-CL5-2024-D1-01-05</a>
  <a href="/about">About the portal</a>
</body></html>`;

describe('Collector', () => {
  let stores: Stores;

  beforeEach(() => {
    silenceConsole();
    stores = storesOn(new MemorySheetGateway());
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('keeps regex matches past the deadline window and appends them once', async () => {
    await stores.config.upsert([{ key: 'RE_GOV', value: 'inova' }]);
    const gov = new FakeProvider('Fake Gov', 'gov', govCalls);
    const collector = collectorWith(stores, gov);

    const first = await collector.collect([GOV], 10);
    expect(first.errors.size).toBe(0);
    expect(first.result).toEqual({
      fixed_links: 0,
      new_items: 1,
      provider_stats: [{ group: GOV, source: 'Fake Gov', fetched: 3, after_deadline_filter: 1 }],
      groups: [{ group: GOV, fetched: 3, retained: 1, new_items: 1, fixed_links: 0, failed: false }],
      cancelled: false,
    });

    const stored = await stores.items.list();
    expect(stored.map((item) => [item.title, item.deadline_iso, item.group])).toEqual([
      ['Inovação Aberta', '2024-01-15', GOV],
    ]);
    expect(gov.lastContext?.regex?.source).toBe('inova');
    expect(gov.lastContext?.http.signal).toBeUndefined();

    const second = await collector.collect([GOV], 10);
    expect(second.result.new_items).toBe(0);
    expect(await stores.items.list()).toHaveLength(1);

    const logs = await stores.operations.tail();
    expect(logs.slice(1).map((row) => row[2])).toEqual([
      `[${GOV}] Fake Gov: fetched=3 after_deadline_filter=1`,
      `[${GOV}] Fake Gov: fetched=3 after_deadline_filter=1`,
    ]);
  });

  test('one failing provider does not stop the others', async () => {
    const collector = collectorWith(
      stores,
      new FakeProvider(
        'Fake Gov',
        'gov',
        new FetchError('HTTP 503 Service Unavailable', 'https://example.org/', { status: 503 }),
      ),
      new FakeProvider('Fake Latam', 'latam', [
        { source: 'Fake Latam', title: 'Floresta viva', link: 'https://example.org/latam/1', deadline: null },
      ]),
    );

    const { result, errors } = await collector.collect(undefined, 10);
    expect(result.new_items).toBe(1);
    expect(result.provider_stats).toEqual([
      { group: GOV, source: 'Fake Gov', fetched: 'erro', after_deadline_filter: 'erro' },
      { group: LATAM, source: 'Fake Latam', fetched: 1, after_deadline_filter: 1 },
    ]);
    expect(result.groups.map((group) => group.group)).toEqual([GOV, 'Filantropia', LATAM]);
    expect(errors.toJSON().map((entry) => [entry.where, entry.message])).toEqual([
      ['provider Fake Gov', 'FetchError: HTTP 503 Service Unavailable'],
    ]);
  });

  test('a provider without credentials is skipped quietly', async () => {
    const keyed = new FakeProvider('Keyed', 'gov', new MissingCredentialsError('SAM_API_KEY'));
    const collector = collectorWith(stores, keyed);
    const { result, errors } = await collector.collect([GOV], 10);
    expect(errors.size).toBe(0);
    expect(result.provider_stats).toEqual([{ group: GOV, source: 'Keyed', fetched: 0, after_deadline_filter: 0 }]);
  });

  test('unknown group names are reported and skipped', async () => {
    const { result, errors } = await collectorWith(stores).collect(['Nope'], 10);
    expect(result.groups).toEqual([]);
    expect(errors.toJSON().map((entry) => [entry.where, entry.message])).toEqual([
      ['collect', 'ValidationError: Unknown group: Nope'],
    ]);
  });

  test('group names ignore case and spacing but not accents', async () => {
    const latam = new FakeProvider('Fake Latam', 'latam', []);
    await collectorWith(stores, latam).collect(['america latina/brasil'], 10);
    expect(latam.calls).toBe(0);
    await collectorWith(stores, latam).collect(['AMÉRICA LATINA/BRASIL'], 10);
    expect(latam.calls).toBe(1);
  });

  test('cancellation stops before the next group', async () => {
    const token = new CancellationToken();
    const gov = new FakeProvider('Fake Gov', 'gov', async () => {
      token.cancel();
      return [];
    });
    const latam = new FakeProvider('Fake Latam', 'latam', []);

    const { result } = await collectorWith(stores, gov, latam).collect(undefined, 10, { token });
    expect(result.cancelled).toBe(true);
    expect(result.groups.map((group) => group.group)).toEqual([GOV]);
    expect(latam.calls).toBe(0);
  });

  test('each topic code becomes its own item', async () => {
    await stores.config.upsert([{ key: 'RE_GOV', value: 'HORIZON' }]);
    const topics = new ListingProvider({
      name: 'EU Topics',
      group: 'gov',
      agency: 'EC',
      region: 'EU',
      urls: ['https://example.org/topics'],
      topicUrl: 'https://example.org/topic-details/{code}',
      scrapeDeadline: false,
    });
    const runtime = testRuntime({ fetchImpl: stubFetch({ 'https://example.org/topics': topicsPage }) });

    const { result } = await collectorOn(stores, runtime, [topics]).collect([GOV], 10);
    expect(result.new_items).toBe(3);
    expect((await stores.items.list()).map((item) => item.link)).toEqual([
      'https://example.org/topic-details/horizon-cl6-2024-biodiv-01-1',
      'https://example.org/topic-details/horizon-cl6-2024-biodiv-01-2',
      'https://example.org/topic-details/horizon-cl5-2024-d1-01-05',
    ]);
  });

  test('repairs relative links already in the store', async () => {
    await stores.items.append([makeItem({ uid: 'old', link: '/calls/42' })]);
    const { result } = await collectorWith(stores, new FakeProvider('Fake Gov', 'gov', [])).collect([GOV], 10);
    expect(result.fixed_links).toBe(1);
    expect((await stores.items.list())[0].link).toBe('https://example.org/calls/42');
  });
});

describe('planLinkRepairs', () => {
  beforeEach(() => silenceConsole());
  afterEach(() => jest.restoreAllMocks());

  test('stores the final URL of a redirect', async () => {
    const fetchImpl: typeof fetch = async () => {
      const res = new Response(null, { status: 200 });
      Object.defineProperty(res, 'url', { value: 'https://example.org/final' });
      return res;
    };
    const fixes = await planLinkRepairs([makeItem({ uid: 'r', link: 'https://short.example/abc' })], {
      baseUrls: new Map(),
      resolveRedirects: true,
      http: { fetchImpl },
    });
    expect([...fixes]).toEqual([['r', 'https://example.org/final']]);
  });

  test('leaves the link alone when the redirect check fails', async () => {
    const fetchImpl: typeof fetch = async () => new Response('gone', { status: 404 });
    const fixes = await planLinkRepairs([makeItem({ uid: 'r', link: 'https://short.example/abc' })], {
      baseUrls: new Map(),
      resolveRedirects: true,
      http: { fetchImpl },
    });
    expect(fixes.size).toBe(0);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  test('ignores links that only differ by a trailing slash', async () => {
    const fixes = await planLinkRepairs([makeItem({ link: 'https://example.org/calls/1/' })], {
      baseUrls: new Map(),
      resolveRedirects: false,
      http: {},
    });
    expect(fixes.size).toBe(0);
  });
});
