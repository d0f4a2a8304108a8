import { Diagnostics } from '../src/diagnostics.js';
import { ErrorLog, FetchError, MissingCredentialsError } from '../src/errors.js';
import { getGroup } from '../src/groups.js';
import { ProviderRegistry } from '../src/providers/registry.js';
import { storesOn, type Stores } from '../src/store/index.js';
import { MemorySheetGateway } from '../src/store/sheetGateway.js';
import { FakeProvider, makeItem, silenceConsole, testRuntime } from './support/fakes.js';

const GOV = 'Governo/Multilaterais';
const LATAM = 'América Latina / Brasil';

function diagnosticsWith(stores: Stores, ...providers: FakeProvider[]): Diagnostics {
  let now = 0;
  return new Diagnostics({
    registry: new ProviderRegistry(providers),
    config: stores.config,
    operations: stores.operations,
    runtime: testRuntime(),
    clock: () => (now += 250),
  });
}

describe('Diagnostics', () => {
  let stores: Stores;

  beforeEach(() => {
    silenceConsole();
    stores = storesOn(new MemorySheetGateway());
  });

  afterEach(() => jest.restoreAllMocks());

  test('times every provider and suggests a hint for failures', async () => {
    await stores.items.append([makeItem({ uid: 'kept' })]);
    const before = await stores.items.list();
    const diagnostics = diagnosticsWith(
      stores,
      new FakeProvider('Keyed Gov', 'gov', new MissingCredentialsError('SAM_API_KEY')),
      new FakeProvider('Fake Gov', 'gov', [
        { source: 'Fake Gov', title: 'A', link: 'https://example.org/a' },
        { source: 'Fake Gov', title: 'B', link: 'https://example.org/b' },
      ]),
      new FakeProvider(
        'Fake Phil',
        'phil',
        new FetchError('Request to https://example.org/x timed out', 'https://example.org/x'),
      ),
      new FakeProvider('Fake Latam', 'latam', new Error('weird')),
    );

    const { diag, errors } = await diagnostics.run();

    expect(errors.toJSON().map((entry) => [entry.where, entry.message])).toEqual([
      ['Fake Phil fetch (diag)', 'FetchError: Request to https://example.org/x timed out'],
      ['Fake Latam fetch (diag)', 'Error: weird'],
    ]);
    expect(diag).toEqual({
      rows: [
        { group: GOV, source: 'Fake Gov', items: 2, elapsed_s: '0.25', error: '', hint: '' },
        {
          group: GOV,
          source: 'Keyed Gov',
          items: 0,
          elapsed_s: '0.25',
          error: 'MissingCredentialsError: SAM_API_KEY is not configured',
          hint: 'missing credentials',
        },
        {
          group: 'Filantropia',
          source: 'Fake Phil',
          items: 0,
          elapsed_s: '0.25',
          error: 'FetchError: Request to https://example.org/x timed out',
          hint: 'timeout',
        },
        {
          group: LATAM,
          source: 'Fake Latam',
          items: 0,
          elapsed_s: '0.25',
          error: 'Error: weird',
          hint: 'https://example.org/status',
        },
      ],
      logs: [['ts', 'level', 'msg']],
      cancelled: false,
    });
    expect(await stores.items.list()).toEqual(before);
    expect(before.map((item) => item.uid)).toEqual(['kept']);
  });

  test('regex overrides apply to one run only', async () => {
    await stores.config.upsert([{ key: 'RE_PHIL', value: 'science' }]);
    const gov = new FakeProvider('Fake Gov', 'gov', []);
    const phil = new FakeProvider('Fake Phil', 'phil', []);
    const latam = new FakeProvider('Fake Latam', 'latam', []);
    const errors = new ErrorLog();

    const overrides = { re_gov: ' inova ', re_phil: '', re_latam: '(' };
    await diagnosticsWith(stores, gov, phil, latam).run(overrides, { errors });

    expect(gov.lastContext?.regex?.source).toBe('inova');
    expect(phil.lastContext?.regex?.source).toBe('science');
    expect(latam.lastContext?.regex?.source).toBe(getGroup('latam').defaultRegex);
    expect(errors.toJSON().map((entry) => entry.where)).toEqual([`regex ${LATAM}`]);
    expect(await stores.config.read()).toEqual({ RE_PHIL: 'science' });
  });

  test('an abort mid-provider drops that row and stops', async () => {
    const controller = new AbortController();
    const gov = new FakeProvider('Fake Gov', 'gov', async () => {
      controller.abort();
      throw new Error('aborted');
    });
    const latam = new FakeProvider('Fake Latam', 'latam', []);

    const { diag } = await diagnosticsWith(stores, gov, latam).run({}, { signal: controller.signal });
    expect(diag.rows).toEqual([]);
    expect(diag.cancelled).toBe(true);
    expect(latam.calls).toBe(0);
  });

  test('rows finished before an abort are kept', async () => {
    const controller = new AbortController();
    const gov = new FakeProvider('Fake Gov', 'gov', async () => {
      controller.abort();
      return [];
    });
    const latam = new FakeProvider('Fake Latam', 'latam', []);

    const { diag } = await diagnosticsWith(stores, gov, latam).run({}, { signal: controller.signal });
    expect(diag.rows.map((row) => row.source)).toEqual(['Fake Gov']);
    expect(diag.cancelled).toBe(true);
    expect(gov.lastContext?.http.signal).toBe(controller.signal);
  });

  test('logs shows what collection wrote', async () => {
    await stores.operations.write('INFO', 'hello');
    const { diag } = await diagnosticsWith(stores).run();
    expect(diag.logs.map((row) => row.slice(1))).toEqual([
      ['level', 'msg'],
      ['INFO', 'hello'],
    ]);
  });
});
