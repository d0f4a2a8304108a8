import { SheetConfigStore } from '../src/store/configStore.js';
import { ITEMS_HEADER, ITEMS_TAB, SheetItemStore } from '../src/store/itemStore.js';
import { OperationLog } from '../src/store/operationLog.js';
import { ResearchLog, RESEARCH_TAB } from '../src/store/researchLog.js';
import { columnLetter, MemorySheetGateway } from '../src/store/sheetGateway.js';
import { makeItem } from './support/fakes.js';

describe('SheetItemStore', () => {
  let gateway: MemorySheetGateway;
  let store: SheetItemStore;

  beforeEach(() => {
    gateway = new MemorySheetGateway();
    store = new SheetItemStore(gateway);
  });

  test('append skips uids already stored or repeated in the batch', async () => {
    const written = await store.append([
      makeItem({ uid: 'a' }),
      makeItem({ uid: 'b' }),
      makeItem({ uid: 'a', title: 'Again' }),
    ]);
    expect(written).toBe(2);
    expect(await store.append([makeItem({ uid: 'b' })])).toBe(0);
    expect((await store.list()).map((item) => item.uid)).toEqual(['a', 'b']);
  });

  test('concurrent appends of the same uid store one row', async () => {
    const counts = await Promise.all([
      store.append([makeItem({ uid: 'same' })]),
      store.append([makeItem({ uid: 'same' })]),
    ]);
    expect(counts[0] + counts[1]).toBe(1);
    expect(await gateway.readAll(ITEMS_TAB)).toHaveLength(2);
  });

  test('rows round-trip through the sheet', async () => {
    const item = makeItem({ uid: 'r', deadline_iso: '2024-02-01', seen: true, do_not_show: true, notes: 'check' });
    await store.append([item]);
    expect(await store.list()).toEqual([item]);
    const [, row] = await gateway.readAll(ITEMS_TAB);
    expect(row[ITEMS_HEADER.indexOf('seen')]).toBe('1');
    expect(row[ITEMS_HEADER.indexOf('published_iso')]).toBe('');
  });

  test('list filters by group and uids', async () => {
    await store.append([makeItem({ uid: 'g1' }), makeItem({ uid: 'f1', group: 'Filantropia' })]);
    expect((await store.list({ group: 'Filantropia' })).map((item) => item.uid)).toEqual(['f1']);
    expect((await store.list({ uids: ['g1', 'nope'] })).map((item) => item.uid)).toEqual(['g1']);
  });

  test('update patches only the given fields', async () => {
    await store.append([makeItem({ uid: 'u', notes: 'keep' })]);
    expect(await store.update('u', { seen: true, status: 'submetido' })).toBe(true);
    const [item] = await store.list();
    expect(item).toMatchObject({ seen: true, status: 'submetido', notes: 'keep', do_not_show: false });
  });

  test('unknown statuses fall back to pendente', async () => {
    await store.append([makeItem({ uid: 'u', status: 'verificando' })]);
    await store.update('u', { status: 'bogus' });
    expect((await store.list())[0].status).toBe('pendente');
  });

  test('updateMany counts the uids it found', async () => {
    await store.append([makeItem({ uid: 'x' }), makeItem({ uid: 'y' })]);
    const found = await store.updateMany([
      { uid: 'x', patch: { notes: 'one' } },
      { uid: 'missing', patch: { notes: 'two' } },
      { uid: 'y', patch: { do_not_show: true } },
    ]);
    expect(found).toBe(2);
    expect(await store.update('missing', { seen: true })).toBe(false);
  });

  test('updateLinks rewrites the link column', async () => {
    await store.append([makeItem({ uid: 'l', link: '/calls/42' })]);
    expect(await store.updateLinks(new Map([['l', 'https://example.org/calls/42']]))).toBe(1);
    expect((await store.list())[0].link).toBe('https://example.org/calls/42');
  });

  test('delete ignores missing uids', async () => {
    await store.append([makeItem({ uid: 'd1' }), makeItem({ uid: 'd2' })]);
    expect(await store.delete(['d1', 'ghost', 'd1'])).toBe(1);
    expect((await store.list()).map((item) => item.uid)).toEqual(['d2']);
    expect(await store.delete([])).toBe(0);
  });

  test('clear keeps the header', async () => {
    await store.append([makeItem({ uid: 'c' })]);
    await store.clear();
    expect(await store.list()).toEqual([]);
    expect(await gateway.readAll(ITEMS_TAB)).toEqual([[...ITEMS_HEADER]]);
  });

  test('adds missing columns to an older sheet without losing its rows', async () => {
    await gateway.ensureTab(ITEMS_TAB, ['uid', 'title', 'legacy']);
    await gateway.appendRows(ITEMS_TAB, [['old-1', 'Old row', 'x']]);

    const [old] = await store.list();
    expect(old).toMatchObject({ uid: 'old-1', title: 'Old row', status: 'pendente', deadline_iso: null, seen: false });

    await store.append([makeItem({ uid: 'new-1' })]);
    const rows = await gateway.readAll(ITEMS_TAB);
    expect(rows[0].slice(0, 4)).toEqual(['uid', 'title', 'legacy', 'group']);
    expect(rows[0]).toHaveLength(16);
    expect(rows[2][0]).toBe('new-1');
    expect(rows[2][2]).toBe('');
  });
});

describe('SheetConfigStore', () => {
  test('upsert trims keys, skips blanks and overwrites existing values', async () => {
    const gateway = new MemorySheetGateway();
    const config = new SheetConfigStore(gateway);

    const first = await config.upsert([
      { key: ' MIN_DAYS ', value: '10' },
      { key: '', value: 'x' },
    ]);
    expect(first).toEqual({ MIN_DAYS: '10' });
    expect(
      await config.upsert([
        { key: 'MIN_DAYS', value: '14' },
        { key: 'USD_BRL', value: '5.5' },
      ]),
    ).toEqual({ MIN_DAYS: '14', USD_BRL: '5.5' });
    expect(await gateway.readAll('config')).toEqual([
      ['key', 'value'],
      ['MIN_DAYS', '14'],
      ['USD_BRL', '5.5'],
    ]);
  });

  test('a duplicated key is updated on the row that read returns', async () => {
    const gateway = new MemorySheetGateway();
    await gateway.ensureTab('config', ['key', 'value']);
    await gateway.appendRows('config', [
      ['MIN_DAYS', '7'],
      ['USD_BRL', '5'],
      [' MIN_DAYS', '9'],
    ]);
    const config = new SheetConfigStore(gateway);

    expect(await config.read()).toEqual({ MIN_DAYS: '9', USD_BRL: '5' });
    const updated = await config.upsert([{ key: 'MIN_DAYS', value: '21' }]);
    expect(updated).toEqual({ MIN_DAYS: '21', USD_BRL: '5' });
    expect(await gateway.readAll('config')).toEqual([
      ['key', 'value'],
      ['MIN_DAYS', '7'],
      ['USD_BRL', '5'],
      [' MIN_DAYS', '21'],
    ]);
  });
});

describe('OperationLog', () => {
  test('tail returns the header and the newest rows', async () => {
    const log = new OperationLog(new MemorySheetGateway(), () => new Date('2024-01-01T12:00:00Z'));
    await log.writeMany('INFO', ['a', 'b', 'c']);
    await log.writeMany('INFO', []);
    expect(await log.tail(2)).toEqual([
      ['ts', 'level', 'msg'],
      ['2024-01-01T12:00:00.000Z', 'INFO', 'b'],
      ['2024-01-01T12:00:00.000Z', 'INFO', 'c'],
    ]);
  });

  test('an empty log is just the header', async () => {
    const log = new OperationLog(new MemorySheetGateway());
    expect(await log.tail()).toEqual([['ts', 'level', 'msg']]);
  });
});

describe('ResearchLog', () => {
  test('writes one row and truncates long cells', async () => {
    const gateway = new MemorySheetGateway();
    await new ResearchLog(gateway).save({
      timestamp: new Date('2024-01-01T12:00:00Z'),
      mode: 'Resumo',
      model: 'sonar',
      prompt: 'p'.repeat(5000),
      params: { temperatura: 0.2 },
      tokensIn: 10,
      tokensOut: 20,
      costUsd: 0.0035,
      costBrl: 0.0175,
      summary: 'ok',
      links: ['https://a.example/x', 'https://b.example/y'],
      response: { id: 1 },
      error: '',
    });

    const [header, row] = await gateway.readAll(RESEARCH_TAB);
    expect(header[0]).toBe('timestamp_utc');
    expect(row[3]).toHaveLength(4000);
    expect(row.slice(4)).toEqual([
      '{"temperatura":0.2}',
      '10',
      '20',
      '0.003500',
      '0.017500',
      'ok',
      'https://a.example/x\nhttps://b.example/y',
      '{"id":1}',
      '',
    ]);
  });
});

test('columnLetter', () => {
  expect([0, 25, 26, 27, 701, 702].map(columnLetter)).toEqual(['A', 'Z', 'AA', 'AB', 'ZZ', 'AAA']);
});
