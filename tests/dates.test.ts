import {
  daysBetween,
  findDeadlineInText,
  monthFromName,
  parseDateAny,
  withinMinDays,
  zonedDate,
} from '../src/dates.js';

describe('parseDateAny', () => {
  test('reads ISO dates as they are', () => {
    expect(parseDateAny('2024-03-15')).toBe('2024-03-15');
  });

  test('reads numeric dates day-first with any separator', () => {
    expect(parseDateAny('15/03/2024')).toBe('2024-03-15');
    expect(parseDateAny('15-03-2024')).toBe('2024-03-15');
    expect(parseDateAny('15.03.2024')).toBe('2024-03-15');
    expect(parseDateAny('5/3/24')).toBe('2024-03-05');
  });

  test('reads month names in Portuguese and English', () => {
    expect(parseDateAny('5 de março de 2024')).toBe('2024-03-05');
    expect(parseDateAny('5 de marco de 2024')).toBe('2024-03-05');
    expect(parseDateAny('12 set. 2024')).toBe('2024-09-12');
    expect(parseDateAny('5 March 2024')).toBe('2024-03-05');
    expect(parseDateAny('March 5, 2024')).toBe('2024-03-05');
  });

  test('converts timestamps to the calendar date of the configured zone', () => {
    expect(parseDateAny('2024-03-15T02:00:00Z', 'America/Sao_Paulo')).toBe('2024-03-14');
    expect(parseDateAny('2024-03-15T02:00:00Z', 'UTC')).toBe('2024-03-15');
  });

  test('keeps the printed date of timestamps without an offset', () => {
    expect(parseDateAny('2024-01-15T00:00:00', 'America/Sao_Paulo')).toBe('2024-01-15');
    expect(parseDateAny('2024-01-15 23:59', 'Asia/Tokyo')).toBe('2024-01-15');
    expect(parseDateAny('2024-01-15T00:30:00-03:00', 'UTC')).toBe('2024-01-15');
    expect(parseDateAny('2024-01-15T23:30:00-03:00', 'UTC')).toBe('2024-01-16');
  });

  test('reads feed timestamps', () => {
    expect(parseDateAny('Fri, 15 Mar 2024 12:00:00 GMT', 'America/Sao_Paulo')).toBe('2024-03-15');
  });

  test('returns null for impossible or missing dates', () => {
    expect(parseDateAny('31/02/2024')).toBeNull();
    expect(parseDateAny('TBD')).toBeNull();
    expect(parseDateAny('em breve')).toBeNull();
    expect(parseDateAny('')).toBeNull();
    expect(parseDateAny(null)).toBeNull();
  });
});

describe('deadline window', () => {
  test('counts whole calendar days', () => {
    expect(daysBetween('2024-01-01', '2024-01-11')).toBe(10);
    expect(daysBetween('2024-02-28', '2024-03-01')).toBe(2);
  });

  test('is inclusive at the boundary', () => {
    expect(withinMinDays('2024-01-11', 10, '2024-01-01')).toBe(true);
    expect(withinMinDays('2024-01-10', 10, '2024-01-01')).toBe(false);
  });

  test('keeps unknown deadlines', () => {
    expect(withinMinDays(null, 10, '2024-01-01')).toBe(true);
  });
});

describe('deadline extraction from text', () => {
  test('prefers the date next to a deadline keyword', () => {
    expect(findDeadlineInText('Published 01/02/2025. Deadline: 10 April 2025')).toBe('2025-04-10');
    expect(findDeadlineInText('Inscrições até 30/06/2025 pelo portal')).toBe('2025-06-30');
  });

  test('falls back to the first date in the text', () => {
    expect(findDeadlineInText('Chamada publicada em 02/05/2025')).toBe('2025-05-02');
  });

  test('returns null when the text has no date', () => {
    expect(findDeadlineInText('Sem data definida')).toBeNull();
  });
});

test('monthFromName ignores accents and case', () => {
  expect(monthFromName('Março')).toBe(3);
  expect(monthFromName('DEZEMBRO')).toBe(12);
  expect(monthFromName('foo')).toBeNull();
});

test('zonedDate shifts across midnight', () => {
  expect(zonedDate(new Date('2024-06-01T01:30:00Z'), 'America/Sao_Paulo')).toBe('2024-05-31');
});
