import { classifyError, describeError, ErrorLog, FetchError, MissingCredentialsError } from '../src/errors.js';

describe('classifyError', () => {
  test.each([
    [new MissingCredentialsError('SAM_API_KEY'), 'missing credentials'],
    [new FetchError('HTTP 403 Forbidden', 'u', { status: 403 }), 'blocked'],
    [new FetchError('HTTP 404 Not Found', 'u', { status: 404 }), 'not found'],
    [new FetchError('HTTP 502 Bad Gateway', 'u', { status: 502 }), 'network'],
    [new FetchError('Request to u timed out', 'u'), 'timeout'],
    [new SyntaxError('Unexpected end of JSON input'), 'parse error'],
    [new Error('Please solve the captcha'), 'blocked'],
    [new Error('getaddrinfo ENOTFOUND example.invalid'), 'network'],
    [new FetchError('Error fetching u: socket hang up', 'u'), 'network'],
    [new Error('something else'), ''],
  ])('%s → %p', (error, hint) => {
    expect(classifyError(error)).toBe(hint);
  });
});

test('ErrorLog keeps entries in order with a stack trace', () => {
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
  const log = new ErrorLog(() => new Date('2024-01-01T00:00:00Z'));
  log.push('first', new Error('one'));
  log.push('second', 'plain');

  const [first, second] = log.toJSON();
  expect(first).toMatchObject({ timestamp: '2024-01-01T00:00:00.000Z', where: 'first', message: 'Error: one' });
  expect(first.stacktrace).toContain('Error: one');
  expect(second).toEqual({ timestamp: '2024-01-01T00:00:00.000Z', where: 'second', message: 'plain', stacktrace: '' });
  expect(log.size).toBe(2);
  jest.restoreAllMocks();
});

test('describeError', () => {
  expect(describeError(new TypeError('bad'))).toBe('TypeError: bad');
  expect(describeError(42)).toBe('42');
});
