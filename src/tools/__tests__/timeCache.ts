import TimeCache from '../timeCache';

afterEach(() => {
  jest.useRealTimers();
});

test('returns values until they expire', () => {
  jest.useFakeTimers();
  jest.setSystemTime(1000);

  const cache = new TimeCache<string, string>({maxSize: 10, ttl: 500});
  cache.set('intro', 'Hello');
  expect(cache.get('intro')).toBe('Hello');

  jest.setSystemTime(1499);
  expect(cache.get('intro')).toBe('Hello');

  jest.setSystemTime(1500);
  expect(cache.get('intro')).toBeUndefined();
  expect(cache.size).toBe(0);
});

test('clear drops every entry', () => {
  const cache = new TimeCache<string, number>({maxSize: 10, ttl: 60000});
  cache.set('a', 1).set('b', 2);
  cache.clear();
  expect(cache.get('a')).toBeUndefined();
  expect(cache.size).toBe(0);
});
