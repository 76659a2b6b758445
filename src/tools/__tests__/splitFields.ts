import splitFields from '../splitFields';
import ErrorWithCode, {hasErrorCode} from '../errorWithCode';

test('splits every line by comma', () => {
  expect(splitFields(['id,name', '1,Knight', '2,,x'])).toEqual([
    ['id', 'name'],
    ['1', 'Knight'],
    ['2', '', 'x'],
  ]);
});

test('splits a single line', () => {
  expect(splitFields(['a;b;c'], ';')).toEqual([['a', 'b', 'c']]);
});

test('returns no rows for no lines', () => {
  expect(splitFields([])).toEqual([]);
});

test('rejects an empty delimiter', () => {
  expect(() => splitFields(['a'], '')).toThrow(ErrorWithCode);
  let caught: unknown = null;
  try {
    splitFields(['a'], '');
  } catch (error) {
    caught = error;
  }
  expect(hasErrorCode(caught, 'INVALID_DELIMITER')).toBe(true);
  expect(hasErrorCode(caught, 'ASSET_NOT_FOUND')).toBe(false);
});
