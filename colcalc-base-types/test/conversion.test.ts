
import { ColumnKind, Float64, Int32, Int64, Strings, Timestamps } from '../src/column';
import { ConvertColumn, DisplayValue, ParseNumber } from '../src/conversion';
import { ErrorType } from '../src/errors';

const feb_28 = Date.UTC(2023, 1, 28);

describe('convert column', () => {

  test('same kind is a no-op', () => {
    const column = Float64([1, 2]);
    expect(ConvertColumn(column, ColumnKind.Float64)).toBe(column);
  });

  test('float to string uses fixed precision', () => {
    expect(ConvertColumn(Float64([1, 2.5]), ColumnKind.String)).toEqual(Strings(['1.00', '2.50']));
    expect(ConvertColumn(Float64([1]), ColumnKind.String, 0)).toEqual(Strings(['1']));
  });

  test('integers to string', () => {
    expect(ConvertColumn(Int32([3, -4]), ColumnKind.String)).toEqual(Strings(['3', '-4']));
    expect(ConvertColumn(Int64([5]), ColumnKind.String)).toEqual(Strings(['5']));
  });

  test('string to float', () => {
    expect(ConvertColumn(Strings(['3', ' 4.5 ']), ColumnKind.Float64)).toEqual(Float64([3, 4.5]));
    expect(ConvertColumn(Strings(['a']), ColumnKind.Float64)).toEqual({
      error: ErrorType.Type, message: `cannot convert 'a' to float64`,
    });
    expect(ConvertColumn(Strings(['']), ColumnKind.Float64)).toEqual({
      error: ErrorType.Type, message: `cannot convert '' to float64`,
    });
  });

  test('truncation to integers', () => {
    expect(ConvertColumn(Float64([1.9, -1.9]), ColumnKind.Int32)).toEqual(Int32([1, -1]));
    expect(ConvertColumn(Float64([1.9, -1.9]), ColumnKind.Int64)).toEqual(Int64([1, -1]));
    expect(ConvertColumn(Strings(['12.7']), ColumnKind.Int64)).toEqual(Int64([12]));
    expect(ConvertColumn(Float64([NaN]), ColumnKind.Int32)).toEqual({
      error: ErrorType.Type, message: `cannot convert 'NaN' to int32`,
    });
  });

  test('dates', () => {
    expect(ConvertColumn(Timestamps([feb_28]), ColumnKind.String)).toEqual(Strings(['2/28/2023']));
    expect(ConvertColumn(Strings(['2/28/2023', '2023-02-28']), ColumnKind.Timestamp)).toEqual(Timestamps([feb_28, feb_28]));
    expect(ConvertColumn(Int32([20230228]), ColumnKind.Timestamp)).toEqual(Timestamps([feb_28]));
    expect(ConvertColumn(Strings(['2/30/2023']), ColumnKind.Timestamp)).toEqual({
      error: ErrorType.Type, message: `cannot convert '2/30/2023' to timestamp`,
    });
  });

  test('dates are not numbers', () => {
    expect(ConvertColumn(Timestamps([feb_28]), ColumnKind.Float64)).toEqual({
      error: ErrorType.Type, message: 'cannot convert timestamp to float64',
    });
  });

});

test('parse number', () => {
  expect(ParseNumber(' 1e3 ')).toBe(1000);
  expect(ParseNumber('  ')).toBeUndefined();
  expect(ParseNumber('1a')).toBeUndefined();
});

test('display value', () => {
  expect(DisplayValue(Float64([1, 1.5]), 0)).toBe('1');
  expect(DisplayValue(Float64([1, 1.5]), 1)).toBe('1.5');
  expect(DisplayValue(Int64([7]), 0)).toBe('7');
  expect(DisplayValue(Strings(['x']), 0)).toBe('x');
  expect(DisplayValue(Timestamps([feb_28]), 0)).toBe('2/28/2023');
});
