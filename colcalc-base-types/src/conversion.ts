/*
 * This file is part of TREB.
 *
 * TREB is free software: you can redistribute it and/or modify it under the 
 * terms of the GNU General Public License as published by the Free Software 
 * Foundation, either version 3 of the License, or (at your option) any 
 * later version.
 *
 * TREB is distributed in the hope that it will be useful, but WITHOUT ANY 
 * WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS 
 * FOR A PARTICULAR PURPOSE. See the GNU General Public License for more 
 * details.
 *
 * You should have received a copy of the GNU General Public License along 
 * with TREB. If not, see <https://www.gnu.org/licenses/>. 
 *
 * Copyright 2022-2024 trebco, llc. 
 * info@treb.app
 * 
 */

import type { TypedColumn } from './column';
import { ColumnKind, IsNumericColumn, NumericValues } from './column';
import type { CalcError } from './errors';
import { ArgumentTypeError } from './errors';
import { DateFromNumber, FormatDate, ParseDate } from './date-utils';

/**
 * parse a number from text. unlike Number(), empty or blank strings
 * are not zero.
 */
export const ParseNumber = (text: string): number|undefined => {
  const trimmed = text.trim();
  if (!trimmed.length) {
    return undefined;
  }
  const value = Number(trimmed);
  return isNaN(value) ? undefined : value;
};

const Unconvertible = (value: string|number, kind: ColumnKind) => {
  return ArgumentTypeError(`cannot convert '${value}' to ${kind}`);
};

/** numbers for the numeric targets, from anything that isn't a date */
const ToNumbers = (column: TypedColumn, kind: ColumnKind): Float64Array|CalcError => {

  if (IsNumericColumn(column)) {
    return NumericValues(column);
  }

  if (column.kind === ColumnKind.String) {
    const values = new Float64Array(column.values.length);
    for (let i = 0; i < column.values.length; i++) {
      const value = ParseNumber(column.values[i]);
      if (value === undefined) {
        return Unconvertible(column.values[i], kind);
      }
      values[i] = value;
    }
    return values;
  }

  return ArgumentTypeError(`cannot convert ${column.kind} to ${kind}`);

};

/**
 * convert a column to another kind. this is the only place values change
 * kind. if the column is already the right kind it's returned as-is (not
 * copied); columns are never written in place, so that's safe.
 *
 * precision applies to float → string only.
 */
export const ConvertColumn = (column: TypedColumn, kind: ColumnKind, precision = 2): TypedColumn|CalcError => {

  if (column.kind === kind) {
    return column;
  }

  switch (kind) {
    case ColumnKind.Float64: {
      const values = ToNumbers(column, kind);
      if (!(values instanceof Float64Array)) {
        return values;
      }
      return { kind, values: values.slice(0) };
    }

    case ColumnKind.Int32:
    case ColumnKind.Int64: {
      const values = ToNumbers(column, kind);
      if (!(values instanceof Float64Array)) {
        return values;
      }
      for (const value of values) {
        if (!Number.isFinite(value)) {
          return Unconvertible(value, kind);
        }
      }
      if (kind === ColumnKind.Int32) {
        return { kind, values: Int32Array.from(values, value => Math.trunc(value)) };
      }
      return { kind, values: BigInt64Array.from(values, value => BigInt(Math.trunc(value))) };
    }

    case ColumnKind.String:
      switch (column.kind) {
        case ColumnKind.Float64:
          return { kind, values: Array.from(column.values, value => value.toFixed(precision)) };
        case ColumnKind.Int32:
          return { kind, values: Array.from(column.values, value => value.toString()) };
        case ColumnKind.Int64:
          return { kind, values: Array.from(column.values, value => value.toString()) };
        case ColumnKind.Timestamp:
          return { kind, values: Array.from(column.values, value => FormatDate(value)) };
      }
      break;

    case ColumnKind.Timestamp: {
      const values = new Float64Array(column.values.length);
      if (column.kind === ColumnKind.String) {
        for (let i = 0; i < column.values.length; i++) {
          const date = ParseDate(column.values[i]);
          if (date === undefined) {
            return Unconvertible(column.values[i], kind);
          }
          values[i] = date;
        }
        return { kind, values };
      }
      if (IsNumericColumn(column)) {
        const numbers = NumericValues(column);
        for (let i = 0; i < numbers.length; i++) {
          const date = DateFromNumber(numbers[i]);
          if (date === undefined) {
            return Unconvertible(numbers[i], kind);
          }
          values[i] = date;
        }
        return { kind, values };
      }
      break;
    }
  }

  return ArgumentTypeError(`cannot convert ${column.kind} to ${kind}`);

};

/**
 * element as display text, for printing. this is looser than converting
 * to string: floats print as-is, without fixed precision.
 */
export const DisplayValue = (column: TypedColumn, index: number): string => {
  switch (column.kind) {
    case ColumnKind.Timestamp:
      return FormatDate(column.values[index]);
    case ColumnKind.String:
      return column.values[index];
    default:
      return column.values[index].toString();
  }
};
