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

import type { TypedColumn } from 'colcalc-base-types';
import {
  AddMonths, ColumnKind, ConstructDate, ConvertColumn, DaysInMonth,
  FunctionLevel, GetDateParts, IsError,
} from 'colcalc-base-types';
import type { DateParts } from 'colcalc-base-types';
import type { ColumnResult, FunctionMap } from '../descriptors';
import { Broadcast, Numbers, TimestampValues } from '../utilities';

/** int column from one calendar part */
const DatePart = (name: string, column: TypedColumn, part: (parts: DateParts) => number): ColumnResult => {
  const values = TimestampValues(column, name);
  if (!(values instanceof Float64Array)) {
    return values;
  }
  return { kind: ColumnKind.Int32, values: Int32Array.from(values, value => part(GetDateParts(value))) };
};

/** dates moved to a day in the same month */
const MonthDay = (name: string, column: TypedColumn, day: (parts: DateParts) => number): ColumnResult => {
  const values = TimestampValues(column, name);
  if (!(values instanceof Float64Array)) {
    return values;
  }
  return {
    kind: ColumnKind.Timestamp,
    values: values.map(value => {
      const parts = GetDateParts(value);
      return ConstructDate(parts.year, parts.month, day(parts)) ?? value;
    }),
  };
};

export const DateFunctionLibrary: FunctionMap = {

  toDate: {
    description: 'convert to a date. strings can be YYYYMMDD, YYYY-MM-DD or M/D/YYYY; numbers are YYYYMMDD',
    arguments: [{ name: 'x', kind: 'any' }],
    return_kind: ColumnKind.Timestamp,
    level: FunctionLevel.Row,
    fn: (args: TypedColumn[]) => ConvertColumn(args[0], ColumnKind.Timestamp),
  },

  dateAdd: {
    description: 'add months to a date',
    arguments: [{ name: 'date', kind: 'timestamp' }, { name: 'months', kind: 'number' }],
    return_kind: ColumnKind.Timestamp,
    level: FunctionLevel.Row,
    fn: (args: TypedColumn[]): ColumnResult => {

      const dates = TimestampValues(args[0], 'dateAdd');
      if (!(dates instanceof Float64Array)) {
        return dates;
      }

      const months = Numbers(args[1], 'dateAdd');
      if (!(months instanceof Float64Array)) {
        return months;
      }

      const shape = Broadcast([dates.length, months.length]);
      if (IsError(shape)) {
        return shape;
      }

      const [sd, sm] = shape.strides;
      const result = new Float64Array(shape.length);

      for (let i = 0, id = 0, im = 0; i < shape.length; i++, id += sd, im += sm) {
        result[i] = AddMonths(dates[id], months[im]);
      }

      return { kind: ColumnKind.Timestamp, values: result };

    },
  },

  year: {
    arguments: [{ name: 'date', kind: 'timestamp' }],
    return_kind: ColumnKind.Int32,
    level: FunctionLevel.Row,
    fn: (args: TypedColumn[]) => DatePart('year', args[0], parts => parts.year),
  },

  month: {
    description: 'month, 1-12',
    arguments: [{ name: 'date', kind: 'timestamp' }],
    return_kind: ColumnKind.Int32,
    level: FunctionLevel.Row,
    fn: (args: TypedColumn[]) => DatePart('month', args[0], parts => parts.month),
  },

  day: {
    description: 'day of the month',
    arguments: [{ name: 'date', kind: 'timestamp' }],
    return_kind: ColumnKind.Int32,
    level: FunctionLevel.Row,
    fn: (args: TypedColumn[]) => DatePart('day', args[0], parts => parts.day),
  },

  toFirstDayOfMonth: {
    arguments: [{ name: 'date', kind: 'timestamp' }],
    return_kind: ColumnKind.Timestamp,
    level: FunctionLevel.Row,
    fn: (args: TypedColumn[]) => MonthDay('toFirstDayOfMonth', args[0], () => 1),
  },

  toLastDayOfMonth: {
    arguments: [{ name: 'date', kind: 'timestamp' }],
    return_kind: ColumnKind.Timestamp,
    level: FunctionLevel.Row,
    fn: (args: TypedColumn[]) => MonthDay('toLastDayOfMonth', args[0], parts => DaysInMonth(parts.year, parts.month)),
  },

};
