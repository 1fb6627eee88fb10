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
  ArgumentTypeError, ColumnKind, ColumnLength, ConcatColumns, ConvertColumn, DomainError,
  FunctionLevel, IsError, IsNumericColumn, ShapeError, TakeColumn,
} from 'colcalc-base-types';
import type { ColumnResult, FunctionContext, FunctionMap } from '../descriptors';
import { Broadcast, FirstNumber, Numbers } from '../utilities';

const int32_min = -(2 ** 31);
const int32_max = 2 ** 31 - 1;

/** largest column range() will allocate */
const max_range_length = 2 ** 30;

/**
 * running sum or product over the rows strictly before (or after) each
 * row. the first (or last) row has nothing to accumulate and gets the
 * edge value.
 */
const Accumulate = (
    name: string,
    args: TypedColumn[],
    edge: number,
    reverse: boolean,
    accumulate: (a: number, b: number) => number): ColumnResult => {

  const values = Numbers(args[0], name);
  if (!(values instanceof Float64Array)) {
    return values;
  }

  if (args.length > 1) {
    const fill = FirstNumber(args[1], name);
    if (typeof fill !== 'number') {
      return fill;
    }
    edge = fill;
  }

  const count = values.length;
  const result = new Float64Array(count);

  if (!count) {
    return { kind: ColumnKind.Float64, values: result };
  }

  if (reverse) {
    result[count - 1] = edge;
    let running = values[count - 1];
    for (let i = count - 2; i >= 0; i--) {
      result[i] = running;
      running = accumulate(running, values[i]);
    }
  }
  else {
    result[0] = edge;
    let running = values[0];
    for (let i = 1; i < count; i++) {
      result[i] = running;
      running = accumulate(running, values[i]);
    }
  }

  return { kind: ColumnKind.Float64, values: result };

};

/** numeric columns of different kinds are compared as floats */
const CommonKind = (a: TypedColumn, b: TypedColumn): [TypedColumn, TypedColumn]|undefined => {
  if (a.kind === b.kind) {
    return [a, b];
  }
  if (IsNumericColumn(a) && IsNumericColumn(b)) {
    const fa = ConvertColumn(a, ColumnKind.Float64);
    const fb = ConvertColumn(b, ColumnKind.Float64);
    if (!IsError(fa) && !IsError(fb)) {
      return [fa, fb];
    }
  }
  return undefined;
};

export const RowFunctionLibrary: FunctionMap = {

  if: {
    description: 'choose a where cond is true (> 0), b otherwise',
    arguments: [
      { name: 'cond', kind: 'number' },
      { name: 'a', kind: 'any' },
      { name: 'b', kind: 'any' },
    ],
    return_kind: 'any',
    level: FunctionLevel.Row,
    fn: (args: TypedColumn[]): ColumnResult => {

      const condition = Numbers(args[0], 'if');
      if (!(condition instanceof Float64Array)) {
        return condition;
      }

      const pair = CommonKind(args[1], args[2]);
      if (!pair) {
        return ArgumentTypeError(`if: can't mix ${args[1].kind} and ${args[2].kind}`);
      }

      const [a, b] = pair;
      const shape = Broadcast([condition.length, ColumnLength(a), ColumnLength(b)]);
      if (IsError(shape)) {
        return shape;
      }

      // take from a column that's a followed by b

      const merged = ConcatColumns(a, b);
      if (!merged) {
        return ArgumentTypeError(`if: can't mix ${a.kind} and ${b.kind}`);
      }

      const offset = ColumnLength(a);
      const [sc, sa, sb] = shape.strides;
      const indices = new Int32Array(shape.length);

      for (let i = 0, ic = 0, ia = 0, ib = 0; i < shape.length; i++, ic += sc, ia += sa, ib += sb) {
        indices[i] = condition[ic] > 0 ? ia : offset + ib;
      }

      return TakeColumn(merged, indices);

    },
  },

  lag: {
    description: 'value from the previous row; the first row gets missing',
    arguments: [
      { name: 'x', kind: 'any' },
      { name: 'missing', kind: 'any' },
    ],
    return_kind: 'same',
    level: FunctionLevel.Row,
    fn: (args: TypedColumn[], context: FunctionContext): ColumnResult => {

      const [x, missing] = args;

      const fill = ConvertColumn(missing, x.kind, context.options.string_precision);
      if (IsError(fill)) {
        return fill;
      }

      // [missing, x0, x1, ...], then drop the last one

      const merged = ConcatColumns(TakeColumn(fill, [0]), x);
      if (!merged) {
        return ArgumentTypeError(`lag: can't convert ${missing.kind} to ${x.kind}`);
      }

      return TakeColumn(merged, Int32Array.from({ length: ColumnLength(x) }, (_, i) => i));

    },
  },

  cumeBefore: {
    description: 'sum of the rows before this one',
    arguments: [{ name: 'x', kind: 'number' }, { name: 'fill', kind: 'number', optional: true }],
    return_kind: ColumnKind.Float64,
    level: FunctionLevel.Row,
    fn: (args: TypedColumn[]) => Accumulate('cumeBefore', args, 0, false, (a, b) => a + b),
  },

  cumeAfter: {
    description: 'sum of the rows after this one',
    arguments: [{ name: 'x', kind: 'number' }, { name: 'fill', kind: 'number', optional: true }],
    return_kind: ColumnKind.Float64,
    level: FunctionLevel.Row,
    fn: (args: TypedColumn[]) => Accumulate('cumeAfter', args, 0, true, (a, b) => a + b),
  },

  prodBefore: {
    description: 'product of the rows before this one',
    arguments: [{ name: 'x', kind: 'number' }, { name: 'fill', kind: 'number', optional: true }],
    return_kind: ColumnKind.Float64,
    level: FunctionLevel.Row,
    fn: (args: TypedColumn[]) => Accumulate('prodBefore', args, 1, false, (a, b) => a * b),
  },

  prodAfter: {
    description: 'product of the rows after this one',
    arguments: [{ name: 'x', kind: 'number' }, { name: 'fill', kind: 'number', optional: true }],
    return_kind: ColumnKind.Float64,
    level: FunctionLevel.Row,
    fn: (args: TypedColumn[]) => Accumulate('prodAfter', args, 1, true, (a, b) => a * b),
  },

  countBefore: {
    description: 'number of rows before this one',
    arguments: [{ name: 'x', kind: 'any' }],
    return_kind: ColumnKind.Int32,
    level: FunctionLevel.Row,
    fn: (args: TypedColumn[]): ColumnResult => {
      return { kind: ColumnKind.Int32, values: Int32Array.from({ length: ColumnLength(args[0]) }, (_, i) => i) };
    },
  },

  countAfter: {
    description: 'number of rows after this one',
    arguments: [{ name: 'x', kind: 'any' }],
    return_kind: ColumnKind.Int32,
    level: FunctionLevel.Row,
    fn: (args: TypedColumn[]): ColumnResult => {
      const count = ColumnLength(args[0]);
      return { kind: ColumnKind.Int32, values: Int32Array.from({ length: count }, (_, i) => count - 1 - i) };
    },
  },

  row: {
    description: 'row number, starting at 0',
    arguments: [{ name: 'x', kind: 'any' }],
    return_kind: ColumnKind.Int32,
    level: FunctionLevel.Row,
    fn: (args: TypedColumn[]): ColumnResult => {
      return { kind: ColumnKind.Int32, values: Int32Array.from({ length: ColumnLength(args[0]) }, (_, i) => i) };
    },
  },

  index: {
    description: 'x at the rows given by idx',
    arguments: [{ name: 'x', kind: 'any' }, { name: 'idx', kind: 'number' }],
    return_kind: 'same',
    level: FunctionLevel.Row,
    fn: (args: TypedColumn[]): ColumnResult => {

      const [x, idx] = args;

      const positions = Numbers(idx, 'index');
      if (!(positions instanceof Float64Array)) {
        return positions;
      }

      const count = ColumnLength(x);
      const indices = new Int32Array(positions.length);

      for (let i = 0; i < positions.length; i++) {
        const position = Math.trunc(positions[i]);
        if (!(position >= 0 && position < count)) {
          return ShapeError(`index: ${positions[i]} is out of range (${count} rows)`);
        }
        indices[i] = position;
      }

      return TakeColumn(x, indices);

    },
  },

  range: {
    description: 'integers from start up to (not including) end',
    arguments: [{ name: 'start', kind: 'number' }, { name: 'end', kind: 'number' }],
    return_kind: ColumnKind.Int32,
    level: FunctionLevel.Row,
    fn: (args: TypedColumn[]): ColumnResult => {

      const start = FirstNumber(args[0], 'range');
      if (typeof start !== 'number') {
        return start;
      }

      const end = FirstNumber(args[1], 'range');
      if (typeof end !== 'number') {
        return end;
      }

      const from = Math.trunc(start);
      const to = Math.trunc(end);

      // values are int32, and the end is exclusive

      if (!(from >= int32_min && to <= int32_max + 1)) {
        return DomainError(`range: [${start}, ${end}) is outside the 32-bit integer range`);
      }

      if (!(to > from)) {
        return DomainError(`range: empty range [${start}, ${end})`);
      }

      if (to - from > max_range_length) {
        return DomainError(`range: [${start}, ${end}) has more than ${max_range_length} rows`);
      }

      return { kind: ColumnKind.Int32, values: Int32Array.from({ length: to - from }, (_, i) => from + i) };

    },
  },

  exist: {
    description: 'a if it can be evaluated, otherwise b',
    arguments: [{ name: 'a', kind: 'any' }, { name: 'b', kind: 'any' }],
    return_kind: 'any',
    level: FunctionLevel.Row,
    fallback: true,
  },

};
