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
import { ArgumentTypeError, ColumnKind, ConvertColumn, FunctionLevel, IsError } from 'colcalc-base-types';
import type { ColumnResult, FunctionContext, FunctionMap } from '../descriptors';
import { Broadcast, Numbers, StringValues } from '../utilities';

/**
 * elementwise over two string columns, with broadcasting
 */
const StringPair = (name: string, args: TypedColumn[], fn: (a: string, b: string) => number): ColumnResult => {

  const a = StringValues(args[0], name);
  if (!Array.isArray(a)) {
    return a;
  }

  const b = StringValues(args[1], name);
  if (!Array.isArray(b)) {
    return b;
  }

  const shape = Broadcast([a.length, b.length]);
  if (IsError(shape)) {
    return shape;
  }

  const [sa, sb] = shape.strides;
  const result = new Int32Array(shape.length);

  for (let i = 0, ia = 0, ib = 0; i < shape.length; i++, ia += sa, ib += sb) {
    result[i] = fn(a[ia], b[ib]);
  }

  return { kind: ColumnKind.Int32, values: result };

};

export const TextFunctionLibrary: FunctionMap = {

  concat: {
    description: 'join two values as strings',
    arguments: [{ name: 'a', kind: 'any' }, { name: 'b', kind: 'any' }],
    return_kind: ColumnKind.String,
    level: FunctionLevel.Row,
    fn: (args: TypedColumn[], context: FunctionContext): ColumnResult => {

      const a = ConvertColumn(args[0], ColumnKind.String, context.options.string_precision);
      if (IsError(a)) {
        return a;
      }

      const b = ConvertColumn(args[1], ColumnKind.String, context.options.string_precision);
      if (IsError(b)) {
        return b;
      }

      if (a.kind !== ColumnKind.String || b.kind !== ColumnKind.String) {
        return ArgumentTypeError(`concat: can't convert ${args[0].kind} and ${args[1].kind} to strings`);
      }

      const shape = Broadcast([a.values.length, b.values.length]);
      if (IsError(shape)) {
        return shape;
      }

      const [sa, sb] = shape.strides;
      const values: string[] = [];

      for (let i = 0, ia = 0, ib = 0; i < shape.length; i++, ia += sa, ib += sb) {
        values.push(a.values[ia] + b.values[ib]);
      }

      return { kind: ColumnKind.String, values };

    },
  },

  substr: {
    description: 'substring, with a 0-based start',
    arguments: [
      { name: 's', kind: 'string' },
      { name: 'start', kind: 'number' },
      { name: 'length', kind: 'number' },
    ],
    return_kind: ColumnKind.String,
    level: FunctionLevel.Row,
    fn: (args: TypedColumn[]): ColumnResult => {

      const text = StringValues(args[0], 'substr');
      if (!Array.isArray(text)) {
        return text;
      }

      const start = Numbers(args[1], 'substr');
      if (!(start instanceof Float64Array)) {
        return start;
      }

      const length = Numbers(args[2], 'substr');
      if (!(length instanceof Float64Array)) {
        return length;
      }

      const shape = Broadcast([text.length, start.length, length.length]);
      if (IsError(shape)) {
        return shape;
      }

      const [sx, sp, sl] = shape.strides;
      const values: string[] = [];

      for (let i = 0, ix = 0, ip = 0, il = 0; i < shape.length; i++, ix += sx, ip += sp, il += sl) {
        const from = Math.max(0, Math.trunc(start[ip]));
        const count = Math.max(0, Math.trunc(length[il]));
        values.push(text[ix].substring(from, from + count));
      }

      return { kind: ColumnKind.String, values };

    },
  },

  strPos: {
    description: 'position of needle in s, or -1',
    arguments: [{ name: 's', kind: 'string' }, { name: 'needle', kind: 'string' }],
    return_kind: ColumnKind.Int32,
    level: FunctionLevel.Row,
    fn: (args: TypedColumn[]) => StringPair('strPos', args, (s, needle) => s.indexOf(needle)),
  },

  strCount: {
    description: 'count of (non-overlapping) occurrences of needle in s',
    arguments: [{ name: 's', kind: 'string' }, { name: 'needle', kind: 'string' }],
    return_kind: ColumnKind.Int32,
    level: FunctionLevel.Row,
    fn: (args: TypedColumn[]) => StringPair('strCount', args, (s, needle) => needle.length ? s.split(needle).length - 1 : 0),
  },

  strLen: {
    arguments: [{ name: 's', kind: 'string' }],
    return_kind: ColumnKind.Int32,
    level: FunctionLevel.Row,
    fn: (args: TypedColumn[]): ColumnResult => {
      const text = StringValues(args[0], 'strLen');
      if (!Array.isArray(text)) {
        return text;
      }
      return { kind: ColumnKind.Int32, values: Int32Array.from(text, value => value.length) };
    },
  },

};
