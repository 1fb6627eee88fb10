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

import type { CalcError, Float64Column, TypedColumn } from 'colcalc-base-types';
import {
  ArgumentTypeError, ColumnKind, IsNumericColumn, NumericValues, Scalar, ShapeError,
} from 'colcalc-base-types';

export interface BroadcastShape {

  /** result length */
  length: number;

  /** per operand: 0 for scalars, 1 otherwise */
  strides: number[];

}

/**
 * the broadcasting rule. result length is the longest operand; every
 * operand has to be either that length or length 1.
 */
export const Broadcast = (lengths: number[]): BroadcastShape|CalcError => {

  const length = lengths.reduce((a, b) => Math.max(a, b), 0);

  for (const test of lengths) {
    if (test !== 1 && test !== length) {
      return ShapeError(`can't broadcast lengths (${lengths.join(', ')})`);
    }
  }

  return {
    length,
    strides: lengths.map(test => test === 1 ? 0 : 1),
  };

};

/** output and plot functions return this */
export const Sentinel = (): Float64Column => Scalar(0);

/**
 * values of a numeric argument. the signature check should have caught
 * anything else, but functions can be called with unchecked arguments.
 */
export const Numbers = (column: TypedColumn, name: string): Float64Array|CalcError => {
  if (!IsNumericColumn(column)) {
    return ArgumentTypeError(`${name}: expected a number, got ${column.kind}`);
  }
  return NumericValues(column);
};

/** first value of a numeric argument */
export const FirstNumber = (column: TypedColumn, name: string): number|CalcError => {
  const values = Numbers(column, name);
  if (!(values instanceof Float64Array)) {
    return values;
  }
  if (!values.length) {
    return ShapeError(`${name}: empty argument`);
  }
  return values[0];
};

export const StringValues = (column: TypedColumn, name: string): string[]|CalcError => {
  if (column.kind !== ColumnKind.String) {
    return ArgumentTypeError(`${name}: expected a string, got ${column.kind}`);
  }
  return column.values;
};

/** first value of a string argument */
export const FirstString = (column: TypedColumn, name: string): string|CalcError => {
  const values = StringValues(column, name);
  if (!Array.isArray(values)) {
    return values;
  }
  if (!values.length) {
    return ShapeError(`${name}: empty argument`);
  }
  return values[0];
};

export const TimestampValues = (column: TypedColumn, name: string): Float64Array|CalcError => {
  if (column.kind !== ColumnKind.Timestamp) {
    return ArgumentTypeError(`${name}: expected a timestamp, got ${column.kind}`);
  }
  return column.values;
};
