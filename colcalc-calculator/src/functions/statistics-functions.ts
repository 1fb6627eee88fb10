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

import type { CalcError, TypedColumn } from 'colcalc-base-types';
import {
  ColumnKind, ColumnLength, DomainError, FunctionLevel, IsError, IsNumericColumn,
  NumericValues, Scalar, TakeColumn,
} from 'colcalc-base-types';
import type { ColumnResult, FunctionMap } from '../descriptors';
import { Broadcast, Numbers } from '../utilities';

const Sum = (values: Float64Array): number => {
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum;
};

/**
 * apply a function to the values of a numeric argument. empty columns
 * are an error unless allow_empty is set.
 */
const Reduce = (name: string, column: TypedColumn, fn: (values: Float64Array) => number|CalcError, allow_empty = false): ColumnResult => {

  const values = Numbers(column, name);
  if (!(values instanceof Float64Array)) {
    return values;
  }

  if (!values.length && !allow_empty) {
    return DomainError(`${name}: no values`);
  }

  const result = fn(values);
  return typeof result === 'number' ? Scalar(result) : result;

};

/**
 * min or max, for any kind. we find the index of the winning row and
 * take it, so the result keeps the argument's kind.
 */
const Extreme = (name: string, column: TypedColumn, sign: 1|-1): ColumnResult => {

  const count = ColumnLength(column);
  if (!count) {
    return DomainError(`${name}: no values`);
  }

  let best = 0;

  if (column.kind === ColumnKind.String) {
    const values = column.values;
    for (let i = 1; i < count; i++) {
      if ((values[i] < values[best] ? -1 : values[i] > values[best] ? 1 : 0) * sign > 0) {
        best = i;
      }
    }
  }
  else {
    const values = IsNumericColumn(column) ? NumericValues(column) : column.values;
    for (let i = 1; i < count; i++) {
      if ((values[i] - values[best]) * sign > 0) {
        best = i;
      }
    }
  }

  return TakeColumn(column, [best]);

};

/**
 * y and yhat broadcast against each other, as pairs
 */
const Residuals = (name: string, args: TypedColumn[]): { y: Float64Array, residuals: Float64Array }|CalcError => {

  const observed = Numbers(args[0], name);
  if (!(observed instanceof Float64Array)) {
    return observed;
  }

  const fitted = Numbers(args[1], name);
  if (!(fitted instanceof Float64Array)) {
    return fitted;
  }

  const shape = Broadcast([observed.length, fitted.length]);
  if (IsError(shape)) {
    return shape;
  }

  if (!shape.length) {
    return DomainError(`${name}: no values`);
  }

  const [sy, sf] = shape.strides;
  const y = new Float64Array(shape.length);
  const residuals = new Float64Array(shape.length);

  for (let i = 0, iy = 0, jf = 0; i < shape.length; i++, iy += sy, jf += sf) {
    y[i] = observed[iy];
    residuals[i] = observed[iy] - fitted[jf];
  }

  return { y, residuals };

};

const SumOfSquares = (values: Float64Array): number => {
  let sum = 0;
  for (const value of values) {
    sum += value * value;
  }
  return sum;
};

export const StatisticsFunctionLibrary: FunctionMap = {

  sum: {
    arguments: [{ name: 'x', kind: 'number' }],
    return_kind: ColumnKind.Float64,
    level: FunctionLevel.Reduction,
    fn: (args: TypedColumn[]) => Reduce('sum', args[0], Sum, true),
  },

  mean: {
    arguments: [{ name: 'x', kind: 'number' }],
    return_kind: ColumnKind.Float64,
    level: FunctionLevel.Reduction,
    fn: (args: TypedColumn[]) => Reduce('mean', args[0], values => Sum(values) / values.length),
  },

  min: {
    description: 'smallest value. strings compare lexicographically',
    arguments: [{ name: 'x', kind: 'any' }],
    return_kind: 'same',
    level: FunctionLevel.Reduction,
    fn: (args: TypedColumn[]) => Extreme('min', args[0], -1),
  },

  max: {
    description: 'largest value. strings compare lexicographically',
    arguments: [{ name: 'x', kind: 'any' }],
    return_kind: 'same',
    level: FunctionLevel.Reduction,
    fn: (args: TypedColumn[]) => Extreme('max', args[0], 1),
  },

  std: {
    description: 'sample standard deviation',
    arguments: [{ name: 'x', kind: 'number' }],
    return_kind: ColumnKind.Float64,
    level: FunctionLevel.Reduction,
    fn: (args: TypedColumn[]) => Reduce('std', args[0], values => {
      if (values.length < 2) {
        return DomainError('std: needs at least 2 values');
      }
      const mean = Sum(values) / values.length;
      let squares = 0;
      for (const value of values) {
        squares += (value - mean) * (value - mean);
      }
      return Math.sqrt(squares / (values.length - 1));
    }),
  },

  count: {
    arguments: [{ name: 'x', kind: 'any' }],
    return_kind: ColumnKind.Float64,
    level: FunctionLevel.Reduction,
    fn: (args: TypedColumn[]) => Scalar(ColumnLength(args[0])),
  },

  median: {
    description: 'empirical median. for an even count this is the lower middle value',
    arguments: [{ name: 'x', kind: 'number' }],
    return_kind: ColumnKind.Float64,
    level: FunctionLevel.Reduction,
    fn: (args: TypedColumn[]) => Reduce('median', args[0], values => {
      const sorted = values.slice(0).sort();
      return sorted[Math.ceil(sorted.length * 0.5) - 1];
    }),
  },

  r2: {
    description: 'coefficient of determination of yhat as a fit to y',
    arguments: [{ name: 'y', kind: 'number' }, { name: 'yhat', kind: 'number' }],
    return_kind: ColumnKind.Float64,
    level: FunctionLevel.Reduction,
    fn: (args: TypedColumn[]): ColumnResult => {
      const fit = Residuals('r2', args);
      if (IsError(fit)) {
        return fit;
      }
      const mean = Sum(fit.y) / fit.y.length;
      let total = 0;
      for (const value of fit.y) {
        total += (value - mean) * (value - mean);
      }
      if (total === 0) {
        return DomainError('r2: y has no variance');
      }
      return Scalar(1 - SumOfSquares(fit.residuals) / total);
    },
  },

  sse: {
    description: 'sum of squared errors',
    arguments: [{ name: 'y', kind: 'number' }, { name: 'yhat', kind: 'number' }],
    return_kind: ColumnKind.Float64,
    level: FunctionLevel.Reduction,
    fn: (args: TypedColumn[]): ColumnResult => {
      const fit = Residuals('sse', args);
      if (IsError(fit)) {
        return fit;
      }
      return Scalar(SumOfSquares(fit.residuals));
    },
  },

  mad: {
    description: 'mean absolute deviation of yhat from y',
    arguments: [{ name: 'y', kind: 'number' }, { name: 'yhat', kind: 'number' }],
    return_kind: ColumnKind.Float64,
    level: FunctionLevel.Reduction,
    fn: (args: TypedColumn[]): ColumnResult => {
      const fit = Residuals('mad', args);
      if (IsError(fit)) {
        return fit;
      }
      let sum = 0;
      for (const value of fit.residuals) {
        sum += Math.abs(value);
      }
      return Scalar(sum / fit.residuals.length);
    },
  },

};
