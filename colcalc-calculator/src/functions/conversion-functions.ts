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
import { ColumnKind, ConvertColumn, FieldRole, FunctionLevel, IsNumericColumn } from 'colcalc-base-types';
import type { CompositeFunctionDescriptor, FunctionContext, FunctionMap } from '../descriptors';

/**
 * declared apart from the map: as a key in an object literal, toString
 * would take its type from Object.prototype
 */
const to_string: CompositeFunctionDescriptor = {
  description: 'convert to string. floats use fixed precision, dates are M/D/YYYY',
  arguments: [{ name: 'x', kind: 'any' }],
  return_kind: ColumnKind.String,
  level: FunctionLevel.Row,
  fn: (args: TypedColumn[], context: FunctionContext) => {
    return ConvertColumn(args[0], ColumnKind.String, context.options.string_precision);
  },
};

export const ConversionFunctionLibrary: FunctionMap = {

  toString: to_string,

  toFloat: {
    arguments: [{ name: 'x', kind: 'any' }],
    return_kind: ColumnKind.Float64,
    level: FunctionLevel.Row,
    role: FieldRole.Continuous,
    fn: (args: TypedColumn[]) => ConvertColumn(args[0], ColumnKind.Float64),
  },

  toInt: {
    description: 'convert to a 64-bit integer, truncating',
    arguments: [{ name: 'x', kind: 'any' }],
    return_kind: ColumnKind.Int64,
    level: FunctionLevel.Row,
    role: FieldRole.Categorical,
    fn: (args: TypedColumn[]) => ConvertColumn(args[0], ColumnKind.Int64),
  },

  cat: {
    description: 'mark as categorical. numbers are truncated to integers',
    arguments: [{ name: 'x', kind: 'any' }],
    return_kind: 'any',
    level: FunctionLevel.Row,
    role: FieldRole.Categorical,
    fn: (args: TypedColumn[]) => {
      const [x] = args;
      if (IsNumericColumn(x) && x.kind !== ColumnKind.Int64) {
        return ConvertColumn(x, ColumnKind.Int32);
      }
      return x;
    },
  },

};
