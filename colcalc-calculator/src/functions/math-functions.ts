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

import { ColumnKind, FunctionLevel } from 'colcalc-base-types';
import type { FunctionMap } from '../descriptors';

/**
 * elementwise math. these all go through the shared broadcasting path,
 * so each one is just a kernel (and maybe a domain check).
 */
export const MathFunctionLibrary: FunctionMap = {

  log: {
    description: 'natural logarithm',
    arguments: [{ name: 'x', kind: 'number' }],
    return_kind: ColumnKind.Float64,
    level: FunctionLevel.Row,
    domain: (x: number) => x > 0 ? undefined : `${x} is not positive`,
    map: (x: number) => Math.log(x),
  },

  exp: {
    arguments: [{ name: 'x', kind: 'number' }],
    return_kind: ColumnKind.Float64,
    level: FunctionLevel.Row,
    map: (x: number) => Math.exp(x),
  },

  abs: {
    arguments: [{ name: 'x', kind: 'number' }],
    return_kind: ColumnKind.Float64,
    level: FunctionLevel.Row,
    map: (x: number) => Math.abs(x),
  },

  sqrt: {
    arguments: [{ name: 'x', kind: 'number' }],
    return_kind: ColumnKind.Float64,
    level: FunctionLevel.Row,
    domain: (x: number) => x >= 0 ? undefined : `${x} is negative`,
    map: (x: number) => Math.sqrt(x),
  },

  pow: {
    description: 'x raised to the power y',
    arguments: [{ name: 'x', kind: 'number' }, { name: 'y', kind: 'number' }],
    return_kind: ColumnKind.Float64,
    level: FunctionLevel.Row,
    map: (x: number, y: number) => Math.pow(x, y),
  },

};
