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

import type { CalcError, FunctionDescriptor, TypedColumn } from 'colcalc-base-types';
import type { OpNode } from 'colcalc-parser';
import type { CalculatorOptions } from './calculator-options';
import type { PlotState } from './plot-state';

export type ColumnResult = TypedColumn|CalcError;

/**
 * passed to functions that work on whole columns. most don't need it;
 * output and plot functions do, and some functions read options.
 */
export interface FunctionContext {

  /** the call node, for functions that want the argument text */
  node: OpNode;

  options: CalculatorOptions;

  plot: PlotState;

}

/**
 * function descriptor with an evaluation strategy. there are three:
 *
 * map: an elementwise numeric kernel. arguments are broadcast against
 * each other and the kernel is called once per row. if there's a domain
 * check it's called first, and a message means the row is invalid.
 *
 * fn: whole-column function. gets the evaluated arguments (kinds already
 * checked against the signature) and returns a column or an error.
 *
 * fallback: evaluate the first argument, and on a lookup error use the
 * second instead. this one is handled by the calculator, since it has to
 * control evaluation of the arguments.
 *
 * the name is set when the descriptor is registered.
 */
export interface CompositeFunctionDescriptor extends Omit<FunctionDescriptor, 'name'> {

  map?: (...args: number[]) => number;

  domain?: (...args: number[]) => string|undefined;

  fn?: (args: TypedColumn[], context: FunctionContext) => ColumnResult;

  fallback?: boolean;

}

export interface ExtendedFunctionDescriptor extends CompositeFunctionDescriptor {
  name: string;
}

export interface FunctionMap {
  [index: string]: CompositeFunctionDescriptor;
}
