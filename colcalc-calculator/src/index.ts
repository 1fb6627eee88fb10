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

export { Calculator } from './calculator';
export { DefaultCalculatorOptions } from './calculator-options';
export type { CalculatorOptions, PlotDimensions } from './calculator-options';
export type {
  ColumnResult, CompositeFunctionDescriptor, ExtendedFunctionDescriptor,
  FunctionContext, FunctionMap,
} from './descriptors';
export { ExpressionCalculator } from './expression-calculator';
export { FunctionLibrary } from './function-library';
export { Loop } from './loop';
export { PipelineAdapter } from './pipeline-adapter';
export type { PlotState } from './plot-state';
export { Broadcast } from './utilities';
