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

import type { ComparisonOperator, NodeOperator } from 'colcalc-parser';

/**
 * binary operations on numbers. comparisons and logicals return 0/1,
 * and logical truth is > 0.
 */
export type NumericKernel = (a: number, b: number) => number;

const Truth = (value: boolean): number => value ? 1 : 0;

export const Add: NumericKernel = (a, b) => a + b;

export const Multiply: NumericKernel = (a, b) => a * b;

/** callers check for zero, this doesn't */
export const Divide: NumericKernel = (a, b) => a / b;

export const Power: NumericKernel = (a, b) => Math.pow(a, b);

export const NumericKernels: Record<NodeOperator, NumericKernel> = {
  '+': Add,
  '*': Multiply,
  '/': Divide,
  '^': Power,
  '>': (a, b) => Truth(a > b),
  '>=': (a, b) => Truth(a >= b),
  '<': (a, b) => Truth(a < b),
  '<=': (a, b) => Truth(a <= b),
  '==': (a, b) => Truth(a === b),
  '!=': (a, b) => Truth(a !== b),
  '&&': (a, b) => Truth(a > 0 && b > 0),
  '||': (a, b) => Truth(a > 0 || b > 0),
};

/** order of two strings, by code unit */
export const OrderStrings = (a: string, b: string): number => a < b ? -1 : a > b ? 1 : 0;

/** order of two int64 values. as doubles these lose precision above 2^53 */
export const OrderBigInts = (a: bigint, b: bigint): number => a < b ? -1 : a > b ? 1 : 0;

/** result of a comparison operator, given the order of its operands */
export const CompareOrder = (operator: ComparisonOperator, order: number): number => {
  return NumericKernels[operator](order, 0);
};
