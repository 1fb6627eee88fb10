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

import type { CalcError } from 'colcalc-base-types';
import { ArgumentTypeError, IsError, Scalar } from 'colcalc-base-types';
import type { OpNode } from 'colcalc-parser';
import { Walk } from 'colcalc-parser';
import type { ExpressionCalculator } from './expression-calculator';
import type { PipelineAdapter } from './pipeline-adapter';

/**
 * set (or release) the loop variable on every leaf that refers to it.
 * pinned leaves are not evaluated, so the variable hides any field with
 * the same name.
 */
const Pin = (node: OpNode, loop_var: string, index?: number): void => {
  Walk(node, test => {
    if (!test.functor && test.expression === loop_var) {
      if (index === undefined) {
        test.hold = false;
        test.value = undefined;
      }
      else {
        test.hold = true;
        test.value = Scalar(test.negate && index !== 0 ? -index : index);
      }
    }
    return true;
  });
};

/**
 * evaluate each body for every integer in [start, end), storing body i
 * in field targets[i] after each evaluation. bodies run in order, so a
 * body sees what earlier bodies stored in the same iteration.
 */
export const Loop = (
    calculator: ExpressionCalculator,
    adapter: PipelineAdapter,
    loop_var: string,
    start: number,
    end: number,
    bodies: OpNode[],
    targets: string[]): CalcError|undefined => {

  if (!bodies.length || bodies.length !== targets.length) {
    return ArgumentTypeError(`loop: ${bodies.length} expressions for ${targets.length} targets`);
  }

  if (adapter.Has(loop_var)) {
    console.warn(`loop variable ${loop_var} hides the field with the same name`);
  }

  try {
    for (let index = Math.trunc(start); index < end; index++) {
      for (let i = 0; i < bodies.length; i++) {

        const body = bodies[i];
        Pin(body, loop_var, index);

        const result = calculator.Calculate(body, adapter);
        if (IsError(result)) {
          return result;
        }

        const error = adapter.Store(targets[i], result, body.role);
        if (error) {
          return error;
        }

      }
    }
  }
  finally {
    for (const body of bodies) {
      Pin(body, loop_var);
    }
  }

  return undefined;

};
