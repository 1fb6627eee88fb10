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
import { ColumnKind, DomainError, FunctionLevel, Scalar, ShapeError } from 'colcalc-base-types';
import type { ColumnResult, FunctionContext, FunctionMap } from '../descriptors';
import { FirstNumber, Numbers } from '../utilities';

const golden = (Math.sqrt(5) - 1) / 2;

/** rates at or below -100% aren't meaningful, and blow up the discount */
const min_rate = -0.999;

/**
 * present value. cash flow i (starting at 0) is discounted i periods,
 * so the first flow is not discounted. with a single rate every period
 * uses it; otherwise flow i is discounted at rate i.
 */
const PresentValue = (rates: Float64Array, cashflows: Float64Array): number => {
  let pv = 0;
  for (let i = 0; i < cashflows.length; i++) {
    const rate = rates.length === 1 ? rates[0] : rates[i];
    pv += cashflows[i] * Math.pow(1 + rate, -i);
  }
  return pv;
};

/**
 * derivative-free minimization, for the irr. first we walk downhill from
 * the guess, growing the step each time, until the function turns up;
 * that brackets a minimum. then golden-section search inside the bracket.
 * both phases are limited to max_iterations.
 */
const Minimize = (f: (x: number) => number, guess: number, max_iterations: number): number|undefined => {

  let step = 0.1;

  let a = guess;
  let fa = f(a);
  let b = Math.max(min_rate, guess + step);
  let fb = f(b);

  if (fb > fa) {
    [a, b] = [b, a];
    [fa, fb] = [fb, fa];
    step = -step;
  }

  let c = b;
  let bracketed = false;

  for (let i = 0; i < max_iterations; i++) {
    step *= 2;
    c = Math.max(min_rate, b + step);
    const fc = f(c);
    if (fc >= fb || c === b) {
      bracketed = true;
      break;
    }
    a = b;
    b = c;
    fb = fc;
  }

  if (!bracketed) {
    return undefined;
  }

  let lo = Math.min(a, c);
  let hi = Math.max(a, c);

  let x1 = hi - golden * (hi - lo);
  let x2 = lo + golden * (hi - lo);
  let f1 = f(x1);
  let f2 = f(x2);

  for (let i = 0; i < max_iterations; i++) {
    if (f1 < f2) {
      hi = x2;
      x2 = x1;
      f2 = f1;
      x1 = hi - golden * (hi - lo);
      f1 = f(x1);
    }
    else {
      lo = x1;
      x1 = x2;
      f1 = f2;
      x2 = lo + golden * (hi - lo);
      f2 = f(x2);
    }
  }

  return (lo + hi) / 2;

};

/** rates have to be a single value, or one per cash flow */
const RatesAndCashflows = (name: string, args: TypedColumn[]): [Float64Array, Float64Array]|CalcError => {

  const rates = Numbers(args[0], name);
  if (!(rates instanceof Float64Array)) {
    return rates;
  }

  const cashflows = Numbers(args[1], name);
  if (!(cashflows instanceof Float64Array)) {
    return cashflows;
  }

  if (rates.length !== 1 && rates.length !== cashflows.length) {
    return ShapeError(`${name}: ${rates.length} rates for ${cashflows.length} cash flows`);
  }

  return [rates, cashflows];

};

export const FinanceFunctionLibrary: FunctionMap = {

  npv: {
    description: 'net present value of a series of cash flows',
    arguments: [{ name: 'rate', kind: 'number' }, { name: 'cashflows', kind: 'number' }],
    return_kind: ColumnKind.Float64,
    level: FunctionLevel.Reduction,
    fn: (args: TypedColumn[]): ColumnResult => {
      const inputs = RatesAndCashflows('npv', args);
      if (!Array.isArray(inputs)) {
        return inputs;
      }
      const [rates, cashflows] = inputs;
      return Scalar(PresentValue(rates, cashflows));
    },
  },

  irr: {
    description: 'rate at which the present value of the cash flows equals cost',
    arguments: [{ name: 'cost', kind: 'number' }, { name: 'cashflows', kind: 'number' }],
    return_kind: ColumnKind.Float64,
    level: FunctionLevel.Reduction,
    fn: (args: TypedColumn[], context: FunctionContext): ColumnResult => {

      const cost = FirstNumber(args[0], 'irr');
      if (typeof cost !== 'number') {
        return cost;
      }

      const cashflows = Numbers(args[1], 'irr');
      if (!(cashflows instanceof Float64Array)) {
        return cashflows;
      }

      const rate = new Float64Array(1);
      const Residual = (x: number) => {
        rate[0] = x;
        return PresentValue(rate, cashflows) - cost;
      };

      const { irr_guess, irr_tolerance, irr_max_iterations } = context.options;
      const result = Minimize(x => Residual(x) * Residual(x), irr_guess, irr_max_iterations);

      // tolerance is relative to the size of the flows, so a zero cost
      // (the usual form, with a negative first flow) can still succeed

      let scale = Math.abs(cost);
      for (const cashflow of cashflows) {
        scale = Math.max(scale, Math.abs(cashflow));
      }

      if (result === undefined || !(Math.abs(Residual(result)) <= irr_tolerance * scale)) {
        return DomainError('irr: no solution found');
      }

      return Scalar(result);

    },
  },

};
