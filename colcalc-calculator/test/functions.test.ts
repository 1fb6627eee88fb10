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

import { ColumnKind, ErrorType, FieldRole, Float64, IsError, Strings, Timestamps } from 'colcalc-base-types';
import { Calculator } from 'colcalc-calculator';
import { Run, TestPipeline, Tree, Values } from './test-pipeline';

const calculator = new Calculator();

describe('row functions', () => {

  const pipeline = new TestPipeline({
    c: Float64([1, 2, 3, 4]),
    s: Strings(['w', 'x', 'y', 'z']),
  });

  test('counts and row numbers', () => {
    expect(Values(Run(calculator, 'countBefore(c)', pipeline))).toEqual([0, 1, 2, 3]);
    expect(Values(Run(calculator, 'countAfter(c)', pipeline))).toEqual([3, 2, 1, 0]);
    expect(Values(Run(calculator, 'row(s)', pipeline))).toEqual([0, 1, 2, 3]);
  });

  test('running sums and products', () => {
    expect(Values(Run(calculator, 'cumeBefore(c)', pipeline))).toEqual([0, 1, 3, 6]);
    expect(Values(Run(calculator, 'cumeAfter(c,-1)', pipeline))).toEqual([9, 7, 4, -1]);
    expect(Values(Run(calculator, 'prodBefore(c)', pipeline))).toEqual([1, 1, 2, 6]);
    expect(Values(Run(calculator, 'prodAfter(c)', pipeline))).toEqual([24, 12, 4, 1]);
  });

  test('if', () => {
    expect(Values(Run(calculator, `if(c>2,'hi','lo')`, pipeline))).toEqual(['lo', 'lo', 'hi', 'hi']);
    expect(Values(Run(calculator, 'if(c>2,row(c),c)', pipeline))).toEqual([1, 2, 2, 3]);
    expect(Run(calculator, `if(c>2,'a',c)`, pipeline)).toEqual({
      error: ErrorType.Type,
      message: `if: can't mix string and float64`,
    });
  });

  test('lag', () => {
    expect(Values(Run(calculator, `lag(s,'none')`, pipeline))).toEqual(['none', 'w', 'x', 'y']);
    expect(Values(Run(calculator, 'lag(c,0)', pipeline))).toEqual([0, 1, 2, 3]);
    expect(Run(calculator, `lag(c,'none')`, pipeline)).toEqual({
      error: ErrorType.Type,
      message: `cannot convert 'none' to float64`,
    });
  });

  test('index', () => {
    expect(Values(Run(calculator, 'index(s,3-row(c))', pipeline))).toEqual(['z', 'y', 'x', 'w']);
    expect(Values(Run(calculator, 'index(c,0)', pipeline))).toEqual([1]);
    expect(Run(calculator, 'index(c,4)', pipeline)).toEqual({
      error: ErrorType.Shape,
      message: 'index: 4 is out of range (4 rows)',
    });
  });

  test('range', () => {
    expect(Values(Run(calculator, 'range(2,5)', pipeline))).toEqual([2, 3, 4]);
    expect(Run(calculator, 'range(3,3)', pipeline)).toEqual({
      error: ErrorType.Domain,
      message: 'range: empty range [3, 3)',
    });
  });

  test('range bounds', () => {
    expect(Run(calculator, 'range(0,3e9)', pipeline)).toEqual({
      error: ErrorType.Domain,
      message: 'range: [0, 3000000000) is outside the 32-bit integer range',
    });
    expect(Run(calculator, 'range(0,1e400)', pipeline)).toEqual({
      error: ErrorType.Domain,
      message: 'range: [0, Infinity) is outside the 32-bit integer range',
    });
    expect(Run(calculator, 'range(-2e9,2e9)', pipeline)).toEqual({
      error: ErrorType.Domain,
      message: 'range: [-2000000000, 2000000000) has more than 1073741824 rows',
    });
  });

  test('exist only recovers from missing fields', () => {
    expect(Values(Run(calculator, `exist(missing,'default')`, pipeline))).toEqual(['default']);
    const result = Run(calculator, 'exist(c/0,c)', pipeline);
    expect(IsError(result) && result.error).toBe(ErrorType.Domain);
  });

  test('exist takes the role of the branch it used', () => {
    const root = Tree(calculator, 'exist(s,c)');
    calculator.Evaluate(root, pipeline);
    expect(root.role).toBe(FieldRole.Categorical);
  });

});

describe('date functions', () => {

  const pipeline = new TestPipeline({
    d: Timestamps([Date.UTC(2024, 0, 31), Date.UTC(2023, 1, 10)]),
  });

  test('toDate', () => {
    expect(Values(Run(calculator, `toString(toDate('20240131'))`, pipeline))).toEqual(['1/31/2024']);
    expect(Values(Run(calculator, `toString(toDate('2024-3-5'))`, pipeline))).toEqual(['3/5/2024']);
    expect(Values(Run(calculator, `toString(toDate('12/25/2023'))`, pipeline))).toEqual(['12/25/2023']);
    expect(Values(Run(calculator, 'toString(toDate(20240315))', pipeline))).toEqual(['3/15/2024']);
    expect(Run(calculator, `toDate('2024-13-01')`, pipeline)).toEqual({
      error: ErrorType.Type,
      message: `cannot convert '2024-13-01' to timestamp`,
    });
  });

  test('dateAdd clamps to the end of the month', () => {
    expect(Values(Run(calculator, 'toString(dateAdd(d,1))', pipeline))).toEqual(['2/29/2024', '3/10/2023']);
    expect(Values(Run(calculator, `toString(dateAdd(toDate('2024-03-31'),-13))`, pipeline))).toEqual(['2/28/2023']);
  });

  test('parts', () => {
    expect(Values(Run(calculator, 'year(d)', pipeline))).toEqual([2024, 2023]);
    expect(Values(Run(calculator, 'month(d)', pipeline))).toEqual([1, 2]);
    expect(Values(Run(calculator, 'day(d)', pipeline))).toEqual([31, 10]);
    const result = Run(calculator, 'day(d)', pipeline);
    expect(!IsError(result) && result.kind).toBe(ColumnKind.Int32);
  });

  test('first and last day of the month', () => {
    expect(Values(Run(calculator, 'toString(toFirstDayOfMonth(d))', pipeline))).toEqual(['1/1/2024', '2/1/2023']);
    expect(Values(Run(calculator, 'toString(toLastDayOfMonth(d))', pipeline))).toEqual(['1/31/2024', '2/28/2023']);
  });

  test('dates compare with dates and strings', () => {
    expect(Values(Run(calculator, `d > '2024-01-01'`, pipeline))).toEqual([1, 0]);
    expect(Values(Run(calculator, `toDate('2/10/2023') == d`, pipeline))).toEqual([0, 1]);
  });

  test('date arguments are checked', () => {
    expect(Run(calculator, 'year(2024)', pipeline)).toEqual({
      error: ErrorType.Type,
      message: 'year: date should be timestamp, got float64',
    });
  });

});

describe('text functions', () => {

  const pipeline = new TestPipeline({
    c: Float64([1, 2]),
    s: Strings(['banana', 'apple']),
  });

  test('concat', () => {
    expect(Values(Run(calculator, `concat('a',c)`, pipeline))).toEqual(['a1.00', 'a2.00']);
    expect(Values(Run(calculator, `concat(s,'!')`, pipeline))).toEqual(['banana!', 'apple!']);
    const whole = new Calculator({ string_precision: 0 });
    expect(Values(Run(whole, `concat('a',c)`, pipeline))).toEqual(['a1', 'a2']);
  });

  test('substr', () => {
    expect(Values(Run(calculator, 'substr(s,1,3)', pipeline))).toEqual(['ana', 'ppl']);
    expect(Values(Run(calculator, 'substr(s,4,10)', pipeline))).toEqual(['na', 'e']);
  });

  test('search', () => {
    expect(Values(Run(calculator, `strPos(s,'an')`, pipeline))).toEqual([1, -1]);
    expect(Values(Run(calculator, `strCount(s,'a')`, pipeline))).toEqual([3, 1]);
    expect(Values(Run(calculator, 'strLen(s)', pipeline))).toEqual([6, 5]);
  });

});

describe('conversion functions', () => {

  const pipeline = new TestPipeline({
    c: Float64([1, 2.5]),
    s: Strings(['3.5', '-1']),
  });

  test('toString', () => {
    expect(Values(Run(calculator, 'toString(c)', pipeline))).toEqual(['1.00', '2.50']);
    expect(Values(Run(calculator, 'toString(toInt(c))', pipeline))).toEqual(['1', '2']);
  });

  test('toFloat', () => {
    const root = Tree(calculator, 'toFloat(s)');
    expect(Values(calculator.Evaluate(root, pipeline))).toEqual([3.5, -1]);
    expect(root.role).toBe(FieldRole.Continuous);
  });

  test('toInt truncates', () => {
    const root = Tree(calculator, 'toInt(-c)');
    const result = calculator.Evaluate(root, pipeline);
    expect(!IsError(result) && result.kind).toBe(ColumnKind.Int64);
    expect(Values(result)).toEqual([-1, -2]);
    expect(root.role).toBe(FieldRole.Categorical);
    expect(Run(calculator, `toInt('x')`, pipeline)).toEqual({
      error: ErrorType.Type,
      message: `cannot convert 'x' to int64`,
    });
  });

  test('cat', () => {
    const root = Tree(calculator, 'cat(c)');
    const result = calculator.Evaluate(root, pipeline);
    expect(!IsError(result) && result.kind).toBe(ColumnKind.Int32);
    expect(Values(result)).toEqual([1, 2]);
    expect(root.role).toBe(FieldRole.Categorical);

    const strings = Tree(calculator, 'cat(s)');
    expect(Values(calculator.Evaluate(strings, pipeline))).toEqual(['3.5', '-1']);
    expect(strings.role).toBe(FieldRole.Categorical);
  });

});

describe('statistics functions', () => {

  const pipeline = new TestPipeline({
    c: Float64([1, 2, 3, 4]),
    u: Float64([4, 1, 3, 1]),
    s: Strings(['pear', 'apple', 'fig', 'plum']),
  });

  test('reductions', () => {
    expect(Values(Run(calculator, 'sum(c)', pipeline))).toEqual([10]);
    expect(Values(Run(calculator, 'mean(c)', pipeline))).toEqual([2.5]);
    expect(Values(Run(calculator, 'count(s)', pipeline))).toEqual([4]);
    expect(Values(Run(calculator, 'median(c)', pipeline))).toEqual([2]);
    expect(Values(Run(calculator, 'median(u)', pipeline))).toEqual([1]);
    expect(Values(Run(calculator, 'std(c)', pipeline))[0]).toBeCloseTo(1.290994, 5);
  });

  test('min and max keep the kind', () => {
    expect(Values(Run(calculator, 'min(u)', pipeline))).toEqual([1]);
    expect(Values(Run(calculator, 'max(u)', pipeline))).toEqual([4]);
    expect(Values(Run(calculator, 'min(s)', pipeline))).toEqual(['apple']);
    expect(Values(Run(calculator, 'max(s)', pipeline))).toEqual(['plum']);
    const result = Run(calculator, 'max(row(c))', pipeline);
    expect(!IsError(result) && result.kind).toBe(ColumnKind.Int32);
    expect(Values(result)).toEqual([3]);
  });

  test('fit measures', () => {
    expect(Values(Run(calculator, 'r2(c,c+1)', pipeline))[0]).toBeCloseTo(0.2, 10);
    expect(Values(Run(calculator, 'sse(c,c+1)', pipeline))).toEqual([4]);
    expect(Values(Run(calculator, 'mad(c,c+1)', pipeline))).toEqual([1]);
    expect(Values(Run(calculator, 'sse(c,2)', pipeline))).toEqual([6]);
  });

  test('errors', () => {
    expect(Run(calculator, 'std(1)', pipeline)).toEqual({
      error: ErrorType.Domain,
      message: 'std: needs at least 2 values',
    });
    expect(Run(calculator, 'r2(1,c)', pipeline)).toEqual({
      error: ErrorType.Domain,
      message: 'r2: y has no variance',
    });
  });

});

describe('finance functions', () => {

  const pipeline = new TestPipeline({
    c: Float64([1, 2, 3, 4]),
    r: Float64([0.1, 0.2, 0.3, 0.4]),
  });

  test('npv with a rate per period', () => {
    expect(Values(Run(calculator, 'npv(r,c)', pipeline))[0]).toBeCloseTo(5.8995, 3);
  });

  test('npv with zero rate is the sum', () => {
    expect(Values(Run(calculator, 'npv(0,c)', pipeline))).toEqual([10]);
  });

  test('npv rates have to line up', () => {
    expect(Run(calculator, 'npv(range(1,3),c)', pipeline)).toEqual({
      error: ErrorType.Shape,
      message: 'npv: 2 rates for 4 cash flows',
    });
  });

  test('irr fails without a solution', () => {
    expect(Run(calculator, 'irr(-1,c)', pipeline)).toEqual({
      error: ErrorType.Domain,
      message: 'irr: no solution found',
    });
  });

  test('irr with zero cost', () => {
    const flows = [-100, 30, 40, 50, 20];
    const pipeline = new TestPipeline({ f: Float64(flows), g: Float64([-1, 1.1, 0, 0, 0]) });

    expect(Values(Run(calculator, 'irr(0,g)', pipeline))[0]).toBeCloseTo(0.1, 4);

    const rate = Values(Run(calculator, 'irr(0,f)', pipeline))[0];
    if (typeof rate !== 'number') {
      throw new Error('expected a number');
    }
    const npv = flows.reduce((sum, flow, i) => sum + flow * Math.pow(1 + rate, -i), 0);
    expect(Math.abs(npv)).toBeLessThan(1e-3);
  });

  test('irr of a single period', () => {
    // 1 + 2/(1+r) = 2 at r = 1
    const result = Values(Run(calculator, 'irr(2,index(c,range(0,2)))', pipeline));
    expect(result[0]).toBeCloseTo(1, 3);
  });

});
