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

import { ErrorType, Float64 } from 'colcalc-base-types';
import { Calculator } from 'colcalc-calculator';
import { TestPipeline, Tree } from './test-pipeline';

const calculator = new Calculator();

describe('loop', () => {

  test('bodies run in order, each iteration', () => {

    const pipeline = new TestPipeline({
      c: Float64([1, 2, 3, 4]),
      D: Float64([5, -5, 3, 6]),
    });

    const bodies = ['c+c', 'indx', 'D*c', 's-1'].map(text => Tree(calculator, text));
    const error = calculator.Loop('indx', 1, 3, bodies, ['c', 'r', 's', 't'], pipeline);

    expect(error).toBeUndefined();
    expect(pipeline.Values('c')).toEqual([4, 8, 12, 16]);
    expect(pipeline.Values('r')).toEqual([2, 2, 2, 2]);
    expect(pipeline.Values('s')).toEqual([20, -40, 36, 96]);
    expect(pipeline.Values('t')).toEqual([19, -41, 35, 95]);

  });

  test('negated loop variable', () => {
    const pipeline = new TestPipeline({ c: Float64([1, 2]) });
    const bodies = [Tree(calculator, 'c*-i')];
    expect(calculator.Loop('i', 2, 3, bodies, ['x'], pipeline)).toBeUndefined();
    expect(pipeline.Values('x')).toEqual([-2, -4]);
  });

  test('pins are released afterwards', () => {
    const pipeline = new TestPipeline({ c: Float64([1, 2]) });
    const body = Tree(calculator, 'c+i');
    expect(calculator.Loop('i', 0, 2, [body], ['x'], pipeline)).toBeUndefined();
    expect(pipeline.Values('x')).toEqual([2, 3]);
    expect(body.children[1].hold).toBe(false);

    // with nothing pinned, i is a field lookup again
    const result = calculator.Evaluate(body, pipeline);
    expect(result).toEqual({ error: ErrorType.Lookup, message: 'i is not in the pipeline' });
  });

  test('an empty range does nothing', () => {
    const pipeline = new TestPipeline({ c: Float64([1, 2]) });
    expect(calculator.Loop('i', 3, 3, [Tree(calculator, 'c+i')], ['x'], pipeline)).toBeUndefined();
    expect(pipeline.FieldNames()).toEqual(['c']);
  });

  test('bodies and targets have to match', () => {
    const pipeline = new TestPipeline({ c: Float64([1, 2]) });
    expect(calculator.Loop('i', 0, 2, [Tree(calculator, 'c')], ['x', 'y'], pipeline)).toEqual({
      error: ErrorType.Type,
      message: 'loop: 1 expressions for 2 targets',
    });
  });

  test('errors stop the loop', () => {
    const pipeline = new TestPipeline({ c: Float64([1, 2]) });
    const body = Tree(calculator, 'c/i');
    const error = calculator.Loop('i', 0, 2, [body], ['x'], pipeline);
    expect(error).toEqual({ error: ErrorType.Domain, message: 'division by zero' });
    expect(body.children[1].hold).toBe(false);
  });

  test('the loop variable hides a field', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const pipeline = new TestPipeline({ c: Float64([1, 2]), i: Float64([100, 100]) });
    expect(calculator.Loop('i', 1, 2, [Tree(calculator, 'c+i')], ['x'], pipeline)).toBeUndefined();
    expect(pipeline.Values('x')).toEqual([2, 3]);
    expect(warn).toHaveBeenCalledWith('loop variable i hides the field with the same name');
    warn.mockRestore();
  });

});
