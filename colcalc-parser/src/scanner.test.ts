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

import { ErrorType } from 'colcalc-base-types';
import {
  CheckParentheses,
  FindOperator,
  IsNumericLiteral,
  MatchFunctionCall,
  SplitArguments,
  StripOuterParens,
  StripWhitespace,
} from './scanner';

describe('find operator', () => {

  test('two-character tokens first', () => {
    expect(FindOperator('a>=b', ['>', '>='])).toEqual({ operator: '>=', left: 'a', right: 'b' });
  });

  test('first and last match', () => {
    expect(FindOperator('a/b*c', ['*', '/'])?.operator).toBe('/');
    expect(FindOperator('a/b*c', ['*', '/'], true)).toEqual({ operator: '*', left: 'a/b', right: 'c' });
  });

  test('ignores operators in parens and quotes', () => {
    expect(FindOperator('(a+b)', ['+', '-'])).toBeUndefined();
    expect(FindOperator(`'a+b'`, ['+', '-'])).toBeUndefined();
    expect(FindOperator(`f(a+b)+'c-d'+e`, ['+', '-'])).toEqual({ operator: '+', left: 'f(a+b)', right: `'c-d'+e` });
  });

  test('never splits at the ends', () => {
    expect(FindOperator('-a', ['+', '-'])).toBeUndefined();
    expect(FindOperator('a-', ['+', '-'])).toBeUndefined();
  });

  test('signs are not operators', () => {
    expect(FindOperator('a*-b', ['+', '-'])).toBeUndefined();
    expect(FindOperator('2.5e-3', ['+', '-'])).toBeUndefined();
    expect(FindOperator('x1e-3', ['+', '-'])).toEqual({ operator: '-', left: 'x1e', right: '3' });
  });

});

describe('parens', () => {

  test('strip outer parens', () => {
    expect(StripOuterParens('((a))')).toBe('a');
    expect(StripOuterParens('(a)+(b)')).toBe('(a)+(b)');
    expect(StripOuterParens(`('(')`)).toBe(`'('`);
  });

  test('check', () => {
    expect(CheckParentheses('(a)+(b)')).toBeUndefined();
    expect(CheckParentheses(`'('`)).toBeUndefined();
    expect(CheckParentheses(')(')?.error).toBe(ErrorType.Parse);
    expect(CheckParentheses('(()')).toEqual({ error: ErrorType.Parse, message: 'mismatched parentheses: (()' });
  });

});

describe('arguments', () => {

  test('split', () => {
    expect(SplitArguments(`a,(b,c),'x,y'`)).toEqual(['a', '(b,c)', `'x,y'`]);
  });

  test('empty', () => {
    expect(SplitArguments('')).toEqual([]);
  });

  test('function call', () => {
    expect(MatchFunctionCall('log(c)')).toEqual({ name: 'log', inner: 'c' });
    expect(MatchFunctionCall('log(c)*(c-2)')).toBeUndefined();
    expect(MatchFunctionCall('(c)')).toBeUndefined();
  });

});

describe('text', () => {

  test('whitespace outside quotes', () => {
    expect(StripWhitespace(` a + 'b c' `)).toBe(`a+'b c'`);
  });

  test('numeric literals', () => {
    expect(IsNumericLiteral('1')).toBeTruthy();
    expect(IsNumericLiteral('.1')).toBeTruthy();
    expect(IsNumericLiteral('1.5e-7')).toBeTruthy();
    expect(IsNumericLiteral('1.2.3')).toBeFalsy();
    expect(IsNumericLiteral('c1')).toBeFalsy();
  });

});
