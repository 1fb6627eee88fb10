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
import { FieldRole } from 'colcalc-base-types';

export type LogicalOperator = '&&'|'||';
export type ComparisonOperator = '>'|'>='|'<'|'<='|'=='|'!=';
export type AdditiveOperator = '+'|'-';
export type MultiplicativeOperator = '*'|'/';
export type PowerOperator = '^';

export type Operator =
  | LogicalOperator
  | ComparisonOperator
  | AdditiveOperator
  | MultiplicativeOperator
  | PowerOperator
  ;

/**
 * subtraction never reaches the tree, it's rewritten as addition of a
 * negated operand
 */
export type NodeOperator = Exclude<Operator, '-'>;

export interface OperatorClass<T extends Operator = Operator> {
  tokens: readonly T[];

  /** split at the last match instead of the first */
  last: boolean;
}

/**
 * precedence classes, lowest to highest. multiplicative splits at the
 * last match so a/b*c is (a/b)*c; additive can split at the first match
 * because a-b-c is a+(-b)+(-c).
 */
export const OperatorClasses: OperatorClass[] = [
  { tokens: ['&&', '||'], last: false },
  { tokens: ['>=', '<=', '==', '!=', '>', '<'], last: false },
  { tokens: ['+', '-'], last: false },
  { tokens: ['*', '/'], last: true },
  { tokens: ['^'], last: false },
];

export const IsComparisonOperator = (operator: Operator): operator is ComparisonOperator => {
  return operator === '>' || operator === '>=' || operator === '<'
      || operator === '<=' || operator === '==' || operator === '!=';
};

export const IsLogicalOperator = (operator: Operator): operator is LogicalOperator => {
  return operator === '&&' || operator === '||';
};

export interface OperatorFunctor {
  type: 'operator';
  operator: NodeOperator;
}

export interface FunctionFunctor {
  type: 'function';

  /** shared, never modified */
  descriptor: FunctionDescriptor;
}

export type Functor = OperatorFunctor|FunctionFunctor;

/**
 * expression tree node. the structure (expression, functor, negate,
 * children) is fixed when the tree is built; value and role are written
 * on every evaluation, and hold is set by the loop driver.
 */
export interface OpNode {

  /** source text for this node, whitespace and wrapping parens removed */
  expression: string;

  /** operator or function. leaves have none */
  functor?: Functor;

  negate: boolean;

  children: OpNode[];

  role: FieldRole;

  /** result of the last evaluation */
  value?: TypedColumn;

  /** pinned: don't evaluate, use value */
  hold: boolean;

}

export const CreateNode = (expression: string): OpNode => {
  return {
    expression,
    negate: false,
    children: [],
    role: FieldRole.Undetermined,
    hold: false,
  };
};

export interface ParseResult {
  valid: boolean;
  root?: OpNode;
  error?: CalcError;
}
