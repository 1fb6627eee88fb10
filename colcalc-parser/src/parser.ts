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

import type { CalcError, FunctionLookup } from 'colcalc-base-types';
import { ParseError, RequiredArguments } from 'colcalc-base-types';
import type { OpNode, ParseResult } from './parser-types';
import { CreateNode, OperatorClasses } from './parser-types';
import {
  CheckParentheses,
  FindOperator,
  IsNumericLiteral,
  IsStringLiteral,
  IsWrapped,
  MatchFunctionCall,
  SplitArguments,
  StripOuterParens,
  StripWhitespace,
} from './scanner';

/**
 * where a leading minus applies: to the whole node, or only to the
 * first operand of a split at an additive (or lower) operator.
 */
type NegationTarget = 'node'|'first';

/**
 * parser for column expressions. this is a recursive splitter rather
 * than a tokenizer: at each node we look for the lowest-precedence
 * top-level operator and split there, or recognize a function call and
 * split its arguments, or stop at a leaf.
 *
 * the parser needs a function lookup so it can reject unknown functions
 * and check argument counts, but it never touches data.
 */
export class Parser {

  constructor(protected readonly functions: FunctionLookup) {}

  /**
   * parses expression and returns the root of the tree. on failure, the
   * result is not valid and there's no tree.
   */
  public Parse(expression: string): ParseResult {

    const root = CreateNode(expression);
    const error = this.BuildTree(root);

    if (error) {
      return { valid: false, error };
    }

    return { valid: true, root };

  }

  /**
   * build the subtree for a node from its expression text. the node is
   * modified in place (expression is normalized, and we add functor and
   * children).
   */
  public BuildTree(node: OpNode): CalcError|undefined {

    let text = StripWhitespace(node.expression);

    if (!text.length) {
      return ParseError('empty expression');
    }

    const paren_error = CheckParentheses(text);
    if (paren_error) {
      return paren_error;
    }

    text = StripOuterParens(text);

    // leading minus. "--a" toggles twice. once we have a split at a low
    // precedence operator, the rest belongs to the first operand.

    let negate_first = false;

    while (text[0] === '-' && text.length > 1) {
      const target = this.NegationTarget(text);
      text = StripOuterParens(text.substring(1));
      if (target === 'first') {
        negate_first = true;
        break;
      }
      node.negate = !node.negate;
    }

    // "()" or "-()" strip down to nothing

    if (!text.length) {
      return ParseError('empty expression');
    }

    node.expression = text;

    let parts: string[] = [];

    const call = MatchFunctionCall(text);

    if (call) {

      const descriptor = this.functions.Get(call.name);
      if (!descriptor) {
        return ParseError(`unknown function: ${call.name}`);
      }

      parts = SplitArguments(call.inner);

      if (descriptor.arguments) {
        const required = RequiredArguments(descriptor);
        const declared = descriptor.arguments.length;
        if (parts.length < required || parts.length > declared) {
          const expected = required === declared ? `${declared}` : `${required}-${declared}`;
          return ParseError(`${descriptor.name}: expected ${expected} arguments, got ${parts.length}`);
        }
      }

      node.functor = { type: 'function', descriptor };

    }
    else {
      for (const operator_class of OperatorClasses) {
        const match = FindOperator(text, operator_class.tokens, operator_class.last);
        if (match) {
          if (match.operator === '-') {
            node.functor = { type: 'operator', operator: '+' };
            parts = [match.left, '-' + match.right];
          }
          else {
            node.functor = { type: 'operator', operator: match.operator };
            parts = [match.left, match.right];
          }
          break;
        }
      }
    }

    // leaves stop here. what kind of leaf it is gets decided when we
    // evaluate, but a leaf can't have operators or parens in it.

    if (!node.functor && !IsNumericLiteral(text) && !IsStringLiteral(text) && /[-+*/^<>=!&|(),]/.test(text)) {
      return ParseError(`invalid expression: ${text}`);
    }

    for (const part of parts) {
      const child = CreateNode(part);
      const error = this.BuildTree(child);
      if (error) {
        return error;
      }
      node.children.push(child);
    }

    if (negate_first) {
      if (!node.children.length) {
        return ParseError(`invalid expression: -${text}`);
      }
      node.children[0].negate = !node.children[0].negate;
    }

    return undefined;

  }

  /**
   * check which part of the expression a leading minus applies to. text
   * still has the minus at index 0, which the operator scan skips.
   */
  protected NegationTarget(text: string): NegationTarget {

    if (IsWrapped(text.substring(1))) {
      return 'node';
    }

    // logical, comparison, additive: these bind looser than negation

    for (const operator_class of OperatorClasses.slice(0, 3)) {
      if (FindOperator(text, operator_class.tokens, operator_class.last)) {
        return 'first';
      }
    }

    return 'node';

  }

}
