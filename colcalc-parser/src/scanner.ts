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
import { ParseError } from 'colcalc-base-types';
import type { Operator } from './parser-types';

const SINGLE_QUOTE = 0x27;
const OPEN_PAREN = 0x28;
const CLOSE_PAREN = 0x29;
const COMMA = 0x2c;

/**
 * a + or - right after one of these is a sign, not an operator
 */
const sign_context = '+-*/^<>=!&|(,';

export interface OperatorMatch<T extends Operator = Operator> {
  operator: T;
  left: string;
  right: string;
}

export interface FunctionCallMatch {
  name: string;

  /** text between the call parens */
  inner: string;
}

/**
 * check if the +/- at index is a sign. that's the case if it follows
 * another operator, a paren or a comma, or if it's the exponent sign of
 * a number like 1e-5.
 */
const IsSign = (text: string, index: number): boolean => {

  const previous = text[index - 1];
  if (sign_context.includes(previous)) {
    return true;
  }

  if (previous === 'e' || previous === 'E') {
    let start = index - 2;
    while (start >= 0 && /[\d.]/.test(text[start])) {
      start--;
    }
    const mantissa = text.substring(start + 1, index - 1);
    if (/\d/.test(mantissa) && (start < 0 || sign_context.includes(text[start]))) {
      return true;
    }
  }

  return false;

};

/**
 * find an operator from the given list, at paren depth 0 and outside of
 * quotes. we never split at the first or last character. by default this
 * returns the first match; set last to return the last one instead.
 *
 * longer tokens are tested first, so >= is not read as >.
 */
export const FindOperator = <T extends Operator>(text: string, tokens: readonly T[], last = false): OperatorMatch<T>|undefined => {

  const sorted = tokens.slice(0).sort((a, b) => b.length - a.length);

  let depth = 0;
  let quoted = false;
  let match: OperatorMatch<T>|undefined;

  for (let index = 0; index < text.length - 1; index++) {

    const char = text.charCodeAt(index);

    if (char === SINGLE_QUOTE) {
      quoted = !quoted;
      continue;
    }

    if (quoted) {
      continue;
    }

    if (char === OPEN_PAREN) {
      depth++;
      continue;
    }

    if (char === CLOSE_PAREN) {
      depth--;
      continue;
    }

    if (depth !== 0 || index === 0) {
      continue;
    }

    const token = sorted.find(test => text.startsWith(test, index));
    if (!token || index + token.length >= text.length) {
      continue;
    }

    if ((token === '+' || token === '-') && IsSign(text, index)) {
      continue;
    }

    const candidate = {
      operator: token,
      left: text.substring(0, index),
      right: text.substring(index + token.length),
    };

    if (!last) {
      return candidate;
    }

    match = candidate;
    index += token.length - 1;

  }

  return match;

};

/**
 * index of the paren that closes the one at open, or -1.
 */
export const MatchingParen = (text: string, open: number): number => {

  let depth = 0;
  let quoted = false;

  for (let index = open; index < text.length; index++) {
    const char = text.charCodeAt(index);
    if (char === SINGLE_QUOTE) {
      quoted = !quoted;
    }
    else if (!quoted) {
      if (char === OPEN_PAREN) {
        depth++;
      }
      else if (char === CLOSE_PAREN) {
        depth--;
        if (depth === 0) {
          return index;
        }
      }
    }
  }

  return -1;

};

/** true if the paren at 0 closes at the last character */
export const IsWrapped = (text: string): boolean => {
  return text.charCodeAt(0) === OPEN_PAREN && MatchingParen(text, 0) === text.length - 1;
};

/**
 * remove wrapping parens, as many layers as there are. (a)+(b) is not
 * wrapped.
 */
export const StripOuterParens = (text: string): string => {
  while (IsWrapped(text)) {
    text = text.substring(1, text.length - 1);
  }
  return text;
};

/**
 * split function arguments at top-level commas. empty text means no
 * arguments; otherwise empty arguments are returned as empty strings.
 */
export const SplitArguments = (inner: string): string[] => {

  if (!inner.length) {
    return [];
  }

  const args: string[] = [];

  let depth = 0;
  let quoted = false;
  let start = 0;

  for (let index = 0; index < inner.length; index++) {
    const char = inner.charCodeAt(index);
    if (char === SINGLE_QUOTE) {
      quoted = !quoted;
    }
    else if (!quoted) {
      if (char === OPEN_PAREN) {
        depth++;
      }
      else if (char === CLOSE_PAREN) {
        depth--;
      }
      else if (char === COMMA && depth === 0) {
        args.push(inner.substring(start, index));
        start = index + 1;
      }
    }
  }

  args.push(inner.substring(start));
  return args;

};

/** remove whitespace outside of quotes */
export const StripWhitespace = (text: string): string => {

  let result = '';
  let quoted = false;

  for (const char of text) {
    if (char === `'`) {
      quoted = !quoted;
    }
    if (quoted || !/\s/.test(char)) {
      result += char;
    }
  }

  return result;

};

/**
 * parens must balance, and can't close before they open. quotes have to
 * be closed as well.
 */
export const CheckParentheses = (text: string): CalcError|undefined => {

  let depth = 0;
  let quoted = false;

  for (let index = 0; index < text.length; index++) {
    const char = text.charCodeAt(index);
    if (char === SINGLE_QUOTE) {
      quoted = !quoted;
    }
    else if (!quoted) {
      if (char === OPEN_PAREN) {
        depth++;
      }
      else if (char === CLOSE_PAREN) {
        depth--;
        if (depth < 0) {
          return ParseError(`unexpected close paren at ${index}: ${text}`);
        }
      }
    }
  }

  if (quoted) {
    return ParseError(`unterminated string: ${text}`);
  }

  if (depth !== 0) {
    return ParseError(`mismatched parentheses: ${text}`);
  }

  return undefined;

};

/**
 * a function call is a name (letter, then letters or digits) followed
 * by one paren group that runs to the end of the text.
 */
export const MatchFunctionCall = (text: string): FunctionCallMatch|undefined => {

  const match = text.match(/^([A-Za-z][A-Za-z0-9]*)\(/);
  if (!match) {
    return undefined;
  }

  const name = match[1];
  if (MatchingParen(text, name.length) !== text.length - 1) {
    return undefined;
  }

  return { name, inner: text.substring(name.length + 1, text.length - 1) };

};

// --- leaf classification ----------------------------------------------------

export const IsNumericLiteral = (text: string): boolean => {
  return /^(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/.test(text);
};

export const IsStringLiteral = (text: string): boolean => {
  return text.includes(`'`);
};

export const StringLiteralValue = (text: string): string => {
  return text.replace(/'/g, '');
};
