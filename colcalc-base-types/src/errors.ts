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

/**
 * error types. errors are values: evaluation returns one of these in
 * place of a column and the caller decides what to do with it.
 */
export enum ErrorType {
  Parse =   'PARSE',
  Type =    'TYPE',
  Shape =   'SHAPE',
  Domain =  'DOMAIN',
  Lookup =  'LOOKUP',
  Render =  'RENDER',
}

export interface CalcError {
  error: ErrorType;
  message: string;
}

const error_types: string[] = Object.values(ErrorType);

/** mismatched parens or quotes, unknown function, wrong argument count */
export const ParseError = (message: string): CalcError => {
  return { error: ErrorType.Parse, message };
};

/**
 * argument kind doesn't match the signature, or a value can't be
 * converted. named so it doesn't collide with the builtin TypeError.
 */
export const ArgumentTypeError = (message: string): CalcError => {
  return { error: ErrorType.Type, message };
};

/** broadcasting mismatch or index out of range */
export const ShapeError = (message: string): CalcError => {
  return { error: ErrorType.Shape, message };
};

/** divide by zero, invalid input to log, no convergence */
export const DomainError = (message: string): CalcError => {
  return { error: ErrorType.Domain, message };
};

/** missing field */
export const LookupError = (message: string): CalcError => {
  return { error: ErrorType.Lookup, message };
};

export const RenderError = (message: string): CalcError => {
  return { error: ErrorType.Render, message };
};

/** type guard function */
export const IsError = (test: unknown): test is CalcError => {
  return typeof test === 'object'
      && test !== null
      && 'error' in test
      && 'message' in test
      && typeof test.error === 'string'
      && typeof test.message === 'string'
      && error_types.includes(test.error);
};
