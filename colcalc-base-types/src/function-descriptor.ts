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

import { ColumnKind } from './column';
import type { FieldRole } from './field-role';

/** signature slot. number accepts any numeric kind */
export type ArgumentKind = 'number'|'string'|'timestamp'|'any';

/** same means the kind of the first argument */
export type ReturnKind = ColumnKind|'same'|'any';

export enum FunctionLevel {

  /** one result per row, or a broadcast of the arguments */
  Row = 'row',

  /** collapses to a single value */
  Reduction = 'reduction',

}

export interface ArgumentDescriptor {
  name: string;
  kind: ArgumentKind;
  optional?: boolean;
  description?: string;
}

/**
 * the parser only needs to know that a function exists and how many
 * arguments it takes; evaluation strategies are attached to the
 * calculator's descriptors, which extend this one.
 */
export interface FunctionDescriptor {
  name: string;
  description?: string;

  /**
   * if there's no argument list the function is variadic and we don't
   * check arity. optional arguments must be at the end.
   */
  arguments?: ArgumentDescriptor[];

  return_kind: ReturnKind;
  level: FunctionLevel;

  /** role for the result; if not set, it's inferred */
  role?: FieldRole;
}

export interface FunctionLookup {
  Get(name: string): FunctionDescriptor|undefined;
}

export const MatchesArgumentKind = (kind: ColumnKind, argument: ArgumentKind): boolean => {
  switch (argument) {
    case 'any':
      return true;
    case 'string':
      return kind === ColumnKind.String;
    case 'timestamp':
      return kind === ColumnKind.Timestamp;
    case 'number':
      return kind === ColumnKind.Float64 || kind === ColumnKind.Int32 || kind === ColumnKind.Int64;
  }
};

/** count of arguments that are not optional */
export const RequiredArguments = (descriptor: FunctionDescriptor): number => {
  return (descriptor.arguments || []).filter(argument => !argument.optional).length;
};
