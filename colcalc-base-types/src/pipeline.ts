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

import type { TypedColumn } from './column';
import type { CalcError } from './errors';
import type { FieldRole } from './field-role';

export interface FieldColumn {
  column: TypedColumn;
  role: FieldRole;
}

/**
 * columnar store the calculator reads from and writes to. we don't own
 * storage; whatever implements this does. every field shares the same
 * row count.
 */
export interface Pipeline {

  RowCount(): number;

  FieldNames(): string[];

  /** LookupError if the field doesn't exist */
  GetColumn(name: string): FieldColumn|CalcError;

  AppendColumn(name: string, column: TypedColumn, role: FieldRole, renormalize: boolean): CalcError|undefined;

  DropColumn(name: string): CalcError|undefined;

}
