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

import type { CalcError, FieldColumn, Pipeline, TypedColumn } from 'colcalc-base-types';
import {
  ColumnLength, CopyColumn, DefaultRole, FieldRole, IsError, RepeatColumn, ShapeError,
} from 'colcalc-base-types';

/**
 * reads and writes for the calculator. the pipeline owns storage; this
 * class enforces the row-count rules when we write back.
 */
export class PipelineAdapter {

  constructor(public readonly pipeline: Pipeline) {}

  public Has(name: string): boolean {
    return this.pipeline.FieldNames().includes(name);
  }

  /** LookupError if the field doesn't exist */
  public Fetch(name: string): FieldColumn|CalcError {
    return this.pipeline.GetColumn(name);
  }

  /**
   * store a column. the column has to be length 1 (we broadcast it), or
   * the pipeline's row count, or anything if the pipeline has a single
   * row; in that case we expand every other field to match. an existing
   * field with the same name is replaced.
   */
  public Store(name: string, column: TypedColumn, role: FieldRole, renormalize = false): CalcError|undefined {

    const source = column;
    const length = ColumnLength(column);
    const rows = this.pipeline.RowCount();
    const populated = this.pipeline.FieldNames().some(test => test !== name);

    if (populated) {
      if (rows === 1 && length > 1) {
        const error = this.Expand(length, name);
        if (error) {
          return error;
        }
      }
      else if (length !== 1 && length !== rows) {
        return ShapeError(`can't store ${name}: length ${length}, pipeline has ${rows} rows`);
      }
      else if (length === 1 && rows > 1) {
        column = RepeatColumn(column, rows);
      }
    }

    if (this.Has(name)) {
      const error = this.pipeline.DropColumn(name);
      if (error) {
        return error;
      }
    }

    if (role === FieldRole.Undetermined) {
      role = DefaultRole(column.kind);
    }

    // a bare field (or anything else that passes a column through) would
    // otherwise share storage with the field it came from

    if (column === source) {
      column = CopyColumn(column);
    }

    return this.pipeline.AppendColumn(name, column, role, renormalize);

  }

  /**
   * grow a one-row pipeline. every field is re-stored at the new length;
   * we drop everything first so the pipeline never holds fields with
   * different lengths. skip is the field that's about to be replaced.
   */
  protected Expand(length: number, skip: string): CalcError|undefined {

    const fields: Array<{ name: string, field: FieldColumn }> = [];

    for (const name of this.pipeline.FieldNames()) {
      if (name === skip) {
        continue;
      }
      const field = this.pipeline.GetColumn(name);
      if (IsError(field)) {
        return field;
      }
      fields.push({ name, field });
    }

    for (const name of this.pipeline.FieldNames()) {
      const error = this.pipeline.DropColumn(name);
      if (error) {
        return error;
      }
    }

    for (const { name, field } of fields) {
      const error = this.pipeline.AppendColumn(name, RepeatColumn(field.column, length), field.role, false);
      if (error) {
        return error;
      }
    }

    return undefined;

  }

}
