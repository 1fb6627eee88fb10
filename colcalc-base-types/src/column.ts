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
 * column kinds. these are the only scalar types a column can hold; we
 * use string values so the kind is readable when it ends up in an error
 * message or a log.
 */
export enum ColumnKind {
  Float64 = 'float64',
  Int32 = 'int32',
  Int64 = 'int64',
  String = 'string',
  Timestamp = 'timestamp',
}

export interface Float64Column {
  kind: ColumnKind.Float64;
  values: Float64Array;
}

export interface Int32Column {
  kind: ColumnKind.Int32;
  values: Int32Array;
}

export interface Int64Column {
  kind: ColumnKind.Int64;
  values: BigInt64Array;
}

export interface StringColumn {
  kind: ColumnKind.String;
  values: string[];
}

/**
 * timestamps are stored as UTC epoch milliseconds.
 */
export interface TimestampColumn {
  kind: ColumnKind.Timestamp;
  values: Float64Array;
}

/**
 * discriminated union over column kinds. a column of length 1 is a
 * scalar, and broadcasts against longer columns.
 */
export type TypedColumn =
  | Float64Column
  | Int32Column
  | Int64Column
  | StringColumn
  | TimestampColumn
  ;

export type NumericColumn = Float64Column | Int32Column | Int64Column;

// --- constructors -----------------------------------------------------------

export const Float64 = (values: ArrayLike<number>): Float64Column => {
  return { kind: ColumnKind.Float64, values: Float64Array.from(values) };
};

export const Int32 = (values: ArrayLike<number>): Int32Column => {
  return { kind: ColumnKind.Int32, values: Int32Array.from(values) };
};

export const Int64 = (values: ArrayLike<number>): Int64Column => {
  return { kind: ColumnKind.Int64, values: BigInt64Array.from(values, value => Number.isFinite(value) ? BigInt(Math.trunc(value)) : BigInt(0)) };
};

export const Strings = (values: string[]): StringColumn => {
  return { kind: ColumnKind.String, values: values.slice(0) };
};

export const Timestamps = (values: ArrayLike<number>): TimestampColumn => {
  return { kind: ColumnKind.Timestamp, values: Float64Array.from(values) };
};

/** single float value */
export const Scalar = (value: number): Float64Column => {
  return { kind: ColumnKind.Float64, values: Float64Array.of(value) };
};

// --- utilities --------------------------------------------------------------

export const ColumnLength = (column: TypedColumn): number => {
  return column.values.length;
};

/** typeguard */
export const IsNumericColumn = (column: TypedColumn): column is NumericColumn => {
  return column.kind === ColumnKind.Float64
      || column.kind === ColumnKind.Int32
      || column.kind === ColumnKind.Int64;
};

/**
 * numeric values as doubles. this is the one place int64 values cross
 * over into number space. for float columns this returns the backing
 * array itself, so callers must not write to the result.
 */
export const NumericValues = (column: NumericColumn): Float64Array => {
  switch (column.kind) {
    case ColumnKind.Float64:
      return column.values;
    case ColumnKind.Int32:
      return Float64Array.from(column.values);
    case ColumnKind.Int64:
      return Float64Array.from(column.values, value => Number(value));
  }
};

export const CopyColumn = (column: TypedColumn): TypedColumn => {
  switch (column.kind) {
    case ColumnKind.Float64:
      return { kind: column.kind, values: column.values.slice(0) };
    case ColumnKind.Int32:
      return { kind: column.kind, values: column.values.slice(0) };
    case ColumnKind.Int64:
      return { kind: column.kind, values: column.values.slice(0) };
    case ColumnKind.String:
      return { kind: column.kind, values: column.values.slice(0) };
    case ColumnKind.Timestamp:
      return { kind: column.kind, values: column.values.slice(0) };
  }
};

/**
 * gather: result[i] = column[indices[i]]. indices are not checked,
 * callers are expected to validate them.
 */
export const TakeColumn = (column: TypedColumn, indices: ArrayLike<number>): TypedColumn => {
  switch (column.kind) {
    case ColumnKind.Float64:
      return { kind: column.kind, values: Float64Array.from(indices, index => column.values[index]) };
    case ColumnKind.Int32:
      return { kind: column.kind, values: Int32Array.from(indices, index => column.values[index]) };
    case ColumnKind.Int64:
      return { kind: column.kind, values: BigInt64Array.from(indices, index => column.values[index]) };
    case ColumnKind.String:
      return { kind: column.kind, values: Array.from(indices, index => column.values[index]) };
    case ColumnKind.Timestamp:
      return { kind: column.kind, values: Float64Array.from(indices, index => column.values[index]) };
  }
};

/** repeat the first element of a column */
export const RepeatColumn = (column: TypedColumn, length: number): TypedColumn => {
  return TakeColumn(column, new Int32Array(length));
};

/**
 * join two columns of the same kind. returns undefined if the kinds
 * don't match; convert first.
 */
export const ConcatColumns = (a: TypedColumn, b: TypedColumn): TypedColumn|undefined => {

  switch (a.kind) {
    case ColumnKind.Float64:
      if (b.kind === ColumnKind.Float64) {
        const values = new Float64Array(a.values.length + b.values.length);
        values.set(a.values);
        values.set(b.values, a.values.length);
        return { kind: a.kind, values };
      }
      break;

    case ColumnKind.Int32:
      if (b.kind === ColumnKind.Int32) {
        const values = new Int32Array(a.values.length + b.values.length);
        values.set(a.values);
        values.set(b.values, a.values.length);
        return { kind: a.kind, values };
      }
      break;

    case ColumnKind.Int64:
      if (b.kind === ColumnKind.Int64) {
        const values = new BigInt64Array(a.values.length + b.values.length);
        values.set(a.values);
        values.set(b.values, a.values.length);
        return { kind: a.kind, values };
      }
      break;

    case ColumnKind.String:
      if (b.kind === ColumnKind.String) {
        return { kind: a.kind, values: a.values.concat(b.values) };
      }
      break;

    case ColumnKind.Timestamp:
      if (b.kind === ColumnKind.Timestamp) {
        const values = new Float64Array(a.values.length + b.values.length);
        values.set(a.values);
        values.set(b.values, a.values.length);
        return { kind: a.kind, values };
      }
      break;
  }

  return undefined;

};

/**
 * negate numeric columns; anything else is returned as-is. always
 * returns a new column for numeric kinds, and never produces -0.
 */
export const NegateColumn = (column: TypedColumn): TypedColumn => {
  switch (column.kind) {
    case ColumnKind.Float64:
      return { kind: column.kind, values: column.values.map(value => value === 0 ? 0 : -value) };
    case ColumnKind.Int32:
      return { kind: column.kind, values: column.values.map(value => -value) };
    case ColumnKind.Int64:
      return { kind: column.kind, values: column.values.map(value => -value) };
    default:
      return column;
  }
};
