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

import type { HistogramNorm, PlotValue, TraceMode, TypedColumn } from 'colcalc-base-types';
import {
  ColumnKind, ColumnLength, DisplayValue, DomainError, FormatDate, FunctionLevel,
  IsError, IsNumericColumn, NumericValues, RenderError,
} from 'colcalc-base-types';
import type { ColumnResult, FunctionContext, FunctionMap } from '../descriptors';
import { Broadcast, FirstNumber, FirstString, Numbers, Sentinel } from '../utilities';

const IsTraceMode = (text: string): text is TraceMode => {
  return text === 'lines' || text === 'markers';
};

const IsHistogramNorm = (text: string): text is HistogramNorm => {
  return text === '' || text === 'percent' || text === 'probability';
};

/** axis values. dates are formatted so the backend doesn't have to */
const PlotValues = (column: TypedColumn): PlotValue[] => {
  if (IsNumericColumn(column)) {
    return Array.from(NumericValues(column));
  }
  if (column.kind === ColumnKind.Timestamp) {
    return Array.from(column.values, value => FormatDate(value));
  }
  return column.values.slice(0);
};

/** repeat scalars so x and y line up */
const Expand = <T>(values: T[], length: number): T[] => {
  return values.length === length ? values : Array.from({ length }, () => values[0]);
};

/**
 * write the argument's expression, then one line per row. rows <= 0
 * (or missing) means all of them.
 */
const Print = (args: TypedColumn[], context: FunctionContext): ColumnResult => {

  const [x] = args;

  let count = ColumnLength(x);
  if (args.length > 1) {
    const rows = FirstNumber(args[1], 'print');
    if (typeof rows !== 'number') {
      return rows;
    }
    if (rows > 0) {
      count = Math.min(count, Math.trunc(rows));
    }
  }

  context.options.output(context.node.children[0]?.expression ?? '');

  for (let i = 0; i < count; i++) {
    context.options.output(`${i}: ${DisplayValue(x, i)}`);
  }

  return Sentinel();

};

export const OutputFunctionLibrary: FunctionMap = {

  print: {
    description: 'print values',
    arguments: [{ name: 'x', kind: 'any' }, { name: 'rows', kind: 'number', optional: true }],
    return_kind: ColumnKind.Float64,
    level: FunctionLevel.Reduction,
    fn: Print,
  },

  printIf: {
    description: 'print values if the first value of cond is true (> 0)',
    arguments: [
      { name: 'x', kind: 'any' },
      { name: 'rows', kind: 'number' },
      { name: 'cond', kind: 'number' },
    ],
    return_kind: ColumnKind.Float64,
    level: FunctionLevel.Reduction,
    fn: (args: TypedColumn[], context: FunctionContext): ColumnResult => {
      const condition = FirstNumber(args[2], 'printIf');
      if (typeof condition !== 'number') {
        return condition;
      }
      return condition > 0 ? Print(args.slice(0, 2), context) : Sentinel();
    },
  },

  setPlotDim: {
    description: 'set plot width and height',
    arguments: [{ name: 'width', kind: 'number' }, { name: 'height', kind: 'number' }],
    return_kind: ColumnKind.Float64,
    level: FunctionLevel.Reduction,
    fn: (args: TypedColumn[], context: FunctionContext): ColumnResult => {

      const width = FirstNumber(args[0], 'setPlotDim');
      if (typeof width !== 'number') {
        return width;
      }

      const height = FirstNumber(args[1], 'setPlotDim');
      if (typeof height !== 'number') {
        return height;
      }

      if (!(width > 0 && height > 0)) {
        return DomainError(`setPlotDim: invalid size ${width} x ${height}`);
      }

      context.plot.dimensions = { width, height };
      return Sentinel();

    },
  },

  newPlot: {
    description: 'start a new plot',
    arguments: [],
    return_kind: ColumnKind.Float64,
    level: FunctionLevel.Reduction,
    fn: (args: TypedColumn[], context: FunctionContext): ColumnResult => {
      context.plot.figure = { traces: [] };
      return Sentinel();
    },
  },

  plotXY: {
    description: 'add an x/y trace to the plot',
    arguments: [
      { name: 'x', kind: 'any' },
      { name: 'y', kind: 'number' },
      { name: 'mode', kind: 'string', description: 'lines or markers' },
      { name: 'color', kind: 'string' },
    ],
    return_kind: ColumnKind.Float64,
    level: FunctionLevel.Reduction,
    fn: (args: TypedColumn[], context: FunctionContext): ColumnResult => {

      const y = Numbers(args[1], 'plotXY');
      if (!(y instanceof Float64Array)) {
        return y;
      }

      const mode = FirstString(args[2], 'plotXY');
      if (typeof mode !== 'string') {
        return mode;
      }
      if (!IsTraceMode(mode)) {
        return DomainError(`plotXY: invalid mode '${mode}'`);
      }

      const color = FirstString(args[3], 'plotXY');
      if (typeof color !== 'string') {
        return color;
      }

      const x = PlotValues(args[0]);
      const shape = Broadcast([x.length, y.length]);
      if (IsError(shape)) {
        return shape;
      }

      context.plot.figure.traces.push({
        type: 'scatter',
        x: Expand(x, shape.length),
        y: Expand(Array.from(y), shape.length),
        mode,
        color,
      });

      return Sentinel();

    },
  },

  plotLine: {
    description: 'add a trace of y against the row number',
    arguments: [
      { name: 'y', kind: 'number' },
      { name: 'mode', kind: 'string', description: 'lines or markers' },
      { name: 'color', kind: 'string' },
    ],
    return_kind: ColumnKind.Float64,
    level: FunctionLevel.Reduction,
    fn: (args: TypedColumn[], context: FunctionContext): ColumnResult => {

      const y = Numbers(args[0], 'plotLine');
      if (!(y instanceof Float64Array)) {
        return y;
      }

      const mode = FirstString(args[1], 'plotLine');
      if (typeof mode !== 'string') {
        return mode;
      }
      if (!IsTraceMode(mode)) {
        return DomainError(`plotLine: invalid mode '${mode}'`);
      }

      const color = FirstString(args[2], 'plotLine');
      if (typeof color !== 'string') {
        return color;
      }

      context.plot.figure.traces.push({
        type: 'scatter',
        x: Array.from({ length: y.length }, (_, i) => i),
        y: Array.from(y),
        mode,
        color,
      });

      return Sentinel();

    },
  },

  histogram: {
    description: 'add a histogram of x to the plot',
    arguments: [
      { name: 'x', kind: 'any' },
      { name: 'color', kind: 'string' },
      { name: 'norm', kind: 'string', description: `'', percent or probability` },
    ],
    return_kind: ColumnKind.Float64,
    level: FunctionLevel.Reduction,
    fn: (args: TypedColumn[], context: FunctionContext): ColumnResult => {

      const color = FirstString(args[1], 'histogram');
      if (typeof color !== 'string') {
        return color;
      }

      const norm = FirstString(args[2], 'histogram');
      if (typeof norm !== 'string') {
        return norm;
      }
      if (!IsHistogramNorm(norm)) {
        return DomainError(`histogram: invalid normalization '${norm}'`);
      }

      context.plot.figure.traces.push({
        type: 'histogram',
        x: PlotValues(args[0]),
        color,
        norm,
      });

      return Sentinel();

    },
  },

  render: {
    description: 'send the plot to the render sink',
    arguments: [
      { name: 'file', kind: 'string' },
      { name: 'title', kind: 'string' },
      { name: 'xTitle', kind: 'string' },
      { name: 'yTitle', kind: 'string' },
    ],
    return_kind: ColumnKind.Float64,
    level: FunctionLevel.Reduction,
    fn: (args: TypedColumn[], context: FunctionContext): ColumnResult => {

      const text: string[] = [];
      for (const arg of args) {
        const value = FirstString(arg, 'render');
        if (typeof value !== 'string') {
          return value;
        }
        text.push(value);
      }

      const sink = context.options.render_sink;
      if (!sink) {
        return RenderError('render: no render sink');
      }

      const [file_name, title, x_title, y_title] = text;

      const error = sink.Render({ traces: context.plot.figure.traces.slice(0) }, {
        title,
        x_title,
        y_title,
        file_name,
        ...context.plot.dimensions,
      });

      if (error) {
        return RenderError(`render: ${error.message}`);
      }

      return Sentinel();

    },
  },

};
