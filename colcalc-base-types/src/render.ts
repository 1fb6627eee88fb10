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

export type TraceMode = 'lines'|'markers';

/** histogram normalization. empty means raw counts */
export type HistogramNorm = ''|'percent'|'probability';

export type PlotValue = number|string;

export interface ScatterTrace {
  type: 'scatter';
  x: PlotValue[];
  y: number[];
  mode: TraceMode;
  color: string;
}

export interface HistogramTrace {
  type: 'histogram';
  x: PlotValue[];
  color: string;
  norm: HistogramNorm;
}

export type Trace = ScatterTrace|HistogramTrace;

export interface Figure {
  traces: Trace[];
}

export interface PlotLayout {
  title: string;
  x_title: string;
  y_title: string;
  width: number;
  height: number;

  /** destination, as passed to render() */
  file_name: string;
}

/**
 * plotting backend. rendering is a side effect; the sink returns an
 * error if it fails, and we pass that back as a render error.
 */
export interface RenderSink {
  Render(figure: Figure, layout: PlotLayout): Error|undefined;
}
