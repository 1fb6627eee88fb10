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

import type { RenderSink } from 'colcalc-base-types';

export interface PlotDimensions {
  width: number;
  height: number;
}

export interface CalculatorOptions {

  /** starting point for the irr search */
  irr_guess: number;

  /**
   * irr fails if the npv residual at the solution is larger than this,
   * relative to the cost
   */
  irr_tolerance: number;

  irr_max_iterations: number;

  /** decimal places when converting floats to strings */
  string_precision: number;

  /** initial plot size. setPlotDim changes it */
  plot_dimensions: PlotDimensions;

  /** plotting backend. if not set, render() fails */
  render_sink?: RenderSink;

  /** destination for print() */
  output: (text: string) => void;

}

export const DefaultCalculatorOptions: CalculatorOptions = {
  irr_guess: 0.05,
  irr_tolerance: 1e-4,
  irr_max_iterations: 40,
  string_precision: 2,
  plot_dimensions: { width: 800, height: 500 },
  output: (text: string) => console.log(text),
};
