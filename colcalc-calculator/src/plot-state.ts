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

import type { Figure } from 'colcalc-base-types';
import type { PlotDimensions } from './calculator-options';

/**
 * pending plot. traces accumulate until newPlot() clears them; render()
 * sends whatever is here to the sink, and does not clear.
 */
export interface PlotState {
  figure: Figure;
  dimensions: PlotDimensions;
}

export const CreatePlotState = (dimensions: PlotDimensions): PlotState => {
  return {
    figure: { traces: [] },
    dimensions: { ...dimensions },
  };
};
