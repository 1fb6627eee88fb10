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

import { ErrorType, Float64, Strings, Timestamps } from 'colcalc-base-types';
import { Calculator } from 'colcalc-calculator';
import { RecordingSink, Run, TestPipeline, Values } from './test-pipeline';

const Capture = (): { lines: string[], output: (text: string) => void } => {
  const lines: string[] = [];
  return { lines, output: (text: string) => { lines.push(text); } };
};

describe('print', () => {

  const pipeline = new TestPipeline({
    c: Float64([1, 2.5, 3]),
    s: Strings(['a', 'b', 'c']),
  });

  test('prints the expression, then rows', () => {
    const capture = Capture();
    const calculator = new Calculator({ output: capture.output });
    expect(Values(Run(calculator, 'print(c*2, 2)', pipeline))).toEqual([0]);
    expect(capture.lines).toEqual(['c*2', '0: 2', '1: 5']);
  });

  test('all rows', () => {
    const capture = Capture();
    const calculator = new Calculator({ output: capture.output });
    Run(calculator, 'print(s)', pipeline);
    Run(calculator, 'print(s,0)', pipeline);
    expect(capture.lines).toEqual(['s', '0: a', '1: b', '2: c', 's', '0: a', '1: b', '2: c']);
  });

  test('dates', () => {
    const capture = Capture();
    const calculator = new Calculator({ output: capture.output });
    Run(calculator, 'print(d)', new TestPipeline({ d: Timestamps([Date.UTC(2024, 6, 4)]) }));
    expect(capture.lines).toEqual(['d', '0: 7/4/2024']);
  });

  test('printIf', () => {
    const capture = Capture();
    const calculator = new Calculator({ output: capture.output });
    Run(calculator, 'printIf(s,1,sum(c)>10)', pipeline);
    expect(capture.lines).toEqual([]);
    Run(calculator, 'printIf(s,1,sum(c)>5)', pipeline);
    expect(capture.lines).toEqual(['s', '0: a']);
  });

});

describe('plots', () => {

  const pipeline = new TestPipeline({
    x: Float64([1, 2, 3]),
    y: Float64([4, 5, 6]),
    d: Timestamps([Date.UTC(2024, 0, 1), Date.UTC(2024, 1, 1), Date.UTC(2024, 2, 1)]),
  });

  test('traces accumulate until render', () => {

    const sink = new RecordingSink();
    const calculator = new Calculator({ render_sink: sink });

    Run(calculator, `plotXY(x,y,'markers','red')`, pipeline);
    Run(calculator, `plotLine(y*2,'lines','blue')`, pipeline);
    Run(calculator, `histogram(x,'green','percent')`, pipeline);
    expect(Values(Run(calculator, `render('out.html','title','x axis','y axis')`, pipeline))).toEqual([0]);

    expect(sink.renders).toEqual([{
      figure: {
        traces: [
          { type: 'scatter', x: [1, 2, 3], y: [4, 5, 6], mode: 'markers', color: 'red' },
          { type: 'scatter', x: [0, 1, 2], y: [8, 10, 12], mode: 'lines', color: 'blue' },
          { type: 'histogram', x: [1, 2, 3], color: 'green', norm: 'percent' },
        ],
      },
      layout: {
        title: 'title',
        x_title: 'x axis',
        y_title: 'y axis',
        file_name: 'out.html',
        width: 800,
        height: 500,
      },
    }]);

  });

  test('newPlot clears, setPlotDim resizes', () => {

    const sink = new RecordingSink();
    const calculator = new Calculator({ render_sink: sink });

    Run(calculator, `plotXY(d,1,'lines','red')`, pipeline);
    Run(calculator, 'newPlot()', pipeline);
    Run(calculator, `plotXY(d,y,'lines','red')`, pipeline);
    Run(calculator, 'setPlotDim(400,300)', pipeline);
    Run(calculator, `render('a.html','','','')`, pipeline);

    expect(sink.renders.length).toBe(1);
    expect(sink.renders[0].figure.traces).toEqual([
      { type: 'scatter', x: ['1/1/2024', '2/1/2024', '3/1/2024'], y: [4, 5, 6], mode: 'lines', color: 'red' },
    ]);
    expect(sink.renders[0].layout.width).toBe(400);
    expect(sink.renders[0].layout.height).toBe(300);

  });

  test('scalars line up with the other axis', () => {
    const sink = new RecordingSink();
    const calculator = new Calculator({ render_sink: sink });
    Run(calculator, `plotXY(x,1,'markers','red')`, pipeline);
    Run(calculator, `render('a.html','','','')`, pipeline);
    expect(sink.renders[0].figure.traces[0]).toEqual({ type: 'scatter', x: [1, 2, 3], y: [1, 1, 1], mode: 'markers', color: 'red' });
  });

  test('bad arguments', () => {
    const calculator = new Calculator({ render_sink: new RecordingSink() });
    expect(Run(calculator, `plotXY(x,y,'bars','red')`, pipeline)).toEqual({
      error: ErrorType.Domain,
      message: `plotXY: invalid mode 'bars'`,
    });
    expect(Run(calculator, `histogram(x,'red','density')`, pipeline)).toEqual({
      error: ErrorType.Domain,
      message: `histogram: invalid normalization 'density'`,
    });
    expect(Run(calculator, 'setPlotDim(0,300)', pipeline)).toEqual({
      error: ErrorType.Domain,
      message: 'setPlotDim: invalid size 0 x 300',
    });
  });

  test('render errors', () => {
    expect(Run(new Calculator(), `render('a.html','','','')`, pipeline)).toEqual({
      error: ErrorType.Render,
      message: 'render: no render sink',
    });
    const calculator = new Calculator({ render_sink: new RecordingSink('disk full') });
    expect(Run(calculator, `render('a.html','','','')`, pipeline)).toEqual({
      error: ErrorType.Render,
      message: 'render: disk full',
    });
  });

});
