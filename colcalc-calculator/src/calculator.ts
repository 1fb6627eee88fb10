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

import type { CalcError, Pipeline } from 'colcalc-base-types';
import { LookupError } from 'colcalc-base-types';
import type { OpNode, ParseResult } from 'colcalc-parser';
import { CopyNode, Parser } from 'colcalc-parser';
import type { CalculatorOptions } from './calculator-options';
import { DefaultCalculatorOptions } from './calculator-options';
import type { ColumnResult } from './descriptors';
import { ExpressionCalculator } from './expression-calculator';
import { FunctionLibrary } from './function-library';
import { Loop } from './loop';
import { PipelineAdapter } from './pipeline-adapter';

import { ConversionFunctionLibrary } from './functions/conversion-functions';
import { DateFunctionLibrary } from './functions/date-functions';
import { FinanceFunctionLibrary } from './functions/finance-functions';
import { MathFunctionLibrary } from './functions/math-functions';
import { OutputFunctionLibrary } from './functions/output-functions';
import { RowFunctionLibrary } from './functions/row-functions';
import { StatisticsFunctionLibrary } from './functions/statistics-functions';
import { TextFunctionLibrary } from './functions/text-functions';

/**
 * calculator: parses expressions and evaluates them against pipelines.
 * the function library is built once per calculator unless you pass one
 * in; the plot state belongs to the calculator, so plot functions in
 * separate expressions add to the same figure.
 */
export class Calculator {

  public readonly library: FunctionLibrary;

  public readonly parser: Parser;

  public readonly options: CalculatorOptions;

  protected readonly expression_calculator: ExpressionCalculator;

  constructor(options: Partial<CalculatorOptions> = {}, library?: FunctionLibrary) {

    this.options = { ...DefaultCalculatorOptions, ...options };
    this.library = library || Calculator.CreateLibrary();
    this.parser = new Parser(this.library);
    this.expression_calculator = new ExpressionCalculator(this.library, this.options);

  }

  /** the standard function set */
  public static CreateLibrary(): FunctionLibrary {

    const library = new FunctionLibrary();

    library.Register(
      MathFunctionLibrary,
      RowFunctionLibrary,
      DateFunctionLibrary,
      TextFunctionLibrary,
      ConversionFunctionLibrary,
      StatisticsFunctionLibrary,
      FinanceFunctionLibrary,
      OutputFunctionLibrary,
    );

    return library;

  }

  public Parse(expression: string): ParseResult {
    return this.parser.Parse(expression);
  }

  /**
   * evaluate a tree. the result is also left on the tree (root.value),
   * which is what AddToPipeline stores.
   */
  public Evaluate(root: OpNode, pipeline: Pipeline): ColumnResult {
    return this.expression_calculator.Calculate(root, new PipelineAdapter(pipeline));
  }

  /**
   * store the last value computed for a tree as a field. evaluate first.
   */
  public AddToPipeline(root: OpNode, name: string, pipeline: Pipeline, renormalize = false): CalcError|undefined {

    if (!root.value) {
      return LookupError(`${root.expression} has not been evaluated`);
    }

    return new PipelineAdapter(pipeline).Store(name, root.value, root.role, renormalize);

  }

  /**
   * run bodies for each integer in [start, end), with loop_var set to the
   * current value. body i is stored as targets[i] each time through.
   */
  public Loop(loop_var: string, start: number, end: number, bodies: OpNode[], targets: string[], pipeline: Pipeline): CalcError|undefined {
    return Loop(this.expression_calculator, new PipelineAdapter(pipeline), loop_var, start, end, bodies, targets);
  }

  /** copy a tree, for evaluating it somewhere else at the same time */
  public CopyNode(root: OpNode): OpNode {
    return CopyNode(root);
  }

}
