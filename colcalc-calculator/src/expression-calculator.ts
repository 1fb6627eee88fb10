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

import type { CalcError, TypedColumn } from 'colcalc-base-types';
import {
  ArgumentTypeError, ColumnKind, ColumnLength, ConvertColumn, DefaultRole, DomainError,
  ErrorType, FieldRole, FunctionLevel, IsError, IsNumericColumn, LookupError,
  MatchesArgumentKind, NegateColumn, NumericValues, Scalar, ShapeError, Strings,
} from 'colcalc-base-types';
import type { ComparisonOperator, NodeOperator, OpNode } from 'colcalc-parser';
import { IsComparisonOperator, IsNumericLiteral, IsStringLiteral, StringLiteralValue } from 'colcalc-parser';
import type { CalculatorOptions } from './calculator-options';
import type { ColumnResult, ExtendedFunctionDescriptor } from './descriptors';
import type { FunctionLibrary } from './function-library';
import type { PipelineAdapter } from './pipeline-adapter';
import type { PlotState } from './plot-state';
import { CreatePlotState } from './plot-state';
import { CompareOrder, NumericKernels, OrderBigInts, OrderStrings } from './primitives';
import type { BroadcastShape } from './utilities';
import { Broadcast, Numbers } from './utilities';

/**
 * evaluates expression trees against a pipeline. this is a post-order
 * walk: children first, then the node. every node we visit gets its
 * value and role overwritten, so don't evaluate the same tree from two
 * places at once (copy it).
 */
export class ExpressionCalculator {

  /** pending plot, shared by every expression this calculator runs */
  public readonly plot: PlotState;

  constructor(
    protected readonly library: FunctionLibrary,
    protected readonly options: CalculatorOptions) {

    this.plot = CreatePlotState(options.plot_dimensions);

  }

  // --- public API -----------------------------------------------------------

  /**
   * evaluate a node. on success the result is also stored on the node
   * (value), along with the inferred role.
   */
  public Calculate(node: OpNode, adapter: PipelineAdapter): ColumnResult {

    // pinned by the loop driver. the value already has negation applied

    if (node.hold) {
      return node.value ?? LookupError(`${node.expression}: held without a value`);
    }

    const result = this.CalculateNode(node, adapter);

    if (IsError(result)) {
      node.value = undefined;
      return result;
    }

    node.value = node.negate ? NegateColumn(result) : result;
    return node.value;

  }

  // --- /public API ----------------------------------------------------------

  protected CalculateNode(node: OpNode, adapter: PipelineAdapter): ColumnResult {

    if (!node.functor) {
      return this.Leaf(node, adapter);
    }

    if (node.functor.type === 'function') {
      return this.CallExpression(node, node.functor.descriptor.name, adapter);
    }

    if (node.children.length !== 2) {
      return ArgumentTypeError(`operator ${node.functor.operator} needs two operands`);
    }

    const left = this.Calculate(node.children[0], adapter);
    if (IsError(left)) {
      return left;
    }

    const right = this.Calculate(node.children[1], adapter);
    if (IsError(right)) {
      return right;
    }

    const result = this.BinaryExpression(node.functor.operator, left, right);
    if (!IsError(result)) {
      node.role = DefaultRole(result.kind);
    }

    return result;

  }

  /**
   * literals are scalars, and have no role. anything else is a field.
   */
  protected Leaf(node: OpNode, adapter: PipelineAdapter): ColumnResult {

    const text = node.expression;

    if (IsNumericLiteral(text)) {
      node.role = FieldRole.Undetermined;
      return Scalar(Number(text));
    }

    if (IsStringLiteral(text)) {
      node.role = FieldRole.Undetermined;
      return Strings([StringLiteralValue(text)]);
    }

    const field = adapter.Fetch(text);
    if (IsError(field)) {
      return field;
    }

    node.role = field.role;
    return field.column;

  }

  protected CallExpression(node: OpNode, name: string, adapter: PipelineAdapter): ColumnResult {

    const descriptor = this.library.Get(name);
    if (!descriptor) {
      return LookupError(`function not available: ${name}`);
    }

    if (descriptor.fallback) {
      return this.Fallback(node, descriptor, adapter);
    }

    const args: TypedColumn[] = [];
    for (const child of node.children) {
      const arg = this.Calculate(child, adapter);
      if (IsError(arg)) {
        return arg;
      }
      args.push(arg);
    }

    const argument_error = this.CheckArguments(descriptor, args);
    if (argument_error) {
      return argument_error;
    }

    let result: ColumnResult;

    if (descriptor.map) {
      result = this.Elementwise(descriptor, descriptor.map, args);
    }
    else if (descriptor.fn) {
      result = descriptor.fn(args, { node, options: this.options, plot: this.plot });
    }
    else {
      return LookupError(`function ${name} has no implementation`);
    }

    if (IsError(result)) {
      return result;
    }

    if (descriptor.level === FunctionLevel.Reduction && ColumnLength(result) !== 1) {
      return ShapeError(`${descriptor.name}: expected one value, got ${ColumnLength(result)}`);
    }

    node.role = this.InferRole(descriptor, node, result);
    return result;

  }

  /**
   * try the first argument; if it refers to something that doesn't
   * exist, use the second. any other error is an error.
   */
  protected Fallback(node: OpNode, descriptor: ExtendedFunctionDescriptor, adapter: PipelineAdapter): ColumnResult {

    if (node.children.length !== 2) {
      return ArgumentTypeError(`${descriptor.name}: expected 2 arguments, got ${node.children.length}`);
    }

    const [primary, alternate] = node.children;

    let result = this.Calculate(primary, adapter);
    let source = primary;

    if (IsError(result) && result.error === ErrorType.Lookup) {
      result = this.Calculate(alternate, adapter);
      source = alternate;
    }

    if (!IsError(result)) {
      node.role = source.role;
    }

    return result;

  }

  protected CheckArguments(descriptor: ExtendedFunctionDescriptor, args: TypedColumn[]): CalcError|undefined {

    if (!descriptor.arguments) {
      return undefined;
    }

    for (let i = 0; i < args.length; i++) {
      const argument = descriptor.arguments[i];
      if (argument && !MatchesArgumentKind(args[i].kind, argument.kind)) {
        return ArgumentTypeError(`${descriptor.name}: ${argument.name} should be ${argument.kind}, got ${args[i].kind}`);
      }
    }

    return undefined;

  }

  protected InferRole(descriptor: ExtendedFunctionDescriptor, node: OpNode, result: TypedColumn): FieldRole {

    if (descriptor.role) {
      return descriptor.role;
    }

    if (descriptor.return_kind === 'same' && node.children.length && node.children[0].role !== FieldRole.Undetermined) {
      return node.children[0].role;
    }

    return DefaultRole(result.kind);

  }

  /**
   * shared path for functions with a numeric kernel: broadcast the
   * arguments and call the kernel once per row.
   */
  protected Elementwise(
      descriptor: ExtendedFunctionDescriptor,
      map: (...args: number[]) => number,
      args: TypedColumn[]): ColumnResult {

    const values: Float64Array[] = [];

    for (const arg of args) {
      const numbers = Numbers(arg, descriptor.name);
      if (!(numbers instanceof Float64Array)) {
        return numbers;
      }
      values.push(numbers);
    }

    const shape = Broadcast(values.map(test => test.length));
    if (IsError(shape)) {
      return shape;
    }

    const result = new Float64Array(shape.length);
    const positions: number[] = values.map(() => 0);
    const operands: number[] = values.map(() => 0);

    for (let i = 0; i < shape.length; i++) {
      for (let k = 0; k < values.length; k++) {
        operands[k] = values[k][positions[k]];
        positions[k] += shape.strides[k];
      }
      if (descriptor.domain) {
        const message = descriptor.domain(...operands);
        if (message) {
          return DomainError(`${descriptor.name}: ${message}`);
        }
      }
      result[i] = map(...operands);
    }

    return { kind: ColumnKind.Float64, values: result };

  }

  /**
   * binary operators. numbers support everything; strings and dates
   * only compare. a string compared to a date is read as a date.
   */
  protected BinaryExpression(operator: NodeOperator, left: TypedColumn, right: TypedColumn): ColumnResult {

    const shape = Broadcast([ColumnLength(left), ColumnLength(right)]);
    if (IsError(shape)) {
      return shape;
    }

    // int64 against int64 compares exactly. above 2^53, doubles don't

    if (left.kind === ColumnKind.Int64 && right.kind === ColumnKind.Int64 && IsComparisonOperator(operator)) {
      return this.CompareColumns(operator, left.values, right.values, OrderBigInts, shape);
    }

    if (IsNumericColumn(left) && IsNumericColumn(right)) {
      return this.ElementwiseBinaryExpression(operator, NumericValues(left), NumericValues(right), shape);
    }

    const unsupported = ArgumentTypeError(`operator ${operator} is not supported for ${left.kind} and ${right.kind}`);

    if (!IsComparisonOperator(operator)) {
      return unsupported;
    }

    if (left.kind === ColumnKind.String && right.kind === ColumnKind.String) {
      return this.CompareColumns(operator, left.values, right.values, OrderStrings, shape);
    }

    const dates = [left.kind, right.kind].every(kind => kind === ColumnKind.Timestamp || kind === ColumnKind.String);

    if (dates) {
      const a = ConvertColumn(left, ColumnKind.Timestamp);
      if (IsError(a)) {
        return a;
      }
      const b = ConvertColumn(right, ColumnKind.Timestamp);
      if (IsError(b)) {
        return b;
      }
      if (a.kind !== ColumnKind.Timestamp || b.kind !== ColumnKind.Timestamp) {
        return unsupported;
      }
      return this.ElementwiseBinaryExpression(operator, a.values, b.values, shape);
    }

    return unsupported;

  }

  /** comparisons for kinds that we don't compare as doubles */
  protected CompareColumns<T>(
      operator: ComparisonOperator,
      a: ArrayLike<T>,
      b: ArrayLike<T>,
      order: (a: T, b: T) => number,
      shape: BroadcastShape): ColumnResult {

    const [sa, sb] = shape.strides;
    const result = new Float64Array(shape.length);

    for (let i = 0, ia = 0, ib = 0; i < shape.length; i++, ia += sa, ib += sb) {
      result[i] = CompareOrder(operator, order(a[ia], b[ib]));
    }

    return { kind: ColumnKind.Float64, values: result };

  }

  protected ElementwiseBinaryExpression(operator: NodeOperator, a: Float64Array, b: Float64Array, shape: BroadcastShape): ColumnResult {

    const kernel = NumericKernels[operator];
    const [sa, sb] = shape.strides;
    const result = new Float64Array(shape.length);

    for (let i = 0, ia = 0, ib = 0; i < shape.length; i++, ia += sa, ib += sb) {
      if (operator === '/' && b[ib] === 0) {
        return DomainError('division by zero');
      }
      result[i] = kernel(a[ia], b[ib]);
    }

    return { kind: ColumnKind.Float64, values: result };

  }

}
