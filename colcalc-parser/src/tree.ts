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

import { CopyColumn } from 'colcalc-base-types';
import type { OpNode } from './parser-types';

/**
 * deep copy. descriptors are shared (they're immutable); computed values
 * are copied, so evaluating the copy never touches the source.
 */
export const CopyNode = (node: OpNode): OpNode => {
  return {
    expression: node.expression,
    functor: node.functor ? { ...node.functor } : undefined,
    negate: node.negate,
    children: node.children.map(child => CopyNode(child)),
    role: node.role,
    value: node.value ? CopyColumn(node.value) : undefined,
    hold: node.hold,
  };
};

/**
 * recursive tree walk.
 *
 * @param func function called on each node. for nodes that have children
 * return false to skip the subtree, or true to traverse.
 */
export const Walk = (node: OpNode, func: (node: OpNode) => boolean): void => {
  if (func(node)) {
    for (const child of node.children) {
      Walk(child, func);
    }
  }
};
