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

import type { FunctionLookup } from 'colcalc-base-types';
import type { ExtendedFunctionDescriptor, FunctionMap } from './descriptors';

/**
 * function registry. build one, register the function maps, and hand it
 * to the parser (for names and arity) and the calculator (for the
 * strategies). names are case-insensitive.
 */
export class FunctionLibrary implements FunctionLookup {

  /**
   * the actual functions, by lowercase name. this is a Map so names
   * like "constructor" don't find anything on the prototype
   */
  protected functions = new Map<string, ExtendedFunctionDescriptor>();

  /**
   * register one or more functions. keys in the passed object are
   * considered the canonical function names, and must be (icase) unique.
   */
  public Register(...maps: FunctionMap[]): void {

    for (const map of maps) {

      for (const name of Object.keys(map)) {

        // names have to be something the parser can recognize as a call:
        // a letter, then letters or digits.

        if (/[^a-zA-Z0-9]/.test(name)) {
          throw new Error(`invalid function name (invalid character): ${name}`);
        }

        if (/^[^a-zA-Z]/.test(name)) {
          throw new Error(`invalid function name (start with an ascii letter): ${name}`);
        }

        const normalized = name.toLowerCase();
        if (this.functions.has(normalized)) {
          throw new Error(`function name (${normalized}) is already in use`);
        }

        const descriptor = map[name];

        const strategies = [descriptor.map, descriptor.fn].filter(strategy => !!strategy).length;
        if (descriptor.fallback ? strategies !== 0 : strategies !== 1) {
          throw new Error(`function ${name} needs exactly one of map, fn or fallback`);
        }

        if (descriptor.arguments) {
          const first_optional = descriptor.arguments.findIndex(argument => argument.optional);
          if (first_optional >= 0 && descriptor.arguments.slice(first_optional).some(argument => !argument.optional)) {
            throw new Error(`function ${name}: optional arguments must come last`);
          }
        }

        this.functions.set(normalized, { ...descriptor, name });

      }

    }

  }

  /** lookup function (actual map is protected) */
  public Get(name: string): ExtendedFunctionDescriptor|undefined {
    return this.functions.get(name.toLowerCase());
  }

  /** list of registered functions, by canonical name */
  public List(): ExtendedFunctionDescriptor[] {
    return Array.from(this.functions.entries())
      .sort(([a], [b]) => a < b ? -1 : a > b ? 1 : 0)
      .map(([, descriptor]) => descriptor);
  }

  /**
   * create an alias. we clone the descriptor and use the alias as the
   * canonical name, so should work better than just a pointer.
   */
  public Alias(name: string, reference: string): void {
    const ref = this.Get(reference);
    if (!ref) {
      throw new Error(`referenced function ${reference} does not exist`);
    }
    this.Register({[name]: {...ref}});
  }

}
