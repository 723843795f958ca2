/**
 * Support-variable naming
 *
 * A fresh allocator is created for every card and passed through the
 * compilation explicitly; names are the base name followed by a counter
 * that starts at 1 and only ever grows.
 */

import type { SupportVariableAllocator } from './types';

export function createSupportVariableAllocator(): SupportVariableAllocator {
  let counter = 0;
  return {
    allocate(baseName: string): string {
      counter += 1;
      return `${baseName}${counter}`;
    },
  };
}
