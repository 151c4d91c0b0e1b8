import type { PropertyValue } from './types';

export function valuesEqual(a: PropertyValue, b: PropertyValue): boolean {
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  return a === b;
}
