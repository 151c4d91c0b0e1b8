/**
 * Property editors module.
 */

export { BaseEditor, VALUE_TEXT_INDENT } from './BaseEditor';
export { ControlSet } from './ControlSet';
export { MultiButtonControl } from './MultiButtonControl';
export { EditorRegistry } from './EditorRegistry';
export * from './types';
export * from './builtin';

export type { MultiButtonOptions } from './MultiButtonControl';
