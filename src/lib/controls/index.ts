export { BaseControl } from './BaseControl';
export * from './types';
