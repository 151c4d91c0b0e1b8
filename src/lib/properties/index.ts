export * from './types';
export { valuesEqual } from './values';
export { BaseProperty } from './BaseProperty';
export { StringProperty } from './StringProperty';
export { IntProperty } from './IntProperty';
export { FloatProperty } from './FloatProperty';
export { BoolProperty } from './BoolProperty';
export { EnumProperty } from './EnumProperty';
export { DateProperty } from './DateProperty';
