export * from './types';

export { EditorError, EditorErrorCode } from './errors';
export { EventEmitter } from './events/EventEmitter';
export type { EventHandler } from './events/EventEmitter';

// Value model
export {
  BaseProperty,
  StringProperty,
  IntProperty,
  FloatProperty,
  BoolProperty,
  EnumProperty,
  DateProperty,
  valuesEqual
} from './properties';

export type {
  Property,
  PropertyValue,
  PropertyChoice,
  PropertyAttributes,
  PropertyOptions,
  PropertyEventHandler,
  ValueConversion
} from './properties';

// Editors
export {
  BaseEditor,
  ControlSet,
  MultiButtonControl,
  EditorRegistry,
  registerBuiltinEditors,
  registerAdditionalEditors,
  TextCtrlEditor,
  ChoiceEditor,
  ComboBoxEditor,
  CheckBoxEditor,
  TextCtrlAndButtonEditor,
  ChoiceAndButtonEditor,
  SpinCtrlEditor,
  DatePickerCtrlEditor,
  PRIMARY_CONTROL_ID,
  SECONDARY_CONTROL_ID,
  AUTO_CONTROL_ID,
  CONTROL_ID_ATTRIBUTE,
  VALUE_TEXT_INDENT
} from './editors';

export type {
  PropertyEditor,
  EditorHost,
  EditorEvent,
  EditorEventType,
  SecondaryControl,
  MultiButtonOptions
} from './editors';

// Controls
export { BaseControl } from './controls';
export type { Control, ControlAttachOptions, ControlOptions } from './controls';

// Grid
export { PropertyGrid, FIRST_AUTO_CONTROL_ID, translateDomEvent, findControlId } from './grid';

export type {
  EditState,
  CommitMode,
  PropertyGridOptions,
  PropertyChangedEvent,
  EditorEventNotification,
  EditEndedEvent
} from './grid';
