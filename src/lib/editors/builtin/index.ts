/**
 * Built-in editors.
 */

import type { EditorRegistry } from '../EditorRegistry';
import { CheckBoxEditor } from './CheckBoxEditor';
import { ChoiceAndButtonEditor } from './ChoiceAndButtonEditor';
import { ChoiceEditor } from './ChoiceEditor';
import { ComboBoxEditor } from './ComboBoxEditor';
import { DatePickerCtrlEditor } from './DatePickerCtrlEditor';
import { SpinCtrlEditor } from './SpinCtrlEditor';
import { TextCtrlAndButtonEditor } from './TextCtrlAndButtonEditor';
import { TextCtrlEditor } from './TextCtrlEditor';

/**
 * Register TextCtrl, Choice, ComboBox, CheckBox, TextCtrlAndButton and ChoiceAndButton.
 */
export function registerBuiltinEditors(registry: EditorRegistry): void {
  registry.register(new TextCtrlEditor());
  registry.register(new ChoiceEditor());
  registry.register(new ComboBoxEditor());
  registry.register(new CheckBoxEditor());
  registry.register(new TextCtrlAndButtonEditor());
  registry.register(new ChoiceAndButtonEditor());
}

/**
 * Register SpinCtrl and DatePickerCtrl.
 */
export function registerAdditionalEditors(registry: EditorRegistry): void {
  registry.register(new SpinCtrlEditor());
  registry.register(new DatePickerCtrlEditor());
}

export {
  TextCtrlEditor,
  ChoiceEditor,
  ComboBoxEditor,
  CheckBoxEditor,
  TextCtrlAndButtonEditor,
  ChoiceAndButtonEditor,
  SpinCtrlEditor,
  DatePickerCtrlEditor
};
