/**
 * TextCtrlEditor - Single-line text input.
 */

import type { Point, Size } from '../../types';
import type { Property, ValueConversion } from '../../properties/types';
import { BaseEditor } from '../BaseEditor';
import { ControlSet } from '../ControlSet';
import { PRIMARY_CONTROL_ID } from '../types';
import type { EditorEvent, EditorHost } from '../types';

export class TextCtrlEditor extends BaseEditor {
  getName(): string {
    return 'TextCtrl';
  }

  createControls(host: EditorHost, property: Property, position: Point, size: Size): ControlSet {
    const input = this.createInput(host, property, position, size);
    return input ? new ControlSet(input) : ControlSet.empty();
  }

  updateControl(property: Property, controls: ControlSet): void {
    const input = this.getTextInput(controls.primary);
    if (!input) {
      return;
    }
    if (property.isValueUnspecified()) {
      this.setValueToUnspecified(property, controls);
      return;
    }
    input.value = property.getDisplayString();
    this.setUnspecifiedMark(input, false);
  }

  onEvent(_host: EditorHost, property: Property, primary: HTMLElement, event: EditorEvent): boolean {
    const input = this.getTextInput(primary);
    if (!input || event.controlId !== PRIMARY_CONTROL_ID) {
      return false;
    }
    if (event.type === 'text-updated') {
      this.setUnspecifiedMark(input, false);
      return this.textDiffers(property, input);
    }
    if (event.type === 'text-enter') {
      return this.textDiffers(property, input);
    }
    return false;
  }

  getValueFromControl(property: Property, controls: ControlSet): ValueConversion {
    const input = this.getTextInput(controls.primary);
    if (!input) {
      return this.unchangedResult(property);
    }
    if (this.isMarkedUnspecified(input)) {
      return this.unspecifiedResult(property);
    }
    return property.stringToValue(input.value);
  }

  setValueToUnspecified(_property: Property, controls: ControlSet): void {
    const input = this.getTextInput(controls.primary);
    if (!input) {
      return;
    }
    input.value = '';
    this.setUnspecifiedMark(input, true);
  }

  setControlStringValue(_property: Property, controls: ControlSet, text: string): void {
    const input = this.getTextInput(controls.primary);
    if (!input) {
      return;
    }
    input.value = text;
    this.setUnspecifiedMark(input, false);
  }

  onFocus(_property: Property, control: HTMLElement): void {
    this.getTextInput(control)?.select();
  }

  /**
   * The text input inside a primary control.
   */
  protected getTextInput(primary: HTMLElement | null): HTMLInputElement | null {
    return primary instanceof HTMLInputElement ? primary : null;
  }

  protected textDiffers(property: Property, input: HTMLInputElement): boolean {
    if (this.isMarkedUnspecified(input)) {
      return !property.isValueUnspecified();
    }
    return input.value !== property.getDisplayString();
  }
}
