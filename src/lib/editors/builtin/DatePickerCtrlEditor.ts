/**
 * DatePickerCtrlEditor - Native date input. An empty input is unspecified.
 */

import type { Point, Size } from '../../types';
import type { Property, ValueConversion } from '../../properties/types';
import { BaseEditor } from '../BaseEditor';
import { ControlSet } from '../ControlSet';
import { PRIMARY_CONTROL_ID } from '../types';
import type { EditorEvent, EditorHost } from '../types';

export class DatePickerCtrlEditor extends BaseEditor {
  getName(): string {
    return 'DatePickerCtrl';
  }

  createControls(host: EditorHost, property: Property, position: Point, size: Size): ControlSet {
    const input = this.createInput(host, property, position, size, 'date');
    return input ? new ControlSet(input) : ControlSet.empty();
  }

  updateControl(property: Property, controls: ControlSet): void {
    const input = this.getDateInput(controls.primary);
    if (!input) {
      return;
    }
    if (property.isValueUnspecified()) {
      this.setValueToUnspecified(property, controls);
      return;
    }
    input.value = property.getDisplayString();
  }

  onEvent(_host: EditorHost, property: Property, primary: HTMLElement, event: EditorEvent): boolean {
    const input = this.getDateInput(primary);
    if (!input || event.controlId !== PRIMARY_CONTROL_ID || event.type !== 'date-changed') {
      return false;
    }
    return input.value !== property.getDisplayString();
  }

  getValueFromControl(property: Property, controls: ControlSet): ValueConversion {
    const input = this.getDateInput(controls.primary);
    return input ? property.stringToValue(input.value) : this.unchangedResult(property);
  }

  setValueToUnspecified(_property: Property, controls: ControlSet): void {
    const input = this.getDateInput(controls.primary);
    if (input) {
      input.value = '';
    }
  }

  setControlStringValue(_property: Property, controls: ControlSet, text: string): void {
    const input = this.getDateInput(controls.primary);
    if (input) {
      input.value = text;
    }
  }

  private getDateInput(primary: HTMLElement | null): HTMLInputElement | null {
    return primary instanceof HTMLInputElement && primary.type === 'date' ? primary : null;
  }
}
