/**
 * CheckBoxEditor - Checkbox for boolean properties.
 * The indeterminate state shows an unspecified value.
 */

import type { Point, Rect, Size } from '../../types';
import type { Property, ValueConversion } from '../../properties/types';
import { BaseEditor } from '../BaseEditor';
import { ControlSet } from '../ControlSet';
import { PRIMARY_CONTROL_ID } from '../types';
import type { EditorEvent, EditorHost } from '../types';

/** Largest side of the painted box */
const MAX_BOX_SIZE = 12;

export class CheckBoxEditor extends BaseEditor {
  getName(): string {
    return 'CheckBox';
  }

  createControls(host: EditorHost, property: Property, position: Point, size: Size): ControlSet {
    const input = this.createInput(host, property, position, size, 'checkbox');
    return input ? new ControlSet(input) : ControlSet.empty();
  }

  updateControl(property: Property, controls: ControlSet): void {
    const checkbox = this.getCheckbox(controls.primary);
    if (!checkbox) {
      return;
    }
    if (property.isValueUnspecified()) {
      this.setValueToUnspecified(property, controls);
      return;
    }
    checkbox.indeterminate = false;
    checkbox.checked = property.getValue() === true;
  }

  onEvent(_host: EditorHost, property: Property, primary: HTMLElement, event: EditorEvent): boolean {
    const checkbox = this.getCheckbox(primary);
    if (!checkbox || event.controlId !== PRIMARY_CONTROL_ID || event.type !== 'checkbox-toggled') {
      return false;
    }
    checkbox.indeterminate = false;
    return property.isValueUnspecified() || checkbox.checked !== (property.getValue() === true);
  }

  getValueFromControl(property: Property, controls: ControlSet): ValueConversion {
    const checkbox = this.getCheckbox(controls.primary);
    if (!checkbox) {
      return this.unchangedResult(property);
    }
    if (checkbox.indeterminate) {
      return this.unspecifiedResult(property);
    }
    return property.intToValue(checkbox.checked ? 1 : 0);
  }

  setValueToUnspecified(_property: Property, controls: ControlSet): void {
    const checkbox = this.getCheckbox(controls.primary);
    if (checkbox) {
      checkbox.checked = false;
      checkbox.indeterminate = true;
    }
  }

  setControlIntValue(_property: Property, controls: ControlSet, value: number): void {
    const checkbox = this.getCheckbox(controls.primary);
    if (checkbox) {
      checkbox.indeterminate = false;
      checkbox.checked = value !== 0;
    }
  }

  /**
   * Paint a box, ticked when the value is true.
   */
  drawValue(ctx: CanvasRenderingContext2D, rect: Rect, property: Property, _text: string): void {
    const box = Math.min(rect.height - 4, MAX_BOX_SIZE);
    const x = rect.x + 2;
    const y = rect.y + (rect.height - box) / 2;

    ctx.save();
    ctx.strokeRect(x, y, box, box);
    if (property.getValue() === true) {
      ctx.beginPath();
      ctx.moveTo(x + 2, y + box / 2);
      ctx.lineTo(x + box * 0.4, y + box - 3);
      ctx.lineTo(x + box - 2, y + 2);
      ctx.stroke();
    }
    ctx.restore();
  }

  private getCheckbox(primary: HTMLElement | null): HTMLInputElement | null {
    return primary instanceof HTMLInputElement && primary.type === 'checkbox' ? primary : null;
  }
}
