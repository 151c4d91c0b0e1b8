/**
 * SpinCtrlEditor - Numeric text input with up and down buttons.
 *
 * The buttons live in a MultiButtonControl returned as the secondary
 * control. Buttons and the ArrowUp/ArrowDown keys step the value by the
 * property's `step` attribute, clamped to `min`/`max` unless `wrap` is set.
 */

import type { Point, Size } from '../../types';
import type { Property } from '../../properties/types';
import { ControlSet } from '../ControlSet';
import { MultiButtonControl } from '../MultiButtonControl';
import type { EditorEvent, EditorHost } from '../types';
import { TextCtrlEditor } from './TextCtrlEditor';

/** Significant digits of a stepped value */
const STEP_PRECISION = 15;

export class SpinCtrlEditor extends TextCtrlEditor {
  getName(): string {
    return 'SpinCtrl';
  }

  createControls(host: EditorHost, property: Property, position: Point, size: Size): ControlSet {
    if (!host.getPanel()) {
      return ControlSet.empty();
    }

    const buttons = new MultiButtonControl(host, size, { className: 'pg-spin-buttons' });
    buttons.add('▲');
    buttons.add('▼');

    const input = this.createInput(host, property, position, buttons.getPrimarySize());
    if (!input) {
      buttons.destroy();
      return ControlSet.empty();
    }
    buttons.finalizePosition(position);
    return new ControlSet(input, buttons);
  }

  onEvent(host: EditorHost, property: Property, primary: HTMLElement, event: EditorEvent): boolean {
    const input = this.getTextInput(primary);
    if (!input) {
      return false;
    }
    const direction = this.getSpinDirection(host, event);
    if (direction === 0) {
      return super.onEvent(host, property, primary, event);
    }
    this.spin(property, input, direction);
    return this.textDiffers(property, input);
  }

  private getSpinDirection(host: EditorHost, event: EditorEvent): number {
    if (event.type === 'key-down') {
      if (event.key === 'ArrowUp') return 1;
      if (event.key === 'ArrowDown') return -1;
      return 0;
    }
    if (event.type === 'button-clicked') {
      const buttons = host.getEditorControlSecondary();
      if (!(buttons instanceof MultiButtonControl) || buttons.getCount() < 2) {
        return 0;
      }
      if (event.controlId === buttons.getButtonId(0)) return 1;
      if (event.controlId === buttons.getButtonId(1)) return -1;
    }
    return 0;
  }

  private spin(property: Property, input: HTMLInputElement, direction: number): void {
    const { min, max, wrap } = property.getAttributes();
    const step = property.getAttributes().step ?? 1;

    const text = input.value.trim();
    const parsed = Number(text);
    const current = property.getValue();
    let base: number;
    if (text !== '' && Number.isFinite(parsed)) {
      base = parsed;
    } else {
      base = typeof current === 'number' ? current : 0;
    }

    let next = Number((base + step * direction).toPrecision(STEP_PRECISION));

    if (max !== undefined && next > max) {
      next = wrap && min !== undefined ? min : max;
    } else if (min !== undefined && next < min) {
      next = wrap && max !== undefined ? max : min;
    }

    input.value = property.valueToString(next);
    this.setUnspecifiedMark(input, false);
  }
}
