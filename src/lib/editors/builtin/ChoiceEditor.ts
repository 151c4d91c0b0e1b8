/**
 * ChoiceEditor - Drop-down list of the property's choices.
 *
 * Each option carries its choice's value, so the selection is read back
 * by value rather than by position. An option added with insertItem that
 * matches no choice is converted from its label.
 */

import type { Point, Size } from '../../types';
import type { Property, ValueConversion } from '../../properties/types';
import { BaseEditor } from '../BaseEditor';
import { ControlSet } from '../ControlSet';
import { PRIMARY_CONTROL_ID } from '../types';
import type { EditorEvent, EditorHost } from '../types';

export class ChoiceEditor extends BaseEditor {
  getName(): string {
    return 'Choice';
  }

  createControls(host: EditorHost, property: Property, position: Point, size: Size): ControlSet {
    const select = this.createSelect(host, property, position, size);
    return select ? new ControlSet(select) : ControlSet.empty();
  }

  updateControl(property: Property, controls: ControlSet): void {
    const select = this.getSelect(controls.primary);
    if (!select) {
      return;
    }
    if (property.isValueUnspecified()) {
      this.setValueToUnspecified(property, controls);
      return;
    }
    this.selectChoice(select, property, property.getChoiceSelection());
  }

  onEvent(_host: EditorHost, property: Property, primary: HTMLElement, event: EditorEvent): boolean {
    const select = this.getSelect(primary);
    if (!select || event.controlId !== PRIMARY_CONTROL_ID || event.type !== 'choice-selected') {
      return false;
    }
    const option = select.item(select.selectedIndex);
    if (!option) {
      return !property.isValueUnspecified();
    }
    const choiceIndex = this.findChoiceIndex(property, option);
    if (choiceIndex < 0) {
      return option.text !== property.getDisplayString();
    }
    return choiceIndex !== property.getChoiceSelection();
  }

  getValueFromControl(property: Property, controls: ControlSet): ValueConversion {
    const select = this.getSelect(controls.primary);
    if (!select) {
      return this.unchangedResult(property);
    }
    const option = select.item(select.selectedIndex);
    if (!option) {
      return this.unspecifiedResult(property);
    }
    const choiceIndex = this.findChoiceIndex(property, option);
    return choiceIndex >= 0 ? property.intToValue(choiceIndex) : property.stringToValue(option.text);
  }

  setValueToUnspecified(_property: Property, controls: ControlSet): void {
    const select = this.getSelect(controls.primary);
    if (select) {
      select.selectedIndex = -1;
    }
  }

  setControlIntValue(property: Property, controls: ControlSet, value: number): void {
    const select = this.getSelect(controls.primary);
    if (select) {
      this.selectChoice(select, property, value);
    }
  }

  setControlStringValue(_property: Property, controls: ControlSet, text: string): void {
    const select = this.getSelect(controls.primary);
    if (!select) {
      return;
    }
    select.selectedIndex = Array.from(select.options).findIndex(option => option.text === text);
  }

  insertItem(control: HTMLElement, label: string, index: number): number {
    const select = this.getSelect(control);
    if (!select) {
      return -1;
    }
    const option = document.createElement('option');
    option.textContent = label;
    option.value = label;
    if (index < 0 || index >= select.options.length) {
      select.appendChild(option);
      return select.options.length - 1;
    }
    select.insertBefore(option, select.options[index]);
    return index;
  }

  deleteItem(control: HTMLElement, index: number): void {
    const select = this.getSelect(control);
    if (select && index >= 0 && index < select.options.length) {
      select.remove(index);
    }
  }

  canContainCustomImage(): boolean {
    return true;
  }

  /**
   * Index among the property's choices of an option, -1 for an option
   * added through insertItem that matches no choice.
   */
  protected findChoiceIndex(property: Property, option: HTMLOptionElement): number {
    return property.getChoices().findIndex(choice => String(choice.value) === option.value);
  }

  /**
   * Select the option of a choice index; -1 clears the selection.
   */
  protected selectChoice(select: HTMLSelectElement, property: Property, choiceIndex: number): void {
    const choice = property.getChoices()[choiceIndex];
    const value = choice ? String(choice.value) : null;
    select.selectedIndex = Array.from(select.options).findIndex(option => option.value === value);
  }

  protected getSelect(primary: HTMLElement | null): HTMLSelectElement | null {
    return primary instanceof HTMLSelectElement ? primary : null;
  }
}
