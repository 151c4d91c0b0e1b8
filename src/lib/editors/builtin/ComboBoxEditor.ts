/**
 * ComboBoxEditor - Editable text with a list of suggested choices.
 *
 * The primary control is a wrapper holding the text input and its datalist.
 */

import type { Point, Size } from '../../types';
import type { Property } from '../../properties/types';
import { ControlSet } from '../ControlSet';
import { PRIMARY_CONTROL_ID } from '../types';
import type { EditorHost } from '../types';
import { TextCtrlEditor } from './TextCtrlEditor';

let listCounter = 0;

export class ComboBoxEditor extends TextCtrlEditor {
  getName(): string {
    return 'ComboBox';
  }

  createControls(host: EditorHost, property: Property, position: Point, size: Size): ControlSet {
    const panel = host.getPanel();
    if (!panel) {
      return ControlSet.empty();
    }

    const wrapper = document.createElement('div');
    wrapper.className = 'pg-editor-combo';
    this.placeControl(wrapper, position, size);
    this.tagControl(wrapper, PRIMARY_CONTROL_ID);

    listCounter += 1;
    const list = document.createElement('datalist');
    list.id = `pg-combo-list-${listCounter}`;
    for (const choice of property.getChoices()) {
      const option = document.createElement('option');
      option.value = choice.label;
      list.appendChild(option);
    }

    const input = document.createElement('input');
    input.type = 'text';
    input.className = 'pg-editor-input pg-editor-input--combo';
    input.setAttribute('list', list.id);
    input.style.width = '100%';
    input.style.height = '100%';

    wrapper.appendChild(input);
    wrapper.appendChild(list);
    panel.appendChild(wrapper);
    return new ControlSet(wrapper);
  }

  insertItem(control: HTMLElement, label: string, index: number): number {
    const list = control.querySelector('datalist');
    if (!list) {
      return -1;
    }
    const options = list.querySelectorAll('option');
    const option = document.createElement('option');
    option.value = label;
    if (index < 0 || index >= options.length) {
      list.appendChild(option);
      return options.length;
    }
    list.insertBefore(option, options[index]);
    return index;
  }

  deleteItem(control: HTMLElement, index: number): void {
    const options = control.querySelectorAll('datalist option');
    if (index >= 0 && index < options.length) {
      options[index].remove();
    }
  }

  canContainCustomImage(): boolean {
    return true;
  }

  protected getTextInput(primary: HTMLElement | null): HTMLInputElement | null {
    if (primary instanceof HTMLInputElement) {
      return primary;
    }
    return primary?.querySelector('input') ?? null;
  }
}
