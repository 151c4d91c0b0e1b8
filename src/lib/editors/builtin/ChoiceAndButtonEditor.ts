/**
 * ChoiceAndButtonEditor - Drop-down list with a "..." button.
 */

import type { Point, Size } from '../../types';
import type { Property } from '../../properties/types';
import { ControlSet } from '../ControlSet';
import type { EditorEvent, EditorHost } from '../types';
import { ChoiceEditor } from './ChoiceEditor';

export class ChoiceAndButtonEditor extends ChoiceEditor {
  getName(): string {
    return 'ChoiceAndButton';
  }

  createControls(host: EditorHost, property: Property, position: Point, size: Size): ControlSet {
    const select = this.createSelect(host, property, position, this.sizeBesideButton(size));
    if (!select) {
      return ControlSet.empty();
    }
    const button = this.createEditorButton(host, position, size);
    if (!button) {
      select.remove();
      return ControlSet.empty();
    }
    return new ControlSet(select, button);
  }

  onEvent(host: EditorHost, property: Property, primary: HTMLElement, event: EditorEvent): boolean {
    if (event.type === 'button-clicked') {
      return false;
    }
    return super.onEvent(host, property, primary, event);
  }
}
