/**
 * TextCtrlAndButtonEditor - Text input with a "..." button.
 *
 * A click on the button is not a change by itself; the host passes it on
 * to the property, which may open a dialog and set the text.
 */

import type { Point, Size } from '../../types';
import type { Property } from '../../properties/types';
import { ControlSet } from '../ControlSet';
import type { EditorEvent, EditorHost } from '../types';
import { TextCtrlEditor } from './TextCtrlEditor';

export class TextCtrlAndButtonEditor extends TextCtrlEditor {
  getName(): string {
    return 'TextCtrlAndButton';
  }

  createControls(host: EditorHost, property: Property, position: Point, size: Size): ControlSet {
    const input = this.createInput(host, property, position, this.sizeBesideButton(size));
    if (!input) {
      return ControlSet.empty();
    }
    const button = this.createEditorButton(host, position, size);
    if (!button) {
      input.remove();
      return ControlSet.empty();
    }
    return new ControlSet(input, button);
  }

  onEvent(host: EditorHost, property: Property, primary: HTMLElement, event: EditorEvent): boolean {
    if (event.type === 'button-clicked') {
      return false;
    }
    return super.onEvent(host, property, primary, event);
  }
}
