/**
 * BaseEditor - Abstract base class for property editors.
 *
 * Supplies the default behaviour of the optional operations and helpers
 * for creating and tagging controls. Subclasses implement control
 * creation, loading, event handling and reading.
 */

import type { Point, Rect, Size } from '../types';
import type { Property, ValueConversion } from '../properties/types';
import type { ControlSet } from './ControlSet';
import { CONTROL_ID_ATTRIBUTE, PRIMARY_CONTROL_ID, SECONDARY_CONTROL_ID } from './types';
import type { EditorEvent, EditorHost, PropertyEditor } from './types';

/** Left indent of painted value text */
export const VALUE_TEXT_INDENT = 4;

const UNSPECIFIED_ATTRIBUTE = 'data-pg-unspecified';

export abstract class BaseEditor<TClientData = undefined> implements PropertyEditor {
  /**
   * Free payload for the code that registers the editor. Shared by every
   * row the editor serves.
   */
  clientData: TClientData | undefined = undefined;

  abstract getName(): string;

  abstract createControls(host: EditorHost, property: Property, position: Point, size: Size): ControlSet;

  abstract updateControl(property: Property, controls: ControlSet): void;

  abstract onEvent(host: EditorHost, property: Property, primary: HTMLElement, event: EditorEvent): boolean;

  abstract getValueFromControl(property: Property, controls: ControlSet): ValueConversion;

  abstract setValueToUnspecified(property: Property, controls: ControlSet): void;

  /**
   * Draw the text as a plain label, vertically centred and clipped to the rect.
   */
  drawValue(ctx: CanvasRenderingContext2D, rect: Rect, _property: Property, text: string): void {
    ctx.save();
    ctx.beginPath();
    ctx.rect(rect.x, rect.y, rect.width, rect.height);
    ctx.clip();
    ctx.textBaseline = 'middle';
    ctx.fillText(text, rect.x + VALUE_TEXT_INDENT, rect.y + rect.height / 2);
    ctx.restore();
  }

  setControlStringValue(_property: Property, _controls: ControlSet, _text: string): void {
    // No string form by default
  }

  setControlIntValue(_property: Property, _controls: ControlSet, _value: number): void {
    // No integer form by default
  }

  insertItem(_control: HTMLElement, _label: string, _index: number): number {
    return -1;
  }

  deleteItem(_control: HTMLElement, _index: number): void {
    // No list by default
  }

  onFocus(_property: Property, _control: HTMLElement): void {
    // Nothing to do by default
  }

  canContainCustomImage(): boolean {
    return false;
  }

  /**
   * Position an element absolutely inside the host panel.
   */
  protected placeControl(element: HTMLElement, position: Point, size: Size): void {
    element.style.position = 'absolute';
    element.style.left = `${position.x}px`;
    element.style.top = `${position.y}px`;
    element.style.width = `${size.width}px`;
    element.style.height = `${size.height}px`;
    element.style.boxSizing = 'border-box';
  }

  protected tagControl(element: HTMLElement, id: number): void {
    element.setAttribute(CONTROL_ID_ATTRIBUTE, String(id));
  }

  /**
   * Create an input of the given type as the primary control.
   * Returns null when the host has no panel.
   */
  protected createInput(
    host: EditorHost,
    property: Property,
    position: Point,
    size: Size,
    type: string = 'text'
  ): HTMLInputElement | null {
    const panel = host.getPanel();
    if (!panel) {
      return null;
    }
    const input = document.createElement('input');
    input.type = type;
    input.className = `pg-editor-input pg-editor-input--${type}`;
    const { placeholder } = property.getAttributes();
    if (placeholder !== undefined) {
      input.placeholder = placeholder;
    }
    this.placeControl(input, position, size);
    this.tagControl(input, PRIMARY_CONTROL_ID);
    panel.appendChild(input);
    return input;
  }

  /**
   * Create a select populated with the property's choices as the primary control.
   * Returns null when the host has no panel.
   */
  protected createSelect(host: EditorHost, property: Property, position: Point, size: Size): HTMLSelectElement | null {
    const panel = host.getPanel();
    if (!panel) {
      return null;
    }
    const select = document.createElement('select');
    select.className = 'pg-editor-select';
    for (const choice of property.getChoices()) {
      const option = document.createElement('option');
      option.value = String(choice.value);
      option.textContent = choice.label;
      select.appendChild(option);
    }
    this.placeControl(select, position, size);
    this.tagControl(select, PRIMARY_CONTROL_ID);
    panel.appendChild(select);
    return select;
  }

  /**
   * Create the square "..." button used as a secondary control at the
   * right edge of the cell.
   */
  protected createEditorButton(host: EditorHost, position: Point, size: Size, label: string = '...'): HTMLButtonElement | null {
    const panel = host.getPanel();
    if (!panel) {
      return null;
    }
    const button = document.createElement('button');
    button.type = 'button';
    button.className = 'pg-editor-button';
    button.textContent = label;
    this.placeControl(
      button,
      { x: position.x + size.width - size.height, y: position.y },
      { width: size.height, height: size.height }
    );
    this.tagControl(button, SECONDARY_CONTROL_ID);
    panel.appendChild(button);
    return button;
  }

  /**
   * Size left for the primary control beside a square button.
   */
  protected sizeBesideButton(size: Size): Size {
    return { width: Math.max(0, size.width - size.height), height: size.height };
  }

  protected setUnspecifiedMark(element: HTMLElement, unspecified: boolean): void {
    if (unspecified) {
      element.setAttribute(UNSPECIFIED_ATTRIBUTE, 'true');
    } else {
      element.removeAttribute(UNSPECIFIED_ATTRIBUTE);
    }
  }

  protected isMarkedUnspecified(element: HTMLElement): boolean {
    return element.getAttribute(UNSPECIFIED_ATTRIBUTE) === 'true';
  }

  /**
   * Result for controls that show no value.
   */
  protected unspecifiedResult(property: Property): ValueConversion {
    return { changed: !property.isValueUnspecified(), value: null };
  }

  protected unchangedResult(property: Property): ValueConversion {
    return { changed: false, value: property.getValue() };
  }
}
