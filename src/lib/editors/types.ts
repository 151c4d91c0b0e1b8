/**
 * Types for property editors.
 *
 * An editor translates between a Property's value and one or more DOM
 * controls created inside the grid, and interprets control events as
 * value changes. One editor instance serves every row that uses it, so
 * all per-row state lives in the ControlSet and the Property.
 */

import type { Point, Rect, Size } from '../types';
import type { Property, ValueConversion } from '../properties/types';
import type { ControlSet } from './ControlSet';
import type { MultiButtonControl } from './MultiButtonControl';

/** Control id of the primary control */
export const PRIMARY_CONTROL_ID = 2;

/** Control id of the secondary control (a button or a button cluster) */
export const SECONDARY_CONTROL_ID = 3;

/** Id sentinel requesting an id allocated by the host */
export const AUTO_CONTROL_ID = -2;

/** DOM attribute carrying a control's id */
export const CONTROL_ID_ATTRIBUTE = 'data-pg-control-id';

export type EditorEventType =
  | 'text-updated'
  | 'text-enter'
  | 'choice-selected'
  | 'checkbox-toggled'
  | 'date-changed'
  | 'button-clicked'
  | 'key-down';

/**
 * A UI event on one of the controls of the active ControlSet.
 */
export interface EditorEvent {
  type: EditorEventType;
  /** Id of the control the event came from */
  controlId: number;
  target: HTMLElement;
  /** Key name for keyboard events */
  key?: string;
  nativeEvent?: Event;
}

export type SecondaryControl = HTMLElement | MultiButtonControl;

/**
 * What an editor needs from the grid hosting its controls.
 */
export interface EditorHost {
  /** Parent element for controls, or null if the host has no DOM yet */
  getPanel(): HTMLElement | null;
  /** A negative control id not handed out before by this host */
  allocateControlId(): number;
  /** Primary control of the active edit */
  getEditorControl(): HTMLElement | null;
  /** Secondary control of the active edit */
  getEditorControlSecondary(): SecondaryControl | null;
}

/**
 * The contract every property editor implements.
 */
export interface PropertyEditor {
  /** Registry key; stable and non-empty */
  getName(): string;

  /**
   * Create the control(s) for a property inside the given cell.
   * Returns an invalid ControlSet if the controls cannot be created.
   */
  createControls(host: EditorHost, property: Property, position: Point, size: Size): ControlSet;

  /** Load the property's value into the controls */
  updateControl(property: Property, controls: ControlSet): void;

  /** Paint the value of a row that is not being edited */
  drawValue(ctx: CanvasRenderingContext2D, rect: Rect, property: Property, text: string): void;

  /**
   * Handle an event on the controls. Returns true when the control's
   * value now differs from the property's value.
   */
  onEvent(host: EditorHost, property: Property, primary: HTMLElement, event: EditorEvent): boolean;

  /** Read the controls and convert their state to a property value */
  getValueFromControl(property: Property, controls: ControlSet): ValueConversion;

  /** Show the "no determinate value" state */
  setValueToUnspecified(property: Property, controls: ControlSet): void;

  setControlStringValue(property: Property, controls: ControlSet, text: string): void;
  setControlIntValue(property: Property, controls: ControlSet, value: number): void;

  /** Insert a list item; index -1 appends. Returns the index used, or -1 */
  insertItem(control: HTMLElement, label: string, index: number): number;
  deleteItem(control: HTMLElement, index: number): void;

  onFocus(property: Property, control: HTMLElement): void;
  canContainCustomImage(): boolean;
}
