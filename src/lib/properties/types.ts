/**
 * Types for the property value model consumed by editors.
 */

import type { EditorEvent, EditorHost } from '../editors/types';

/**
 * A property's value. `null` means the value is unspecified.
 */
export type PropertyValue = string | number | boolean | Date | null;

/**
 * Outcome of converting control state into a property value.
 */
export interface ValueConversion {
  /** Whether `value` differs from the property's current value */
  changed: boolean;
  value: PropertyValue;
  /** Set when the text could not be converted; `value` is then the current value */
  error?: string;
}

export interface PropertyChoice {
  label: string;
  value: string | number;
}

export interface PropertyAttributes {
  min?: number;
  max?: number;
  step?: number;
  /** Spin past max to min (and back) instead of clamping */
  wrap?: boolean;
  /** Decimal places for float display */
  precision?: number;
  /** Edit booleans with a checkbox instead of a choice */
  useCheckbox?: boolean;
  placeholder?: string;
}

/**
 * Property-level event hook, offered every event the editor did not treat as a change.
 */
export type PropertyEventHandler = (
  host: EditorHost,
  property: Property,
  primary: HTMLElement,
  event: EditorEvent
) => boolean;

/**
 * The value holder edited by a row of the grid.
 * Editors read from it and convert through it but never write to it.
 */
export interface Property {
  readonly name: string;
  readonly label: string;

  getValue(): PropertyValue;
  setValue(value: PropertyValue): void;
  isValueUnspecified(): boolean;
  setValueToUnspecified(): void;

  /** Current value as display text ('' when unspecified) */
  getDisplayString(): string;
  valueToString(value: PropertyValue): string;
  stringToValue(text: string): ValueConversion;
  intToValue(value: number): ValueConversion;

  getChoices(): readonly PropertyChoice[];
  /** Index of the current value among the choices, -1 if none */
  getChoiceSelection(): number;
  getAttributes(): Readonly<PropertyAttributes>;

  getEditorName(): string;
  setEditorName(name: string | null): void;

  onEvent(host: EditorHost, primary: HTMLElement, event: EditorEvent): boolean;
}

export interface PropertyOptions {
  label?: string;
  attributes?: PropertyAttributes;
  /** Editor name overriding the property type's default */
  editor?: string;
  onEvent?: PropertyEventHandler;
}
