/**
 * BaseProperty - Abstract base class for grid properties.
 *
 * Subclasses define the value type, its text form and the default editor.
 */

import type { EditorEvent, EditorHost } from '../editors/types';
import type {
  Property,
  PropertyAttributes,
  PropertyChoice,
  PropertyEventHandler,
  PropertyOptions,
  PropertyValue,
  ValueConversion
} from './types';
import { valuesEqual } from './values';

export abstract class BaseProperty<T extends Exclude<PropertyValue, null>> implements Property {
  readonly name: string;
  readonly label: string;
  protected value: T | null;
  protected attributes: PropertyAttributes;
  private editorName: string | null;
  private eventHandler: PropertyEventHandler | null;

  constructor(name: string, value: T | null, options: PropertyOptions = {}) {
    this.name = name;
    this.label = options.label ?? name;
    this.value = value;
    this.attributes = { ...options.attributes };
    this.editorName = options.editor ?? null;
    this.eventHandler = options.onEvent ?? null;
  }

  getValue(): PropertyValue {
    return this.value;
  }

  setValue(value: PropertyValue): void {
    if (value === null) {
      this.value = null;
      return;
    }
    if (!this.isValueOfType(value)) {
      throw new TypeError(`Property "${this.name}" cannot hold ${String(value)}`);
    }
    this.value = value;
  }

  isValueUnspecified(): boolean {
    return this.value === null;
  }

  setValueToUnspecified(): void {
    this.value = null;
  }

  getDisplayString(): string {
    return this.valueToString(this.value);
  }

  valueToString(value: PropertyValue): string {
    if (value === null) {
      return '';
    }
    return this.isValueOfType(value) ? this.formatValue(value) : String(value);
  }

  abstract stringToValue(text: string): ValueConversion;

  intToValue(value: number): ValueConversion {
    return this.stringToValue(String(value));
  }

  getChoices(): readonly PropertyChoice[] {
    return [];
  }

  getChoiceSelection(): number {
    return -1;
  }

  getAttributes(): Readonly<PropertyAttributes> {
    return this.attributes;
  }

  getEditorName(): string {
    return this.editorName ?? this.getDefaultEditorName();
  }

  setEditorName(name: string | null): void {
    this.editorName = name;
  }

  onEvent(host: EditorHost, primary: HTMLElement, event: EditorEvent): boolean {
    return this.eventHandler ? this.eventHandler(host, this, primary, event) : false;
  }

  protected abstract isValueOfType(value: Exclude<PropertyValue, null>): value is T;

  protected abstract formatValue(value: T): string;

  protected abstract getDefaultEditorName(): string;

  /**
   * Build a successful conversion result.
   */
  protected converted(value: T | null): ValueConversion {
    return { changed: !valuesEqual(value, this.value), value };
  }

  /**
   * Build a failed conversion result that keeps the current value.
   */
  protected conversionFailed(error: string): ValueConversion {
    return { changed: false, value: this.value, error };
  }
}
