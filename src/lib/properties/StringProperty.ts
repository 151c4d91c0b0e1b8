import { BaseProperty } from './BaseProperty';
import type { PropertyValue, ValueConversion } from './types';

export class StringProperty extends BaseProperty<string> {
  stringToValue(text: string): ValueConversion {
    return this.converted(text);
  }

  protected isValueOfType(value: Exclude<PropertyValue, null>): value is string {
    return typeof value === 'string';
  }

  protected formatValue(value: string): string {
    return value;
  }

  protected getDefaultEditorName(): string {
    return 'TextCtrl';
  }
}
