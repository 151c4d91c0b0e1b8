import { BaseProperty } from './BaseProperty';
import type { PropertyValue, ValueConversion } from './types';

const INTEGER_PATTERN = /^[+-]?\d+$/;

export class IntProperty extends BaseProperty<number> {
  stringToValue(text: string): ValueConversion {
    const trimmed = text.trim();
    if (trimmed === '') {
      return this.converted(null);
    }
    if (!INTEGER_PATTERN.test(trimmed)) {
      return this.conversionFailed(`"${text}" is not a valid integer`);
    }
    const value = Number(trimmed);
    if (!Number.isSafeInteger(value)) {
      return this.conversionFailed(`"${text}" is outside the integer range`);
    }
    const { min, max } = this.attributes;
    if ((min !== undefined && value < min) || (max !== undefined && value > max)) {
      return this.conversionFailed(`${value} is outside the range ${min ?? '-∞'}..${max ?? '∞'}`);
    }
    return this.converted(value);
  }

  intToValue(value: number): ValueConversion {
    return this.stringToValue(String(Math.trunc(value)));
  }

  protected isValueOfType(value: Exclude<PropertyValue, null>): value is number {
    return typeof value === 'number' && Number.isSafeInteger(value);
  }

  protected formatValue(value: number): string {
    return String(value);
  }

  protected getDefaultEditorName(): string {
    return 'TextCtrl';
  }
}
