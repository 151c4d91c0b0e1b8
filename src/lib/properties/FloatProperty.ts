import { BaseProperty } from './BaseProperty';
import type { PropertyValue, ValueConversion } from './types';

export class FloatProperty extends BaseProperty<number> {
  stringToValue(text: string): ValueConversion {
    const trimmed = text.trim();
    if (trimmed === '') {
      return this.converted(null);
    }
    const value = Number(trimmed);
    if (!Number.isFinite(value)) {
      return this.conversionFailed(`"${text}" is not a valid number`);
    }
    const { min, max } = this.attributes;
    if ((min !== undefined && value < min) || (max !== undefined && value > max)) {
      return this.conversionFailed(`${value} is outside the range ${min ?? '-∞'}..${max ?? '∞'}`);
    }
    return this.converted(value);
  }

  protected isValueOfType(value: Exclude<PropertyValue, null>): value is number {
    return typeof value === 'number' && Number.isFinite(value);
  }

  protected formatValue(value: number): string {
    const { precision } = this.attributes;
    return precision !== undefined ? value.toFixed(precision) : String(value);
  }

  protected getDefaultEditorName(): string {
    return 'TextCtrl';
  }
}
