import { BaseProperty } from './BaseProperty';
import type { PropertyValue, ValueConversion } from './types';

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad(value: number, length: number): string {
  return String(value).padStart(length, '0');
}

/**
 * Calendar date property. Values are Dates at UTC midnight and their
 * text form is `YYYY-MM-DD`.
 */
export class DateProperty extends BaseProperty<Date> {
  stringToValue(text: string): ValueConversion {
    const trimmed = text.trim();
    if (trimmed === '') {
      return this.converted(null);
    }
    const match = DATE_PATTERN.exec(trimmed);
    if (!match) {
      return this.conversionFailed(`"${text}" is not a date (YYYY-MM-DD)`);
    }
    const [, year, month, day] = match.map(Number);
    const date = new Date(Date.UTC(year, month - 1, day));
    if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
      return this.conversionFailed(`"${text}" is not a valid calendar date`);
    }
    return this.converted(date);
  }

  protected isValueOfType(value: Exclude<PropertyValue, null>): value is Date {
    return value instanceof Date && !Number.isNaN(value.getTime());
  }

  protected formatValue(value: Date): string {
    return `${pad(value.getUTCFullYear(), 4)}-${pad(value.getUTCMonth() + 1, 2)}-${pad(value.getUTCDate(), 2)}`;
  }

  protected getDefaultEditorName(): string {
    return 'DatePickerCtrl';
  }
}
