import { BaseProperty } from './BaseProperty';
import type { PropertyChoice, PropertyValue, ValueConversion } from './types';

const BOOL_CHOICES: readonly PropertyChoice[] = [
  { label: 'False', value: 0 },
  { label: 'True', value: 1 }
];

export class BoolProperty extends BaseProperty<boolean> {
  stringToValue(text: string): ValueConversion {
    const normalized = text.trim().toLowerCase();
    if (normalized === '') {
      return this.converted(null);
    }
    if (normalized === 'true' || normalized === '1') {
      return this.converted(true);
    }
    if (normalized === 'false' || normalized === '0') {
      return this.converted(false);
    }
    return this.conversionFailed(`"${text}" is not a boolean`);
  }

  intToValue(value: number): ValueConversion {
    return this.converted(value !== 0);
  }

  getChoices(): readonly PropertyChoice[] {
    return BOOL_CHOICES;
  }

  getChoiceSelection(): number {
    if (this.value === null) {
      return -1;
    }
    return this.value ? 1 : 0;
  }

  protected isValueOfType(value: Exclude<PropertyValue, null>): value is boolean {
    return typeof value === 'boolean';
  }

  protected formatValue(value: boolean): string {
    return value ? 'True' : 'False';
  }

  protected getDefaultEditorName(): string {
    return this.attributes.useCheckbox ? 'CheckBox' : 'Choice';
  }
}
