import { BaseProperty } from './BaseProperty';
import type { PropertyChoice, PropertyOptions, PropertyValue, ValueConversion } from './types';

/**
 * Property whose value is one of a fixed list of choices.
 */
export class EnumProperty extends BaseProperty<string | number> {
  private choices: PropertyChoice[];

  constructor(
    name: string,
    choices: PropertyChoice[],
    value: string | number | null,
    options: PropertyOptions = {}
  ) {
    super(name, value, options);
    this.choices = [...choices];
  }

  stringToValue(text: string): ValueConversion {
    if (text === '') {
      return this.converted(null);
    }
    const choice = this.choices.find(c => c.label === text);
    if (!choice) {
      return this.conversionFailed(`"${text}" is not one of the choices`);
    }
    return this.converted(choice.value);
  }

  intToValue(index: number): ValueConversion {
    const choice = this.choices[index];
    if (!choice) {
      return this.conversionFailed(`Choice index ${index} is out of range`);
    }
    return this.converted(choice.value);
  }

  getChoices(): readonly PropertyChoice[] {
    return this.choices;
  }

  getChoiceSelection(): number {
    return this.choices.findIndex(c => c.value === this.value);
  }

  addChoice(choice: PropertyChoice, index: number = -1): void {
    if (index < 0 || index >= this.choices.length) {
      this.choices.push(choice);
    } else {
      this.choices.splice(index, 0, choice);
    }
  }

  removeChoice(index: number): void {
    if (index >= 0 && index < this.choices.length) {
      this.choices.splice(index, 1);
    }
  }

  protected isValueOfType(value: Exclude<PropertyValue, null>): value is string | number {
    return this.choices.some(c => c.value === value);
  }

  protected formatValue(value: string | number): string {
    return this.choices.find(c => c.value === value)?.label ?? String(value);
  }

  protected getDefaultEditorName(): string {
    return 'Choice';
  }
}
