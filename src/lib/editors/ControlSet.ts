/**
 * ControlSet - The controls created by one edit session.
 *
 * The host owns the controls once the set is returned and removes them
 * when the edit ends.
 */

import { MultiButtonControl } from './MultiButtonControl';
import type { SecondaryControl } from './types';

export class ControlSet {
  readonly primary: HTMLElement | null;
  private secondary: SecondaryControl | null;

  constructor(primary: HTMLElement | null = null, secondary: SecondaryControl | null = null) {
    this.primary = primary;
    this.secondary = secondary;
  }

  /**
   * The result of a failed createControls.
   */
  static empty(): ControlSet {
    return new ControlSet();
  }

  get isValid(): boolean {
    return this.primary !== null;
  }

  getSecondary(): SecondaryControl | null {
    return this.secondary;
  }

  setSecondary(secondary: SecondaryControl | null): void {
    this.secondary = secondary;
  }

  getSecondaryElement(): HTMLElement | null {
    if (this.secondary instanceof MultiButtonControl) {
      return this.secondary.element;
    }
    return this.secondary;
  }

  /**
   * All top-level elements of the set, primary first.
   */
  getElements(): HTMLElement[] {
    const elements: HTMLElement[] = [];
    if (this.primary) {
      elements.push(this.primary);
    }
    const secondary = this.getSecondaryElement();
    if (secondary) {
      elements.push(secondary);
    }
    return elements;
  }
}
