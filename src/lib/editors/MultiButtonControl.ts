/**
 * MultiButtonControl - A cluster of action buttons used as the secondary
 * control of an editor.
 *
 * Usage inside createControls:
 *
 *   const buttons = new MultiButtonControl(host, size);
 *   buttons.add('...');
 *   buttons.add('A');
 *   const input = this.createInput(host, property, position, buttons.getPrimarySize());
 *   buttons.finalizePosition(position);
 *   return new ControlSet(input, buttons);
 *
 * Buttons sit left to right inside the cluster and the cluster is moved
 * to the right edge of the cell, leaving the rest to the primary control.
 */

import { EditorError, EditorErrorCode } from '../errors';
import type { ButtonBitmap, Point, Size } from '../types';
import {
  AUTO_CONTROL_ID,
  CONTROL_ID_ATTRIBUTE,
  PRIMARY_CONTROL_ID,
  SECONDARY_CONTROL_ID
} from './types';
import type { EditorHost } from './types';

export interface MultiButtonOptions {
  /** Estimated width of one label character */
  charWidth?: number;
  /** Horizontal padding on each side of a label or image */
  padding?: number;
  className?: string;
}

const DEFAULT_OPTIONS: Required<MultiButtonOptions> = {
  charWidth: 7,
  padding: 4,
  className: ''
};

export class MultiButtonControl {
  readonly element: HTMLDivElement;
  private readonly host: EditorHost;
  private readonly fullEditorSize: Size;
  private readonly options: Required<MultiButtonOptions>;
  private buttons: HTMLButtonElement[] = [];
  private buttonIds: number[] = [];
  private buttonsWidth: number = 0;
  private position: Point | null = null;

  constructor(host: EditorHost, size: Size, options: MultiButtonOptions = {}) {
    this.host = host;
    this.fullEditorSize = { width: size.width, height: size.height };
    this.options = { ...DEFAULT_OPTIONS, ...options };

    this.element = document.createElement('div');
    this.element.className = 'pg-multi-button';
    if (this.options.className) {
      this.element.classList.add(this.options.className);
    }
    this.element.setAttribute(CONTROL_ID_ATTRIBUTE, String(SECONDARY_CONTROL_ID));
    this.element.style.position = 'absolute';
    this.element.style.width = '0px';
    this.element.style.height = `${size.height}px`;

    host.getPanel()?.appendChild(this.element);
  }

  /**
   * Append a text button.
   */
  add(label: string, id?: number): void;
  /**
   * Append an image button.
   */
  add(bitmap: ButtonBitmap, id?: number): void;
  add(content: string | ButtonBitmap, id: number = AUTO_CONTROL_ID): void {
    if (this.position !== null) {
      throw new EditorError(
        'Buttons cannot be added after finalizePosition',
        EditorErrorCode.INVALID_STATE
      );
    }

    const buttonId = this.resolveId(id);
    const { padding, charWidth } = this.options;
    const height = this.fullEditorSize.height;

    const button = document.createElement('button');
    button.type = 'button';
    button.className = 'pg-multi-button__button';
    button.setAttribute(CONTROL_ID_ATTRIBUTE, String(buttonId));

    let width: number;
    if (typeof content === 'string') {
      button.textContent = content;
      width = Math.max(height, content.length * charWidth + padding * 2);
    } else {
      const img = document.createElement('img');
      img.src = content.src;
      img.width = content.width;
      img.height = content.height;
      img.alt = content.alt ?? '';
      button.appendChild(img);
      width = Math.max(height, content.width + padding * 2);
    }

    button.style.position = 'absolute';
    button.style.left = `${this.buttonsWidth}px`;
    button.style.top = '0px';
    button.style.width = `${width}px`;
    button.style.height = `${height}px`;

    this.element.appendChild(button);
    this.buttons.push(button);
    this.buttonIds.push(buttonId);
    this.buttonsWidth += width;
    this.element.style.width = `${this.buttonsWidth}px`;
  }

  getButton(index: number): HTMLButtonElement {
    this.checkIndex(index);
    return this.buttons[index];
  }

  getButtonId(index: number): number {
    this.checkIndex(index);
    return this.buttonIds[index];
  }

  getCount(): number {
    return this.buttons.length;
  }

  getButtonsWidth(): number {
    return this.buttonsWidth;
  }

  /**
   * The part of the cell left for the primary control.
   */
  getPrimarySize(): Size {
    return {
      width: this.fullEditorSize.width - this.buttonsWidth,
      height: this.fullEditorSize.height
    };
  }

  /**
   * Move the cluster to the right edge of the cell whose origin is given.
   * Call once, after the last add().
   */
  finalizePosition(origin: Point): void {
    if (this.position !== null) {
      throw new EditorError('finalizePosition was already called', EditorErrorCode.INVALID_STATE);
    }
    this.position = {
      x: origin.x + this.fullEditorSize.width - this.buttonsWidth,
      y: origin.y
    };
    this.element.style.left = `${this.position.x}px`;
    this.element.style.top = `${this.position.y}px`;
  }

  /**
   * Cluster position, or null before finalizePosition.
   */
  getPosition(): Point | null {
    return this.position ? { ...this.position } : null;
  }

  /**
   * Remove the cluster from the DOM.
   */
  destroy(): void {
    this.element.remove();
  }

  private resolveId(id: number): number {
    if (id === AUTO_CONTROL_ID) {
      let allocated = this.host.allocateControlId();
      while (this.isIdTaken(allocated)) {
        allocated = this.host.allocateControlId();
      }
      return allocated;
    }
    if (this.isIdTaken(id)) {
      throw new EditorError(
        `Control id ${id} is already used in this control set`,
        EditorErrorCode.DUPLICATE_CONTROL_ID,
        { id }
      );
    }
    return id;
  }

  private isIdTaken(id: number): boolean {
    return id === PRIMARY_CONTROL_ID || id === SECONDARY_CONTROL_ID || this.buttonIds.includes(id);
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.buttons.length) {
      throw new EditorError(
        `Button index ${index} is out of range (count ${this.buttons.length})`,
        EditorErrorCode.INDEX_OUT_OF_RANGE,
        { index }
      );
    }
  }
}
