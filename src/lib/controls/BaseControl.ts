/**
 * BaseControl - Abstract base class for DOM controls.
 *
 * Owns one root element inside a container and the DOM listeners
 * registered on it, and emits 'attached', 'detached' and
 * 'visibility-changed'.
 */

import { EditorError, EditorErrorCode } from '../errors';
import { EventEmitter } from '../events/EventEmitter';
import type { Control, ControlAttachOptions, ControlOptions } from './types';

export abstract class BaseControl extends EventEmitter implements Control {
  readonly id: string;
  protected _isAttached: boolean = false;
  protected _isVisible: boolean = true;
  protected container: HTMLElement | null = null;
  protected element: HTMLElement | null = null;
  protected eventCleanup: Array<() => void> = [];

  constructor(id: string, options: ControlOptions = {}) {
    super();
    this.id = id;
    this._isVisible = options.visible !== false;
  }

  get isAttached(): boolean {
    return this._isAttached;
  }

  get isVisible(): boolean {
    return this._isVisible;
  }

  /**
   * Attach the control to a container.
   */
  attach(options: ControlAttachOptions): void {
    if (this._isAttached) {
      throw new EditorError(`Control ${this.id} is already attached`, EditorErrorCode.ALREADY_ATTACHED);
    }

    this.container = options.container;
    this.element = this.createElement();
    this.container.appendChild(this.element);

    this.setupEventListeners();
    this._isAttached = true;

    this.update();

    if (!this._isVisible) {
      this.element.style.display = 'none';
    }

    this.emit('attached');
  }

  /**
   * Detach the control from its container.
   */
  detach(): void {
    if (!this._isAttached) {
      return;
    }

    this.cleanupEventListeners();

    if (this.element && this.element.parentNode) {
      this.element.parentNode.removeChild(this.element);
    }

    this._isAttached = false;
    this.container = null;
    this.element = null;

    this.emit('detached');
  }

  show(): void {
    this._isVisible = true;
    if (this.element) {
      this.element.style.display = '';
      this.update();
    }
    this.emit('visibility-changed', { visible: true });
  }

  hide(): void {
    this._isVisible = false;
    if (this.element) {
      this.element.style.display = 'none';
    }
    this.emit('visibility-changed', { visible: false });
  }

  toggle(): void {
    if (this._isVisible) {
      this.hide();
    } else {
      this.show();
    }
  }

  /**
   * Clean up and destroy the control.
   */
  destroy(): void {
    this.detach();
    this.removeAllListeners();
  }

  /**
   * Create the control's root element.
   */
  protected abstract createElement(): HTMLElement;

  /**
   * Set up DOM listeners. Subclasses override this to add their own.
   */
  protected setupEventListeners(): void {
    // Default implementation - subclasses add their own
  }

  protected cleanupEventListeners(): void {
    for (const cleanup of this.eventCleanup) {
      cleanup();
    }
    this.eventCleanup = [];
  }

  /**
   * Add a DOM listener that is removed on detach.
   */
  protected addDomListener(target: EventTarget, type: string, handler: (event: Event) => void): void {
    target.addEventListener(type, handler);
    this.eventCleanup.push(() => target.removeEventListener(type, handler));
  }

  /**
   * Update the control's display.
   */
  abstract update(): void;
}
