/**
 * Types for DOM controls.
 */

/**
 * Options for attaching a control to the page.
 */
export interface ControlAttachOptions {
  /** Container element where the control should be rendered */
  container: HTMLElement;
}

/**
 * Base interface for controls.
 */
export interface Control {
  /** Unique identifier for this control instance */
  readonly id: string;
  /** Whether the control is currently attached */
  readonly isAttached: boolean;
  attach(options: ControlAttachOptions): void;
  detach(): void;
  /** Update the control's display */
  update(): void;
  show(): void;
  hide(): void;
  /** Clean up and destroy the control */
  destroy(): void;
}

/**
 * Base options for creating a control.
 */
export interface ControlOptions {
  /** Initial visibility state */
  visible?: boolean;
}
