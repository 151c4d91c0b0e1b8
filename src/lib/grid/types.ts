/**
 * Types for the property grid host.
 */

import type { ControlOptions } from '../controls/types';
import type { EditorEvent } from '../editors/types';
import type { Property, PropertyValue } from '../properties/types';

/**
 * Lifecycle of the row being edited.
 */
export type EditState = 'inactive' | 'creating' | 'bound' | 'destroying';

/**
 * When a change reported by the editor is written to the property:
 * - 'immediate': on every reported change
 * - 'deferred': on committing events (Enter, choice, checkbox, button,
 *   date) and on commitEdit(); typing only marks the edit as modified
 */
export type CommitMode = 'immediate' | 'deferred';

export interface PropertyGridOptions extends ControlOptions {
  /** Total grid width in pixels */
  width?: number;
  /** Width of the label column */
  labelWidth?: number;
  rowHeight?: number;
  commitMode?: CommitMode;
  className?: string;
}

export interface PropertyChangedEvent {
  property: Property;
  value: PropertyValue;
  oldValue: PropertyValue;
}

export interface EditorEventNotification {
  property: Property;
  event: EditorEvent;
  changed: boolean;
}

export interface EditEndedEvent {
  property: Property;
  cancelled: boolean;
}
