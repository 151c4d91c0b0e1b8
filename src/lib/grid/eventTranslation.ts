/**
 * Translation of DOM events on editor controls into EditorEvents.
 */

import { CONTROL_ID_ATTRIBUTE } from '../editors/types';
import type { EditorEvent } from '../editors/types';

const NON_TEXT_INPUT_TYPES = new Set([
  'checkbox', 'radio', 'date', 'button', 'submit', 'reset', 'file', 'color', 'range'
]);

/** DOM event types the grid listens to on editor controls */
export const ROUTED_DOM_EVENTS = ['input', 'change', 'keydown', 'click'] as const;

function isTextInput(element: Element): element is HTMLInputElement {
  return element instanceof HTMLInputElement && !NON_TEXT_INPUT_TYPES.has(element.type);
}

/**
 * Id of the control an element belongs to, or null if it belongs to none.
 */
export function findControlId(element: Element): number | null {
  const tagged = element.closest(`[${CONTROL_ID_ATTRIBUTE}]`);
  if (!tagged) {
    return null;
  }
  const id = Number(tagged.getAttribute(CONTROL_ID_ATTRIBUTE));
  return Number.isInteger(id) ? id : null;
}

/**
 * Translate a DOM event. Returns null for events editors do not handle.
 */
export function translateDomEvent(domEvent: Event): EditorEvent | null {
  const target = domEvent.target;
  if (!(target instanceof HTMLElement)) {
    return null;
  }

  switch (domEvent.type) {
    case 'input': {
      if (!isTextInput(target)) return null;
      return createEvent('text-updated', target, domEvent);
    }
    case 'change': {
      if (target instanceof HTMLSelectElement) {
        return createEvent('choice-selected', target, domEvent);
      }
      if (target instanceof HTMLInputElement && target.type === 'checkbox') {
        return createEvent('checkbox-toggled', target, domEvent);
      }
      if (target instanceof HTMLInputElement && target.type === 'date') {
        return createEvent('date-changed', target, domEvent);
      }
      return null;
    }
    case 'keydown': {
      if (!(domEvent instanceof KeyboardEvent)) return null;
      if (domEvent.key === 'Enter' && isTextInput(target)) {
        return createEvent('text-enter', target, domEvent, domEvent.key);
      }
      return createEvent('key-down', target, domEvent, domEvent.key);
    }
    case 'click': {
      const button = target.closest('button');
      if (!button) return null;
      return createEvent('button-clicked', button, domEvent);
    }
    default:
      return null;
  }
}

function createEvent(
  type: EditorEvent['type'],
  target: HTMLElement,
  nativeEvent: Event,
  key?: string
): EditorEvent | null {
  const controlId = findControlId(target);
  if (controlId === null) {
    return null;
  }
  const event: EditorEvent = { type, controlId, target, nativeEvent };
  if (key !== undefined) {
    event.key = key;
  }
  return event;
}
