/**
 * Mock factories for unit tests
 */
import { vi } from 'vitest';
import type { ControlSet } from '../../lib/editors/ControlSet';
import { PRIMARY_CONTROL_ID } from '../../lib/editors/types';
import type { EditorEvent, EditorEventType, EditorHost, SecondaryControl } from '../../lib/editors/types';

/**
 * Create a mock canvas 2D context with the drawing methods stubbed
 */
export function createMockContext(canvas: HTMLCanvasElement | null = null): CanvasRenderingContext2D {
  const ctx = {
    canvas,
    fillRect: vi.fn(),
    strokeRect: vi.fn(),
    clearRect: vi.fn(),
    fillText: vi.fn(),
    strokeText: vi.fn(),
    measureText: vi.fn((text: string) => ({ width: text.length * 8 })),
    beginPath: vi.fn(),
    closePath: vi.fn(),
    moveTo: vi.fn(),
    lineTo: vi.fn(),
    rect: vi.fn(),
    fill: vi.fn(),
    stroke: vi.fn(),
    clip: vi.fn(),
    save: vi.fn(),
    restore: vi.fn(),
    fillStyle: '#000000',
    strokeStyle: '#000000',
    lineWidth: 1,
    font: '12px Arial',
    textAlign: 'left',
    textBaseline: 'alphabetic'
  };
  return ctx as unknown as CanvasRenderingContext2D;
}

/**
 * Minimal editor host with its own panel and id counter
 */
export class TestHost implements EditorHost {
  controls: ControlSet | null = null;
  private nextId = -1000;

  constructor(readonly panel: HTMLElement | null = document.createElement('div')) {}

  getPanel(): HTMLElement | null {
    return this.panel;
  }

  allocateControlId(): number {
    const id = this.nextId;
    this.nextId -= 1;
    return id;
  }

  getEditorControl(): HTMLElement | null {
    return this.controls?.primary ?? null;
  }

  getEditorControlSecondary(): SecondaryControl | null {
    return this.controls?.getSecondary() ?? null;
  }
}

/**
 * Build an EditorEvent as the grid would deliver it
 */
export function editorEvent(
  type: EditorEventType,
  target: HTMLElement,
  controlId: number = PRIMARY_CONTROL_ID,
  key?: string
): EditorEvent {
  return key === undefined ? { type, target, controlId } : { type, target, controlId, key };
}

/**
 * Set an input's text and fire the input event
 */
export function typeInto(input: HTMLInputElement, text: string): void {
  input.value = text;
  input.dispatchEvent(new Event('input', { bubbles: true }));
}

export function pressKey(target: HTMLElement, key: string): void {
  target.dispatchEvent(new KeyboardEvent('keydown', { key, bubbles: true }));
}
