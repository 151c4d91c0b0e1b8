/**
 * Unit tests for MultiButtonControl
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { MultiButtonControl } from '../../../lib/editors/MultiButtonControl';
import { PRIMARY_CONTROL_ID, SECONDARY_CONTROL_ID } from '../../../lib/editors/types';
import { EditorError, EditorErrorCode } from '../../../lib/errors';
import { TestHost } from '../../helpers/mocks';

function expectErrorCode(fn: () => void, code: EditorErrorCode): void {
  try {
    fn();
    expect.unreachable();
  } catch (error) {
    expect(error).toBeInstanceOf(EditorError);
    if (error instanceof EditorError) {
      expect(error.code).toBe(code);
    }
  }
}

describe('MultiButtonControl', () => {
  let host: TestHost;
  let buttons: MultiButtonControl;

  beforeEach(() => {
    host = new TestHost();
    buttons = new MultiButtonControl(host, { width: 100, height: 20 });
  });

  describe('construction', () => {
    it('should start empty with the whole cell for the primary', () => {
      expect(buttons.getCount()).toBe(0);
      expect(buttons.getButtonsWidth()).toBe(0);
      expect(buttons.getPrimarySize()).toEqual({ width: 100, height: 20 });
      expect(buttons.getPosition()).toBeNull();
    });

    it('should add its element to the host panel as the secondary control', () => {
      expect(buttons.element.parentElement).toBe(host.panel);
      expect(buttons.element.getAttribute('data-pg-control-id')).toBe(String(SECONDARY_CONTROL_ID));
      expect(buttons.element.className).toBe('pg-multi-button');
    });

    it('should add the extra class name', () => {
      const spin = new MultiButtonControl(host, { width: 100, height: 20 }, { className: 'pg-spin-buttons' });

      expect(spin.element.classList.contains('pg-spin-buttons')).toBe(true);
    });
  });

  describe('add', () => {
    it('should size text and image buttons', () => {
      buttons.add('...');
      buttons.add('A');
      buttons.add({ src: 'icon.png', width: 16, height: 16 });

      expect(buttons.getCount()).toBe(3);
      expect(buttons.getButton(0).style.width).toBe('29px');
      expect(buttons.getButton(1).style.width).toBe('20px');
      expect(buttons.getButton(2).style.width).toBe('24px');
      expect(buttons.getButtonsWidth()).toBe(73);
      expect(buttons.getPrimarySize()).toEqual({ width: 27, height: 20 });
    });

    it('should lay buttons out left to right', () => {
      buttons.add('...');
      buttons.add('A');

      expect(buttons.getButton(0).style.left).toBe('0px');
      expect(buttons.getButton(1).style.left).toBe('29px');
      expect(buttons.element.style.width).toBe('49px');
    });

    it('should render image buttons with an img', () => {
      buttons.add({ src: 'icon.png', width: 16, height: 16, alt: 'Pick' });

      const img = buttons.getButton(0).querySelector('img');
      expect(img?.width).toBe(16);
      expect(img?.alt).toBe('Pick');
    });

    it('should allocate distinct ids from the host', () => {
      buttons.add('A');
      buttons.add('B');

      expect(buttons.getButtonId(0)).toBe(-1000);
      expect(buttons.getButtonId(1)).toBe(-1001);
      expect(buttons.getButton(1).getAttribute('data-pg-control-id')).toBe('-1001');
    });

    it('should keep explicit ids', () => {
      buttons.add('A', 10);
      buttons.add('B', 11);

      expect(buttons.getButtonId(0)).toBe(10);
      expect(buttons.getButtonId(1)).toBe(11);
    });

    it('should skip allocated ids that are already taken', () => {
      buttons.add('A', -1000);
      buttons.add('B');

      expect(buttons.getButtonId(1)).toBe(-1001);
    });

    it('should reject duplicate explicit ids', () => {
      buttons.add('A', 10);

      expectErrorCode(() => buttons.add('B', 10), EditorErrorCode.DUPLICATE_CONTROL_ID);
      expect(buttons.getCount()).toBe(1);
    });

    it('should reject the primary and secondary control ids', () => {
      expectErrorCode(() => buttons.add('A', PRIMARY_CONTROL_ID), EditorErrorCode.DUPLICATE_CONTROL_ID);
      expectErrorCode(() => buttons.add('A', SECONDARY_CONTROL_ID), EditorErrorCode.DUPLICATE_CONTROL_ID);
    });

    it('should not add buttons after finalizePosition', () => {
      buttons.add('A');
      buttons.finalizePosition({ x: 0, y: 0 });

      expectErrorCode(() => buttons.add('B'), EditorErrorCode.INVALID_STATE);
    });
  });

  describe('accessors', () => {
    it('should reject out of range indices', () => {
      buttons.add('A');

      expectErrorCode(() => buttons.getButton(1), EditorErrorCode.INDEX_OUT_OF_RANGE);
      expectErrorCode(() => buttons.getButtonId(-1), EditorErrorCode.INDEX_OUT_OF_RANGE);
    });
  });

  describe('finalizePosition', () => {
    it('should move the cluster to the right edge of the cell', () => {
      buttons.add('...');
      buttons.add('A');
      buttons.add({ src: 'icon.png', width: 16, height: 16 });
      buttons.finalizePosition({ x: 100, y: 40 });

      expect(buttons.getPosition()).toEqual({ x: 127, y: 40 });
      expect(buttons.element.style.left).toBe('127px');
      expect(buttons.element.style.top).toBe('40px');
    });

    it('should align the right edge with the cell for any button count', () => {
      const empty = new MultiButtonControl(host, { width: 100, height: 20 });
      empty.finalizePosition({ x: 100, y: 0 });
      expect(empty.getPosition()).toEqual({ x: 200, y: 0 });

      buttons.add('A');
      buttons.finalizePosition({ x: 100, y: 0 });
      expect(buttons.getPosition()).toEqual({ x: 180, y: 0 });
      expect(buttons.getPrimarySize().width + buttons.getButtonsWidth()).toBe(100);
    });

    it('should only be called once', () => {
      buttons.finalizePosition({ x: 0, y: 0 });

      expectErrorCode(() => buttons.finalizePosition({ x: 0, y: 0 }), EditorErrorCode.INVALID_STATE);
    });
  });

  it('should remove its element on destroy', () => {
    buttons.destroy();

    expect(buttons.element.isConnected).toBe(false);
    expect(host.panel?.children.length).toBe(0);
  });
});
