/**
 * Unit tests for BaseControl
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { BaseControl } from '../../../lib/controls/BaseControl';
import { EditorError, EditorErrorCode } from '../../../lib/errors';

// Concrete implementation for testing
class TestControl extends BaseControl {
  public updateCount = 0;
  public clicks = 0;

  protected createElement(): HTMLElement {
    const div = document.createElement('div');
    div.className = 'test-control';
    return div;
  }

  protected setupEventListeners(): void {
    if (this.element) {
      this.addDomListener(this.element, 'click', () => {
        this.clicks += 1;
      });
    }
  }

  update(): void {
    this.updateCount += 1;
  }

  getElement(): HTMLElement | null {
    return this.element;
  }
}

describe('BaseControl', () => {
  let control: TestControl;
  let container: HTMLElement;

  beforeEach(() => {
    control = new TestControl('test-control');
    container = document.createElement('div');
    document.body.appendChild(container);
  });

  afterEach(() => {
    control.destroy();
  });

  describe('attach()', () => {
    it('should append the element and update once', () => {
      const attached = vi.fn();
      control.on('attached', attached);

      control.attach({ container });

      expect(control.isAttached).toBe(true);
      expect(container.querySelector('.test-control')).not.toBeNull();
      expect(control.updateCount).toBe(1);
      expect(attached).toHaveBeenCalledTimes(1);
    });

    it('should throw if already attached', () => {
      control.attach({ container });

      expect(() => control.attach({ container })).toThrow(EditorError);
      try {
        control.attach({ container });
      } catch (error) {
        expect(error instanceof EditorError && error.code).toBe(EditorErrorCode.ALREADY_ATTACHED);
      }
    });

    it('should hide the element when created invisible', () => {
      const hidden = new TestControl('hidden', { visible: false });
      hidden.attach({ container });

      expect(hidden.getElement()?.style.display).toBe('none');
      hidden.destroy();
    });
  });

  describe('detach()', () => {
    it('should remove the element and its DOM listeners', () => {
      control.attach({ container });
      const element = control.getElement();

      control.detach();
      element?.dispatchEvent(new MouseEvent('click'));

      expect(container.children.length).toBe(0);
      expect(control.clicks).toBe(0);
      expect(control.isAttached).toBe(false);
    });

    it('should not throw if not attached', () => {
      expect(() => control.detach()).not.toThrow();
    });
  });

  describe('DOM listeners', () => {
    it('should receive events while attached', () => {
      control.attach({ container });

      control.getElement()?.dispatchEvent(new MouseEvent('click'));

      expect(control.clicks).toBe(1);
    });
  });

  describe('visibility', () => {
    it('should toggle between shown and hidden', () => {
      const changes: boolean[] = [];
      control.on('visibility-changed', (data: { visible: boolean }) => changes.push(data.visible));
      control.attach({ container });

      control.toggle();
      expect(control.getElement()?.style.display).toBe('none');

      control.toggle();
      expect(control.getElement()?.style.display).toBe('');

      expect(changes).toEqual([false, true]);
      expect(control.updateCount).toBe(2);
    });
  });

  describe('destroy()', () => {
    it('should detach and drop event handlers', () => {
      const detached = vi.fn();
      control.on('detached', detached);
      control.attach({ container });

      control.destroy();

      expect(detached).toHaveBeenCalledTimes(1);
      expect(control.listenerCount('detached')).toBe(0);
    });
  });
});
