/**
 * Unit tests for SpinCtrlEditor
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { SpinCtrlEditor } from '../../../lib/editors/builtin';
import type { ControlSet } from '../../../lib/editors/ControlSet';
import { MultiButtonControl } from '../../../lib/editors/MultiButtonControl';
import { FloatProperty } from '../../../lib/properties/FloatProperty';
import { IntProperty } from '../../../lib/properties/IntProperty';
import type { Property } from '../../../lib/properties/types';
import { TestHost, editorEvent } from '../../helpers/mocks';

describe('SpinCtrlEditor', () => {
  let editor: SpinCtrlEditor;
  let host: TestHost;

  beforeEach(() => {
    editor = new SpinCtrlEditor();
    host = new TestHost();
  });

  function open(property: Property): { controls: ControlSet; input: HTMLInputElement; buttons: MultiButtonControl } {
    const controls = editor.createControls(host, property, { x: 100, y: 0 }, { width: 100, height: 20 });
    host.controls = controls;
    editor.updateControl(property, controls);
    const input = controls.primary;
    const buttons = controls.getSecondary();
    if (!(input instanceof HTMLInputElement) || !(buttons instanceof MultiButtonControl)) {
      throw new Error('unexpected spin controls');
    }
    return { controls, input, buttons };
  }

  function clickButton(property: Property, input: HTMLInputElement, buttons: MultiButtonControl, index: number): boolean {
    const button = buttons.getButton(index);
    return editor.onEvent(host, property, input, editorEvent('button-clicked', button, buttons.getButtonId(index)));
  }

  it('should create an input and two buttons at the right edge', () => {
    const { input, buttons } = open(new IntProperty('count', 5));

    expect(buttons.getCount()).toBe(2);
    expect(buttons.getButton(0).textContent).toBe('▲');
    expect(buttons.getButton(1).textContent).toBe('▼');
    expect(buttons.getButtonsWidth()).toBe(40);
    expect(buttons.getPosition()).toEqual({ x: 160, y: 0 });
    expect(input.style.width).toBe('60px');
    expect(input.value).toBe('5');
  });

  it('should step up and down with the buttons', () => {
    const property = new IntProperty('count', 5);
    const { controls, input, buttons } = open(property);

    expect(clickButton(property, input, buttons, 0)).toBe(true);
    expect(input.value).toBe('6');
    expect(editor.getValueFromControl(property, controls)).toEqual({ changed: true, value: 6 });

    expect(clickButton(property, input, buttons, 1)).toBe(false);
    expect(input.value).toBe('5');
  });

  it('should step with the arrow keys', () => {
    const property = new IntProperty('count', 5);
    const { input } = open(property);

    expect(editor.onEvent(host, property, input, editorEvent('key-down', input, 2, 'ArrowDown'))).toBe(true);
    expect(input.value).toBe('4');
    expect(editor.onEvent(host, property, input, editorEvent('key-down', input, 2, 'a'))).toBe(false);
    expect(input.value).toBe('4');
  });

  it('should clamp to the range', () => {
    const property = new IntProperty('count', 5, { attributes: { min: 0, max: 6 } });
    const { input, buttons } = open(property);

    clickButton(property, input, buttons, 0);
    clickButton(property, input, buttons, 0);

    expect(input.value).toBe('6');
  });

  it('should wrap around when wrap is set', () => {
    const property = new IntProperty('count', 6, { attributes: { min: 0, max: 6, wrap: true } });
    const { input, buttons } = open(property);

    clickButton(property, input, buttons, 0);
    expect(input.value).toBe('0');

    clickButton(property, input, buttons, 1);
    expect(input.value).toBe('6');
  });

  it('should step floats by the step attribute', () => {
    const property = new FloatProperty('ratio', 0.2, { attributes: { step: 0.1 } });
    const { input, buttons } = open(property);

    clickButton(property, input, buttons, 0);

    expect(input.value).toBe('0.3');
  });

  it('should step by steps too small for fixed decimals', () => {
    const property = new FloatProperty('epsilon', 0, { attributes: { step: 1e-7 } });
    const { controls, input, buttons } = open(property);

    expect(clickButton(property, input, buttons, 0)).toBe(true);
    expect(input.value).toBe('1e-7');
    expect(editor.getValueFromControl(property, controls)).toEqual({ changed: true, value: 1e-7 });

    clickButton(property, input, buttons, 0);
    expect(input.value).toBe('2e-7');
  });

  it('should start from zero when the value is unspecified', () => {
    const property = new IntProperty('count', null);
    const { input, buttons } = open(property);

    expect(clickButton(property, input, buttons, 0)).toBe(true);
    expect(input.value).toBe('1');
    expect(input.hasAttribute('data-pg-unspecified')).toBe(false);
  });

  it('should fail without a panel', () => {
    const controls = editor.createControls(new TestHost(null), new IntProperty('count', 5), { x: 0, y: 0 }, { width: 100, height: 20 });

    expect(controls.isValid).toBe(false);
  });
});
