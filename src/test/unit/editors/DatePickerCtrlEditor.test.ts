/**
 * Unit tests for DatePickerCtrlEditor
 */
import { describe, it, expect, vi } from 'vitest';
import { DatePickerCtrlEditor } from '../../../lib/editors/builtin';
import { DateProperty } from '../../../lib/properties/DateProperty';
import { TestHost, editorEvent } from '../../helpers/mocks';

describe('DatePickerCtrlEditor', () => {
  function open() {
    const editor = new DatePickerCtrlEditor();
    const host = new TestHost();
    const property = new DateProperty('due', new Date(Date.UTC(2024, 2, 5)));
    const controls = editor.createControls(host, property, { x: 100, y: 0 }, { width: 100, height: 20 });
    editor.updateControl(property, controls);
    const input = controls.primary;
    if (!(input instanceof HTMLInputElement)) {
      throw new Error('primary control is not an input');
    }
    return { editor, host, property, controls, input };
  }

  it('should create a date input showing the value', () => {
    const { input } = open();

    expect(input.type).toBe('date');
    expect(input.value).toBe('2024-03-05');
  });

  it('should report a change when another date is picked', () => {
    const { editor, host, property, controls, input } = open();

    input.value = '2024-03-06';
    expect(editor.onEvent(host, property, input, editorEvent('date-changed', input))).toBe(true);

    const result = editor.getValueFromControl(property, controls);
    expect(result.changed).toBe(true);
    expect(result.value).toEqual(new Date(Date.UTC(2024, 2, 6)));
  });

  it('should load an unspecified property through setValueToUnspecified', () => {
    const editor = new DatePickerCtrlEditor();
    const property = new DateProperty('due', null);
    const controls = editor.createControls(new TestHost(), property, { x: 100, y: 0 }, { width: 100, height: 20 });
    const setUnspecified = vi.spyOn(editor, 'setValueToUnspecified');

    editor.updateControl(property, controls);

    expect(setUnspecified).toHaveBeenCalledWith(property, controls);
    expect(editor.getValueFromControl(property, controls)).toEqual({ changed: false, value: null });
  });

  it('should read a cleared input as unspecified', () => {
    const { editor, property, controls, input } = open();

    editor.setValueToUnspecified(property, controls);

    expect(input.value).toBe('');
    expect(editor.getValueFromControl(property, controls)).toEqual({ changed: true, value: null });
  });
});
