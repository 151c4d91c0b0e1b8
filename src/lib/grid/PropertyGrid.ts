/**
 * PropertyGrid - Hosts property rows and drives the editor of the row
 * being edited.
 *
 * Edit lifecycle of a row:
 *   inactive -> creating (createControls) -> bound (updateControl)
 *   -> [events, commits] -> destroying (controls removed) -> inactive
 *
 * Only one row per grid is edited at a time; beginning an edit on another
 * row ends the current one. Several grids may share one EditorRegistry and
 * edit at the same time, since editors keep no per-row state.
 */

import { BaseControl } from '../controls/BaseControl';
import type { ControlSet } from '../editors/ControlSet';
import type { EditorRegistry } from '../editors/EditorRegistry';
import type { EditorEvent, EditorHost, PropertyEditor, SecondaryControl } from '../editors/types';
import { EditorError, EditorErrorCode } from '../errors';
import type { Property, PropertyValue } from '../properties/types';
import type { Rect } from '../types';
import { ROUTED_DOM_EVENTS, translateDomEvent } from './eventTranslation';
import type { EditState, PropertyGridOptions } from './types';

/** First id handed out by allocateControlId; later ids count down */
export const FIRST_AUTO_CONTROL_ID = -1000;

type ResolvedGridOptions = Required<Omit<PropertyGridOptions, 'visible'>>;

const DEFAULT_OPTIONS: ResolvedGridOptions = {
  width: 300,
  labelWidth: 100,
  rowHeight: 20,
  commitMode: 'immediate',
  className: ''
};

interface EditSession {
  property: Property;
  editor: PropertyEditor;
  controls: ControlSet;
  /** The controls hold a change not yet written to the property */
  modified: boolean;
  cleanup: Array<() => void>;
}

export class PropertyGrid extends BaseControl implements EditorHost {
  private readonly registry: EditorRegistry;
  private readonly options: ResolvedGridOptions;
  private properties: Property[] = [];
  private rowsElement: HTMLElement | null = null;
  private state: EditState = 'inactive';
  private session: EditSession | null = null;
  private nextControlId: number = FIRST_AUTO_CONTROL_ID;

  constructor(id: string, registry: EditorRegistry, options: PropertyGridOptions = {}) {
    super(id, options);
    this.registry = registry;
    const { visible: _visible, ...rest } = options;
    this.options = { ...DEFAULT_OPTIONS, ...rest };
  }

  // ============================================
  // Rows
  // ============================================

  append(property: Property): Property {
    if (this.findProperty(property.name)) {
      throw new EditorError(
        `Grid ${this.id} already has a property named "${property.name}"`,
        EditorErrorCode.DUPLICATE_PROPERTY
      );
    }
    this.properties.push(property);
    this.update();
    return property;
  }

  getProperty(name: string): Property | undefined {
    return this.findProperty(name);
  }

  getProperties(): readonly Property[] {
    return this.properties;
  }

  /**
   * Change the editor used for a property. Ends its edit if active.
   */
  setPropertyEditor(name: string, editorName: string): void {
    const property = this.requireProperty(name);
    this.registry.resolve(editorName);
    if (this.session?.property === property) {
      this.endEdit();
    }
    property.setEditorName(editorName);
  }

  getEditorFor(property: Property): PropertyEditor {
    return this.registry.resolve(property.getEditorName());
  }

  /**
   * Set a property's value from outside the editor and reload the
   * controls if the property is being edited.
   */
  setPropertyValue(name: string, value: PropertyValue): void {
    const property = this.requireProperty(name);
    const oldValue = property.getValue();
    property.setValue(value);
    if (this.session?.property === property) {
      this.refreshEditor();
    }
    this.update();
    this.emit('property-changed', { property, value: property.getValue(), oldValue });
  }

  /**
   * Value cell of a row, in panel coordinates.
   */
  getCellRect(name: string): Rect {
    const property = this.requireProperty(name);
    const index = this.properties.indexOf(property);
    const { width, labelWidth, rowHeight } = this.options;
    return {
      x: labelWidth,
      y: index * rowHeight,
      width: width - labelWidth,
      height: rowHeight
    };
  }

  /**
   * Paint a row's value with its editor.
   */
  paintValue(ctx: CanvasRenderingContext2D, name: string, rect: Rect = this.getCellRect(name)): void {
    const property = this.requireProperty(name);
    this.getEditorFor(property).drawValue(ctx, rect, property, property.getDisplayString());
  }

  // ============================================
  // EditorHost
  // ============================================

  getPanel(): HTMLElement | null {
    return this.element;
  }

  allocateControlId(): number {
    const id = this.nextControlId;
    this.nextControlId -= 1;
    return id;
  }

  getEditorControl(): HTMLElement | null {
    return this.session?.controls.primary ?? null;
  }

  getEditorControlSecondary(): SecondaryControl | null {
    return this.session?.controls.getSecondary() ?? null;
  }

  // ============================================
  // Edit lifecycle
  // ============================================

  getEditState(): EditState {
    return this.state;
  }

  getActiveProperty(): Property | null {
    return this.session?.property ?? null;
  }

  getControlSet(): ControlSet | null {
    return this.session?.controls ?? null;
  }

  /**
   * Whether the active edit holds a change not yet written to the property.
   */
  isModified(): boolean {
    return this.session?.modified ?? false;
  }

  /**
   * Create and bind the editor controls for a row.
   * Returns false if the editor could not create its controls.
   */
  beginEdit(name: string): boolean {
    const property = this.requireProperty(name);
    if (this.session) {
      if (this.session.property === property) {
        return true;
      }
      this.endEdit();
    }

    const editor = this.getEditorFor(property);
    const rect = this.getCellRect(name);

    this.state = 'creating';
    const controls = editor.createControls(
      this,
      property,
      { x: rect.x, y: rect.y },
      { width: rect.width, height: rect.height }
    );

    if (!controls.isValid) {
      this.state = 'inactive';
      console.warn(`[PropertyGrid] Editor "${editor.getName()}" could not create controls for "${name}"`);
      this.emit('editor-creation-failed', { property, editorName: editor.getName() });
      return false;
    }

    const session: EditSession = { property, editor, controls, modified: false, cleanup: [] };
    this.session = session;
    editor.updateControl(property, controls);
    this.bindControls(session);
    this.state = 'bound';

    this.emit('edit-started', { property });
    return true;
  }

  /**
   * Forward an event to the active editor, then to the property if the
   * editor reports no change. Returns whether a change was reported.
   */
  handleEditorEvent(event: EditorEvent): boolean {
    const session = this.session;
    const primary = session?.controls.primary;
    if (!session || !primary || this.state !== 'bound') {
      return false;
    }

    const { editor, property } = session;
    let changed = editor.onEvent(this, property, primary, event);
    if (!changed) {
      changed = property.onEvent(this, primary, event);
    }

    this.emit('editor-event', { property, event, changed });

    if (!changed || this.session !== session) {
      return changed;
    }

    session.modified = true;
    if (this.options.commitMode === 'immediate' || isCommittingEvent(event)) {
      this.commitEdit();
    }
    return true;
  }

  /**
   * Read the controls and write their value to the property.
   * Returns whether the property changed.
   */
  commitEdit(): boolean {
    const session = this.session;
    if (!session || this.state !== 'bound') {
      return false;
    }

    const { editor, property, controls } = session;
    const result = editor.getValueFromControl(property, controls);
    if (result.error !== undefined) {
      console.warn(`[PropertyGrid] Invalid value for "${property.name}": ${result.error}`);
      this.emit('property-validation-failed', { property, error: result.error });
      return false;
    }

    session.modified = false;
    if (!result.changed) {
      return false;
    }

    const oldValue = property.getValue();
    property.setValue(result.value);
    this.update();
    this.emit('property-changed', { property, value: result.value, oldValue });
    return true;
  }

  /**
   * Reload the active controls from the property, dropping pending changes.
   */
  refreshEditor(): void {
    const session = this.session;
    if (!session || this.state !== 'bound') {
      return;
    }
    session.editor.updateControl(session.property, session.controls);
    session.modified = false;
  }

  /**
   * End the active edit, committing a pending change first.
   */
  endEdit(): void {
    if (this.session?.modified) {
      this.commitEdit();
    }
    this.destroyControls(false);
  }

  /**
   * End the active edit without reading the controls.
   */
  cancelEdit(): void {
    this.destroyControls(true);
  }

  // ============================================
  // BaseControl
  // ============================================

  destroy(): void {
    this.cancelEdit();
    super.destroy();
  }

  detach(): void {
    this.cancelEdit();
    super.detach();
    this.rowsElement = null;
  }

  protected createElement(): HTMLElement {
    const element = document.createElement('div');
    element.className = 'pg-grid';
    if (this.options.className) {
      element.classList.add(this.options.className);
    }
    element.style.position = 'relative';
    element.style.width = `${this.options.width}px`;

    this.rowsElement = document.createElement('div');
    this.rowsElement.className = 'pg-grid__rows';
    element.appendChild(this.rowsElement);
    return element;
  }

  protected setupEventListeners(): void {
    if (!this.rowsElement) {
      return;
    }
    this.addDomListener(this.rowsElement, 'click', (event: Event) => {
      const target = event.target;
      if (!(target instanceof Element)) {
        return;
      }
      const row = target.closest('.pg-row');
      const name = row?.getAttribute('data-property');
      if (name) {
        this.beginEdit(name);
      }
    });
  }

  /**
   * Render the rows' labels and display values.
   */
  update(): void {
    if (!this.rowsElement) {
      return;
    }
    const { labelWidth, rowHeight } = this.options;
    this.rowsElement.innerHTML = '';
    for (const property of this.properties) {
      const row = document.createElement('div');
      row.className = 'pg-row';
      row.setAttribute('data-property', property.name);
      row.style.display = 'flex';
      row.style.height = `${rowHeight}px`;

      const label = document.createElement('div');
      label.className = 'pg-row__label';
      label.style.width = `${labelWidth}px`;
      label.textContent = property.label;

      const value = document.createElement('div');
      value.className = 'pg-row__value';
      value.textContent = property.getDisplayString();

      row.appendChild(label);
      row.appendChild(value);
      this.rowsElement.appendChild(row);
    }
  }

  // ============================================
  // Internals
  // ============================================

  private findProperty(name: string): Property | undefined {
    return this.properties.find(p => p.name === name);
  }

  private requireProperty(name: string): Property {
    const property = this.findProperty(name);
    if (!property) {
      throw new EditorError(
        `Grid ${this.id} has no property named "${name}"`,
        EditorErrorCode.PROPERTY_NOT_FOUND,
        { name }
      );
    }
    return property;
  }

  private bindControls(session: EditSession): void {
    for (const element of session.controls.getElements()) {
      for (const type of ROUTED_DOM_EVENTS) {
        const handler = (domEvent: Event) => {
          if (this.session !== session) {
            return;
          }
          const event = translateDomEvent(domEvent);
          if (event) {
            this.handleEditorEvent(event);
          }
        };
        element.addEventListener(type, handler);
        session.cleanup.push(() => element.removeEventListener(type, handler));
      }

      const focusHandler = () => {
        const primary = session.controls.primary;
        if (this.session === session && this.state === 'bound' && primary) {
          session.editor.onFocus(session.property, primary);
        }
      };
      element.addEventListener('focusin', focusHandler);
      session.cleanup.push(() => element.removeEventListener('focusin', focusHandler));
    }
  }

  private destroyControls(cancelled: boolean): void {
    const session = this.session;
    if (!session) {
      return;
    }
    this.state = 'destroying';
    for (const cleanup of session.cleanup) {
      cleanup();
    }
    for (const element of session.controls.getElements()) {
      element.remove();
    }
    this.session = null;
    this.state = 'inactive';
    this.emit('edit-ended', { property: session.property, cancelled });
  }
}

/**
 * Events that write a change immediately in deferred mode.
 */
function isCommittingEvent(event: EditorEvent): boolean {
  return event.type !== 'text-updated' && event.type !== 'key-down';
}
