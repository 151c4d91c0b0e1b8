/**
 * EditorRegistry - Maps editor names to editor instances.
 *
 * Created once by the application and passed to every grid that needs
 * to resolve editors. The registry keeps the instances it is given for
 * its whole lifetime; callers keep plain references.
 */

import { EditorError, EditorErrorCode } from '../errors';
import type { PropertyEditor } from './types';

export class EditorRegistry {
  private editors: Map<string, PropertyEditor> = new Map();

  /**
   * Register an editor under its name. A second editor with the same
   * name replaces the first.
   */
  register<E extends PropertyEditor>(editor: E, name: string = editor.getName()): E {
    if (!name) {
      throw new EditorError('Editor name must not be empty', EditorErrorCode.INVALID_EDITOR_NAME);
    }
    if (name !== editor.getName()) {
      throw new EditorError(
        `Editor named "${editor.getName()}" cannot be registered as "${name}"`,
        EditorErrorCode.INVALID_EDITOR_NAME,
        { name, editorName: editor.getName() }
      );
    }

    const previous = this.editors.get(name);
    if (previous && previous !== editor) {
      console.warn(`[EditorRegistry] Replacing editor "${name}"`);
    }
    this.editors.set(name, editor);
    return editor;
  }

  /**
   * Look up an editor by name.
   * @throws EditorError with code EDITOR_NOT_FOUND
   */
  resolve(name: string): PropertyEditor {
    const editor = this.editors.get(name);
    if (!editor) {
      throw new EditorError(`No editor registered as "${name}"`, EditorErrorCode.EDITOR_NOT_FOUND, { name });
    }
    return editor;
  }

  find(name: string): PropertyEditor | undefined {
    return this.editors.get(name);
  }

  has(name: string): boolean {
    return this.editors.has(name);
  }

  unregister(name: string): boolean {
    return this.editors.delete(name);
  }

  getNames(): string[] {
    return Array.from(this.editors.keys());
  }

  get size(): number {
    return this.editors.size;
  }
}
