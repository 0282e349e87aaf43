import type { LocalsMapping, StackSnapshot } from './stack.js';

/**
 * Notifications the controller sends to the editor.
 *
 * Line numbers are 0-based here.
 */
export interface UiSink {
  moveSelection(file: string, line: number): void;
  clearSelection(file: string): void;
  updateInspector(locals: LocalsMapping, frames: StackSnapshot): void;
  setMarker(file: string, line: number): void;
  clearMarker(file: string, line: number): void;
  clearAllMarkers(file: string): void;
  showStatus(text: string): void;
  setReadOnly(readOnly: boolean): void;
  enableAction(name: string, enabled: boolean): void;
  showInspector(): void;
  removeInspector(): void;
}
