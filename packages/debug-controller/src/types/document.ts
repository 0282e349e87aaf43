export interface DebugDocument {
  /** `null` until the document has been saved under a name. */
  path: string | null;
  modified: boolean;
}

/**
 * Access to the editor's documents. Saving is the host's business; the
 * controller only asks for it.
 */
export interface DocumentSource {
  currentDocument(): DebugDocument | null;
  /** @returns the saved path, or `null` when the user declined to name it */
  save(document: DebugDocument): Promise<string | null>;
}

export interface ModeHost {
  changeMode(name: string): void;
}
