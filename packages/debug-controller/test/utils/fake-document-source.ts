import type { DebugDocument, DocumentSource } from '../../src/types/index.js';

export class FakeDocumentSource implements DocumentSource {
  public saveRequests = 0;

  public constructor(
    public document: DebugDocument | null,
    /** Path handed back by save; `null` means the user declined */
    public saveAs: string | null = null,
  ) {}

  public currentDocument(): DebugDocument | null {
    return this.document;
  }

  public save(document: DebugDocument): Promise<string | null> {
    this.saveRequests++;
    const saved = this.saveAs ?? (document.modified ? document.path : null);
    if (saved !== null) {
      document.path = saved;
      document.modified = false;
    }
    return Promise.resolve(saved);
  }
}
