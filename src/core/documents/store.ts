/**
 * Document State Store
 *
 * Latest text and version of every document the editor has open. Versions
 * only move forward: an update carrying an older or equal version is ignored.
 */
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

export interface DocumentState {
  readonly id: string;
  readonly version: number;
  readonly text: string;
  /** Filesystem path for `file:` documents. */
  readonly filePath: string | null;
}

export class DocumentStore {
  private readonly documents = new Map<string, DocumentState>();
  private readonly byPath = new Map<string, string>();

  /**
   * Records new text. Returns false, leaving the store unchanged, when the
   * version is not newer than the stored one.
   */
  setText(id: string, version: number, text: string): boolean {
    const current = this.documents.get(id);
    if (current && version <= current.version) {
      return false;
    }

    const filePath = current?.filePath ?? documentPath(id);
    this.documents.set(id, { id, version, text, filePath });
    if (filePath) {
      this.byPath.set(filePath, id);
    }
    return true;
  }

  get(id: string): DocumentState | undefined {
    return this.documents.get(id);
  }

  getText(id: string): string | undefined {
    return this.documents.get(id)?.text;
  }

  getVersion(id: string): number | undefined {
    return this.documents.get(id)?.version;
  }

  /** The open document backed by `filePath`, if any. */
  findByPath(filePath: string): DocumentState | undefined {
    const id = this.byPath.get(path.resolve(filePath));
    return id === undefined ? undefined : this.documents.get(id);
  }

  remove(id: string): void {
    const current = this.documents.get(id);
    if (current?.filePath) {
      this.byPath.delete(current.filePath);
    }
    this.documents.delete(id);
  }

  ids(): string[] {
    return [...this.documents.keys()];
  }

  get size(): number {
    return this.documents.size;
  }
}

/**
 * Maps a document id to a filesystem path. `file:` URIs and plain absolute
 * paths are accepted; anything else (untitled buffers) has no path.
 */
export function documentPath(id: string): string | null {
  if (id.startsWith('file:')) {
    return fileURLToPath(id);
  }
  return path.isAbsolute(id) ? path.resolve(id) : null;
}
