/**
 * Whole-document persistence keyed by name. Writes replace the full document;
 * implementations must never expose a partially written one.
 */
export interface DocumentStorePort {
  write(key: string, content: string): void;
  read(key: string): string | null;
  remove(key: string): boolean;
  exists(key: string): boolean;
  /** Keys currently stored, sorted. */
  keys(): string[];
  /** Modification time in ms since epoch, or null when the document is absent. */
  modifiedAt(key: string): number | null;
  /** Filesystem location of the document (it may not exist yet). */
  locate(key: string): string;
}
