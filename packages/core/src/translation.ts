import { DuplicateKeyError } from './errors.js';
import type { EntryAnnotations, TranslationEntry } from './translation-entry.js';

export interface TranslationMetadata {
  locale?: string;
  context?: string;
  author?: string;
  lastModified?: Date;
}

/**
 * Entries of one locale keyed by their qualified (dot-joined) key.
 * Keys are unique; inserting a key twice is an error.
 */
export class Translation implements Iterable<TranslationEntry> {
  private readonly entries = new Map<string, TranslationEntry>();

  public locale?: string;
  public context?: string;
  public author?: string;
  public lastModified?: Date;
  /** Path of the file the translation was loaded from, when known */
  public originalFile?: string;
  public readonly customProperties = new Map<string, string>();

  constructor(metadata: TranslationMetadata = {}) {
    this.locale = metadata.locale;
    this.context = metadata.context;
    this.author = metadata.author;
    this.lastModified = metadata.lastModified;
  }

  public get size(): number {
    return this.entries.size;
  }

  public has(key: string): boolean {
    return this.entries.has(key);
  }

  public get(key: string): TranslationEntry | undefined {
    return this.entries.get(key);
  }

  /**
   * Insert a new entry. The existing entry is left untouched on conflict.
   * @param lineNumber Source line reported with a duplicate, when known
   */
  public add(entry: TranslationEntry, lineNumber?: number): TranslationEntry {
    if (this.entries.has(entry.key)) {
      throw new DuplicateKeyError(entry.key, lineNumber);
    }
    this.entries.set(entry.key, entry);
    return entry;
  }

  /**
   * Replace an existing entry with a copy carrying extra metadata.
   * Returns undefined when the key is unknown.
   */
  public annotate(key: string, annotations: EntryAnnotations): TranslationEntry | undefined {
    const existing = this.entries.get(key);
    if (!existing) {
      return undefined;
    }
    const updated: TranslationEntry = { ...existing, ...annotations };
    this.entries.set(key, updated);
    return updated;
  }

  public keys(): string[] {
    return Array.from(this.entries.keys());
  }

  public values(): TranslationEntry[] {
    return Array.from(this.entries.values());
  }

  public [Symbol.iterator](): Iterator<TranslationEntry> {
    return this.entries.values();
  }
}
