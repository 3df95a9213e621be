import type { Placeholder } from './placeholders.js';

export interface LiteralValue {
  readonly kind: 'literal';
  /** Text after decoding escapes, if the format uses them */
  readonly text: string;
  /** Text as written in the source, kept only when decoding changed it */
  readonly escapedText?: string;
}

export interface ReferenceValue {
  readonly kind: 'reference';
  /** Key (or file reference) whose text stands in for this entry */
  readonly key: string;
}

export type EntryValue = LiteralValue | ReferenceValue;

/**
 * One localizable key's parsed value plus the metadata collected for it.
 * Entries are replaced, never mutated, while a translation is being parsed.
 */
export interface TranslationEntry {
  readonly key: string;
  readonly value: EntryValue;
  readonly isTemplated: boolean;
  /** ARB target attribute (`key@attr`) */
  readonly target?: string;
  readonly description?: string;
  readonly type?: string;
  readonly context?: string;
  readonly sourceText?: string;
  readonly screen?: string;
  readonly video?: string;
  readonly placeholders?: readonly Placeholder[];
}

export type EntryAnnotations = Partial<
  Pick<
    TranslationEntry,
    'target' | 'description' | 'type' | 'context' | 'sourceText' | 'screen' | 'video' | 'placeholders'
  >
>;

export function createLiteralEntry(
  key: string,
  text: string,
  options: { escapedText?: string; isTemplated?: boolean } & EntryAnnotations = {}
): TranslationEntry {
  const { escapedText, isTemplated = false, ...annotations } = options;
  const value: LiteralValue =
    escapedText !== undefined ? { kind: 'literal', text, escapedText } : { kind: 'literal', text };
  return { ...annotations, key, value, isTemplated };
}

export function createReferenceEntry(key: string, reference: string, annotations: EntryAnnotations = {}): TranslationEntry {
  return { ...annotations, key, value: { kind: 'reference', key: reference }, isTemplated: false };
}

export function getEntryText(entry: TranslationEntry): string | undefined {
  return entry.value.kind === 'literal' ? entry.value.text : undefined;
}

export function getEntryReference(entry: TranslationEntry): string | undefined {
  return entry.value.kind === 'reference' ? entry.value.key : undefined;
}
