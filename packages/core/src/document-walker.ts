import { InvalidDocumentError } from './errors.js';
import type { Translation } from './translation.js';
import { readEntryValue, type ValueReaderOptions } from './value-reader.js';

export type DocumentObject = Record<string, unknown>;

export const isDocumentObject = (value: unknown): value is DocumentObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export type DocumentWalkerOptions = ValueReaderOptions;

/**
 * Flattens a decoded document into dotted-key entries.
 *
 * String fields of an object are visited before its object fields, each in
 * document order. Arrays, numbers, booleans and null are ignored. Subclasses
 * change how fields are treated through the skip and visit hooks.
 */
export class DocumentWalker {
  constructor(protected readonly options: DocumentWalkerOptions) {}

  public walk(document: DocumentObject, translation: Translation, groupName = ''): Translation {
    const strings: Array<[string, string]> = [];
    const objects: Array<[string, DocumentObject]> = [];

    for (const [rawName, value] of Object.entries(document)) {
      if (typeof value === 'string') {
        strings.push([fieldName(rawName, groupName), value]);
      } else if (isDocumentObject(value)) {
        objects.push([fieldName(rawName, groupName), value]);
      }
    }

    for (const [name, value] of strings) {
      if (!this.skipStringField(name, value, groupName)) {
        this.visitStringField(name, value, translation, groupName);
      }
    }

    for (const [name, value] of objects) {
      if (!this.skipObjectField(name, value, groupName)) {
        this.visitObjectField(name, value, translation, groupName);
      }
    }

    return translation;
  }

  protected qualify(groupName: string, name: string): string {
    return groupName ? `${groupName}.${name}` : name;
  }

  protected skipStringField(_name: string, _value: string, _groupName: string): boolean {
    return false;
  }

  protected skipObjectField(_name: string, _value: DocumentObject, _groupName: string): boolean {
    return false;
  }

  protected visitStringField(name: string, value: string, translation: Translation, groupName: string): void {
    translation.add(readEntryValue(this.qualify(groupName, name), value, this.options));
  }

  protected visitObjectField(name: string, value: DocumentObject, translation: Translation, groupName: string): void {
    this.walk(value, translation, this.qualify(groupName, name));
  }
}

function fieldName(rawName: string, groupName: string): string {
  const name = rawName.trim();
  if (!name) {
    throw new InvalidDocumentError(
      groupName ? `Empty field name encountered in group '${groupName}'` : 'Empty field name encountered'
    );
  }
  return name;
}
