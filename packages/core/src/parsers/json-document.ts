import { InvalidDocumentError, MalformedInputError } from '../errors.js';
import { isDocumentObject, type DocumentObject } from '../document-walker.js';

const POSITION_PATTERN = /at position (\d+)/;

/**
 * Decode JSON text whose root must be an object.
 * Syntax errors carry a line and column when the runtime reports a position.
 */
export function decodeDocument(content: string): DocumentObject {
  const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;

  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const match = POSITION_PATTERN.exec(message);
    if (match) {
      const position = Number(match[1]);
      const { lineNumber, columnNumber } = locate(text, position);
      throw new MalformedInputError(message, { lineNumber, columnNumber, startPosition: position, endPosition: position }, error);
    }
    throw new InvalidDocumentError(message, error);
  }

  if (!isDocumentObject(decoded)) {
    throw new InvalidDocumentError('The document root must be an object');
  }
  return decoded;
}

function locate(text: string, position: number): { lineNumber: number; columnNumber: number } {
  let lineNumber = 1;
  let lineStart = 0;
  const end = Math.min(position, text.length);
  for (let i = 0; i < end; i++) {
    if (text[i] === '\n') {
      lineNumber += 1;
      lineStart = i + 1;
    }
  }
  return { lineNumber, columnNumber: end - lineStart + 1 };
}
