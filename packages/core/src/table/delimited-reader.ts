import { MalformedInputError } from '../errors.js';

const QUOTE = '"';

export interface DelimitedLine {
  /** Cell values of the row, in column order */
  fields: string[];
  /** Offset of the first character of the next row */
  posAfterEnd: number;
  /** Line on which the row ended; larger than the starting line when a quoted cell spans lines */
  endLineNumber: number;
}

/**
 * Read one logical row of a separator-delimited buffer starting at `offset`.
 *
 * With `quotedFields`, a cell that starts with `"` runs to the matching
 * closing quote; `""` inside it is a literal quote and separators or line
 * breaks inside it are content. The line terminator ending the row is
 * consumed.
 *
 * @param lineNumber 1-based line on which `offset` lies, for error reporting
 */
export function readDelimitedLine(
  content: string,
  offset: number,
  lineNumber: number,
  separator: string,
  quotedFields: boolean
): DelimitedLine {
  if (separator.length !== 1) {
    throw new RangeError(`The field separator must be a single character, got '${separator}'`);
  }
  if (quotedFields && separator === QUOTE) {
    throw new RangeError('The field separator cannot be a quote when quoted fields are enabled');
  }

  if (offset >= content.length) {
    return { fields: [], posAfterEnd: content.length, endLineNumber: lineNumber };
  }

  const fields: string[] = [];
  const length = content.length;
  let current = '';
  let atFieldStart = true;
  let line = lineNumber;
  let lineStart = offset;
  let i = offset;

  while (i < length) {
    const char = content[i];

    if (quotedFields && atFieldStart && char === QUOTE) {
      const quoteStart = i;
      const quoteLine = line;
      const quoteColumn = quoteStart - lineStart + 1;
      i += 1;
      let closed = false;

      while (i < length) {
        const inner = content[i];
        if (inner === QUOTE) {
          if (content[i + 1] === QUOTE) {
            current += QUOTE;
            i += 2;
            continue;
          }
          closed = true;
          i += 1;
          break;
        }

        if (inner === '\r') {
          // CRLF inside a cell becomes a single \n; a lone CR is kept
          if (content[i + 1] === '\n') {
            i += 1;
            continue;
          }
          current += inner;
          line += 1;
          lineStart = i + 1;
          i += 1;
          continue;
        }

        if (inner === '\n') {
          line += 1;
          lineStart = i + 1;
        }
        current += inner;
        i += 1;
      }

      if (!closed) {
        throw new MalformedInputError(`Unclosed quote at ${quoteLine}:${quoteColumn}`, {
          lineNumber: quoteLine,
          columnNumber: quoteColumn,
          startPosition: quoteStart,
          endPosition: i,
        });
      }

      atFieldStart = false;
      continue;
    }

    if (char === separator) {
      fields.push(current);
      current = '';
      atFieldStart = true;
      i += 1;
      continue;
    }

    if (char === '\r' || char === '\n') {
      break;
    }

    current += char;
    atFieldStart = false;
    i += 1;
  }

  fields.push(current);

  if (i < length) {
    if (content[i] === '\r') {
      i += 1;
      if (content[i] === '\n') {
        i += 1;
      }
    } else if (content[i] === '\n') {
      i += 1;
    }
  }

  return { fields, posAfterEnd: i, endLineNumber: line };
}
