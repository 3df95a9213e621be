const SIMPLE_ESCAPES: Record<string, string> = {
  '"': '"',
  '\\': '\\',
  '/': '/',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
};

const HEX_PATTERN = /^[0-9A-Fa-f]{4}$/;

/**
 * Decode backslash escapes as used in JSON and TOML basic strings.
 * Unknown or incomplete sequences are kept as they are.
 */
export function unescapeString(value: string): string {
  if (!value.includes('\\')) {
    return value;
  }

  let result = '';
  let i = 0;

  while (i < value.length) {
    const char = value[i];
    if (char !== '\\') {
      result += char;
      i += 1;
      continue;
    }

    // trailing backslash is dropped
    if (i + 1 >= value.length) {
      break;
    }

    const next = value[i + 1];
    const simple = SIMPLE_ESCAPES[next];
    if (simple !== undefined) {
      result += simple;
      i += 2;
      continue;
    }

    if (next === 'u') {
      const hex = value.slice(i + 2, i + 6);
      if (HEX_PATTERN.test(hex)) {
        result += String.fromCharCode(parseInt(hex, 16));
        i += 6;
      } else {
        result += '\\u';
        i += 2;
      }
      continue;
    }

    result += `\\${next}`;
    i += 2;
  }

  return result;
}
