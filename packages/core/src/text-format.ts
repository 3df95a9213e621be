/**
 * Escaping modes that decide which placeholder syntax is recognized in entry
 * values and whether backslash escapes are decoded.
 *
 * - 'none': text is taken literally and never templated
 * - 'backslash': `\n`, `\t`, `\uXXXX`... are decoded; no placeholders
 * - 'arb': `{name}` placeholders, `'` quotes literal text, `''` is one quote
 * - 'arbNoEscaping': `{name}` placeholders, quotes carry no meaning
 * - 'composite': `{0}` / `{name}` placeholders, `{{` and `}}` are literal braces,
 *   backslash escapes are decoded
 * - 'doubleCurly': `{{ name }}` placeholders
 * - 'percentCurly': `%{name}` placeholders
 */
export type TextFormat =
  | 'none'
  | 'backslash'
  | 'arb'
  | 'arbNoEscaping'
  | 'composite'
  | 'doubleCurly'
  | 'percentCurly';

export const TEXT_FORMATS: readonly TextFormat[] = [
  'none',
  'backslash',
  'arb',
  'arbNoEscaping',
  'composite',
  'doubleCurly',
  'percentCurly',
];

export const isTextFormat = (value: unknown): value is TextFormat =>
  typeof value === 'string' && TEXT_FORMATS.some((format) => format === value);

/**
 * Modes in which stored values are backslash-escaped and should be kept in
 * both raw and decoded form.
 */
export function usesBackslashEscaping(format: TextFormat): boolean {
  return format === 'backslash' || format === 'composite';
}
