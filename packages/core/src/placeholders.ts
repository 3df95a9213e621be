import type { TextFormat } from './text-format.js';

/**
 * Decides whether a value contains at least one placeholder.
 * Detectors must not throw; malformed syntax means "not templated".
 */
export type TemplateDetector = (text: string) => boolean;

export type TemplateSyntaxTable = Record<TextFormat, TemplateDetector>;

interface BraceSyntaxOptions {
  /** `'` toggles literal text and `''` stands for one quote */
  quoteEscapes: boolean;
  /** `{{` and `}}` stand for literal braces */
  doubledBraces: boolean;
}

function createBraceDetector(options: BraceSyntaxOptions): TemplateDetector {
  return (text: string): boolean => {
    let inQuotes = false;
    let openBraces = 0;
    let i = 0;

    while (i < text.length) {
      const char = text[i];
      const next = text[i + 1];

      if (options.quoteEscapes && char === "'" && next === "'") {
        i += 2;
        continue;
      }

      if (options.doubledBraces) {
        if (char === '{' && next === '{') {
          i += 2;
          continue;
        }
        // `}}` after an open brace closes it; the second brace is seen on the next round
        if (char === '}' && next === '}' && openBraces === 0) {
          i += 2;
          continue;
        }
      }

      if (options.quoteEscapes && char === "'") {
        inQuotes = !inQuotes;
        i += 1;
        continue;
      }

      if (!inQuotes) {
        if (char === '{') {
          openBraces += 1;
        } else if (char === '}') {
          // an unmatched closing brace ends detection
          return openBraces > 0;
        }
      }

      i += 1;
    }

    return false;
  };
}

function createPatternDetector(source: RegExp): TemplateDetector {
  return (text: string): boolean => new RegExp(source.source, source.flags.replace('g', '')).test(text);
}

const never: TemplateDetector = () => false;

export const DEFAULT_TEMPLATE_SYNTAXES: Readonly<TemplateSyntaxTable> = {
  none: never,
  backslash: never,
  arb: createBraceDetector({ quoteEscapes: true, doubledBraces: false }),
  arbNoEscaping: createBraceDetector({ quoteEscapes: false, doubledBraces: false }),
  composite: createBraceDetector({ quoteEscapes: false, doubledBraces: true }),
  doubleCurly: createPatternDetector(/\{\{\s*([A-Za-z0-9_.-]+)\s*\}\}/g),
  percentCurly: createPatternDetector(/%\{([A-Za-z0-9_.-]+)\}/g),
};

/**
 * Build a syntax table with some modes replaced by custom detectors.
 */
export function createTemplateSyntaxes(overrides: Partial<TemplateSyntaxTable> = {}): TemplateSyntaxTable {
  return { ...DEFAULT_TEMPLATE_SYNTAXES, ...overrides };
}

export function isTemplated(
  text: string,
  mode: TextFormat,
  syntaxes: Readonly<TemplateSyntaxTable> = DEFAULT_TEMPLATE_SYNTAXES
): boolean {
  if (!text) {
    return false;
  }
  const detector = syntaxes[mode] ?? never;
  try {
    return detector(text);
  } catch {
    // custom detectors are advisory too
    return false;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Placeholder metadata
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Describes one template parameter as declared by a source document.
 */
export interface Placeholder {
  readonly name: string;
  readonly type?: string;
  readonly format?: string;
  readonly example?: string;
  /** Unrecognized scalar attributes, stringified */
  readonly properties: Readonly<Record<string, string>>;
  /** String members of the `optionalParameters` object */
  readonly optionalParameters: Readonly<Record<string, string>>;
}

const OPTIONAL_PARAMETERS_KEY = 'optionalparameters';

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export function parsePlaceholder(name: string, record: Record<string, unknown>): Placeholder {
  let type: string | undefined;
  let format: string | undefined;
  let example: string | undefined;
  const properties: Record<string, string> = {};
  const optionalParameters: Record<string, string> = {};

  for (const [rawKey, value] of Object.entries(record)) {
    const key = rawKey.trim();
    const lowered = key.toLowerCase();

    if (lowered === OPTIONAL_PARAMETERS_KEY && isPlainObject(value)) {
      for (const [paramKey, paramValue] of Object.entries(value)) {
        if (typeof paramValue === 'string') {
          optionalParameters[paramKey.trim()] = paramValue;
        }
      }
      continue;
    }

    if (typeof value === 'string') {
      if (lowered === 'type') {
        type = value;
        continue;
      }
      if (lowered === 'format') {
        format = value;
        continue;
      }
      if (lowered === 'example') {
        example = value;
        continue;
      }
      properties[key] = value;
      continue;
    }

    if (typeof value === 'number' || typeof value === 'boolean') {
      properties[key] = String(value);
    }
  }

  return {
    name: name.trim(),
    type,
    format,
    example,
    properties,
    optionalParameters,
  };
}
