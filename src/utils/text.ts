export const HIGHLIGHT_PRE_TAG = '__ais-highlight__';
export const HIGHLIGHT_POST_TAG = '__/ais-highlight__';

const FORMULA_PREFIX = /^[=+-]/;

// ignoreBOM keeps a leading U+FEFF in the output instead of dropping it.
const strictUtf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

function reinterpretLatin1AsUtf8(value: string): string {
  const bytes = new Uint8Array(value.length);
  for (let i = 0; i < value.length; i += 1) {
    const code = value.charCodeAt(i);
    if (code > 0xff) {
      return value;
    }
    bytes[i] = code;
  }

  try {
    return strictUtf8.decode(bytes);
  } catch {
    return value;
  }
}

/**
 * Undoes UTF-8 text that was decoded as Latin-1 ("ZÃ¼rich" -> "Zürich").
 * Text that does not round-trip is returned unchanged, and the repair is
 * repeated until it settles, so applying it twice equals applying it once.
 */
export function repairEncoding(value: string): string {
  let current = value;
  for (;;) {
    const next = reinterpretLatin1AsUtf8(current);
    if (next === current) {
      return current;
    }
    current = next;
  }
}

export function slugify(...parts: Array<string | undefined>): string {
  if (parts.length === 0 || parts.some((part) => part === undefined || part.trim() === '')) {
    return '';
  }

  return parts
    .map((part) => (part ?? '').toLowerCase())
    .join('-')
    .replace(/[^a-z0-9-]+/g, '-')
    .replace(/-{2,}/g, '-')
    .replace(/^-+|-+$/g, '');
}

export function stripHighlightTags(value: string): string {
  return value.split(HIGHLIGHT_PRE_TAG).join('').split(HIGHLIGHT_POST_TAG).join('');
}

// Spreadsheet apps evaluate cells starting with these characters.
export function guardFormula(value: string): string {
  return FORMULA_PREFIX.test(value) ? `'${value}` : value;
}
