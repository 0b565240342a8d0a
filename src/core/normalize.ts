const NAMESPACE_SEPARATOR = '::';
const ARRAY_ACCESSOR = /TryGet[\s\S]*Array/;
const BARE_REFERENCE = /(?<!\[\])&/g;
const WHITESPACE = /\s+/g;

function lastWhitespaceIndex(text: string): number {
  for (let i = text.length - 1; i >= 0; i--) {
    if (/\s/.test(text[i] ?? '')) return i;
  }
  return -1;
}

/**
 * Drop a leading return type: `ReturnType NS::Class::Method` -> `NS::Class::Method`.
 * Only whitespace before the first `::` counts.
 */
export function stripReturnType(name: string): string {
  const firstSeparator = name.indexOf(NAMESPACE_SEPARATOR);
  if (firstSeparator === -1) return name;
  const cut = lastWhitespaceIndex(name.slice(0, firstSeparator));
  return cut === -1 ? name : name.slice(cut + 1);
}

/**
 * The demangler prints array-by-reference arguments as plain references.
 * For `TryGet...Array` methods every bare `&` becomes `[]&`; one already
 * written as `[]&` is left alone.
 */
export function disambiguateArrayReferences(name: string): string {
  if (!ARRAY_ACCESSOR.test(name.replace(WHITESPACE, ''))) return name;
  return name.replace(BARE_REFERENCE, '[]&');
}

export function removeWhitespace(name: string): string {
  return name.replace(WHITESPACE, '');
}

/**
 * Canonical, whitespace-free form of a demangled symbol.
 *
 * Idempotent: `normalizeName(normalizeName(s)) === normalizeName(s)`.
 */
export function normalizeName(demangled: string): string {
  return removeWhitespace(disambiguateArrayReferences(stripReturnType(demangled)));
}
