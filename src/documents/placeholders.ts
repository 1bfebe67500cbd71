const PLACEHOLDER_SOURCE = '\\[([^\\]]+)\\]';

const placeholderPattern = () => new RegExp(PLACEHOLDER_SOURCE, 'g');

/** Distinct placeholder names, in first-appearance order. */
export function extractPlaceholders(text: string): Set<string> {
  const names = new Set<string>();
  for (const match of text.matchAll(placeholderPattern())) {
    names.add(match[1]);
  }
  return names;
}

export function listPlaceholders(text: string): string[] {
  return [...extractPlaceholders(text)];
}

/**
 * Replaces every placeholder that has a value; the rest stay literal.
 */
export function substitutePlaceholders(
  text: string,
  values: Readonly<Record<string, string>>,
): string {
  return text.replace(placeholderPattern(), (token: string, name: string) =>
    Object.prototype.hasOwnProperty.call(values, name) ? values[name] : token,
  );
}

export function humanizePlaceholder(name: string): string {
  return name.replace(/_+/g, ' ').trim().toLowerCase();
}
