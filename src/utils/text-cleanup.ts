/**
 * Spacing repair for model-written prose.
 */

const CLEANUP_RULES: ReadonlyArray<readonly [RegExp, string]> = [
  // "in stock.We also" -> "in stock. We also"
  [/\.([A-Z])/g, '. $1'],
  // "stockWe" -> "stock We"
  [/([a-z])([A-Z])/g, '$1 $2'],
  // "5units" -> "5 units"
  [/(\d)([a-zA-Z])/g, '$1 $2'],
];

/**
 * Insert the spaces models tend to drop between sentences, words and numbers.
 *
 * Applying it twice gives the same result as applying it once.
 */
export function cleanResponseText(text: unknown): string {
  if (typeof text !== 'string') {
    return '';
  }
  let cleaned = text;
  for (const [pattern, replacement] of CLEANUP_RULES) {
    cleaned = cleaned.replace(pattern, replacement);
  }
  return cleaned;
}
