/**
 * Numeric parsing for locale-ambiguous export values.
 */

// Longer markers first so `US$` and `Bs.` are removed whole.
const CURRENCY_MARKERS = ['US$', 'Bs.', 'Bs', '$', '€', '¢'] as const;

const DECIMAL_LITERAL_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

const count = (text: string, ch: string): number => text.split(ch).length - 1;

/**
 * Parses a plain decimal float literal (`12`, `-0.5`, `1e3`).
 * Surrounding whitespace is allowed; anything else yields null.
 */
export const parseDecimalLiteral = (text: string): number | null => {
  const trimmed = text.trim();
  if (!DECIMAL_LITERAL_RE.test(trimmed)) return null;

  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
};

/**
 * Converts a free-form numeric value to a number.
 *
 * Separator rules, applied after stripping currency markers and whitespace:
 * - one comma placed after at least one period (`1.234,56`): periods are
 *   thousands separators and the comma is the decimal point
 * - one comma and no period (`1234,56`): the comma is the decimal point
 * - anything else (`1,234.56`, `1,234,567`): commas are thousands separators
 *
 * `1,234` therefore reads as 1.234. That ambiguity is not resolvable from the
 * text alone.
 */
export const toNumber = (value: unknown): number | null => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') return null;

  let text = value.trim();
  for (const marker of CURRENCY_MARKERS) {
    text = text.replaceAll(marker, '');
  }
  text = text.replace(/\s+/g, '');

  const commas = count(text, ',');
  const lastPeriod = text.lastIndexOf('.');

  if (commas === 1 && lastPeriod !== -1 && text.indexOf(',') > lastPeriod) {
    text = text.replaceAll('.', '').replace(',', '.');
  } else if (commas === 1 && lastPeriod === -1) {
    text = text.replace(',', '.');
  } else {
    text = text.replaceAll(',', '');
  }

  return parseDecimalLiteral(text);
};
