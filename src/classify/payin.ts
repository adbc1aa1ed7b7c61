import { PayinBracket, type PayinClassification } from '../types.js';
import { BRACKET_LABELS, BRACKET_UPPER_BOUNDS } from '../library/constants.js';

const DEFAULT_CLASSIFICATION: PayinClassification = {
  value: 0,
  bracket: PayinBracket.Below20,
};

/**
 * Parse a payin ("35%", " 35 ", 35, "N/A") and bucket it.
 * Never throws: anything unparseable becomes `0` / `Below20`.
 */
export function classifyPayin(raw: unknown): PayinClassification {
  const value = parsePayin(raw);
  if (value === null) {
    return { ...DEFAULT_CLASSIFICATION };
  }
  return { value, bracket: bracketFor(value) };
}

/** Bracket for a numeric payin; 20, 30 and 50 fall in the lower bracket. */
export function bracketFor(value: number): PayinBracket {
  for (const [bracket, upper] of BRACKET_UPPER_BOUNDS) {
    if (value <= upper) return bracket;
  }
  return PayinBracket.Above50;
}

export function bracketLabel(bracket: PayinBracket): string {
  return BRACKET_LABELS[bracket];
}

/** Finds a bracket label inside free text, e.g. a rule's remarks condition. */
export function parseBracketLabel(text: string): PayinBracket | undefined {
  const upper = text.toUpperCase();
  for (const bracket of Object.values(PayinBracket)) {
    if (upper.includes(BRACKET_LABELS[bracket].toUpperCase())) {
      return bracket;
    }
  }
  return undefined;
}

// Extraction writes discounts as negatives ("-25%"), so the sign is dropped
function parsePayin(raw: unknown): number | null {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? Math.abs(raw) : null;
  }
  if (typeof raw !== 'string') {
    return null;
  }

  const cleaned = raw.replace(/[%\s-]/g, '');
  if (!cleaned || cleaned.toUpperCase() === 'N/A') {
    return null;
  }
  if (!/^\d*\.?\d+$|^\d+\.$/.test(cleaned)) {
    return null;
  }

  const num = parseFloat(cleaned);
  return Number.isFinite(num) ? num : null;
}
