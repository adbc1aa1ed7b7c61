import type { Formula } from '../types.js';
import { DecisionTableError } from '../library/errors.js';

// ═══════════════════════════════════════════════════════════════════════════
// FORMULAS
// ═══════════════════════════════════════════════════════════════════════════
// percentOf    - "90% of Payin"
// subtractFlat - "-2%", "Less 2% of Payin"
// identity     - "Payin", also used when no rule matched

export const percentOf = (factor: number): Formula => ({ kind: 'percentOf', factor });
export const subtractFlat = (points: number): Formula => ({ kind: 'subtractFlat', points });
export const identity: Formula = Object.freeze({ kind: 'identity' });

const PERCENT_OF = /^(\d+(?:\.\d+)?)\s*%\s*OF\s+PAYIN$/;
const LESS = /^LESS\s+(\d+(?:\.\d+)?)\s*%(?:\s*OF\s+PAYIN)?$/;
const MINUS = /^-\s*(\d+(?:\.\d+)?)\s*%$/;

/**
 * Parse formula text as written in a decision table.
 */
export function parseFormula(text: string): Formula {
  const normalized = text.trim().toUpperCase().replace(/\s+/g, ' ');

  const percent = PERCENT_OF.exec(normalized);
  if (percent) {
    return percentOf(parseFloat(percent[1]) / 100);
  }

  const flat = LESS.exec(normalized) ?? MINUS.exec(normalized);
  if (flat) {
    return subtractFlat(parseFloat(flat[1]));
  }

  if (normalized === 'PAYIN' || normalized === 'IDENTITY') {
    return identity;
  }

  throw new DecisionTableError(`Unrecognized payout formula: "${text}"`);
}

/** Clamp at zero; payouts are never negative. */
export function clampPayout(value: number): number {
  return Math.max(0, value);
}

export function applyFormula(formula: Formula, payinValue: number): number {
  switch (formula.kind) {
    case 'percentOf':
      return clampPayout(payinValue * formula.factor);
    case 'subtractFlat':
      return clampPayout(payinValue - formula.points);
    case 'identity':
      return clampPayout(payinValue);
  }
}

/** Two decimals with a trailing %, e.g. "52.00%". */
export function formatPercent(value: number): string {
  return `${value.toFixed(2)}%`;
}

export function describeFormula(formula: Formula): string {
  switch (formula.kind) {
    case 'percentOf':
      return `${trimNumber(formula.factor * 100)}% of Payin`;
    case 'subtractFlat':
      return `-${trimNumber(formula.points)}%`;
    case 'identity':
      return 'Payin';
  }
}

// 0.9 * 100 is 90.00000000000001
function trimNumber(value: number): string {
  return String(Number(value.toFixed(4)));
}
