import { LOB, type DecisionTable } from '../types.js';
import {
  COMP_KEYWORDS,
  CV_UPTO_KEYWORDS,
  TW_NEW_KEYWORDS,
  TW_SAOD_KEYWORDS,
} from '../library/constants.js';

// ═══════════════════════════════════════════════════════════════════════════
// SEGMENT MATCHING
// ═══════════════════════════════════════════════════════════════════════════
// CV    - "upto 2.5" tonnage bucket, everything else in the default bucket
// Bus   - SCHOOL, otherwise STAFF
// PvtCar- COMP family, or TP without COMP
// TW    - 1+5 / SAOD+COMP / TP (no COMP exclusion)
// Taxi, Misd - single segment


/** Upper-case and collapse whitespace. */
export function normalizeSegment(text: string): string {
  return text.toUpperCase().replace(/\s+/g, ' ').trim();
}

/**
 * Whether a rule's segment pattern applies to free text for the given LOB.
 */
export function segmentMatches(lob: LOB, pattern: string, text: string): boolean {
  const rule = normalizeSegment(pattern);
  const input = normalizeSegment(text);

  switch (lob) {
    case LOB.CV:
      return matchCv(rule, input);
    case LOB.Bus:
      return matchBus(rule, input);
    case LOB.PvtCar:
      return matchPvtCar(rule, input);
    case LOB.TW:
      return matchTw(rule, input);
    case LOB.Taxi:
    case LOB.Misd:
      return true;
    default:
      return input.includes(rule);
  }
}

/**
 * First segment pattern of `lob`, in table order, that applies to `text`.
 */
export function resolveSegment(
  lob: LOB,
  text: string,
  table: DecisionTable
): string | undefined {
  const seen = new Set<string>();
  for (const rule of table.rules) {
    if (rule.lob !== lob || seen.has(rule.segmentPattern)) continue;
    seen.add(rule.segmentPattern);
    if (segmentMatches(lob, rule.segmentPattern, text)) {
      return rule.segmentPattern;
    }
  }
  return undefined;
}

function matchCv(rule: string, input: string): boolean {
  const upto = hasAny(input, CV_UPTO_KEYWORDS);
  if (rule.includes('UPTO 2.5')) return upto;
  if (rule.includes('ALL GVW')) return !upto;
  return input.includes(rule);
}

function matchBus(rule: string, input: string): boolean {
  const school = input.includes('SCHOOL');
  if (rule.includes('SCHOOL')) return school;
  if (rule.includes('STAFF')) return input.includes('STAFF') || !school;
  return input.includes(rule);
}

function matchPvtCar(rule: string, input: string): boolean {
  if (rule.includes('COMP')) return hasAny(input, COMP_KEYWORDS);
  if (rule.includes('TP')) return input.includes('TP') && !input.includes('COMP');
  return input.includes(rule);
}

// Unlike PvtCar, TP here has no COMP exclusion
function matchTw(rule: string, input: string): boolean {
  if (rule.includes('1+5')) return hasAny(input, TW_NEW_KEYWORDS);
  if (rule.includes('SAOD') || rule.includes('COMP')) return hasAny(input, TW_SAOD_KEYWORDS);
  if (rule.includes('TP')) return input.includes('TP');
  return input.includes(rule);
}

function hasAny(input: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => input.includes(keyword));
}
