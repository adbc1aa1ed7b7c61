import type { DecisionTable, InsurerScope, LOB, RuleEntry } from '../types.js';
import {
  ALL_COMPANIES,
  COMPANY_STOP_WORDS,
  REST_OF_COMPANIES,
} from '../library/constants.js';
import { DecisionTableError } from '../library/errors.js';
import { normalizeSegment } from '../classify/segments.js';

/**
 * Upper-case, drop punctuation and the GENERAL / INSURANCE / CO / LTD noise
 * tokens. "ICICI Lombard General Insurance Co. Ltd." -> "ICICI LOMBARD".
 */
export function normalizeCompanyName(name: string): string {
  return name
    .toUpperCase()
    .replace(/[^A-Z0-9]+/g, ' ')
    .split(' ')
    .filter((token) => token && !COMPANY_STOP_WORDS.has(token))
    .join(' ');
}

/** Substring match in either direction; empty names never overlap. */
export function namesOverlap(a: string, b: string): boolean {
  if (!a || !b) return false;
  return a.includes(b) || b.includes(a);
}

export function matchesAnyName(company: string, names: Iterable<string>): boolean {
  for (const name of names) {
    if (namesOverlap(company, name)) return true;
  }
  return false;
}

/**
 * Key shared by rules that compete for the same companies.
 */
export function groupKey(lob: LOB, segmentPattern: string): string {
  return `${lob}::${normalizeSegment(segmentPattern)}`;
}

/**
 * Parse an insurer declaration: 'All Companies', 'Rest of Companies', a
 * comma-separated list, or an array of names.
 */
export function parseInsurerScope(spec: string | string[] | undefined): InsurerScope {
  if (spec === undefined) {
    return { kind: 'all' };
  }

  if (typeof spec === 'string') {
    const keyword = spec.trim().toUpperCase();
    if (keyword === '' || keyword === ALL_COMPANIES.toUpperCase()) {
      return { kind: 'all' };
    }
    if (keyword === REST_OF_COMPANIES.toUpperCase()) {
      return { kind: 'rest' };
    }
  }

  const raw = typeof spec === 'string' ? spec.split(',') : spec;
  const names = new Set(raw.map(normalizeCompanyName).filter(Boolean));
  if (names.size === 0) {
    throw new DecisionTableError(`Insurer list has no usable names: ${JSON.stringify(spec)}`);
  }
  return { kind: 'list', names };
}

/**
 * Union of explicitly listed companies per (lob, segment) group. Computed
 * once when the table is loaded.
 */
export function buildExclusionIndex(
  rules: readonly RuleEntry[]
): ReadonlyMap<string, ReadonlySet<string>> {
  const index = new Map<string, Set<string>>();
  for (const rule of rules) {
    if (rule.insurerScope.kind !== 'list') continue;
    const key = groupKey(rule.lob, rule.segmentPattern);
    const claimed = index.get(key) ?? new Set<string>();
    for (const name of rule.insurerScope.names) {
      claimed.add(name);
    }
    index.set(key, claimed);
  }
  return index;
}

/**
 * Whether `rule` applies to a company. `company` must already be normalized.
 */
export function scopeMatches(
  rule: RuleEntry,
  company: string,
  table: DecisionTable
): boolean {
  const scope = rule.insurerScope;
  switch (scope.kind) {
    case 'all':
      return true;
    case 'list':
      return matchesAnyName(company, scope.names);
    case 'rest': {
      const excluded = table.exclusions.get(groupKey(rule.lob, rule.segmentPattern));
      return !excluded || !matchesAnyName(company, excluded);
    }
  }
}

export function describeScope(scope: InsurerScope): string {
  switch (scope.kind) {
    case 'all':
      return ALL_COMPANIES;
    case 'rest':
      return REST_OF_COMPANIES;
    case 'list':
      return `{${[...scope.names].join(', ')}}`;
  }
}
