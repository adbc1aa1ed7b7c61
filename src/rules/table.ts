import * as fs from 'fs';
import { z } from 'zod';
import { LOB, type DecisionTable, type RuleEntry, type RuleSpec } from '../types.js';
import { LOB_CODES, NIL_CONDITION } from '../library/constants.js';
import { DecisionTableError, errorMessage } from '../library/errors.js';
import { normalizeSegment } from '../classify/segments.js';
import { parseFormula } from './formula.js';
import { buildExclusionIndex, parseInsurerScope } from './scope.js';

export const ruleSpecSchema = z.object({
  lob: z.string().min(1, 'lob is required'),
  segment: z.string().min(1, 'segment is required'),
  insurers: z.union([z.string(), z.array(z.string())]).optional(),
  formula: z.string().min(1, 'formula is required'),
  remarks: z.string().optional(),
});

// Bare arrays are wrapped as `{ rules }`
export const decisionTableFileSchema = z.preprocess(
  (value) => (Array.isArray(value) ? { rules: value } : value),
  z.object({ rules: z.array(ruleSpecSchema).min(1, 'decision table cannot be empty') })
);

/**
 * Build the immutable table from ordered rule specs. Declaration order is
 * evaluation order.
 */
export function loadDecisionTable(specs: readonly RuleSpec[]): DecisionTable {
  if (specs.length === 0) {
    throw new DecisionTableError('decision table cannot be empty');
  }

  const rules = specs.map((spec, index) => {
    try {
      return parseRule(spec, index);
    } catch (error) {
      throw new DecisionTableError(`Invalid rule #${index}: ${errorMessage(error)}`, error);
    }
  });

  return Object.freeze({
    rules: Object.freeze(rules),
    exclusions: buildExclusionIndex(rules),
  });
}

/**
 * Load a table from a JSON file holding either `{ "rules": [...] }` or a
 * bare array of rule specs.
 */
export function loadDecisionTableFile(filePath: string): DecisionTable {
  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new DecisionTableError(
      `Failed to read decision table ${filePath}: ${errorMessage(error)}`,
      error
    );
  }

  const parsed = decisionTableFileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? ` at ${issue.path.join('.')}` : '';
    throw new DecisionTableError(
      `Invalid decision table ${filePath}${where}: ${issue?.message ?? 'unknown error'}`,
      parsed.error
    );
  }

  return loadDecisionTable(parsed.data.rules);
}

/**
 * Accepts table codes ('PVT CAR') as well as enum names ('PvtCar').
 */
export function parseLob(code: string): LOB {
  const wanted = normalizeSegment(code);
  for (const lob of Object.values(LOB)) {
    if (lob === LOB.Unknown) continue;
    if (LOB_CODES[lob] === wanted || lob.toUpperCase() === wanted) {
      return lob;
    }
  }
  throw new DecisionTableError(`Unknown LOB "${code}"`);
}

function parseRule(spec: RuleSpec, index: number): RuleEntry {
  const segmentPattern = spec.segment.trim();
  if (!segmentPattern) {
    throw new DecisionTableError('segment is required');
  }

  return Object.freeze({
    index,
    lob: parseLob(spec.lob),
    segmentPattern,
    insurerScope: Object.freeze(parseInsurerScope(spec.insurers)),
    payoutFormula: Object.freeze(parseFormula(spec.formula)),
    formulaText: spec.formula.trim(),
    remarksCondition: spec.remarks?.trim() || NIL_CONDITION,
  });
}
