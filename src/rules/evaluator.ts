import type {
  ConditionKind,
  DecisionTable,
  LOB,
  MatchResult,
  PolicyRecord,
  RuleEntry,
} from '../types.js';
import { LOB_CODES, NIL_CONDITION } from '../library/constants.js';
import { silentLogger, type Logger } from '../library/logger.js';
import { bracketLabel, parseBracketLabel } from '../classify/payin.js';
import { normalizeSegment } from '../classify/segments.js';
import { describeScope, normalizeCompanyName, scopeMatches } from './scope.js';

export interface EvaluatorOptions {
  logger?: Logger;
}

export interface Evaluator {
  readonly table: DecisionTable;
  evaluate(
    record: PolicyRecord,
    lob: LOB,
    segmentLabel: string | undefined,
    companyName: string
  ): MatchResult;
}

/**
 * Bind an evaluator to one table. The table is never mutated; evaluating a
 * record touches no state outside the call.
 */
export function createEvaluator(
  table: DecisionTable,
  options: EvaluatorOptions = {}
): Evaluator {
  const logger = options.logger ?? silentLogger;

  return {
    table,
    evaluate(record, lob, segmentLabel, companyName) {
      const company = normalizeCompanyName(companyName);
      const segment = segmentLabel === undefined ? undefined : normalizeSegment(segmentLabel);

      for (const rule of table.rules) {
        if (rule.lob !== lob) continue;
        if (segment === undefined || normalizeSegment(rule.segmentPattern) !== segment) continue;
        if (!scopeMatches(rule, company, table)) continue;

        const condition = checkCondition(rule, record);
        if (!condition) continue;

        if (condition === 'informational') {
          logger.warn(
            `Rule #${rule.index} (${rule.segmentPattern}) matched on unenforced remarks '${rule.remarksCondition}'`
          );
        }

        return {
          rule,
          condition,
          explanation: explainMatch(rule, record),
        };
      }

      const explanation = `no rule for ${LOB_CODES[lob]}/${segmentLabel ?? record.segment}/${company || '(no company)'}`;
      logger.debug(explanation);
      return { explanation };
    },
  };
}

/**
 * Remarks condition of a rule against a record. NIL and blank always pass,
 * bracket phrases must equal the record's bracket, anything else passes but
 * is reported as informational.
 */
export function checkCondition(
  rule: RuleEntry,
  record: PolicyRecord
): ConditionKind | undefined {
  const condition = rule.remarksCondition.trim();
  if (condition === '' || condition.toUpperCase() === NIL_CONDITION) {
    return 'unconditional';
  }

  const bracket = parseBracketLabel(condition);
  if (bracket !== undefined) {
    return bracket === record.payinCategory ? 'bracket' : undefined;
  }

  return 'informational';
}

function explainMatch(rule: RuleEntry, record: PolicyRecord): string {
  return (
    `Matched: LOB=${LOB_CODES[rule.lob]}, ` +
    `Segment='${rule.segmentPattern}', ` +
    `Insurer=${describeScope(rule.insurerScope)}, ` +
    `REMARKS='${rule.remarksCondition}', ` +
    `PayinCat='${bracketLabel(record.payinCategory)}'`
  );
}
