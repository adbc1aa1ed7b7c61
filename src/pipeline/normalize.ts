import type { PolicyRecord, RawRecord } from '../types.js';
import {
  DEFAULT_LOCATION,
  DEFAULT_POLICY_TYPE,
  REMARKS_SEPARATOR,
} from '../library/constants.js';
import { RecordShapeError } from '../library/errors.js';
import { classifyPayin } from '../classify/payin.js';

/**
 * Coerce an extracted record into a frozen `PolicyRecord`.
 * Accepts snake_case and camelCase keys (`policy_type` / `policyType`,
 * `remark` / `remarks`).
 */
export function normalizeRecord(raw: unknown): PolicyRecord {
  if (!isRawRecord(raw)) {
    throw new RecordShapeError(`Expected an object record, got ${describe(raw)}`);
  }

  const payin = raw.payin ?? raw.Payin;
  const { value, bracket } = classifyPayin(payin);

  return Object.freeze({
    segment: text(raw.segment),
    policyType: text(raw.policy_type ?? raw.policyType) || DEFAULT_POLICY_TYPE,
    location: text(raw.location) || DEFAULT_LOCATION,
    payinRaw: text(payin),
    payinValue: value,
    payinCategory: bracket,
    remarks: remarksText(raw.remark ?? raw.remarks),
  });
}

export function isRawRecord(value: unknown): value is RawRecord {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function text(value: unknown): string {
  if (value == null) return '';
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

function remarksText(value: unknown): string {
  if (Array.isArray(value)) {
    return value.map(text).filter(Boolean).join(REMARKS_SEPARATOR);
  }
  return text(value);
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
